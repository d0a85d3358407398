export * from './base-strategy';
export * from './occurrences';
export * from './supporter-overlap.strategy';
export * from './tag-similarity.strategy';
export * from './random-sample.strategy';
