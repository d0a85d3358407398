export * from './errors';
export * from './tags';
export * from './random';
export * from './url';
