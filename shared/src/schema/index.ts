export * from './item';
export * from './recommendation';
export * from './request';
export * from './job';
