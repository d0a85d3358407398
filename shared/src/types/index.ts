export * from './progress';
export * from './collaborators';
