// Shared types and schemas for the project

export * from './schema';
export * from './enums';
export * from './types';

// Utilities (errors, tag normalization, random source, urls)
export * from './utils';
