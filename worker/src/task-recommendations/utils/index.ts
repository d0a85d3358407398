/**
 * Recommendation utilities
 *
 * - Bounded fetch pool with input-ordered outcomes
 * - Request-scoped memo store
 * - Progress tracking (ETA) and the BullMQ progress bridge
 * - Result views
 */

export * from './fetch-pool';
export * from './request-memo';
export * from './progress-tracker';
export * from './job-progress-reporter';
export * from './views';
