export const QUEUE_NAMES = {
  RECOMMENDATIONS: 'recommendations',
} as const;

/**
 * Defaults for every recommendation job. Fetch failures are absorbed inside a
 * job, so a failed attempt means something above the fetch layer broke.
 */
export const DEFAULT_JOB_OPTIONS = {
  attempts: 3,
  backoff: { type: 'exponential', delay: 5000 },
  removeOnComplete: { age: 24 * 3600, count: 1000 },
  removeOnFail: { age: 7 * 24 * 3600 },
} as const;
