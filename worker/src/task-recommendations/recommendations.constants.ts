/**
 * Injection token for the RandomSource used by sampling strategies
 */
export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');
