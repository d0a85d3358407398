import type { RandomSource } from '@crate-digger/shared';
import {
  RecommendationMode,
  defaultRandom,
  sampleWithoutReplacement,
} from '@crate-digger/shared';
import {
  BaseRecommendationStrategy,
  type OccurrenceEntry,
  type OccurrenceMap,
} from './base-strategy';

/**
 * Items whose overlap count reaches the threshold
 */
export type PoolAt<T> = (threshold: number) => readonly T[];

export interface FallbackAttempt {
  threshold: number;
  poolSize: number;
}

export interface SampleOutcome<T> {
  items: T[];
  /**
   * Threshold in effect when sampling stopped
   */
  finalOverlap: number;
  attempts: FallbackAttempt[];
}

/**
 * Pool function over occurrence counts; items keep first-seen order
 */
export function buildOverlapPool(
  occurrences: OccurrenceMap
): PoolAt<OccurrenceEntry> {
  const entries = [...occurrences.values()];
  return (threshold) => entries.filter((entry) => entry.count >= threshold);
}

/**
 * Random Sample Strategy
 *
 * Uniform pick among items at or above an overlap threshold. With fallback
 * enabled the threshold is lowered one step at a time until the pool is big
 * enough or the threshold reaches 1.
 */
export class RandomSampleStrategy extends BaseRecommendationStrategy {
  readonly name = RecommendationMode.RANDOM;

  constructor(private readonly random: RandomSource = defaultRandom) {
    super();
  }

  sampleWithFallback<T>(
    poolAt: PoolAt<T>,
    numItems: number,
    minOverlap: number,
    useFallback: boolean
  ): SampleOutcome<T> {
    this.requireInteger('sampleWithFallback', 'numItems', numItems, 1);
    this.requireInteger('sampleWithFallback', 'minOverlap', minOverlap, 1);

    const attempts: FallbackAttempt[] = [];
    let threshold = minOverlap;

    for (;;) {
      const pool = poolAt(threshold);
      attempts.push({ threshold, poolSize: pool.length });

      if (pool.length >= numItems) {
        return {
          items: sampleWithoutReplacement(pool, numItems, this.random),
          finalOverlap: threshold,
          attempts,
        };
      }

      if (!useFallback || threshold <= 1) {
        return { items: [...pool], finalOverlap: threshold, attempts };
      }

      threshold -= 1;
    }
  }
}
