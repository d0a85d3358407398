/**
 * Base Strategy for the recommendation engine
 *
 * Strategies are pure: they take what the fetch stage collected (collections,
 * tags, occurrence counts) and turn it into ordered, tagged results. Nothing
 * here performs I/O.
 */

import type { Item, SeedItem } from '@crate-digger/shared';
import {
  InvalidArgument,
  RecommendationMode,
  normalizeItemUrl,
} from '@crate-digger/shared';

/**
 * How many distinct supporter collections contain an item,
 * plus where it was first seen (used as tie-break)
 */
export interface OccurrenceEntry {
  item: Item;
  count: number;
  firstSeen: number;
}

/**
 * Occurrences keyed by item id, in first-seen order
 */
export type OccurrenceMap = ReadonlyMap<string, OccurrenceEntry>;

export interface IRecommendationStrategy {
  /**
   * Strategy identifier
   */
  readonly name: RecommendationMode;
}

/**
 * Abstract base class for recommendation strategies
 *
 * Provides the shared seed exclusion, ranking and argument checks.
 */
export abstract class BaseRecommendationStrategy implements IRecommendationStrategy {
  abstract readonly name: RecommendationMode;

  /**
   * Helper: True when the item is the seed (by id, or by url when the seed id
   * is unknown)
   */
  protected isSeed(item: Item, seed: SeedItem | undefined): boolean {
    if (!seed) return false;
    if (seed.id !== null && item.id === seed.id) return true;
    return normalizeItemUrl(item.url) === normalizeItemUrl(seed.url);
  }

  /**
   * Helper: Sort descending by score; equal scores keep their input order
   */
  protected rankDescending<T>(
    entries: readonly T[],
    scoreOf: (entry: T) => number
  ): T[] {
    return entries
      .map((entry, index) => ({ entry, index, score: scoreOf(entry) }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .map(({ entry }) => entry);
  }

  /**
   * Helper: Reject a bad numeric argument before any work is done
   */
  protected requireInteger(
    operation: string,
    field: string,
    value: number,
    min: number
  ): void {
    if (!Number.isInteger(value) || value < min) {
      const issue = `${field}: must be an integer >= ${min}`;
      throw new InvalidArgument(
        `Invalid arguments for ${operation}: ${issue}`,
        [issue],
        { operation }
      );
    }
  }

  protected requireUnitInterval(
    operation: string,
    field: string,
    value: number
  ): void {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      const issue = `${field}: must be between 0 and 1`;
      throw new InvalidArgument(
        `Invalid arguments for ${operation}: ${issue}`,
        [issue],
        { operation }
      );
    }
  }
}
