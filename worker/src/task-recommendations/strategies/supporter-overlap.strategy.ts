import type {
  Collection,
  OverlapResult,
  SeedItem,
  Supporter,
} from '@crate-digger/shared';
import { RecommendationMode } from '@crate-digger/shared';
import { BaseRecommendationStrategy } from './base-strategy';
import { countOccurrences } from './occurrences';

/**
 * Supporter Overlap Strategy
 *
 * Items bought by several supporters of the seed rank higher. Each supporter
 * contributes at most one vote per item.
 */
export class SupporterOverlapStrategy extends BaseRecommendationStrategy {
  readonly name = RecommendationMode.OVERLAP;

  rankByOverlap(
    seed: SeedItem,
    supporters: readonly Supporter[],
    collectionOf: (supporter: Supporter) => Collection,
    minSupporters: number,
    maxResults: number
  ): OverlapResult[] {
    this.requireInteger('rankByOverlap', 'minSupporters', minSupporters, 1);
    this.requireInteger('rankByOverlap', 'maxResults', maxResults, 0);

    const occurrences = countOccurrences(
      supporters.map((supporter) => collectionOf(supporter)),
      seed
    );

    const qualifying = [...occurrences.values()].filter(
      (entry) => entry.count >= minSupporters && !this.isSeed(entry.item, seed)
    );

    return this.rankDescending(qualifying, (entry) => entry.count)
      .slice(0, maxResults)
      .map((entry) => ({
        kind: RecommendationMode.OVERLAP,
        item: entry.item,
        supportersCount: entry.count,
      }));
  }
}
