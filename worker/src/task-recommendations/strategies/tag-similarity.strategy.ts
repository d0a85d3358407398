import type { Item, SeedItem, SimilarityResult } from '@crate-digger/shared';
import { RecommendationMode, normalizeTagSet } from '@crate-digger/shared';
import { BaseRecommendationStrategy } from './base-strategy';

/**
 * Normalized tag -> number of candidates carrying it, plus the corpus size
 */
export interface DocumentFrequency {
  readonly totalCandidates: number;
  readonly counts: ReadonlyMap<string, number>;
}

export interface SimilarityRankingOptions {
  /**
   * Excluded from the results when given
   */
  seed?: SeedItem;
  /**
   * Reported as supportersCount; 0 when absent
   */
  supportersCountOf?: (item: Item) => number;
}

export function buildDocumentFrequency(
  candidates: readonly Item[]
): DocumentFrequency {
  const counts = new Map<string, number>();
  for (const candidate of candidates) {
    for (const tag of normalizeTagSet(candidate.tags)) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }
  return { totalCandidates: candidates.length, counts };
}

/**
 * IDF-weighted Jaccard over two normalized tag sets, in [0, 1].
 *
 * weight(tag) = max(0, log(N / (1 + df))). When every tag in the union weighs
 * 0 the plain Jaccard index is returned instead.
 */
export function weightedJaccard(
  seedTags: ReadonlySet<string>,
  candidateTags: ReadonlySet<string>,
  documentFrequency: DocumentFrequency
): number {
  if (seedTags.size === 0 || candidateTags.size === 0) return 0;

  const { totalCandidates, counts } = documentFrequency;
  const weight = (tag: string): number => {
    if (totalCandidates === 0) return 0;
    const df = counts.get(tag) ?? 0;
    return Math.max(0, Math.log(totalCandidates / (1 + df)));
  };

  let intersection = 0;
  let union = 0;
  let intersectionSize = 0;
  let unionSize = 0;

  for (const tag of seedTags) {
    const w = weight(tag);
    union += w;
    unionSize += 1;
    if (candidateTags.has(tag)) {
      intersection += w;
      intersectionSize += 1;
    }
  }
  for (const tag of candidateTags) {
    if (seedTags.has(tag)) continue;
    union += weight(tag);
    unionSize += 1;
  }

  const score = union > 0 ? intersection / union : intersectionSize / unionSize;
  return Math.min(1, Math.max(0, score));
}

/**
 * Tag Similarity Strategy
 *
 * Scores candidates by how much of the seed's tag vocabulary they share,
 * rare tags counting more than common ones.
 */
export class TagSimilarityStrategy extends BaseRecommendationStrategy {
  readonly name = RecommendationMode.TAG_SIMILARITY;

  rankByTagSimilarity(
    seedTags: Iterable<string>,
    candidates: readonly Item[],
    documentFrequency: DocumentFrequency,
    minSimilarity: number,
    maxResults: number,
    options: SimilarityRankingOptions = {}
  ): SimilarityResult[] {
    this.requireUnitInterval(
      'rankByTagSimilarity',
      'minSimilarity',
      minSimilarity
    );
    this.requireInteger('rankByTagSimilarity', 'maxResults', maxResults, 0);

    if (candidates.length === 0) return [];

    const seedSet = normalizeTagSet(seedTags);
    const supportersCountOf = options.supportersCountOf ?? (() => 0);

    const scored = candidates
      .filter((item) => !this.isSeed(item, options.seed))
      .map((item) => ({
        item,
        score: weightedJaccard(
          seedSet,
          normalizeTagSet(item.tags),
          documentFrequency
        ),
      }))
      .filter(({ score }) => score >= minSimilarity);

    return this.rankDescending(scored, (entry) => entry.score)
      .slice(0, maxResults)
      .map(({ item, score }) => ({
        kind: RecommendationMode.TAG_SIMILARITY,
        item,
        similarityScore: score,
        supportersCount: supportersCountOf(item),
      }));
  }
}
