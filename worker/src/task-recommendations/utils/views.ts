import type {
  Item,
  OverlapRecommendation,
  OverlapResult,
  RandomItem,
  RandomPickResult,
  SimilarRecommendation,
  SimilarityResult,
} from '@crate-digger/shared';

function itemView(item: Item): {
  itemTitle: string;
  bandName: string;
  itemUrl: string;
} {
  return { itemTitle: item.title, bandName: item.artist, itemUrl: item.url };
}

/**
 * Tags are attached only when they were fetched for this request
 */
export function toOverlapView(
  result: OverlapResult,
  tags?: readonly string[]
): OverlapRecommendation {
  const view: OverlapRecommendation = {
    ...itemView(result.item),
    supportersCount: result.supportersCount,
  };
  if (tags) {
    view.tags = [...tags];
  }
  return view;
}

export function toSimilarView(
  result: SimilarityResult
): SimilarRecommendation {
  return {
    ...itemView(result.item),
    tags: [...result.item.tags],
    similarityScore: result.similarityScore,
    supportersCount: result.supportersCount,
  };
}

export function toRandomView(
  result: RandomPickResult,
  tags: readonly string[] = []
): RandomItem {
  const view: RandomItem = {
    ...itemView(result.item),
    tags: [...tags],
    overlapCount: result.overlapCount,
  };
  if (result.finalOverlap !== undefined) {
    view.finalOverlap = result.finalOverlap;
  }
  return view;
}
