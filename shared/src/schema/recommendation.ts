import { z } from 'zod';
import { RecommendationMode } from '../enums';
import type { Item } from './item';

/**
 * Recommendation results as produced by the strategies.
 * One variant per mode; never mutated after creation.
 */
export interface OverlapResult {
  readonly kind: RecommendationMode.OVERLAP;
  readonly item: Item;
  readonly supportersCount: number;
}

export interface SimilarityResult {
  readonly kind: RecommendationMode.TAG_SIMILARITY;
  readonly item: Item;
  readonly similarityScore: number;
  readonly supportersCount: number;
}

export interface RandomPickResult {
  readonly kind: RecommendationMode.RANDOM;
  readonly item: Item;
  readonly overlapCount: number;
  readonly finalOverlap?: number;
}

export type RecommendationResult =
  | OverlapResult
  | SimilarityResult
  | RandomPickResult;

/**
 * External shapes handed back to callers
 */
const ItemViewSchema = z.object({
  itemTitle: z.string(),
  bandName: z.string(),
  itemUrl: z.string(),
});

export const OverlapRecommendationSchema = ItemViewSchema.extend({
  supportersCount: z.number().int().min(1),
  tags: z.array(z.string()).optional(),
});

export const SimilarRecommendationSchema = ItemViewSchema.extend({
  tags: z.array(z.string()),
  similarityScore: z.number().min(0).max(1),
  supportersCount: z.number().int().min(0),
});

export const RandomItemSchema = ItemViewSchema.extend({
  tags: z.array(z.string()),
  overlapCount: z.number().int().min(0),
  finalOverlap: z.number().int().min(1).optional(),
});

export type OverlapRecommendation = z.infer<typeof OverlapRecommendationSchema>;
export type SimilarRecommendation = z.infer<typeof SimilarRecommendationSchema>;
export type RandomItem = z.infer<typeof RandomItemSchema>;

export type RecommendationView =
  | OverlapRecommendation
  | SimilarRecommendation
  | RandomItem;
