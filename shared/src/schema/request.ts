import { z } from 'zod';
import { isItemUrl } from '../utils/url';

/**
 * Input schemas for the three recommendation entry points.
 * Parsed before any fetching starts; a failure becomes InvalidArgument.
 */

export const SeedUrlSchema = z
  .string()
  .trim()
  .min(1, 'Seed url is required')
  .refine(isItemUrl, 'Seed url must be an http(s) album or track url');

export const OverlapOptionsSchema = z.object({
  maxRecommendations: z.number().int().min(0).default(10),
  minSupporters: z.number().int().min(1).default(2),
  includeTags: z.boolean().default(false),
});

export const TagSimilarityOptionsSchema = z.object({
  maxRecommendations: z.number().int().min(0).default(10),
  minSimilarity: z
    .number()
    .min(0, 'minSimilarity must be within [0, 1]')
    .max(1, 'minSimilarity must be within [0, 1]')
    .default(0.1),
  maxSupporters: z.number().int().min(1).optional(),
});

export const RandomItemsOptionsSchema = z.object({
  numItems: z.number().int().min(1, 'numItems must be greater than 0'),
  numSupporters: z.number().int().min(1).default(20),
  useWishlist: z.boolean().default(false),
  minOverlap: z.number().int().min(1).optional(),
  useFallback: z.boolean().default(false),
  includeTags: z.boolean().default(false),
});

export type OverlapOptionsInput = z.input<typeof OverlapOptionsSchema>;
export type OverlapOptions = z.output<typeof OverlapOptionsSchema>;

export type TagSimilarityOptionsInput = z.input<
  typeof TagSimilarityOptionsSchema
>;
export type TagSimilarityOptions = z.output<typeof TagSimilarityOptionsSchema>;

export type RandomItemsOptionsInput = z.input<typeof RandomItemsOptionsSchema>;
export type RandomItemsOptions = z.output<typeof RandomItemsOptionsSchema>;
