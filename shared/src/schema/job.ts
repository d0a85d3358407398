import { z } from 'zod';
import { RecommendationMode } from '../enums';
import {
  OverlapOptionsSchema,
  RandomItemsOptionsSchema,
  SeedUrlSchema,
  TagSimilarityOptionsSchema,
} from './request';
import type {
  OverlapRecommendation,
  RandomItem,
  SimilarRecommendation,
} from './recommendation';

/**
 * Payload of a queued recommendation request, discriminated by mode
 */
export const RecommendationJobDataSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal(RecommendationMode.OVERLAP),
    seedUrl: SeedUrlSchema,
    options: OverlapOptionsSchema.default({}),
  }),
  z.object({
    mode: z.literal(RecommendationMode.TAG_SIMILARITY),
    seedUrl: SeedUrlSchema,
    options: TagSimilarityOptionsSchema.default({}),
  }),
  z.object({
    mode: z.literal(RecommendationMode.RANDOM),
    seedUrl: SeedUrlSchema,
    options: RandomItemsOptionsSchema,
  }),
]);

export type RecommendationJobDataInput = z.input<
  typeof RecommendationJobDataSchema
>;
export type RecommendationJobData = z.output<
  typeof RecommendationJobDataSchema
>;

/**
 * Progress payload written to the job while it runs
 */
export interface RecommendationJobProgress {
  status: string;
  current: number;
  total: number;
  etaSeconds: number;
}

interface JobResultBase {
  /** How many results were asked for */
  requested: number;
  /** How many were found; may be lower than requested */
  returned: number;
}

export type RecommendationJobResult =
  | (JobResultBase & {
      mode: RecommendationMode.OVERLAP;
      results: OverlapRecommendation[];
    })
  | (JobResultBase & {
      mode: RecommendationMode.TAG_SIMILARITY;
      results: SimilarRecommendation[];
    })
  | (JobResultBase & {
      mode: RecommendationMode.RANDOM;
      results: RandomItem[];
    });
