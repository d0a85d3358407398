import type {
  JobState,
  RecommendationJobProgress,
  RecommendationJobResult,
  RecommendationMode,
} from '@crate-digger/shared';

/**
 * What callers see of a queued recommendation job
 */
export interface RecommendationJobSnapshot {
  id: string;
  mode: RecommendationMode;
  state: JobState;
  progress: RecommendationJobProgress | null;
  result: RecommendationJobResult | null;
  failedReason: string | null;
  attemptsMade: number;
}
