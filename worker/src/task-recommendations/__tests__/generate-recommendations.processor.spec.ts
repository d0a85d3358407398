import { describe, it, expect, vi } from 'vitest';
import { UnrecoverableError, type Job } from 'bullmq';
import {
  InvalidArgument,
  RecommendationMode,
  type RecommendationJobData,
  type RecommendationJobResult,
} from '@crate-digger/shared';
import { GenerateRecommendationsProcessor } from '../processors/generate-recommendations.processor';
import type { RecommendationsService } from '../recommendations.service';
import type { RecommenderConfigService } from '../../config/recommender.config';

const SEED_URL = 'https://label.example.com/album/seed';

function makeJob(data: unknown) {
  return {
    id: 'job-1',
    name: 'test',
    data,
    updateProgress: vi.fn().mockResolvedValue(undefined),
  } as unknown as Job<RecommendationJobData, RecommendationJobResult>;
}

function makeProcessor() {
  const recommendations = {
    getRecommendations: vi.fn().mockResolvedValue([]),
    getTagSimilarRecommendations: vi.fn().mockResolvedValue([]),
    getRandomItems: vi.fn().mockResolvedValue([]),
  };
  const config = { queueConcurrency: 2 } as unknown as RecommenderConfigService;
  const processor = new GenerateRecommendationsProcessor(
    recommendations as unknown as RecommendationsService,
    config
  );
  return { processor, recommendations };
}

describe('GenerateRecommendationsProcessor', () => {
  it('should run overlap jobs with defaulted options', async () => {
    const { processor, recommendations } = makeProcessor();
    const view = { itemTitle: 'T', bandName: 'B', itemUrl: SEED_URL, supportersCount: 2 };
    recommendations.getRecommendations.mockResolvedValue([view]);

    const result = await processor.process(makeJob({ mode: 'overlap', seedUrl: SEED_URL }));

    expect(result).toEqual({ mode: RecommendationMode.OVERLAP, requested: 10, returned: 1, results: [view] });
    expect(recommendations.getRecommendations).toHaveBeenCalledWith(
      SEED_URL,
      { maxRecommendations: 10, minSupporters: 2, includeTags: false },
      expect.anything()
    );
  });

  it('should report requested as numItems for random jobs', async () => {
    const { processor, recommendations } = makeProcessor();

    const result = await processor.process(
      makeJob({ mode: 'random', seedUrl: SEED_URL, options: { numItems: 4 } })
    );

    expect(result).toEqual({ mode: RecommendationMode.RANDOM, requested: 4, returned: 0, results: [] });
    expect(recommendations.getRandomItems).toHaveBeenCalledTimes(1);
  });

  it('should dispatch tag similarity jobs', async () => {
    const { processor, recommendations } = makeProcessor();

    await processor.process(makeJob({ mode: 'tag_similarity', seedUrl: SEED_URL, options: { minSimilarity: 0.3 } }));

    expect(recommendations.getTagSimilarRecommendations).toHaveBeenCalledWith(
      SEED_URL,
      { maxRecommendations: 10, minSimilarity: 0.3 },
      expect.anything()
    );
  });

  it('should fail invalid payloads without retry', async () => {
    const { processor } = makeProcessor();

    await expect(processor.process(makeJob({ mode: 'overlap', seedUrl: 'nope' }))).rejects.toThrow(
      UnrecoverableError
    );
  });

  it('should turn InvalidArgument from the service into UnrecoverableError', async () => {
    const { processor, recommendations } = makeProcessor();
    recommendations.getRecommendations.mockRejectedValue(new InvalidArgument('Invalid arguments for x: y'));

    await expect(processor.process(makeJob({ mode: 'overlap', seedUrl: SEED_URL }))).rejects.toThrow(
      UnrecoverableError
    );
  });

  it('should let other failures through for a retry', async () => {
    const { processor, recommendations } = makeProcessor();
    recommendations.getRecommendations.mockRejectedValue(new Error('redis down'));

    await expect(processor.process(makeJob({ mode: 'overlap', seedUrl: SEED_URL }))).rejects.toThrow('redis down');
  });
});
