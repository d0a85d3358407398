/**
 * Generate Recommendations Processor
 *
 * Runs one queued recommendation request: validates the payload, dispatches
 * on the mode and forwards progress to the job. Invalid payloads fail without
 * retry.
 */

import { Inject, Logger, type OnApplicationBootstrap } from '@nestjs/common';
import { Processor } from '@nestjs/bullmq';
import { Job, UnrecoverableError } from 'bullmq';
import {
  InvalidArgument,
  isInvalidArgument,
  RecommendationJobDataSchema,
  RecommendationMode,
  type RecommendationJobData,
  type RecommendationJobResult,
} from '@crate-digger/shared';
import { BaseSimpleProcessor } from '../../queue/processors/base-simple.processor';
import { QUEUE_NAMES } from '../../queue/queue.constants';
import { RecommenderConfigService } from '../../config/recommender.config';
import { RecommendationsService } from '../recommendations.service';
import { JobProgressReporter } from '../utils/job-progress-reporter';

@Processor(QUEUE_NAMES.RECOMMENDATIONS)
export class GenerateRecommendationsProcessor
  extends BaseSimpleProcessor<RecommendationJobData, RecommendationJobResult>
  implements OnApplicationBootstrap
{
  protected readonly logger = new Logger(
    GenerateRecommendationsProcessor.name
  );

  constructor(
    @Inject(RecommendationsService)
    private readonly recommendations: RecommendationsService,
    @Inject(RecommenderConfigService)
    private readonly config: RecommenderConfigService
  ) {
    super();
  }

  onApplicationBootstrap(): void {
    this.worker.concurrency = this.config.queueConcurrency;
    this.logger.log(
      `Processing ${QUEUE_NAMES.RECOMMENDATIONS} with concurrency ${this.config.queueConcurrency}`
    );
  }

  async process(
    job: Job<RecommendationJobData, RecommendationJobResult>
  ): Promise<RecommendationJobResult> {
    const parsed = RecommendationJobDataSchema.safeParse(job.data);
    if (!parsed.success) {
      const invalid = InvalidArgument.fromZodError('process', parsed.error);
      throw new UnrecoverableError(invalid.message);
    }

    const data = parsed.data;
    const progress = new JobProgressReporter(job);
    this.logger.log(
      `Generating ${data.mode} recommendations for ${data.seedUrl} (job ${job.id})`
    );

    try {
      switch (data.mode) {
        case RecommendationMode.OVERLAP: {
          const results = await this.recommendations.getRecommendations(
            data.seedUrl,
            data.options,
            progress
          );
          return {
            mode: data.mode,
            requested: data.options.maxRecommendations,
            returned: results.length,
            results,
          };
        }
        case RecommendationMode.TAG_SIMILARITY: {
          const results =
            await this.recommendations.getTagSimilarRecommendations(
              data.seedUrl,
              data.options,
              progress
            );
          return {
            mode: data.mode,
            requested: data.options.maxRecommendations,
            returned: results.length,
            results,
          };
        }
        case RecommendationMode.RANDOM: {
          const results = await this.recommendations.getRandomItems(
            data.seedUrl,
            data.options,
            progress
          );
          return {
            mode: data.mode,
            requested: data.options.numItems,
            returned: results.length,
            results,
          };
        }
      }
    } catch (error) {
      if (isInvalidArgument(error)) {
        throw new UnrecoverableError(error.message);
      }
      throw error;
    }
  }
}
