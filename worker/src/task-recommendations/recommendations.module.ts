import { Module } from '@nestjs/common';
import {
  defaultRandom,
  createSeededRandom,
  type RandomSource,
} from '@crate-digger/shared';
import { RecommenderConfigService } from '../config/recommender.config';
import { MarketplaceModule } from '../marketplace/marketplace.module';
import { QueueModule } from '../queue/queue.module';
import { RecommendationsService } from './recommendations.service';
import { RecommendationJobsService } from './recommendation-jobs.service';
import { RANDOM_SOURCE } from './recommendations.constants';
import { GenerateRecommendationsProcessor } from './processors';

/**
 * Module for recommendation generation
 *
 * Provides:
 * - The three recommendation entry points
 * - Job enqueueing and lookup
 * - The queue processor
 */
@Module({
  imports: [MarketplaceModule, QueueModule],
  providers: [
    {
      provide: RANDOM_SOURCE,
      useFactory: (config: RecommenderConfigService): RandomSource => {
        const seed = config.randomSeed;
        return seed === undefined ? defaultRandom : createSeededRandom(seed);
      },
      inject: [RecommenderConfigService],
    },
    RecommendationsService,
    RecommendationJobsService,
    GenerateRecommendationsProcessor,
  ],
  exports: [RecommendationsService, RecommendationJobsService],
})
export class RecommendationsModule {}
