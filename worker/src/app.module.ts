import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BullModule } from '@nestjs/bullmq';
import configuration from './config/configuration';
import { RecommenderConfigService } from './config/recommender.config';
import { validateEnv } from './config/validation.schema';
import { QueueModule } from './queue/queue.module';
import { SharedModule } from './shared/shared.module';
import { MarketplaceModule } from './marketplace/marketplace.module';
import { RecommendationsModule } from './task-recommendations/recommendations.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validate: validateEnv,
      envFilePath: '../.env',
    }),

    // BullMQ Queue
    BullModule.forRootAsync({
      imports: [SharedModule],
      useFactory: (config: RecommenderConfigService) => ({
        connection: config.redis,
      }),
      inject: [RecommenderConfigService],
    }),

    // Feature modules
    SharedModule,
    QueueModule,
    MarketplaceModule,
    RecommendationsModule,
  ],
})
export class AppModule {}
