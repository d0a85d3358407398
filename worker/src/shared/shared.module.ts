import { Global, Module } from '@nestjs/common';
import { RecommenderConfigService } from '../config/recommender.config';

@Global()
@Module({
  providers: [RecommenderConfigService],
  exports: [RecommenderConfigService],
})
export class SharedModule {}
