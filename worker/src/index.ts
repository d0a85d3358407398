import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { RecommenderConfigService } from './config/recommender.config';
import { createMonitoringServer } from './monitoring/monitoring.server';
import { RecommendationJobsService } from './task-recommendations/recommendation-jobs.service';

const logger = new Logger('Worker Service');

async function bootstrap(): Promise<void> {
  const context = await NestFactory.createApplicationContext(AppModule);
  context.enableShutdownHooks();

  const config = context.get(RecommenderConfigService);
  const app = createMonitoringServer(context.get(RecommendationJobsService));

  const server = app.listen(config.port, () => {
    logger.log(`Monitoring server listening on port ${config.port}`);
  });

  process.once('SIGTERM', () => {
    server.close();
  });
}

bootstrap().catch((error: unknown) => {
  logger.error(
    'Fatal error starting worker',
    error instanceof Error ? error.stack : String(error)
  );
  process.exit(1);
});
