import { OnWorkerEvent, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job } from 'bullmq';

/**
 * Abstract base class for single-step processors
 *
 * Subclasses implement process(); this class logs the job lifecycle.
 */
export abstract class BaseSimpleProcessor<TData, TResult> extends WorkerHost {
  protected abstract readonly logger: Logger;

  abstract process(job: Job<TData, TResult>): Promise<TResult>;

  @OnWorkerEvent('active')
  onActive(job: Job<TData, TResult>): void {
    this.logger.log(
      `Job ${job.id} (${job.name}) started, attempt ${job.attemptsMade + 1}`
    );
  }

  @OnWorkerEvent('completed')
  onCompleted(job: Job<TData, TResult>): void {
    this.logger.log(`Job ${job.id} (${job.name}) completed`);
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<TData, TResult> | undefined, error: Error): void {
    this.logger.error(
      `Job ${job?.id ?? 'unknown'} failed: ${error.message}`,
      error.stack
    );
  }
}
