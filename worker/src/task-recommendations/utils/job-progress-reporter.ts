import { Logger } from '@nestjs/common';
import type { Job } from 'bullmq';
import type {
  ProgressReporter,
  RecommendationJobProgress,
} from '@crate-digger/shared';

/**
 * Forwards progress to the BullMQ job. updateProgress is not awaited; a
 * failed write is logged.
 */
export class JobProgressReporter implements ProgressReporter {
  private readonly logger = new Logger(JobProgressReporter.name);

  constructor(private readonly job: Pick<Job, 'id' | 'updateProgress'>) {}

  onProgress(
    status: string,
    current: number,
    total: number,
    etaSeconds: number
  ): void {
    const progress: RecommendationJobProgress = {
      status,
      current,
      total,
      etaSeconds,
    };
    this.job.updateProgress({ ...progress }).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Failed to update progress for job ${this.job.id}: ${reason}`
      );
    });
  }
}
