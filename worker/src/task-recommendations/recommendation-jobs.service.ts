import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { z } from 'zod';
import {
  InvalidArgument,
  JobState,
  RecommendationJobDataSchema,
  type RecommendationJobData,
  type RecommendationJobProgress,
  type RecommendationJobResult,
} from '@crate-digger/shared';
import { DEFAULT_JOB_OPTIONS, QUEUE_NAMES } from '../queue/queue.constants';
import type { RecommendationJobSnapshot } from '../queue/types/job.types';

const JobProgressSchema = z.object({
  status: z.string(),
  current: z.number(),
  total: z.number(),
  etaSeconds: z.number(),
});

function toJobState(state: string): JobState {
  if (state === 'waiting-children' || state === 'prioritized') {
    return JobState.WAITING;
  }
  return (
    Object.values(JobState).find((known) => known === state) ??
    JobState.UNKNOWN
  );
}

function toProgress(progress: unknown): RecommendationJobProgress | null {
  const parsed = JobProgressSchema.safeParse(progress);
  return parsed.success ? parsed.data : null;
}

/**
 * Enqueues recommendation requests and reports on them
 */
@Injectable()
export class RecommendationJobsService {
  private readonly logger = new Logger(RecommendationJobsService.name);

  constructor(
    @InjectQueue(QUEUE_NAMES.RECOMMENDATIONS)
    private readonly queue: Queue<
      RecommendationJobData,
      RecommendationJobResult
    >
  ) {}

  /**
   * Validate a request and add it to the queue
   *
   * @returns the BullMQ job id
   */
  async enqueue(request: unknown): Promise<string> {
    const parsed = RecommendationJobDataSchema.safeParse(request);
    if (!parsed.success) {
      throw InvalidArgument.fromZodError('enqueue', parsed.error);
    }

    const data = parsed.data;
    const job = await this.queue.add(data.mode, data, DEFAULT_JOB_OPTIONS);
    if (!job.id) {
      throw new Error(
        `Queue ${QUEUE_NAMES.RECOMMENDATIONS} returned a job without an id`
      );
    }

    this.logger.log(`Enqueued ${data.mode} job ${job.id} for ${data.seedUrl}`);
    return job.id;
  }

  async getJob(id: string): Promise<RecommendationJobSnapshot | null> {
    const job = await this.queue.getJob(id);
    if (!job) return null;

    const state = await job.getState();
    return {
      id,
      mode: job.data.mode,
      state: toJobState(state),
      progress: toProgress(job.progress),
      result: job.returnvalue ?? null,
      failedReason: job.failedReason || null,
      attemptsMade: job.attemptsMade,
    };
  }
}
