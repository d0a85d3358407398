import express, {
  type ErrorRequestHandler,
  type Express,
  type RequestHandler,
} from 'express';
import { Logger } from '@nestjs/common';
import { isInvalidArgument } from '@crate-digger/shared';
import type { RecommendationJobsService } from '../task-recommendations/recommendation-jobs.service';

export type RecommendationJobs = Pick<
  RecommendationJobsService,
  'enqueue' | 'getJob'
>;

const logger = new Logger('MonitoringServer');

export const healthHandler: RequestHandler = (_req, res) => {
  res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
};

export function statusHandler(version: string): RequestHandler {
  return (_req, res) => {
    res
      .status(200)
      .json({ status: 'running', version, uptime: process.uptime() });
  };
}

export function enqueueHandler(jobs: RecommendationJobs): RequestHandler {
  return async (req, res, next) => {
    try {
      const id = await jobs.enqueue(req.body);
      res.status(202).json({ id });
    } catch (error) {
      next(error);
    }
  };
}

export function getJobHandler(
  jobs: RecommendationJobs
): RequestHandler<{ id: string }> {
  return async (req, res, next) => {
    try {
      const job = await jobs.getJob(req.params.id);
      if (!job) {
        res.status(404).json({ error: `Job ${req.params.id} not found` });
        return;
      }
      res.status(200).json(job);
    } catch (error) {
      next(error);
    }
  };
}

/**
 * express.json() rejects unparsable bodies with a SyntaxError tagged
 * `entity.parse.failed`
 */
function isMalformedBody(error: unknown): error is SyntaxError {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

export const errorHandler: ErrorRequestHandler = (
  error: unknown,
  _req,
  res,
  _next
) => {
  if (isInvalidArgument(error)) {
    res.status(400).json({ error: error.message, issues: error.issues });
    return;
  }
  if (isMalformedBody(error)) {
    res.status(400).json({ error: `Malformed JSON body: ${error.message}` });
    return;
  }
  logger.error(
    `Request failed: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined
  );
  res.status(500).json({ error: 'Internal server error' });
};

/**
 * Health, status and job endpoints served next to the queue worker
 */
export function createMonitoringServer(
  jobs: RecommendationJobs,
  version = '1.0.0'
): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', healthHandler);
  app.get('/status', statusHandler(version));
  app.post('/recommendations', enqueueHandler(jobs));
  app.get('/recommendations/:id', getJobHandler(jobs));

  app.use(errorHandler);
  return app;
}
