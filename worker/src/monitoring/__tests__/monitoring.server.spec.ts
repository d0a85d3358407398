import { describe, it, expect, vi } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import { InvalidArgument, JobState, RecommendationMode } from '@crate-digger/shared';
import {
  enqueueHandler,
  errorHandler,
  getJobHandler,
  healthHandler,
  type RecommendationJobs,
} from '../monitoring.server';

function makeResponse() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

function makeJobs(overrides: Partial<RecommendationJobs> = {}): RecommendationJobs {
  return {
    enqueue: vi.fn().mockResolvedValue('job-1'),
    getJob: vi.fn().mockResolvedValue(null),
    ...overrides,
  };
}

describe('monitoring server handlers', () => {
  it('should answer health checks', () => {
    const res = makeResponse();
    healthHandler({} as Request, res as unknown as Response, vi.fn());

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith(expect.objectContaining({ status: 'ok' }));
  });

  it('should enqueue a request and return the job id', async () => {
    const jobs = makeJobs();
    const res = makeResponse();
    const body = { mode: 'overlap', seedUrl: 'https://label.example.com/album/seed' };

    await enqueueHandler(jobs)({ body } as Request, res as unknown as Response, vi.fn());

    expect(jobs.enqueue).toHaveBeenCalledWith(body);
    expect(res.status).toHaveBeenCalledWith(202);
    expect(res.json).toHaveBeenCalledWith({ id: 'job-1' });
  });

  it('should pass enqueue errors to the error handler', async () => {
    const failure = new InvalidArgument('Invalid arguments for enqueue: mode: Invalid', ['mode: Invalid']);
    const jobs = makeJobs({ enqueue: vi.fn().mockRejectedValue(failure) });
    const next = vi.fn();

    await enqueueHandler(jobs)({ body: {} } as Request, makeResponse() as unknown as Response, next);

    expect(next).toHaveBeenCalledWith(failure);
  });

  it('should return 404 for an unknown job', async () => {
    const res = makeResponse();

    await getJobHandler(makeJobs())(
      { params: { id: 'missing' } } as unknown as Request<{ id: string }>,
      res as unknown as Response,
      vi.fn()
    );

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({ error: 'Job missing not found' });
  });

  it('should return a job snapshot', async () => {
    const snapshot = {
      id: 'job-1',
      mode: RecommendationMode.OVERLAP,
      state: JobState.ACTIVE,
      progress: { status: 'Fetching supporters...', current: 0, total: 0, etaSeconds: 0 },
      result: null,
      failedReason: null,
      attemptsMade: 0,
    };
    const res = makeResponse();

    await getJobHandler(makeJobs({ getJob: vi.fn().mockResolvedValue(snapshot) }))(
      { params: { id: 'job-1' } } as unknown as Request<{ id: string }>,
      res as unknown as Response,
      vi.fn()
    );

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith(snapshot);
  });

  it('should map InvalidArgument to 400 and anything else to 500', () => {
    const badRequest = makeResponse();
    errorHandler(
      new InvalidArgument('Invalid arguments for enqueue: x', ['x']),
      {} as Request,
      badRequest as unknown as Response,
      vi.fn() as NextFunction
    );
    expect(badRequest.status).toHaveBeenCalledWith(400);
    expect(badRequest.json).toHaveBeenCalledWith({ error: 'Invalid arguments for enqueue: x', issues: ['x'] });

    const serverError = makeResponse();
    errorHandler(new Error('redis down'), {} as Request, serverError as unknown as Response, vi.fn() as NextFunction);
    expect(serverError.status).toHaveBeenCalledWith(500);
  });

  it('should answer 400 to a body express.json() could not parse', () => {
    const parseError = Object.assign(
      new SyntaxError('Unexpected token } in JSON at position 9'),
      { type: 'entity.parse.failed', status: 400 }
    );
    const res = makeResponse();

    errorHandler(
      parseError,
      {} as Request,
      res as unknown as Response,
      vi.fn() as NextFunction
    );

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Malformed JSON body: Unexpected token } in JSON at position 9',
    });
  });

  it('should still answer 500 to other syntax errors', () => {
    const res = makeResponse();

    errorHandler(
      new SyntaxError('bad regexp'),
      {} as Request,
      res as unknown as Response,
      vi.fn() as NextFunction
    );

    expect(res.status).toHaveBeenCalledWith(500);
  });
});
