import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ErrorCode, FetchFailureReason } from '../../enums';
import { CrateDiggerError, FetchFailure, InvalidArgument, isFetchFailure } from '../errors';

describe('CrateDiggerError.fromError', () => {
  it('should keep our own errors unchanged', () => {
    const original = new InvalidArgument('bad input');
    expect(CrateDiggerError.fromError(original)).toBe(original);
  });

  it('should wrap plain errors and keep the cause', () => {
    const cause = new Error('boom');
    const wrapped = CrateDiggerError.fromError(cause, { step: 'fetch' });

    expect(wrapped.code).toBe(ErrorCode.UNKNOWN);
    expect(wrapped.message).toBe('boom');
    expect(wrapped.cause).toBe(cause);
    expect(wrapped.context).toEqual({ step: 'fetch' });
  });

  it('should stringify non-error values', () => {
    expect(CrateDiggerError.fromError('nope').message).toBe('nope');
  });
});

describe('FetchFailure', () => {
  it('should describe the target and reason', () => {
    const failure = new FetchFailure('https://bandcamp.com/fan-a', FetchFailureReason.PARSE, 'missing pagedata');

    expect(failure.message).toBe('Fetch failed for https://bandcamp.com/fan-a (parse): missing pagedata');
    expect(failure.code).toBe(ErrorCode.FETCH_FAILED);
    expect(failure.retryable).toBe(false);
    expect(isFetchFailure(failure)).toBe(true);
  });

  it('should treat wrapped errors as retryable network failures', () => {
    const failure = FetchFailure.fromError(new Error('socket hang up'), { target: 'fan-b' });

    expect(failure.reason).toBe(FetchFailureReason.NETWORK);
    expect(failure.target).toBe('fan-b');
    expect(failure.retryable).toBe(true);
  });
});

describe('InvalidArgument.fromZodError', () => {
  it('should list every issue with its path', () => {
    const result = z.object({ numItems: z.number().min(1, 'too small') }).safeParse({ numItems: 0 });
    if (result.success) throw new Error('expected a parse failure');

    const error = InvalidArgument.fromZodError('getRandomItems', result.error);

    expect(error.code).toBe(ErrorCode.INVALID_ARGUMENT);
    expect(error.issues).toEqual(['numItems: too small']);
    expect(error.message).toBe('Invalid arguments for getRandomItems: numItems: too small');
  });
});
