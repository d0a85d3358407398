/**
 * Error taxonomy for recommendation requests
 *
 * - FetchFailure: a single collaborator call failed (network, auth or parse).
 *   Absorbed by the caller for one supporter/item; never aborts a request.
 * - InvalidArgument: rejected input, raised at the entry point before any
 *   fetch.
 *
 * Fewer results than requested is not an error and has no class here.
 */

import type { ZodError } from 'zod';
import { ErrorCode, FetchFailureReason } from '../enums';

export type ErrorContext = Record<string, unknown>;

export class CrateDiggerError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: ErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CrateDiggerError';
    this.code = code;
    this.context = context;
  }

  /**
   * Wrap any thrown value, keeping our own errors as they are
   */
  static fromError(
    error: unknown,
    context: ErrorContext = {}
  ): CrateDiggerError {
    if (error instanceof CrateDiggerError) {
      return error;
    }
    if (error instanceof Error) {
      return new CrateDiggerError(error.message, ErrorCode.UNKNOWN, context, {
        cause: error,
      });
    }
    return new CrateDiggerError(String(error), ErrorCode.UNKNOWN, context);
  }
}

export class FetchFailure extends CrateDiggerError {
  readonly target: string;
  readonly reason: FetchFailureReason;

  constructor(
    target: string,
    reason: FetchFailureReason,
    message: string,
    options?: { cause?: unknown; context?: ErrorContext }
  ) {
    super(
      `Fetch failed for ${target} (${reason}): ${message}`,
      ErrorCode.FETCH_FAILED,
      { target, reason, ...options?.context },
      options
    );
    this.name = 'FetchFailure';
    this.target = target;
    this.reason = reason;
  }

  /**
   * Network failures may succeed on a later attempt; the other reasons will not
   */
  get retryable(): boolean {
    return this.reason === FetchFailureReason.NETWORK;
  }

  static fromError(error: unknown, context: ErrorContext = {}): FetchFailure {
    if (error instanceof FetchFailure) {
      return error;
    }
    const target =
      typeof context.target === 'string' ? context.target : 'unknown';
    const message = error instanceof Error ? error.message : String(error);
    return new FetchFailure(target, FetchFailureReason.NETWORK, message, {
      cause: error,
      context,
    });
  }
}

export class InvalidArgument extends CrateDiggerError {
  readonly issues: string[];

  constructor(
    message: string,
    issues: string[] = [],
    context: ErrorContext = {}
  ) {
    super(message, ErrorCode.INVALID_ARGUMENT, context);
    this.name = 'InvalidArgument';
    this.issues = issues;
  }

  static fromZodError(operation: string, error: ZodError): InvalidArgument {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new InvalidArgument(
      `Invalid arguments for ${operation}: ${issues.join('; ')}`,
      issues,
      { operation }
    );
  }
}

export function isFetchFailure(error: unknown): error is FetchFailure {
  return error instanceof FetchFailure;
}

export function isInvalidArgument(error: unknown): error is InvalidArgument {
  return error instanceof InvalidArgument;
}
