/**
 * Bounded-concurrency task pool
 *
 * A fixed number of workers pull inputs off a shared queue. Outcomes are
 * stored by input index, so the result order never depends on which fetch
 * finished first. A failing task is recorded and the pool moves on.
 */

export const DEFAULT_POOL_CONCURRENCY = 15;

export type PoolOutcome<O> =
  | { status: 'fulfilled'; value: O }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export interface PoolOptions<O> {
  /**
   * Upper bound on tasks in flight (defaults to min(15, inputs))
   */
  concurrency?: number;
  /**
   * Once aborted no new task starts and the pool returns what has settled
   */
  signal?: AbortSignal;
  onSettled?: (
    outcome: PoolOutcome<O>,
    index: number,
    settledCount: number
  ) => void;
}

export async function runPool<I, O>(
  inputs: readonly I[],
  worker: (input: I, index: number) => Promise<O>,
  options: PoolOptions<O> = {}
): Promise<PoolOutcome<O>[]> {
  const { signal, onSettled } = options;
  const concurrency = options.concurrency ?? DEFAULT_POOL_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(
      `Pool concurrency must be a positive integer, got ${concurrency}`
    );
  }

  const outcomes: PoolOutcome<O>[] = inputs.map(() => ({ status: 'skipped' }));
  if (inputs.length === 0 || signal?.aborted) {
    return outcomes;
  }

  let next = 0;
  let settledCount = 0;
  let finished = false;
  const dequeue = (): number | undefined =>
    next < inputs.length ? next++ : undefined;

  const settle = (index: number, outcome: PoolOutcome<O>): void => {
    if (finished) return;
    outcomes[index] = outcome;
    settledCount += 1;
    onSettled?.(outcome, index, settledCount);
  };

  const size = Math.min(concurrency, inputs.length);
  const workers = Array.from({ length: size }, async () => {
    let index: number | undefined;
    while (!signal?.aborted && (index = dequeue()) !== undefined) {
      try {
        const value = await worker(inputs[index], index);
        settle(index, { status: 'fulfilled', value });
      } catch (reason) {
        settle(index, { status: 'rejected', reason });
      }
    }
  });

  const abort = waitForAbort(signal);
  try {
    await Promise.race([Promise.all(workers), abort.promise]);
  } finally {
    abort.dispose();
    finished = true;
  }

  return [...outcomes];
}

function waitForAbort(signal: AbortSignal | undefined): {
  promise: Promise<void>;
  dispose: () => void;
} {
  if (!signal) {
    return {
      promise: new Promise<void>(() => undefined),
      dispose: () => undefined,
    };
  }

  let listener: (() => void) | undefined;
  const promise = new Promise<void>((resolve) => {
    listener = () => resolve();
    signal.addEventListener('abort', listener, { once: true });
  });

  return {
    promise,
    dispose: () => {
      if (listener) signal.removeEventListener('abort', listener);
    },
  };
}

/**
 * Values of the fulfilled outcomes, in input order
 */
export function fulfilledValues<O>(outcomes: readonly PoolOutcome<O>[]): O[] {
  const values: O[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'fulfilled') values.push(outcome.value);
  }
  return values;
}
