/**
 * Progress reporting contract
 *
 * Invoked at coarse granularity (per stage, per supporter fetched).
 * Implementations must return quickly; they are never awaited.
 */
export interface ProgressReporter {
  onProgress(
    status: string,
    current: number,
    total: number,
    etaSeconds: number
  ): void;
}

export const NOOP_PROGRESS: ProgressReporter = {
  onProgress: () => undefined,
};
