import { Logger } from '@nestjs/common';
import { NOOP_PROGRESS, type ProgressReporter } from '@crate-digger/shared';

export type Clock = () => number;

/**
 * Wraps a ProgressReporter with ETA bookkeeping.
 *
 * ETA = average milliseconds per completed unit * remaining units, in whole
 * seconds. Reporter exceptions are logged and dropped.
 */
export class ProgressTracker {
  private readonly logger = new Logger(ProgressTracker.name);
  private startedAt = 0;
  private completed = 0;
  private total = 0;

  constructor(
    private readonly reporter: ProgressReporter = NOOP_PROGRESS,
    private readonly now: Clock = Date.now
  ) {}

  /**
   * Stage message without a unit count
   */
  status(message: string): void {
    this.emit(message, 0, 0, 0);
  }

  start(total: number, message: string): void {
    this.total = total;
    this.completed = 0;
    this.startedAt = this.now();
    this.emit(message, 0, total, 0);
  }

  advance(message: string): void {
    this.completed = Math.min(this.completed + 1, this.total);
    this.emit(message, this.completed, this.total, this.etaSeconds());
  }

  finish(message: string): void {
    this.completed = this.total;
    this.emit(message, this.total, this.total, 0);
  }

  etaSeconds(): number {
    if (this.completed === 0) return 0;
    const elapsed = Math.max(0, this.now() - this.startedAt);
    const remaining = this.total - this.completed;
    return Math.floor(((elapsed / this.completed) * remaining) / 1000);
  }

  private emit(
    message: string,
    current: number,
    total: number,
    eta: number
  ): void {
    try {
      this.reporter.onProgress(message, current, total, eta);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Progress reporter failed: ${reason}`);
    }
  }
}
