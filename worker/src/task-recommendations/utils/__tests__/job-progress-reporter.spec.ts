import { describe, it, expect, vi } from 'vitest';
import { JobProgressReporter } from '../job-progress-reporter';

describe('JobProgressReporter', () => {
  it('should forward progress to the job', () => {
    const job = { id: 'job-1', updateProgress: vi.fn().mockResolvedValue(undefined) };
    const reporter = new JobProgressReporter(job);

    reporter.onProgress('Fetched 3/10', 3, 10, 14);

    expect(job.updateProgress).toHaveBeenCalledWith({
      status: 'Fetched 3/10',
      current: 3,
      total: 10,
      etaSeconds: 14,
    });
  });

  it('should not throw when the progress write fails', async () => {
    const job = { id: 'job-1', updateProgress: vi.fn().mockRejectedValue(new Error('redis down')) };
    const reporter = new JobProgressReporter(job);

    expect(() => reporter.onProgress('x', 0, 0, 0)).not.toThrow();
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(job.updateProgress).toHaveBeenCalledTimes(1);
  });
});
