/**
 * Fixed-size worker pool over a pre-enumerated list of tasks
 * Features: bounded concurrency, one result slot per task, progress counters
 */

import pLimit from 'p-limit';

export interface BatchConfig {
  concurrency: number;           // Parallel workers (default 4)
}

export interface BatchProgress {
  processed: number;
  total: number;
  failed: number;
  succeeded: number;
  startTime: number;
}

export type ProcessingResult<T, R> =
  | { item: T; index: number; success: true; result: R }
  | { item: T; index: number; success: false; error: Error };

/**
 * Whole number of workers, at least 1. `Infinity` means unbounded.
 */
export function normalizeConcurrency(value: number): number {
  if (value === Number.POSITIVE_INFINITY) return value;
  if (!Number.isFinite(value)) return 1;
  return Math.max(1, Math.floor(value));
}

/**
 * Runs every item through `processor` with at most `concurrency` in flight
 */
export class BatchProcessor {
  private config: BatchConfig;
  private progress: BatchProgress;

  constructor(config?: Partial<BatchConfig>) {
    this.config = {
      concurrency: normalizeConcurrency(config?.concurrency ?? 4),
    };

    this.progress = {
      processed: 0,
      total: 0,
      failed: 0,
      succeeded: 0,
      startTime: 0,
    };
  }

  /**
   * Process all items and wait for every one of them. Results come back in
   * input order, whatever order the workers finished in.
   */
  async process<T, R>(
    items: readonly T[],
    processor: (item: T, index: number) => Promise<R>
  ): Promise<ProcessingResult<T, R>[]> {
    this.progress.total = items.length;
    this.progress.startTime = Date.now();
    this.progress.processed = 0;
    this.progress.failed = 0;
    this.progress.succeeded = 0;

    const results = new Array<ProcessingResult<T, R>>(items.length);
    const limit = pLimit(this.config.concurrency);

    const promises = items.map((item, index) =>
      limit(async () => {
        try {
          const result = await processor(item, index);
          results[index] = { item, index, success: true, result };
          this.progress.succeeded++;
        } catch (error) {
          results[index] = {
            item,
            index,
            success: false,
            error: error instanceof Error ? error : new Error(String(error)),
          };
          this.progress.failed++;
        }

        this.progress.processed++;
      })
    );

    await Promise.all(promises);

    return results;
  }

  getConcurrency(): number {
    return this.config.concurrency;
  }

  /**
   * Get current progress
   */
  getProgress(): BatchProgress {
    return { ...this.progress };
  }
}

