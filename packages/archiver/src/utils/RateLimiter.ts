import pLimit from 'p-limit';
import { sleep } from '@streamvault/shared';

type Limit = ReturnType<typeof pLimit>;

export interface RateLimiterOptions {
  concurrency: number;
  // minimum spacing between the start of two tasks
  intervalMs?: number;
}

/**
 * Bounds how many tasks run at once and how often a new one may start.
 */
export class RateLimiter {
  private limit: Limit;
  private intervalMs: number;
  private nextSlot = 0;

  constructor(options: RateLimiterOptions) {
    this.limit = pLimit(Math.max(1, Math.floor(options.concurrency)));
    this.intervalMs = Math.max(0, options.intervalMs ?? 0);
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.limit(async () => {
      await this.waitForSlot();
      return task();
    });
  }

  private async waitForSlot(): Promise<void> {
    if (this.intervalMs === 0) {
      return;
    }
    const now = Date.now();
    const start = Math.max(now, this.nextSlot);
    this.nextSlot = start + this.intervalMs;
    if (start > now) {
      await sleep(start - now);
    }
  }
}
