import { formatError, sleep } from '@streamvault/shared';
import { HealthCheckScheduling, HealthCheckTarget } from './types';

export interface HealthSchedulerOptions {
  // read on every wake-up so config reloads take effect
  isEnabled: () => boolean;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Re-verifies finished jobs against upstream at growing intervals until the
 * job reports no further delay.
 */
export class HealthScheduler implements HealthCheckScheduling {
  private loops = new Map<string, Promise<void>>();
  private controller = new AbortController();
  private now: () => Date;
  private sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private options: HealthSchedulerOptions) {
    this.now = options.now ?? (() => new Date());
    this.sleepFn = options.sleep ?? sleep;
  }

  schedule(job: HealthCheckTarget): void {
    if (this.loops.has(job.id) || this.controller.signal.aborted) {
      return;
    }
    if (job.nextHealthCheckDelay(this.now()) === null) {
      return;
    }

    const loop = this.runLoop(job).finally(() => {
      this.loops.delete(job.id);
    });
    this.loops.set(job.id, loop);
  }

  get activeCount(): number {
    return this.loops.size;
  }

  async stop(): Promise<void> {
    this.controller.abort();
    await Promise.all(this.loops.values());
  }

  private async runLoop(job: HealthCheckTarget): Promise<void> {
    const signal = this.controller.signal;
    let delay = job.nextHealthCheckDelay(this.now());

    while (delay !== null && !signal.aborted) {
      await this.sleepFn(delay, signal);
      if (signal.aborted) {
        break;
      }

      if (this.options.isEnabled()) {
        try {
          const result = await job.runHealthCheck();
          console.log(`Health check for job ${job.id}: ${result}`);
        } catch (error) {
          console.error(`Health check for job ${job.id} failed:`, formatError(error));
        }
      }
      delay = job.nextHealthCheckDelay(this.now());
    }
  }
}
