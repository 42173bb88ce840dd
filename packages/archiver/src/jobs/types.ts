import { HealthCheckResult, JobSnapshot } from '@streamvault/shared';
import { Notifier } from '../notifications';
import { PlayerSource } from '../upstream';
import { RateLimiter } from '../utils/RateLimiter';

export interface StoredJob {
  id: string;
  payload: string;
}

export interface JobStore {
  getAll(): StoredJob[];
  upsert(id: string, snapshot: JobSnapshot): void;
}

export interface SeenSet {
  // true when the id was already present
  containsOrInsert(id: string): boolean;
  remove(id: string): void;
}

export interface JobBroadcaster {
  publish(snapshot: JobSnapshot): void;
}

export interface HealthCheckTarget {
  readonly id: string;
  nextHealthCheckDelay(now?: Date): number | null;
  runHealthCheck(): Promise<HealthCheckResult>;
}

export interface HealthCheckScheduling {
  schedule(job: HealthCheckTarget): void;
}

export interface JobDependencies {
  broadcaster: JobBroadcaster;
  notifier: Notifier;
  store: JobStore;
  player: PlayerSource;
  playerLimiter: RateLimiter;
  healthChecks?: HealthCheckScheduling;
  clock?: () => Date;
}

// [status priority, reference time]
export type SortKey = [number, Date | null];
