import { randomBytes } from 'crypto';
import { join } from 'path';
import {
  AppConfig,
  DAY,
  EngineParams,
  JobSnapshot,
  JobSnapshotSchema,
  JobStatusSummary,
  formatError
} from '@streamvault/shared';
import { EngineFactory } from '../engine';
import { Notifier } from '../notifications';
import { PlayerSource } from '../upstream';
import { RateLimiter } from '../utils/RateLimiter';
import { Subscription } from '../utils/Subscription';
import { ArchiveJob, compareJobs } from './ArchiveJob';
import { HealthCheckScheduling, JobBroadcaster, JobDependencies, JobStore } from './types';

// engine parameters a caller may leave for the registry to fill in
export type JobRequest = Pick<EngineParams, 'url'> & Partial<Omit<EngineParams, 'url'>>;

export interface JobRegistryOptions {
  config: () => AppConfig;
  store: JobStore;
  notifier: Notifier;
  player: PlayerSource;
  playerLimiter: RateLimiter;
  engineFactory: EngineFactory;
  healthChecks?: HealthCheckScheduling;
  generateId?: () => string;
  clock?: () => Date;
}

// seconds between upstream checks while a stream has not started
const DEFAULT_ENGINE_POLL_INTERVAL = 300;

export function generateJobId(): string {
  return randomBytes(8).toString('base64url');
}

/**
 * Owns every known job and fans job snapshots out to subscribers, both
 * globally and per job.
 */
export class JobRegistry implements JobBroadcaster {
  private jobs = new Map<string, ArchiveJob>();
  private runs = new Map<string, Promise<void>>();
  private subscribers = new Set<Subscription<JobSnapshot>>();
  private jobSubscribers = new Map<string, Set<Subscription<JobSnapshot>>>();
  private generateId: () => string;

  constructor(private options: JobRegistryOptions) {
    this.generateId = options.generateId ?? generateJobId;
  }

  createJob(request: JobRequest): ArchiveJob {
    let id = this.generateId();
    while (this.jobs.has(id)) {
      id = this.generateId();
    }

    const job = new ArchiveJob(id, this.dependencies(), this.options.engineFactory(this.resolveParams(id, request)));
    job.stagingDirectory = job.engine?.params.stagingDirectory ?? null;
    this.jobs.set(id, job);
    return job;
  }

  /**
   * Starts the job's run in the background. Returns the run's promise, which
   * never rejects.
   */
  startJob(job: ArchiveJob): Promise<void> {
    const existing = this.runs.get(job.id);
    if (existing) {
      return existing;
    }
    const run = job.run().finally(() => {
      this.runs.delete(job.id);
    });
    this.runs.set(job.id, run);
    return run;
  }

  getJob(id: string): ArchiveJob | undefined {
    return this.jobs.get(id);
  }

  get size(): number {
    return this.jobs.size;
  }

  allJobs(): ArchiveJob[] {
    return [...this.jobs.values()];
  }

  /**
   * Jobs to show, in display order. Finished jobs older than the configured
   * retention are left out.
   */
  visibleJobs(now: Date = new Date()): ArchiveJob[] {
    const hideAfterDays = this.options.config().tasklist.hideFinishedAgeDays;
    const cutoff = now.getTime() - hideAfterDays * DAY;

    return this.allJobs()
      .filter((job) => {
        if (hideAfterDays <= 0 || job.status !== 'finished' || !job.finishedAt) {
          return true;
        }
        return job.finishedAt.getTime() >= cutoff;
      })
      .sort(compareJobs);
  }

  statusSummaries(now: Date = new Date()): JobStatusSummary[] {
    return this.visibleJobs(now).map((job) => job.statusSummary());
  }

  publish(snapshot: JobSnapshot): void {
    for (const subscriber of [...this.subscribers]) {
      subscriber.deliver(snapshot);
    }
    const perJob = this.jobSubscribers.get(snapshot.id);
    if (perJob) {
      for (const subscriber of [...perJob]) {
        subscriber.deliver(snapshot);
      }
    }
  }

  subscribe(): Subscription<JobSnapshot> {
    return new Subscription(this.subscribers);
  }

  subscribeJob(id: string): Subscription<JobSnapshot> {
    let subscribers = this.jobSubscribers.get(id);
    if (!subscribers) {
      subscribers = new Set();
      this.jobSubscribers.set(id, subscribers);
    }
    const owned = subscribers;
    return new Subscription(owned, () => {
      if (owned.size === 0 && this.jobSubscribers.get(id) === owned) {
        this.jobSubscribers.delete(id);
      }
    });
  }

  get subscriberCount(): number {
    let count = this.subscribers.size;
    for (const subscribers of this.jobSubscribers.values()) {
      count += subscribers.size;
    }
    return count;
  }

  /**
   * Restores persisted jobs. Rows that fail to decode are skipped.
   */
  load(): number {
    let loaded = 0;
    for (const row of this.options.store.getAll()) {
      let snapshot: JobSnapshot;
      try {
        snapshot = JobSnapshotSchema.parse(JSON.parse(row.payload));
      } catch (error) {
        console.warn(`Skipping stored job ${row.id}: ${formatError(error)}`);
        continue;
      }
      if (this.jobs.has(snapshot.id)) {
        continue;
      }

      const job = ArchiveJob.fromSnapshot(snapshot, this.dependencies());
      this.jobs.set(job.id, job);
      loaded++;
      if (job.status === 'finished') {
        this.options.healthChecks?.schedule(job);
      }
    }
    console.log(`Loaded ${loaded} stored jobs`);
    return loaded;
  }

  async shutdown(): Promise<void> {
    for (const job of this.jobs.values()) {
      job.cancel();
    }
    await Promise.all(this.runs.values());
    for (const subscriber of [...this.subscribers]) {
      subscriber.close();
    }
    for (const subscribers of [...this.jobSubscribers.values()]) {
      for (const subscriber of [...subscribers]) {
        subscriber.close();
      }
    }
  }

  private resolveParams(id: string, request: JobRequest): EngineParams {
    const config = this.options.config();
    const downloader = config.downloader;
    const stagingRoot = downloader.stagingDirectory ?? join(config.dataDir, 'staging');

    return {
      pollInterval: DEFAULT_ENGINE_POLL_INTERVAL,
      writeDescription: false,
      writeThumbnail: false,
      preferVp9: false,
      ...request,
      stagingDirectory: request.stagingDirectory ?? join(stagingRoot, id),
      ffmpegPath: request.ffmpegPath ?? downloader.ffmpegPath,
      poToken: request.poToken ?? downloader.poToken,
      visitorData: request.visitorData ?? downloader.visitorData,
      cookieFile: request.cookieFile ?? downloader.cookieFile,
      outputDirectory: request.outputDirectory ?? downloader.outputDirectory,
      outputTemplate: request.outputTemplate ?? downloader.outputTemplate,
      maxVideoResolution: request.maxVideoResolution ?? downloader.maxVideoResolution,
      numParallelDownloads: request.numParallelDownloads ?? downloader.numParallelDownloads
    };
  }

  private dependencies(): JobDependencies {
    return {
      broadcaster: this,
      notifier: this.options.notifier,
      store: this.options.store,
      player: this.options.player,
      playerLimiter: this.options.playerLimiter,
      healthChecks: this.options.healthChecks,
      clock: this.options.clock
    };
  }
}
