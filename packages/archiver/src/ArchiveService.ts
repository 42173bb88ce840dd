import { readdir, rmdir, unlink } from 'fs/promises';
import { isAbsolute, join } from 'path';
import {
  AppConfig,
  CreateJobRequest,
  HealthResponse,
  JobStatus,
  SECOND,
  formatError
} from '@streamvault/shared';
import { ConfigManager } from './config/ConfigManager';
import { Database } from './database';
import { EngineFactory, ProcessEngine } from './engine';
import { FeedMonitor, IngestionDaemon } from './feeds';
import { ArchiveJob, HealthScheduler, JobRegistry } from './jobs';
import { NotificationManager } from './notifications';
import { PlayerClient, PlayerResponse, PlayerSource, extractVideoId } from './upstream';
import { RateLimiter } from './utils/RateLimiter';

export interface ArchiveServiceOptions {
  configPath?: string;
  config?: ConfigManager;
  database?: Database;
  player?: PlayerSource;
  engineFactory?: EngineFactory;
  fetch?: typeof fetch;
}

export type TempFileResult =
  | { status: 'not-found' }
  | { status: 'not-allowed' }
  | { status: 'deleted'; files: string[] };

// simultaneous feed requests
const FEED_CONCURRENCY = 3;
// spacing between upstream player requests
const PLAYER_REQUEST_INTERVAL = 20 * SECOND;

/**
 * Wires configuration, persistence, the job registry, health checks and feed
 * ingestion together and owns their lifecycle.
 */
export class ArchiveService {
  readonly config: ConfigManager;
  readonly database: Database;
  readonly registry: JobRegistry;
  readonly daemon: IngestionDaemon;
  readonly healthScheduler: HealthScheduler;
  readonly notifications: NotificationManager;
  private player: PlayerSource;
  private isRunning = false;

  constructor(options: ArchiveServiceOptions = {}) {
    this.config = options.config ?? new ConfigManager(options.configPath ?? './config');
    const config = this.config.getConfig();

    this.database = options.database ?? new Database({ path: this.config.getDatabasePath() });
    this.notifications = new NotificationManager(config.notifications, options.fetch);
    this.player = options.player ?? new PlayerClient({ fetch: options.fetch });

    const playerLimiter = new RateLimiter({ concurrency: 1, intervalMs: PLAYER_REQUEST_INTERVAL });
    const feedLimiter = new RateLimiter({ concurrency: FEED_CONCURRENCY });

    this.healthScheduler = new HealthScheduler({
      isEnabled: () => this.config.getConfig().healthchecks.enableScheduled
    });

    const engineFactory =
      options.engineFactory ??
      ((params) => new ProcessEngine(params, this.config.getConfig().downloader.command));

    this.registry = new JobRegistry({
      config: () => this.config.getConfig(),
      store: this.database,
      notifier: this.notifications,
      player: this.player,
      playerLimiter,
      engineFactory,
      healthChecks: this.healthScheduler
    });

    this.daemon = new IngestionDaemon({
      config: () => this.config.getConfig(),
      modifiedFlag: this.config.getModifiedFlag(),
      feeds: new FeedMonitor({ limiter: feedLimiter, fetch: options.fetch }),
      registry: this.registry,
      seen: this.database,
      player: this.player,
      playerLimiter,
      notifier: this.notifications
    });

    this.config.onConfigChange((updated: AppConfig) => {
      this.notifications.setTargets(updated.notifications);
    });
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      console.log('ArchiveService already running');
      return;
    }

    console.log('Starting ArchiveService...');
    try {
      this.registry.load();
      this.daemon.start();
      this.config.startWatching();
      this.isRunning = true;
      console.log('ArchiveService started successfully');
    } catch (error) {
      console.error('Failed to start ArchiveService:', formatError(error));
      throw error;
    }
  }

  async stop(): Promise<void> {
    console.log('Stopping ArchiveService...');
    await this.daemon.stop();
    await this.healthScheduler.stop();
    await this.registry.shutdown();
    await this.config.stopWatching();
    this.database.close();
    this.isRunning = false;
    console.log('ArchiveService stopped');
  }

  /**
   * Creates and starts a job for a manually submitted URL.
   */
  async addJob(request: CreateJobRequest): Promise<ArchiveJob> {
    const config = this.config.getConfig();
    const videoId = extractVideoId(request.url);

    let response: PlayerResponse | null = null;
    if (videoId) {
      response = await this.player.fetchPlayerResponse(videoId);
    } else {
      console.warn(`Could not find a video id in ${request.url}`);
    }

    const job = this.registry.createJob({
      url: request.url,
      outputDirectory: this.resolveOutputDirectory(config, request.outputDirectory),
      writeDescription: request.writeDescription ?? false,
      writeThumbnail: request.writeThumbnail ?? false,
      preferVp9: request.preferVp9 ?? false,
      numParallelDownloads: request.numParallelDownloads
    });
    if (response) {
      job.seedFromPlayerResponse(response);
    }

    void this.registry.startJob(job);
    return job;
  }

  cancelJob(id: string): boolean | null {
    const job = this.registry.getJob(id);
    if (!job) {
      return null;
    }
    return job.cancel();
  }

  /**
   * Removes the job's files from its staging directory. Only files named
   * after the job's video are touched.
   */
  async deleteTempFiles(id: string): Promise<TempFileResult> {
    const job = this.registry.getJob(id);
    if (!job) {
      return { status: 'not-found' };
    }
    const videoId = job.videoId;
    const stagingDirectory = job.stagingDirectory;
    if (!job.canDeleteTempFiles() || !videoId) {
      return { status: 'not-allowed' };
    }
    if (!stagingDirectory) {
      return { status: 'deleted', files: [] };
    }

    let entries: string[];
    try {
      entries = await readdir(stagingDirectory);
    } catch (error) {
      console.warn(`Staging directory for job ${id} is not readable:`, formatError(error));
      return { status: 'deleted', files: [] };
    }

    const files = entries.filter((name) => name.startsWith(videoId));
    for (const name of files) {
      await unlink(join(stagingDirectory, name));
    }
    try {
      await rmdir(stagingDirectory);
    } catch (error) {
      console.log(`Kept staging directory ${stagingDirectory}: ${formatError(error)}`);
    }
    return { status: 'deleted', files };
  }

  getHealthStatus(): HealthResponse {
    const jobs: Partial<Record<JobStatus, number>> = {};
    for (const job of this.registry.allJobs()) {
      jobs[job.status] = (jobs[job.status] ?? 0) + 1;
    }
    const channels = this.config.getConfig().channels.length;
    const daemonRunning = this.daemon.isRunning;

    return {
      status: this.isRunning && !daemonRunning ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      jobs,
      channels,
      daemon: {
        running: daemonRunning,
        lastPollAt: this.daemon.lastPollAt ? this.daemon.lastPollAt.toISOString() : null
      }
    };
  }

  private resolveOutputDirectory(config: AppConfig, requested: string | undefined): string | undefined {
    const base = config.downloader.outputDirectory ?? 'output';
    if (!requested) {
      return config.downloader.outputDirectory;
    }
    // relative paths are placed under the configured output directory
    return isAbsolute(requested) ? requested : join(base, requested);
  }
}
