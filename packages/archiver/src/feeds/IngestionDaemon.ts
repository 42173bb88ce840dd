import { AppConfig, ChannelMonitorConfig, SECOND, formatError, sleep } from '@streamvault/shared';
import { JobRegistry, SeenSet } from '../jobs';
import { Notifier } from '../notifications';
import { PlayerResponse, PlayerSource } from '../upstream';
import { ModifiedFlag } from '../utils/ModifiedFlag';
import { RateLimiter } from '../utils/RateLimiter';
import { FeedItemMatch, displayAuthor } from './FeedMonitor';

export interface ChannelMatchSource {
  getChannelMatches(channel: ChannelMonitorConfig): Promise<FeedItemMatch[]>;
}

export interface IngestionDaemonOptions {
  config: () => AppConfig;
  modifiedFlag: ModifiedFlag;
  feeds: ChannelMatchSource;
  registry: JobRegistry;
  seen: SeenSet;
  player: PlayerSource;
  playerLimiter: RateLimiter;
  notifier: Notifier;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type ScheduleOutcome = 'active' | 'seen' | 'unavailable' | 'ineligible' | 'scheduled';

// engine poll interval for jobs found in feeds, in seconds
const FEED_JOB_POLL_INTERVAL = 300;

export function isArchivable(response: PlayerResponse, includeNonLiveContent: boolean): boolean {
  const details = response.videoDetails;
  if (!details) {
    return false;
  }
  const streaming = details.isPostLiveDvr || details.isUpcoming || details.isLive;
  return streaming && (details.isLiveContent || includeNonLiveContent);
}

/**
 * Polls every configured channel feed on an interval and starts a job for
 * each new matching stream.
 */
export class IngestionDaemon {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private sleepFn: (ms: number, signal?: AbortSignal) => Promise<void>;
  lastPollAt: Date | null = null;

  constructor(private options: IngestionDaemonOptions) {
    this.sleepFn = options.sleep ?? sleep;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) {
      console.log('Ingestion daemon already running');
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(controller.signal).finally(() => {
      this.loop = null;
    });
    console.log('Ingestion daemon started');
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    if (this.loop) {
      await this.loop;
    }
    this.controller = null;
    console.log('Ingestion daemon stopped');
  }

  /**
   * Polls every channel once and schedules the new matches.
   */
  async pollOnce(): Promise<FeedItemMatch[]> {
    const channels = this.options.config().channels;
    const results = await Promise.allSettled(
      channels.map((channel) => this.options.feeds.getChannelMatches(channel))
    );

    const matches: FeedItemMatch[] = [];
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        matches.push(...result.value);
      } else {
        console.error(`Failed to check feed for channel ${channels[index].id}:`, formatError(result.reason));
      }
    });

    for (const match of matches) {
      try {
        await this.scheduleMatch(match);
      } catch (error) {
        console.error(`Failed to schedule ${match.videoId}:`, formatError(error));
      }
    }
    this.lastPollAt = new Date();
    return matches;
  }

  async scheduleMatch(match: FeedItemMatch): Promise<ScheduleOutcome> {
    const { registry, seen } = this.options;

    const active = registry
      .allJobs()
      .some((job) => job.videoId === match.videoId && job.status !== 'unavailable');
    if (active) {
      return 'active';
    }

    if (seen.containsOrInsert(match.videoId)) {
      return 'seen';
    }

    let response: PlayerResponse | null;
    try {
      response = await this.options.playerLimiter.run(() =>
        this.options.player.fetchPlayerResponse(match.videoId)
      );
    } catch (error) {
      seen.remove(match.videoId);
      throw error;
    }
    if (!response?.videoDetails) {
      // recheck on the next poll
      seen.remove(match.videoId);
      return 'unavailable';
    }
    if (!isArchivable(response, match.channel.includeNonLiveContent)) {
      return 'ineligible';
    }

    const config = this.options.config();
    const job = registry.createJob({
      url: match.url,
      pollInterval: FEED_JOB_POLL_INTERVAL,
      writeDescription: true,
      writeThumbnail: true,
      preferVp9: true,
      outputDirectory: match.channel.outputDirectory ?? config.downloader.outputDirectory
    });
    job.seedFromPlayerResponse(response);

    const terms = [...match.matchingTerms].sort().join(', ');
    job.appendMessage(`Found stream with matching terms: ${terms}`);
    void registry.startJob(job);
    console.log(`Scheduled job ${job.id} for ${match.videoId} (${terms})`);

    this.options.notifier.notify({
      body: `${displayAuthor(match)} is doing a stream matching: ${terms} @ https://youtu.be/${match.videoId}`,
      tag: 'monitor-feed:found'
    });
    return 'scheduled';
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    const flag = this.options.modifiedFlag;
    flag.clear();

    while (!signal.aborted) {
      if (this.options.config().channels.length === 0) {
        console.warn('No channels configured for monitoring; waiting for a config change');
        await flag.wait(signal);
        flag.clear();
        continue;
      }

      try {
        await this.pollOnce();
      } catch (error) {
        console.error('Feed poll failed:', formatError(error));
      }
      await this.sleepFn(this.options.config().pollIntervalSeconds * SECOND, signal);
    }
  }
}
