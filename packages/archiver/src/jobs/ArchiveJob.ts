import {
  ArchiveEvent,
  ArchiveEventType,
  DAY,
  EventSink,
  FormatSelectionEvent,
  FragmentEvent,
  HOUR,
  HealthCheckResult,
  HealthCheckStatus,
  JobSnapshot,
  JobStatus,
  JobStatusSummary,
  LogMessage,
  MINUTE,
  ManifestProgress,
  TERMINAL_STATUSES,
  capitalize,
  formatError,
  isCancellation
} from '@streamvault/shared';
import { DownloadEngine } from '../engine';
import { PlayerResponse, estimatedBroadcastDuration } from '../upstream';
import { createManifestProgress, estimateTimeRemaining } from './progress';
import { JobDependencies, SortKey } from './types';

const STATUS_PRIORITY: Partial<Record<JobStatus, number>> = {
  unknown: 3,
  downloading: 2,
  waiting: 1
};

// statuses whose temporary files may be removed
const DELETE_ELIGIBLE: ReadonlySet<JobStatus> = new Set<JobStatus>(['cancelled', 'finished', 'error']);

// the event that puts a job into each terminal status; a repeat is applied again
const TERMINAL_EVENTS: Partial<Record<JobStatus, ArchiveEventType>> = {
  finished: 'job-finished',
  error: 'failed-output-move',
  unavailable: 'stream-unavailable'
};

// events a terminal job still records
const INFORMATIONAL_EVENTS: ReadonlySet<ArchiveEventType> = new Set<ArchiveEventType>([
  'text',
  'stream-mux-progress'
]);

// [elapsed since finish, interval until the next check]
const HEALTH_CHECK_SCHEDULE: ReadonlyArray<[number, number]> = [
  [HOUR, 5 * MINUTE],
  [6 * HOUR, 30 * MINUTE],
  [DAY, HOUR],
  [3 * DAY, 4 * HOUR]
];

function ignoreEvent(_event: never): void {}

export function describeFormat(event: FormatSelectionEvent): string {
  const { format, manifestId } = event;
  const typeName = capitalize(event.majorType);
  const details = `(itag ${format.itag}, manifest ${manifestId}, duration ${format.targetDurationSec})`;
  let codec = format.codec || 'unknown codec';

  if (event.majorType === 'video') {
    if (codec.startsWith('avc1')) {
      codec = 'h264';
    }
    return `${typeName} format: ${format.qualityLabel ?? 'unknown quality'} ${codec} ${details}`;
  }
  if (format.bitrate) {
    return `${typeName} format: ${Math.floor(format.bitrate / 1000)}k ${codec} ${details}`;
  }
  return `${typeName} format selected (manifest ${manifestId}, duration ${format.targetDurationSec})`;
}

/**
 * Orders jobs for display: higher status priority first, then the later
 * reference time. Jobs without a comparable time keep their relative order.
 */
export function compareSortKeys(a: SortKey, b: SortKey): number {
  const [priorityA, timeA] = a;
  const [priorityB, timeB] = b;
  if (priorityA !== priorityB) {
    return priorityB - priorityA;
  }
  if (priorityA === 0 || !timeA || !timeB) {
    return 0;
  }
  // for waiting jobs this puts the furthest scheduled start first
  return timeB.getTime() - timeA.getTime();
}

export function compareJobs(a: ArchiveJob, b: ArchiveJob): number {
  return compareSortKeys(a.sortKey(), b.sortKey());
}

export class ArchiveJob implements EventSink {
  author: string | null = null;
  channelId: string | null = null;
  videoId: string | null = null;
  scheduledStart: Date | null = null;
  thumbnailUrl: string | null = null;
  title: string | null = null;
  currentManifest: string | null = null;
  status: JobStatus = 'unknown';
  finishedAt: Date | null = null;
  messages: LogMessage[] = [];
  manifestProgress = new Map<string, ManifestProgress>();
  healthCheck: HealthCheckStatus = { result: null, checkedAt: null };
  outputPaths: string[] = [];
  stagingDirectory: string | null = null;

  private abortController: AbortController | null = null;

  constructor(
    public readonly id: string,
    private deps: JobDependencies,
    // absent for jobs restored from the store
    public readonly engine: DownloadEngine | null = null
  ) {}

  static fromSnapshot(snapshot: JobSnapshot, deps: JobDependencies): ArchiveJob {
    const job = new ArchiveJob(snapshot.id, deps);
    job.author = snapshot.author;
    job.channelId = snapshot.channelId;
    job.videoId = snapshot.videoId;
    job.scheduledStart = snapshot.scheduledStart;
    job.thumbnailUrl = snapshot.thumbnailUrl;
    job.title = snapshot.title;
    job.currentManifest = snapshot.currentManifest;
    job.status = snapshot.status;
    job.finishedAt = snapshot.finishedAt;
    job.messages = snapshot.messages.map((entry) => ({ ...entry }));
    job.manifestProgress = new Map(Object.entries(structuredClone(snapshot.manifestProgress)));
    job.healthCheck = { ...snapshot.healthCheck };
    job.outputPaths = [...snapshot.outputPaths];
    job.stagingDirectory = snapshot.stagingDirectory;
    return job;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATUSES.has(this.status);
  }

  get isRunning(): boolean {
    return this.abortController !== null;
  }

  async handleEvent(event: ArchiveEvent): Promise<void> {
    const previousStatus = this.status;

    if (!this.acceptsEvent(event)) {
      return;
    }

    switch (event.type) {
      case 'stream-info':
        this.title = event.videoTitle;
        this.status = 'waiting';
        if (event.scheduledStart && event.scheduledStart.getTime() !== this.scheduledStart?.getTime()) {
          this.scheduledStart = event.scheduledStart;
        }
        break;
      case 'fragment':
        this.status = 'downloading';
        this.applyFragment(event);
        break;
      case 'job-finished':
        this.status = 'finished';
        this.appendMessage('Finished downloading');
        this.finishedAt = this.now();
        this.outputPaths = [...event.outputPaths];
        this.persist();
        this.deps.healthChecks?.schedule(this);
        break;
      case 'failed-output-move':
        this.status = 'error';
        this.appendMessage('Failed to move output files');
        this.persist();
        break;
      case 'stream-mux':
        this.status = 'muxing';
        this.appendMessage('Started remux process');
        break;
      case 'stream-mux-progress':
        this.getManifestProgress(event.manifestId).output = {
          outTime: event.progress.outTime,
          totalSize: event.progress.totalSize
        };
        break;
      case 'stream-unavailable':
        this.status = 'unavailable';
        break;
      case 'format-selection':
        this.getManifestProgress(event.manifestId).fragmentDuration = event.format.targetDurationSec;
        this.appendMessage(describeFormat(event));
        break;
      case 'text':
        this.appendMessage(event.text);
        break;
      default:
        ignoreEvent(event);
    }

    if (previousStatus !== this.status) {
      this.notifyStatus();
    }
    this.broadcast();
  }

  /**
   * Drives the attached engine to completion. Failures and cancellation are
   * recorded on the job; this never rejects.
   */
  async run(): Promise<void> {
    if (!this.engine) {
      this.appendMessage('No downloader attached to this job');
      this.broadcast();
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.appendMessage('Started download task');
    this.broadcast();

    try {
      await this.engine.run(this, controller.signal);
    } catch (error) {
      // a terminal status reported by the engine outlives its exit
      const settled = this.isTerminal;
      if (controller.signal.aborted || isCancellation(error)) {
        this.appendMessage('Download cancelled');
        if (!settled) {
          this.status = 'cancelled';
          this.notifyStatus();
        }
      } else {
        this.appendMessage(`Exception: ${formatError(error)}`);
        if (error instanceof Error && error.stack) {
          this.appendMessage(error.stack);
        }
        if (!settled) {
          this.status = 'error';
          this.notifyStatus();
          this.persist();
        }
      }
      this.broadcast();
    } finally {
      this.abortController = null;
    }
  }

  cancel(): boolean {
    if (!this.abortController) {
      return false;
    }
    this.abortController.abort();
    return true;
  }

  /**
   * Copies identifying details from an upstream player response onto the job.
   */
  seedFromPlayerResponse(response: PlayerResponse): void {
    const details = response.videoDetails;
    if (details) {
      this.videoId = details.videoId;
      this.author = details.author;
      this.channelId = details.channelId;
      this.title = this.title ?? details.title;
      const [largest] = [...details.thumbnails].sort((a, b) => b.width * b.height - a.width * a.height);
      this.thumbnailUrl = largest ? largest.url : null;
    }
    if (response.playabilityStatus) {
      this.scheduledStart = response.playabilityStatus.scheduledStart;
    }
  }

  appendMessage(message: string): void {
    this.messages.push({ time: this.now(), message });
  }

  sortKey(): SortKey {
    const priority = STATUS_PRIORITY[this.status] ?? 0;
    if (this.status === 'finished') {
      return [priority, this.finishedAt];
    }
    if (this.status === 'waiting') {
      return [priority, this.scheduledStart];
    }
    const last = this.messages[this.messages.length - 1];
    return [priority, last ? last.time : null];
  }

  canDeleteTempFiles(): boolean {
    if (!this.videoId || !DELETE_ELIGIBLE.has(this.status)) {
      return false;
    }
    if (this.status === 'finished') {
      // an unknown output size means the mux may not have completed
      for (const progress of this.manifestProgress.values()) {
        if (progress.output.totalSize === null) {
          return false;
        }
      }
    }
    return true;
  }

  /**
   * Archived duration in seconds. Broadcasts split over several manifests
   * overlap, so their combined length is not determined.
   */
  downloadedDuration(): number | null {
    if (this.manifestProgress.size !== 1) {
      return null;
    }
    const [progress] = this.manifestProgress.values();
    return progress.output.outTime > 0 ? progress.output.outTime : null;
  }

  estimatedTimeRemaining(): number | null {
    if (!this.currentManifest) {
      return null;
    }
    const progress = this.manifestProgress.get(this.currentManifest);
    return progress ? estimateTimeRemaining(progress) : null;
  }

  async runHealthCheck(): Promise<HealthCheckResult> {
    let result: HealthCheckResult;
    try {
      result = await this.computeHealthCheckResult();
    } catch (error) {
      console.error(`Health check for job ${this.id} failed:`, formatError(error));
      result = 'healthcheck-failure';
    }

    this.healthCheck = { result, checkedAt: this.now() };
    if (this.status === 'finished') {
      this.persist();
    }
    this.broadcast();
    return result;
  }

  nextHealthCheckDelay(now: Date = this.now()): number | null {
    if (!this.finishedAt) {
      return null;
    }
    const elapsed = now.getTime() - this.finishedAt.getTime();
    for (const [threshold, interval] of HEALTH_CHECK_SCHEDULE) {
      if (elapsed <= threshold) {
        return interval;
      }
    }
    return null;
  }

  statusSummary(): JobStatusSummary {
    let videoSeq = 0;
    let audioSeq = 0;
    let maxSeq = 0;
    let totalDownloaded = 0;
    for (const progress of this.manifestProgress.values()) {
      videoSeq += progress.videoSeq;
      audioSeq += progress.audioSeq;
      maxSeq += progress.maxSeq;
      totalDownloaded += progress.totalDownloaded;
    }
    return {
      id: this.id,
      status: this.status,
      videoSeq,
      audioSeq,
      maxSeq,
      totalDownloaded,
      estimatedTimeRemaining: this.estimatedTimeRemaining()
    };
  }

  snapshot(): JobSnapshot {
    return structuredClone({
      id: this.id,
      author: this.author,
      channelId: this.channelId,
      videoId: this.videoId,
      scheduledStart: this.scheduledStart,
      thumbnailUrl: this.thumbnailUrl,
      title: this.title,
      currentManifest: this.currentManifest,
      status: this.status,
      finishedAt: this.finishedAt,
      messages: this.messages,
      manifestProgress: Object.fromEntries(this.manifestProgress),
      healthCheck: this.healthCheck,
      outputPaths: this.outputPaths,
      stagingDirectory: this.stagingDirectory
    });
  }

  private async computeHealthCheckResult(): Promise<HealthCheckResult> {
    const videoId = this.videoId;
    if (!videoId) {
      return 'healthcheck-failure';
    }

    const duration = this.downloadedDuration();
    if (duration === null) {
      return 'stream-length-indeterminate';
    }

    // skip validation so private and removed videos still report a status
    const response = await this.deps.playerLimiter.run(() =>
      this.deps.player.fetchPlayerResponse(videoId, { validate: false })
    );
    if (!response?.playabilityStatus) {
      return 'healthcheck-failure';
    }
    if (response.playabilityStatus.status === 'LOGIN_REQUIRED') {
      return 'video-unavailable';
    }
    if (!response.videoDetails) {
      return 'healthcheck-failure';
    }

    if (response.videoDetails.isLiveContent) {
      const upstreamDuration = response.videoDetails.lengthSeconds;
      if (Math.abs(duration - upstreamDuration) > 1) {
        // upstream may still be finalizing a broadcast that just ended
        const estimated = estimatedBroadcastDuration(response);
        if (estimated === null || estimated <= upstreamDuration) {
          return 'stream-length-differs';
        }
      }
    }
    return 'ok';
  }

  private acceptsEvent(event: ArchiveEvent): boolean {
    if (!this.isTerminal) {
      return true;
    }
    return INFORMATIONAL_EVENTS.has(event.type) || TERMINAL_EVENTS[this.status] === event.type;
  }

  private applyFragment(event: FragmentEvent): void {
    const progress = this.getManifestProgress(event.manifestId);
    const now = this.now();
    if (!progress.firstUpdate) {
      progress.firstUpdate = now;
      progress.startSeq = event.currentFragment;
    }
    progress.lastUpdate = now;

    progress.maxSeq = Math.max(progress.maxSeq, event.maxFragments);
    if (event.mediaType === 'audio') {
      progress.audioSeq = Math.max(progress.audioSeq, event.currentFragment);
    } else {
      progress.videoSeq = Math.max(progress.videoSeq, event.currentFragment);
    }
    progress.totalDownloaded += event.fragmentSize;

    this.currentManifest = event.manifestId;
    this.videoId = event.manifestId.split('.')[0];
  }

  private getManifestProgress(manifestId: string): ManifestProgress {
    let progress = this.manifestProgress.get(manifestId);
    if (!progress) {
      progress = createManifestProgress();
      this.manifestProgress.set(manifestId, progress);
    }
    return progress;
  }

  private notifyStatus(): void {
    this.deps.notifier.notify({
      title: `Archive status: ${capitalize(this.status)}`,
      body: `${this.title} from ${this.author} @ https://youtu.be/${this.videoId}`,
      tag: `status:${this.status}`
    });
  }

  private persist(): void {
    try {
      this.deps.store.upsert(this.id, this.snapshot());
    } catch (error) {
      console.error(`Failed to persist job ${this.id}:`, formatError(error));
    }
  }

  private broadcast(): void {
    this.deps.broadcaster.publish(this.snapshot());
  }

  private now(): Date {
    return this.deps.clock ? this.deps.clock() : new Date();
  }
}
