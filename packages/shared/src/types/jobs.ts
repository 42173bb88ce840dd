export const JOB_STATUSES = [
  'unknown',
  'unavailable',
  'waiting',
  'downloading',
  'muxing',
  'finished',
  'error',
  'cancelled'
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'finished',
  'error',
  'cancelled',
  'unavailable'
]);

export const HEALTH_CHECK_RESULTS = [
  'ok',
  'healthcheck-failure',
  'video-unavailable',
  'stream-length-differs',
  'stream-length-indeterminate'
] as const;

export type HealthCheckResult = (typeof HEALTH_CHECK_RESULTS)[number];

export interface LogMessage {
  time: Date;
  message: string;
}

export interface MuxProgress {
  outTime: number;
  // null until the muxer reports the size of its output
  totalSize: number | null;
}

export interface ManifestProgress {
  videoSeq: number;
  audioSeq: number;
  maxSeq: number;
  totalDownloaded: number;
  fragmentDuration: number | null;
  output: MuxProgress;
  startSeq: number;
  firstUpdate: Date | null;
  lastUpdate: Date | null;
}

export interface HealthCheckStatus {
  result: HealthCheckResult | null;
  checkedAt: Date | null;
}

export interface JobSnapshot {
  id: string;
  author: string | null;
  channelId: string | null;
  videoId: string | null;
  scheduledStart: Date | null;
  thumbnailUrl: string | null;
  title: string | null;
  currentManifest: string | null;
  status: JobStatus;
  finishedAt: Date | null;
  messages: LogMessage[];
  manifestProgress: Record<string, ManifestProgress>;
  healthCheck: HealthCheckStatus;
  outputPaths: string[];
  stagingDirectory: string | null;
}

/**
 * Parameters handed to a download engine. Unset values are filled from the
 * downloader section of the configuration when the job is created.
 */
export interface EngineParams {
  url: string;
  pollInterval: number;
  writeDescription: boolean;
  writeThumbnail: boolean;
  preferVp9: boolean;
  numParallelDownloads?: number;
  maxVideoResolution?: number;
  ffmpegPath?: string;
  poToken?: string;
  visitorData?: string;
  cookieFile?: string;
  stagingDirectory?: string;
  outputDirectory?: string;
  outputTemplate?: string;
}
