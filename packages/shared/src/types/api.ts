import { JobStatus } from './jobs';

export interface JobStatusSummary {
  id: string;
  status: JobStatus;
  videoSeq: number;
  audioSeq: number;
  maxSeq: number;
  totalDownloaded: number;
  estimatedTimeRemaining: number | null;
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  jobs: Partial<Record<JobStatus, number>>;
  channels: number;
  daemon: {
    running: boolean;
    lastPollAt: string | null;
  };
}

export interface CreateJobRequest {
  url: string;
  outputDirectory?: string;
  writeDescription?: boolean;
  writeThumbnail?: boolean;
  preferVp9?: boolean;
  numParallelDownloads?: number;
}
