// map of rule names to the expressions that match them
export type PatternMap = Record<string, RegExp>;

export interface ChannelMonitorConfig {
  id: string;
  name?: string;
  lookbehind: number;
  terms: PatternMap;
  outputDirectory?: string;
  includeNonLiveContent: boolean;
}

export interface NotificationTarget {
  url: string;
  tags: string[];
}

export interface DownloaderConfig {
  command: string;
  numParallelDownloads: number;
  maxVideoResolution: number;
  ffmpegPath?: string;
  outputDirectory?: string;
  outputTemplate?: string;
  stagingDirectory?: string;
  poToken?: string;
  visitorData?: string;
  cookieFile?: string;
}

export interface AppConfig {
  dataDir: string;
  server: {
    port: number;
  };
  pollIntervalSeconds: number;
  tasklist: {
    hideFinishedAgeDays: number;
  };
  healthchecks: {
    enableScheduled: boolean;
  };
  downloader: DownloaderConfig;
  notifications: NotificationTarget[];
  channels: ChannelMonitorConfig[];
}

export * from './events';
export * from './jobs';
export * from './api';
