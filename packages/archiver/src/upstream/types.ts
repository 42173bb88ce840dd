export interface VideoThumbnail {
  url: string;
  width: number;
  height: number;
}

export interface VideoDetails {
  videoId: string;
  title: string;
  author: string;
  channelId: string;
  lengthSeconds: number;
  thumbnails: VideoThumbnail[];
  // currently being shown in real time
  isLive: boolean;
  // whether the video was a live broadcast at all
  isLiveContent: boolean;
  isUpcoming: boolean;
  // recently finished, fragments still available
  isPostLiveDvr: boolean;
}

export interface PlayabilityStatus {
  status: string;
  scheduledStart: Date | null;
}

export interface LiveBroadcastDetails {
  startTimestamp: Date | null;
  endTimestamp: Date | null;
  isLiveNow: boolean;
}

export interface PlayerResponse {
  videoDetails: VideoDetails | null;
  playabilityStatus: PlayabilityStatus | null;
  liveBroadcastDetails: LiveBroadcastDetails | null;
}

export interface FetchPlayerOptions {
  // when false, responses for private or removed videos are returned as-is
  validate?: boolean;
}

export interface PlayerSource {
  fetchPlayerResponse(videoId: string, options?: FetchPlayerOptions): Promise<PlayerResponse | null>;
}

export interface ClientConfig {
  apiKey: string;
  clientName: string;
  clientVersion: string;
  contextClientName: number;
  visitorData: string | null;
  sessionIndex: string | null;
  delegatedSessionId: string | null;
  idToken: string | null;
}
