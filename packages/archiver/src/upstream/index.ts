export { PlayerClient, estimatedBroadcastDuration, extractJsonObject, type PlayerClientOptions } from './PlayerClient';
export { extractVideoId } from './videoId';
export * from './types';
