import { z } from 'zod';
import { ClientConfig, PlayerResponse } from './types';

const TimestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value))
  .nullable()
  .catch(null);

const VideoDetailsSchema = z.object({
  videoId: z.string(),
  title: z.string(),
  author: z.string(),
  channelId: z.string(),
  lengthSeconds: z.coerce.number().int().nonnegative(),
  thumbnail: z
    .object({
      thumbnails: z.array(
        z.object({
          url: z.string(),
          width: z.number(),
          height: z.number()
        })
      )
    })
    .default({ thumbnails: [] }),
  isLive: z.boolean().default(false),
  // assume live content when the field is missing upstream
  isLiveContent: z.boolean().default(true),
  isUpcoming: z.boolean().default(false),
  isPostLiveDvr: z.boolean().default(false)
});

const PlayabilityStatusSchema = z.object({
  status: z.string(),
  liveStreamability: z
    .object({
      liveStreamabilityRenderer: z
        .object({
          offlineSlate: z
            .object({
              liveStreamOfflineSlateRenderer: z
                .object({ scheduledStartTime: z.string().optional() })
                .optional()
            })
            .optional()
        })
        .optional()
    })
    .optional()
});

const MicroformatSchema = z.object({
  playerMicroformatRenderer: z
    .object({
      liveBroadcastDetails: z
        .object({
          startTimestamp: TimestampSchema.default(null),
          endTimestamp: TimestampSchema.default(null),
          isLiveNow: z.boolean().default(false)
        })
        .optional()
    })
    .optional()
});

function parseEpochSeconds(value: string | undefined): Date | null {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  return Number.isInteger(seconds) ? new Date(seconds * 1000) : null;
}

export const PlayerResponseSchema: z.ZodType<PlayerResponse, z.ZodTypeDef, unknown> = z
  .object({
    videoDetails: VideoDetailsSchema.nullable().catch(null).default(null),
    playabilityStatus: PlayabilityStatusSchema.nullable().catch(null).default(null),
    microformat: MicroformatSchema.nullable().catch(null).default(null)
  })
  .transform((raw) => ({
    videoDetails: raw.videoDetails
      ? {
          videoId: raw.videoDetails.videoId,
          title: raw.videoDetails.title,
          author: raw.videoDetails.author,
          channelId: raw.videoDetails.channelId,
          lengthSeconds: raw.videoDetails.lengthSeconds,
          thumbnails: raw.videoDetails.thumbnail.thumbnails,
          isLive: raw.videoDetails.isLive,
          isLiveContent: raw.videoDetails.isLiveContent,
          isUpcoming: raw.videoDetails.isUpcoming,
          isPostLiveDvr: raw.videoDetails.isPostLiveDvr
        }
      : null,
    playabilityStatus: raw.playabilityStatus
      ? {
          status: raw.playabilityStatus.status,
          scheduledStart: parseEpochSeconds(
            raw.playabilityStatus.liveStreamability?.liveStreamabilityRenderer?.offlineSlate
              ?.liveStreamOfflineSlateRenderer?.scheduledStartTime
          )
        }
      : null,
    liveBroadcastDetails: raw.microformat?.playerMicroformatRenderer?.liveBroadcastDetails ?? null
  }));

export const ClientConfigSchema: z.ZodType<ClientConfig, z.ZodTypeDef, unknown> = z
  .object({
    INNERTUBE_API_KEY: z.string(),
    INNERTUBE_CLIENT_NAME: z.string(),
    INNERTUBE_CLIENT_VERSION: z.string(),
    INNERTUBE_CONTEXT_CLIENT_NAME: z.number(),
    VISITOR_DATA: z.string().nullish(),
    SESSION_INDEX: z.coerce.string().nullish(),
    DELEGATED_SESSION_ID: z.string().nullish(),
    ID_TOKEN: z.string().nullish()
  })
  .transform((raw) => ({
    apiKey: raw.INNERTUBE_API_KEY,
    clientName: raw.INNERTUBE_CLIENT_NAME,
    clientVersion: raw.INNERTUBE_CLIENT_VERSION,
    contextClientName: raw.INNERTUBE_CONTEXT_CLIENT_NAME,
    visitorData: raw.VISITOR_DATA ?? null,
    sessionIndex: raw.SESSION_INDEX ?? null,
    delegatedSessionId: raw.DELEGATED_SESSION_ID ?? null,
    idToken: raw.ID_TOKEN ?? null
  }));
