import { z } from 'zod';
import {
  AppConfig,
  ArchiveEvent,
  HEALTH_CHECK_RESULTS,
  JOB_STATUSES,
  JobSnapshot
} from '../types';
import { compilePattern } from '../utils/patterns';
import { formatError } from '../utils/errors';

// resolutions offered by the upstream player
export const VALID_RESOLUTIONS = [144, 240, 360, 480, 720, 1080, 1440, 2160, 4320] as const;

const IsoDateSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const PatternSchema = z
  .string()
  .min(1)
  .transform((source, ctx) => {
    try {
      return compilePattern(source);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid pattern '${source}': ${formatError(error)}`
      });
      return z.NEVER;
    }
  });

// legacy %(name)s interpolation is not accepted in output templates
const LEGACY_TEMPLATE_FORMAT = /%(?:\(([_a-z][_a-z0-9]*)\))?s?/;

export const ChannelMonitorConfigSchema = z.object({
  id: z.string().startsWith('UC', { message: "Expected 'UC' prefix for channel id" }),
  name: z.string().min(1).optional(),
  lookbehind: z.number().int().nonnegative().default(2),
  terms: z.record(z.string(), PatternSchema).default({}),
  outputDirectory: z.string().min(1).optional(),
  includeNonLiveContent: z.boolean().default(false)
});

export const NotificationTargetSchema = z.object({
  url: z.string().url(),
  tags: z.array(z.string().min(1)).default([])
});

export const DownloaderConfigSchema = z.object({
  command: z.string().min(1).default('moonarchive'),
  numParallelDownloads: z.number().int().positive().default(1),
  maxVideoResolution: z
    .number()
    .int()
    .refine((value) => (VALID_RESOLUTIONS as readonly number[]).includes(value), {
      message: `Expected one of ${VALID_RESOLUTIONS.join(', ')}`
    })
    .default(4320),
  ffmpegPath: z.string().min(1).optional(),
  outputDirectory: z.string().min(1).optional(),
  outputTemplate: z
    .string()
    .min(1)
    .refine((value) => !LEGACY_TEMPLATE_FORMAT.test(value), {
      message: 'Output template must use ${name} placeholders'
    })
    .refine((value) => !value.startsWith('/'), {
      message: 'Output template should not specify an absolute path'
    })
    .optional(),
  stagingDirectory: z.string().min(1).optional(),
  poToken: z.string().min(1).optional(),
  visitorData: z.string().min(1).optional(),
  cookieFile: z.string().min(1).optional()
});

export const AppConfigSchema: z.ZodType<AppConfig, z.ZodTypeDef, unknown> = z
  .object({
    dataDir: z.string().min(1).default('./data'),
    server: z
      .object({
        port: z.coerce.number().int().positive().default(3000)
      })
      .default({}),
    pollIntervalSeconds: z.number().positive().default(600),
    tasklist: z
      .object({
        hideFinishedAgeDays: z.number().int().nonnegative().default(0)
      })
      .default({}),
    healthchecks: z
      .object({
        enableScheduled: z.boolean().default(false)
      })
      .default({}),
    downloader: DownloaderConfigSchema.default({}),
    notifications: z.array(NotificationTargetSchema).default([]),
    channels: z.array(ChannelMonitorConfigSchema).default([])
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    for (const channel of config.channels) {
      if (seen.has(channel.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['channels'],
          message: `Duplicate channel in config: ${channel.id}`
        });
      }
      seen.add(channel.id);
    }
  });

const MediaTypeSchema = z.enum(['audio', 'video']);

export const ArchiveEventSchema: z.ZodType<ArchiveEvent, z.ZodTypeDef, unknown> =
  z.discriminatedUnion('type', [
    z.object({
      type: z.literal('stream-info'),
      videoTitle: z.string(),
      scheduledStart: IsoDateSchema.nullable().default(null)
    }),
    z.object({
      type: z.literal('fragment'),
      manifestId: z.string().min(1),
      mediaType: MediaTypeSchema,
      currentFragment: z.number().int().nonnegative(),
      maxFragments: z.number().int().nonnegative(),
      fragmentSize: z.number().int().nonnegative()
    }),
    z.object({
      type: z.literal('format-selection'),
      manifestId: z.string().min(1),
      majorType: MediaTypeSchema,
      format: z.object({
        itag: z.number().int(),
        qualityLabel: z.string().nullable().default(null),
        bitrate: z.number().nonnegative().nullable().default(null),
        codec: z.string().nullable().default(null),
        targetDurationSec: z.number().nonnegative()
      })
    }),
    z.object({ type: z.literal('stream-mux') }),
    z.object({
      type: z.literal('stream-mux-progress'),
      manifestId: z.string().min(1),
      progress: z.object({
        outTime: z.number().nonnegative(),
        totalSize: z.number().nonnegative().nullable().default(null)
      })
    }),
    z.object({ type: z.literal('stream-unavailable') }),
    z.object({
      type: z.literal('job-finished'),
      outputPaths: z.array(z.string()).default([])
    }),
    z.object({ type: z.literal('failed-output-move') }),
    z.object({ type: z.literal('text'), text: z.string() })
  ]);

const ManifestProgressSchema = z.object({
  videoSeq: z.number().default(0),
  audioSeq: z.number().default(0),
  maxSeq: z.number().default(0),
  totalDownloaded: z.number().default(0),
  fragmentDuration: z.number().nullable().default(null),
  output: z
    .object({
      outTime: z.number().default(0),
      totalSize: z.number().nullable().default(null)
    })
    .default({}),
  startSeq: z.number().default(0),
  firstUpdate: IsoDateSchema.nullable().default(null),
  lastUpdate: IsoDateSchema.nullable().default(null)
});

export const JobSnapshotSchema: z.ZodType<JobSnapshot, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  author: z.string().nullable().default(null),
  channelId: z.string().nullable().default(null),
  videoId: z.string().nullable().default(null),
  scheduledStart: IsoDateSchema.nullable().default(null),
  thumbnailUrl: z.string().nullable().default(null),
  title: z.string().nullable().default(null),
  currentManifest: z.string().nullable().default(null),
  status: z.enum(JOB_STATUSES),
  finishedAt: IsoDateSchema.nullable().default(null),
  messages: z.array(z.object({ time: IsoDateSchema, message: z.string() })).default([]),
  manifestProgress: z.record(z.string(), ManifestProgressSchema).default({}),
  healthCheck: z
    .object({
      result: z.enum(HEALTH_CHECK_RESULTS).nullable().default(null),
      checkedAt: IsoDateSchema.nullable().default(null)
    })
    .default({}),
  outputPaths: z.array(z.string()).default([]),
  stagingDirectory: z.string().nullable().default(null)
});

export const CreateJobRequestSchema = z.object({
  url: z.string().min(1),
  outputDirectory: z.string().min(1).optional(),
  writeDescription: z.boolean().optional(),
  writeThumbnail: z.boolean().optional(),
  preferVp9: z.boolean().optional(),
  numParallelDownloads: z.number().int().positive().optional()
});
