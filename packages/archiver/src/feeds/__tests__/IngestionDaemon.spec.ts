import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AppConfig, AppConfigSchema, ChannelMonitorConfig, ChannelMonitorConfigSchema } from '@streamvault/shared';
import { FeedItemMatch } from '../FeedMonitor';
import { IngestionDaemon, isArchivable } from '../IngestionDaemon';
import { JobRegistry } from '../../jobs';
import { Notification } from '../../notifications';
import { FakePlayer, MemoryStore, ScriptedEngine, playerResponse } from '../../__tests__/fakes';
import { ModifiedFlag } from '../../utils/ModifiedFlag';
import { RateLimiter } from '../../utils/RateLimiter';

const VIDEO_ID = 'dQw4w9WgXcQ';

function channelConfig(overrides: Record<string, unknown> = {}): ChannelMonitorConfig {
  return ChannelMonitorConfigSchema.parse({
    id: 'UCtestchannel000000000000',
    name: 'Test Channel',
    terms: { karaoke: '(?i)(\\W|^)karaoke' },
    ...overrides
  });
}

function match(channel: ChannelMonitorConfig = channelConfig()): FeedItemMatch {
  return {
    channel,
    url: `https://www.youtube.com/watch?v=${VIDEO_ID}`,
    videoId: VIDEO_ID,
    author: 'Feed Author',
    matchingTerms: new Set(['unarchived', 'karaoke'])
  };
}

describe('isArchivable', () => {
  it('accepts upcoming, live and post-live broadcasts', () => {
    expect(isArchivable(playerResponse({ isUpcoming: true }), false)).toBe(true);
    expect(isArchivable(playerResponse({ isUpcoming: false, isLive: true }), false)).toBe(true);
    expect(isArchivable(playerResponse({ isUpcoming: false, isPostLiveDvr: true }), false)).toBe(true);
  });

  it('rejects finished uploads and missing details', () => {
    expect(isArchivable(playerResponse({ isUpcoming: false }), false)).toBe(false);
    expect(isArchivable(playerResponse(null), true)).toBe(false);
  });

  it('accepts premieres only when the channel allows non-live content', () => {
    const premiere = playerResponse({ isLiveContent: false, isUpcoming: true });
    expect(isArchivable(premiere, false)).toBe(false);
    expect(isArchivable(premiere, true)).toBe(true);
  });
});

describe('IngestionDaemon', () => {
  let config: AppConfig;
  let store: MemoryStore;
  let player: FakePlayer;
  let notifications: Notification[];
  let registry: JobRegistry;
  let flag: ModifiedFlag;
  let feedMatches: FeedItemMatch[];
  let feedCalls: string[];
  let daemon: IngestionDaemon;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    config = AppConfigSchema.parse({
      dataDir: '/srv/streamvault',
      downloader: { outputDirectory: '/srv/output' },
      channels: [{ id: 'UCtestchannel000000000000', terms: { karaoke: '(?i)(\\W|^)karaoke' } }]
    });
    store = new MemoryStore();
    player = new FakePlayer();
    notifications = [];
    flag = new ModifiedFlag();
    feedMatches = [];
    feedCalls = [];

    const ids = ['job-1', 'job-2'];
    const notifier = { notify: (notification: Notification) => notifications.push(notification) };
    const playerLimiter = new RateLimiter({ concurrency: 1 });
    registry = new JobRegistry({
      config: () => config,
      store,
      notifier,
      player,
      playerLimiter,
      engineFactory: (params) => new ScriptedEngine(params, [], 'hang'),
      generateId: () => ids.shift() ?? 'fallback'
    });
    daemon = new IngestionDaemon({
      config: () => config,
      modifiedFlag: flag,
      feeds: {
        getChannelMatches: async (channel) => {
          feedCalls.push(channel.id);
          return feedMatches;
        }
      },
      registry,
      seen: store,
      player,
      playerLimiter,
      notifier,
      sleep: (_ms, signal) =>
        new Promise<void>((resolve) => signal?.addEventListener('abort', () => resolve(), { once: true }))
    });
  });

  describe('scheduleMatch', () => {
    it('creates and starts a job for an eligible stream', async () => {
      player.responses.set(VIDEO_ID, playerResponse());

      expect(await daemon.scheduleMatch(match())).toBe('scheduled');

      const job = registry.getJob('job-1');
      expect(job?.videoId).toBe(VIDEO_ID);
      expect(job?.title).toBe('Test stream');
      expect(job?.messages[0].message).toBe('Found stream with matching terms: karaoke, unarchived');
      expect(job?.isRunning).toBe(true);
      expect(job?.engine?.params).toMatchObject({
        url: `https://www.youtube.com/watch?v=${VIDEO_ID}`,
        pollInterval: 300,
        writeDescription: true,
        writeThumbnail: true,
        preferVp9: true,
        outputDirectory: '/srv/output'
      });
      expect(notifications).toEqual([
        {
          body: `Test Channel is doing a stream matching: karaoke, unarchived @ https://youtu.be/${VIDEO_ID}`,
          tag: 'monitor-feed:found'
        }
      ]);
      expect(store.seen.has(VIDEO_ID)).toBe(true);

      await registry.shutdown();
    });

    it('writes into the channel output directory when one is set', async () => {
      player.responses.set(VIDEO_ID, playerResponse());

      await daemon.scheduleMatch(match(channelConfig({ outputDirectory: '/srv/karaoke' })));

      expect(registry.getJob('job-1')?.engine?.params.outputDirectory).toBe('/srv/karaoke');
      await registry.shutdown();
    });

    it('skips videos that already have a job', async () => {
      player.responses.set(VIDEO_ID, playerResponse());
      await daemon.scheduleMatch(match());
      store.seen.clear();

      expect(await daemon.scheduleMatch(match())).toBe('active');
      expect(registry.size).toBe(1);
      await registry.shutdown();
    });

    it('skips videos seen before', async () => {
      store.seen.add(VIDEO_ID);

      expect(await daemon.scheduleMatch(match())).toBe('seen');
      expect(player.calls).toEqual([]);
    });

    it('forgets the video when its metadata is unavailable', async () => {
      expect(await daemon.scheduleMatch(match())).toBe('unavailable');
      expect(store.seen.has(VIDEO_ID)).toBe(false);
      expect(registry.size).toBe(0);
    });

    it('forgets the video when the metadata request throws', async () => {
      vi.spyOn(player, 'fetchPlayerResponse').mockRejectedValue(new Error('connection reset'));

      await expect(daemon.scheduleMatch(match())).rejects.toThrow('connection reset');
      expect(store.seen.has(VIDEO_ID)).toBe(false);
    });

    it('remembers ineligible videos without creating a job', async () => {
      player.responses.set(VIDEO_ID, playerResponse({ isUpcoming: false }));

      expect(await daemon.scheduleMatch(match())).toBe('ineligible');
      expect(store.seen.has(VIDEO_ID)).toBe(true);
      expect(registry.size).toBe(0);
      expect(notifications).toEqual([]);
    });
  });

  describe('pollOnce', () => {
    it('schedules nothing new when the feed is unchanged', async () => {
      player.responses.set(VIDEO_ID, playerResponse());
      feedMatches = [match()];

      await daemon.pollOnce();
      await daemon.pollOnce();

      expect(registry.size).toBe(1);
      expect(player.calls).toHaveLength(1);
      expect(notifications).toHaveLength(1);
      expect(daemon.lastPollAt).toBeInstanceOf(Date);
      await registry.shutdown();
    });

    it('keeps polling other channels when one feed fails', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      config = AppConfigSchema.parse({
        channels: [
          { id: 'UCbroken0000000000000000' },
          { id: 'UCtestchannel000000000000' }
        ]
      });
      player.responses.set(VIDEO_ID, playerResponse());
      const feeds = {
        getChannelMatches: async (channel: ChannelMonitorConfig) => {
          if (channel.id === 'UCbroken0000000000000000') {
            throw new Error('feed unavailable');
          }
          return [match()];
        }
      };
      const partial = new IngestionDaemon({
        config: () => config,
        modifiedFlag: flag,
        feeds,
        registry,
        seen: store,
        player,
        playerLimiter: new RateLimiter({ concurrency: 1 }),
        notifier: { notify: () => {} }
      });

      const matches = await partial.pollOnce();

      expect(matches.map((item) => item.videoId)).toEqual([VIDEO_ID]);
      expect(registry.size).toBe(1);
      expect(error).toHaveBeenCalledWith(
        'Failed to check feed for channel UCbroken0000000000000000:',
        'feed unavailable'
      );
      await registry.shutdown();
    });
  });

  describe('start', () => {
    it('waits for a config change when no channels are configured', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      config = AppConfigSchema.parse({});

      daemon.start();
      expect(daemon.isRunning).toBe(true);
      await Promise.resolve();
      expect(feedCalls).toEqual([]);

      config = AppConfigSchema.parse({ channels: [{ id: 'UCtestchannel000000000000' }] });
      flag.set();
      await vi.waitFor(() => expect(feedCalls).toEqual(['UCtestchannel000000000000']));

      await daemon.stop();
      expect(daemon.isRunning).toBe(false);
    });
  });
});
