import { describe, it, expect, vi } from 'vitest';
import { ChannelMonitorConfigSchema } from '@streamvault/shared';
import {
  FeedEntry,
  FeedMonitor,
  channelFeedUrl,
  displayAuthor,
  matchEntries,
  slidingWindow,
  uniqueDescriptionLines
} from '../FeedMonitor';
import { RateLimiter } from '../../utils/RateLimiter';

const channel = ChannelMonitorConfigSchema.parse({
  id: 'UCtestchannel000000000000',
  terms: { karaoke: '(?i)(\\W|^)karaoke', unarchived: '(?i)(\\W|^)unar?chived?' }
});

function entry(videoId: string, title: string, description: string): FeedEntry {
  return {
    title,
    link: `https://www.youtube.com/watch?v=${videoId}`,
    videoId,
    author: 'Feed Author',
    description
  };
}

function atomFeed(entries: Array<{ videoId: string; title: string; description: string }>): string {
  const items = entries
    .map(
      (item) => `
  <entry>
    <id>yt:video:${item.videoId}</id>
    <yt:videoId>${item.videoId}</yt:videoId>
    <yt:channelId>UCtestchannel000000000000</yt:channelId>
    <title>${item.title}</title>
    <link rel="alternate" href="https://www.youtube.com/watch?v=${item.videoId}"/>
    <author>
      <name>Feed Author</name>
      <uri>https://www.youtube.com/channel/UCtestchannel000000000000</uri>
    </author>
    <published>2024-06-01T12:00:00+00:00</published>
    <media:group>
      <media:title>${item.title}</media:title>
      <media:description>${item.description}</media:description>
    </media:group>
  </entry>`
    )
    .join('');
  return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns:yt="http://www.youtube.com/xml/schemas/2015" xmlns:media="http://search.yahoo.com/mrss/" xmlns="http://www.w3.org/2005/Atom">
  <title>Feed Author</title>
  <link rel="alternate" href="https://www.youtube.com/channel/UCtestchannel000000000000"/>${items}
</feed>`;
}

describe('uniqueDescriptionLines', () => {
  it('drops lines found in older descriptions, ignoring trailing whitespace', () => {
    const description = 'Tonight we sing\nFollow the channel   \nSee you there';
    expect(uniqueDescriptionLines(description, ['Follow the channel', 'Other'])).toBe(
      'Tonight we sing\nSee you there'
    );
  });

  it('keeps everything without older entries', () => {
    expect(uniqueDescriptionLines('a\nb', [])).toBe('a\nb');
  });
});

describe('slidingWindow', () => {
  it('pairs each entry with up to the given number of older entries', () => {
    expect(slidingWindow([1, 2, 3, 4], 2)).toEqual([
      [1, [2, 3]],
      [2, [3, 4]],
      [3, [4]],
      [4, []]
    ]);
  });

  it('compares nothing with a zero lookbehind', () => {
    expect(slidingWindow(['a', 'b'], 0)).toEqual([
      ['a', []],
      ['b', []]
    ]);
  });
});

describe('matchEntries', () => {
  it('suppresses template lines shared with older entries', () => {
    const entries = [
      entry('vid-new', 'Late stream', 'Singing karaoke tonight\nMembers: archive list'),
      entry('vid-mid', 'Chatting', 'Just talking\nKaraoke archive in the playlist'),
      entry('vid-old', 'Gaming', 'Karaoke archive in the playlist')
    ];

    const matches = matchEntries(channel, entries);

    expect(matches.map((match) => match.videoId)).toEqual(['vid-new', 'vid-old']);
    expect(matches[0]).toEqual({
      channel,
      url: 'https://www.youtube.com/watch?v=vid-new',
      videoId: 'vid-new',
      author: 'Feed Author',
      matchingTerms: new Set(['karaoke'])
    });
  });

  it('keeps lines unique to the newest entry when older entries share a template', () => {
    const entries = [
      entry('vid-1', 'Stream', 'UNARCHIVED session'),
      entry('vid-2', 'Stream', 'Shared footer line'),
      entry('vid-3', 'Stream', 'Shared footer line')
    ];

    const matches = matchEntries(channel, entries);
    expect(matches.map((match) => [match.videoId, [...match.matchingTerms]])).toEqual([
      ['vid-1', ['unarchived']]
    ]);
  });

  it('matches the title as well as the description', () => {
    const matches = matchEntries(channel, [entry('vid-1', '【KARAOKE】', '')]);
    expect(matches).toHaveLength(1);
  });
});

describe('displayAuthor', () => {
  it('prefers the configured channel name', () => {
    const named = { ...channel, name: 'Configured Name' };
    const [match] = matchEntries(named, [entry('vid-1', 'karaoke', '')]);

    expect(displayAuthor(match)).toBe('Configured Name');
    expect(displayAuthor({ ...match, channel })).toBe('Feed Author');
  });
});

describe('FeedMonitor', () => {
  it('fetches and parses the channel feed', async () => {
    const xml = atomFeed([
      { videoId: 'vid-new', title: 'Karaoke tonight', description: 'Come sing\nSocial links' },
      { videoId: 'vid-old', title: 'Chatting', description: 'Social links' }
    ]);
    const fetchMock = vi.fn(async (_input: string | URL | Request) => new Response(xml));
    const monitor = new FeedMonitor({ limiter: new RateLimiter({ concurrency: 3 }), fetch: fetchMock });

    const entries = await monitor.fetchEntries(channel.id);

    expect(fetchMock).toHaveBeenCalledWith(channelFeedUrl(channel.id));
    expect(entries).toEqual([
      {
        title: 'Karaoke tonight',
        link: 'https://www.youtube.com/watch?v=vid-new',
        videoId: 'vid-new',
        author: 'Feed Author',
        description: 'Come sing\nSocial links'
      },
      {
        title: 'Chatting',
        link: 'https://www.youtube.com/watch?v=vid-old',
        videoId: 'vid-old',
        author: 'Feed Author',
        description: 'Social links'
      }
    ]);

    const matches = await monitor.getChannelMatches(channel);
    expect(matches.map((match) => match.videoId)).toEqual(['vid-new']);
  });

  it('rejects when the feed request fails', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) => new Response('unavailable', { status: 503 }));
    const monitor = new FeedMonitor({ limiter: new RateLimiter({ concurrency: 3 }), fetch: fetchMock });

    await expect(monitor.fetchEntries(channel.id)).rejects.toThrow(
      'Feed request for UCtestchannel000000000000 failed with 503'
    );
  });
});

describe('channelFeedUrl', () => {
  it('points at the channel video feed', () => {
    expect(channelFeedUrl('UCtestchannel000000000000')).toBe(
      'https://www.youtube.com/feeds/videos.xml?channel_id=UCtestchannel000000000000'
    );
  });
});
