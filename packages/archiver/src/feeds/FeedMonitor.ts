import Parser from 'rss-parser';
import { z } from 'zod';
import { ArchiveError, ChannelMonitorConfig } from '@streamvault/shared';
import { RateLimiter } from '../utils/RateLimiter';
import { getPatternMatches } from './patterns';

interface FeedEntryFields {
  author?: string;
  'yt:videoId'?: string;
  'media:group'?: unknown;
}

export interface FeedEntry {
  title: string;
  link: string;
  videoId: string;
  author: string;
  description: string;
}

export interface FeedItemMatch {
  channel: ChannelMonitorConfig;
  url: string;
  videoId: string;
  author: string;
  matchingTerms: Set<string>;
}

export interface FeedMonitorOptions {
  limiter: RateLimiter;
  fetch?: typeof fetch;
}

// media:description may carry attributes, in which case xml2js nests the text under `_`
const MediaTextSchema = z.union([z.string(), z.object({ _: z.string() }).transform((node) => node._)]);

const MediaGroupSchema = z.object({
  'media:description': z.array(MediaTextSchema).min(1)
});

export function channelFeedUrl(channelId: string): string {
  return `https://www.youtube.com/feeds/videos.xml?channel_id=${encodeURIComponent(channelId)}`;
}

export function displayAuthor(match: FeedItemMatch): string {
  return match.channel.name || match.author;
}

function descriptionLines(description: string): string[] {
  return description.split(/\r?\n/).map((line) => line.trimEnd());
}

/**
 * Removes the lines of `description` that also appear in any of the older
 * descriptions, keeping the original order. Channels often reuse a template
 * description, and a rule matching the template would match every upload.
 */
export function uniqueDescriptionLines(description: string, olderDescriptions: string[]): string {
  const olderLines = new Set<string>();
  for (const older of olderDescriptions) {
    for (const line of descriptionLines(older)) {
      olderLines.add(line);
    }
  }
  return descriptionLines(description)
    .filter((line) => !olderLines.has(line))
    .join('\n');
}

/**
 * Pairs each entry (newest first) with up to `lookbehind` entries that follow
 * it in the feed.
 */
export function slidingWindow<T>(entries: T[], lookbehind: number): Array<[T, T[]]> {
  return entries.map((entry, index) => [entry, entries.slice(index + 1, index + 1 + lookbehind)]);
}

export function matchEntries(channel: ChannelMonitorConfig, entries: FeedEntry[]): FeedItemMatch[] {
  const matches: FeedItemMatch[] = [];
  for (const [entry, older] of slidingWindow(entries, channel.lookbehind)) {
    const description = uniqueDescriptionLines(
      entry.description,
      older.map((item) => item.description)
    );

    const matchingTerms = new Set<string>();
    for (const haystack of [entry.title, description]) {
      for (const term of getPatternMatches(channel.terms, haystack)) {
        matchingTerms.add(term);
      }
    }

    // entries that do not match now are checked again on the next poll
    if (matchingTerms.size > 0) {
      matches.push({
        channel,
        url: entry.link,
        videoId: entry.videoId,
        author: entry.author,
        matchingTerms
      });
    }
  }
  return matches;
}

export class FeedMonitor {
  private parser: Parser<Record<string, unknown>, FeedEntryFields>;
  private limiter: RateLimiter;
  private fetchImpl: typeof fetch;

  constructor(options: FeedMonitorOptions) {
    this.parser = new Parser({
      customFields: {
        item: ['yt:videoId', 'media:group']
      }
    });
    this.limiter = options.limiter;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async fetchEntries(channelId: string): Promise<FeedEntry[]> {
    const url = channelFeedUrl(channelId);
    const fetchImpl = this.fetchImpl;
    const xml = await this.limiter.run(async () => {
      const res = await fetchImpl(url);
      if (!res.ok) {
        throw new ArchiveError(`Feed request for ${channelId} failed with ${res.status}`, 'FEED_FETCH_FAILED', {
          status: res.status
        });
      }
      return res.text();
    });

    const feed = await this.parser.parseString(xml);
    const entries: FeedEntry[] = [];
    for (const item of feed.items) {
      const videoId = item['yt:videoId'];
      if (!videoId) {
        continue;
      }
      const group = MediaGroupSchema.safeParse(item['media:group']);
      entries.push({
        title: item.title ?? '',
        link: item.link ?? `https://www.youtube.com/watch?v=${videoId}`,
        videoId,
        author: item.author ?? '',
        description: group.success ? group.data['media:description'][0] : ''
      });
    }
    return entries;
  }

  async getChannelMatches(channel: ChannelMonitorConfig): Promise<FeedItemMatch[]> {
    const entries = await this.fetchEntries(channel.id);
    return matchEntries(channel, entries);
  }
}
