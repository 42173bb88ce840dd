import { ArchiveError, HOUR, SECOND, formatError, sleep } from '@streamvault/shared';
import { ClientConfigSchema, PlayerResponseSchema } from './schemas';
import { ClientConfig, FetchPlayerOptions, PlayerResponse, PlayerSource } from './types';

const HOME_URL = 'https://www.youtube.com/';
const PLAYER_URL = 'https://www.youtube.com/youtubei/v1/player';
const WEB_CLIENT_VERSION = '2.20241121.01.00';
const CLIENT_CONFIG_MARKER = 'ytcfg.set({"CLIENT';

export interface PlayerClientOptions {
  fetch?: typeof fetch;
  attempts?: number;
  retryDelayMs?: number;
  clientConfigMaxAgeMs?: number;
}

/**
 * Returns the JSON object literal that follows `marker` in `text`.
 */
export function extractJsonObject(text: string, marker: string): unknown {
  const markerPos = text.indexOf(marker);
  if (markerPos === -1) {
    return null;
  }
  const start = text.indexOf('{', markerPos);
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        try {
          return JSON.parse(text.slice(start, i + 1));
        } catch {
          return null;
        }
      }
    }
  }
  return null;
}

export function estimatedBroadcastDuration(response: PlayerResponse): number | null {
  const details = response.liveBroadcastDetails;
  if (!details?.startTimestamp || !details.endTimestamp) {
    return null;
  }
  return Math.floor((details.endTimestamp.getTime() - details.startTimestamp.getTime()) / SECOND);
}

export class PlayerClient implements PlayerSource {
  private fetchImpl: typeof fetch;
  private attempts: number;
  private retryDelayMs: number;
  private clientConfigMaxAgeMs: number;
  private clientConfig?: ClientConfig;
  private clientConfigFetchedAt = 0;

  constructor(options: PlayerClientOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.attempts = options.attempts ?? 10;
    this.retryDelayMs = options.retryDelayMs ?? 10 * SECOND;
    this.clientConfigMaxAgeMs = options.clientConfigMaxAgeMs ?? 4 * HOUR;
  }

  async fetchPlayerResponse(
    videoId: string,
    options: FetchPlayerOptions = {}
  ): Promise<PlayerResponse | null> {
    const validate = options.validate ?? true;
    let config: ClientConfig;
    try {
      config = await this.getClientConfig();
    } catch (error) {
      console.error(`Cannot query player for ${videoId}:`, formatError(error));
      return null;
    }

    const headers: Record<string, string> = {
      'X-YouTube-Client-Name': String(config.contextClientName),
      'X-YouTube-Client-Version': config.clientVersion,
      Origin: 'https://www.youtube.com',
      'Content-Type': 'application/json'
    };
    if (config.visitorData) {
      headers['X-Goog-Visitor-Id'] = config.visitorData;
    }
    if (config.sessionIndex) {
      headers['X-Goog-AuthUser'] = config.sessionIndex;
    }
    if (config.delegatedSessionId) {
      headers['X-Goog-PageId'] = config.delegatedSessionId;
    }
    if (config.idToken) {
      headers['X-Youtube-Identity-Token'] = config.idToken;
    }

    const client: Record<string, string> = {
      clientName: 'WEB',
      clientVersion: WEB_CLIENT_VERSION,
      hl: 'en'
    };
    if (config.visitorData) {
      client.visitorData = config.visitorData;
    }

    const body = JSON.stringify({
      context: { client },
      videoId,
      playbackContext: { contentPlaybackContext: { html5Preference: 'HTML5_PREF_WANTS' } }
    });
    const url = `${PLAYER_URL}?key=${encodeURIComponent(config.apiKey)}`;

    // null responses come back intermittently, so retry a bounded number of times
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        const res = await this.fetchImpl(url, { method: 'POST', headers, body });
        const parsed = PlayerResponseSchema.safeParse(await res.json());
        if (parsed.success) {
          if (!validate) {
            return parsed.data;
          }
          if (parsed.data.videoDetails?.videoId === videoId) {
            return parsed.data;
          }
        }
      } catch (error) {
        console.warn(`Player request for ${videoId} failed (attempt ${attempt}):`, formatError(error));
      }
      if (attempt < this.attempts) {
        await sleep(this.retryDelayMs);
      }
    }
    return null;
  }

  private async getClientConfig(): Promise<ClientConfig> {
    const now = Date.now();
    if (this.clientConfig && now - this.clientConfigFetchedAt < this.clientConfigMaxAgeMs) {
      return this.clientConfig;
    }
    this.clientConfig = await this.extractClientConfig();
    this.clientConfigFetchedAt = now;
    return this.clientConfig;
  }

  private async extractClientConfig(): Promise<ClientConfig> {
    let raw: unknown = null;
    for (let attempt = 1; attempt <= 5 && !raw; attempt++) {
      try {
        const res = await this.fetchImpl(HOME_URL, { redirect: 'follow' });
        raw = extractJsonObject(await res.text(), CLIENT_CONFIG_MARKER);
      } catch (error) {
        console.warn('Failed to fetch web client configuration:', formatError(error));
      }
      if (!raw && attempt < 5) {
        await sleep(6 * SECOND);
      }
    }

    const parsed = ClientConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ArchiveError('Could not extract web client configuration', 'CLIENT_CONFIG_UNAVAILABLE');
    }
    return parsed.data;
  }
}
