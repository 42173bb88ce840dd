import { describe, it, expect, vi } from 'vitest';
import { PlayerClient, estimatedBroadcastDuration, extractJsonObject } from '../PlayerClient';
import { playerResponse } from '../../__tests__/fakes';

const HOME_PAGE = `<html><script>var ytcfg = {};ytcfg.set({"CLIENT_CANARY_STATE":"none","INNERTUBE_API_KEY":"test-key","INNERTUBE_CLIENT_NAME":"WEB","INNERTUBE_CLIENT_VERSION":"2.20240601.00.00","INNERTUBE_CONTEXT_CLIENT_NAME":1,"VISITOR_DATA":"test-visitor","SESSION_INDEX":0});</script></html>`;

function rawPlayerResponse(videoId: string, extra: Record<string, unknown> = {}) {
  return {
    videoDetails: {
      videoId,
      title: 'Night stream',
      author: 'Test Author',
      channelId: 'UCtestchannel000000000000',
      lengthSeconds: '0',
      thumbnail: { thumbnails: [{ url: 'https://i.ytimg.com/vi/thumb.jpg', width: 120, height: 90 }] },
      isLiveContent: true,
      isUpcoming: true
    },
    playabilityStatus: {
      status: 'LIVE_STREAM_OFFLINE',
      liveStreamability: {
        liveStreamabilityRenderer: {
          offlineSlate: { liveStreamOfflineSlateRenderer: { scheduledStartTime: '1717243200' } }
        }
      }
    },
    ...extra
  };
}

function fakeUpstream(player: () => unknown) {
  return vi.fn(async (input: string | URL | Request, _init?: RequestInit) => {
    const url = String(input);
    if (url === 'https://www.youtube.com/') {
      return new Response(HOME_PAGE);
    }
    return new Response(JSON.stringify(player()));
  });
}

describe('extractJsonObject', () => {
  it('reads the object after the marker, including braces in strings', () => {
    const text = 'x = 1; config({"a":"}{","b":{"c":[1,2]}}); more';
    expect(extractJsonObject(text, 'config(')).toEqual({ a: '}{', b: { c: [1, 2] } });
  });

  it('returns null without the marker or with broken JSON', () => {
    expect(extractJsonObject('nothing here', 'config(')).toBeNull();
    expect(extractJsonObject('config({"a":}', 'config(')).toBeNull();
  });
});

describe('estimatedBroadcastDuration', () => {
  it('measures between the broadcast timestamps', () => {
    const response = {
      ...playerResponse(),
      liveBroadcastDetails: {
        startTimestamp: new Date('2024-06-01T12:00:00Z'),
        endTimestamp: new Date('2024-06-01T13:30:00Z'),
        isLiveNow: false
      }
    };
    expect(estimatedBroadcastDuration(response)).toBe(5400);
  });

  it('is unknown while the broadcast has not ended', () => {
    expect(estimatedBroadcastDuration(playerResponse())).toBeNull();
  });
});

describe('PlayerClient', () => {
  it('queries the player with the web client configuration', async () => {
    const fetchMock = fakeUpstream(() => rawPlayerResponse('dQw4w9WgXcQ'));
    const client = new PlayerClient({ fetch: fetchMock, retryDelayMs: 0 });

    const response = await client.fetchPlayerResponse('dQw4w9WgXcQ');

    expect(response).toEqual({
      videoDetails: {
        videoId: 'dQw4w9WgXcQ',
        title: 'Night stream',
        author: 'Test Author',
        channelId: 'UCtestchannel000000000000',
        lengthSeconds: 0,
        thumbnails: [{ url: 'https://i.ytimg.com/vi/thumb.jpg', width: 120, height: 90 }],
        isLive: false,
        isLiveContent: true,
        isUpcoming: true,
        isPostLiveDvr: false
      },
      playabilityStatus: { status: 'LIVE_STREAM_OFFLINE', scheduledStart: new Date('2024-06-01T12:00:00Z') },
      liveBroadcastDetails: null
    });

    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe('https://www.youtube.com/youtubei/v1/player?key=test-key');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({
      'X-YouTube-Client-Name': '1',
      'X-YouTube-Client-Version': '2.20240601.00.00',
      'X-Goog-Visitor-Id': 'test-visitor',
      'X-Goog-AuthUser': '0'
    });
  });

  it('reuses the client configuration between requests', async () => {
    const fetchMock = fakeUpstream(() => rawPlayerResponse('dQw4w9WgXcQ'));
    const client = new PlayerClient({ fetch: fetchMock, retryDelayMs: 0 });

    await client.fetchPlayerResponse('dQw4w9WgXcQ');
    await client.fetchPlayerResponse('dQw4w9WgXcQ');

    const homeRequests = fetchMock.mock.calls.filter(([url]) => String(url) === 'https://www.youtube.com/');
    expect(homeRequests).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('retries until the response is for the requested video', async () => {
    const responses = [{ responseContext: {} }, rawPlayerResponse('dQw4w9WgXcQ')];
    const fetchMock = fakeUpstream(() => responses.shift());
    const client = new PlayerClient({ fetch: fetchMock, retryDelayMs: 0 });

    const response = await client.fetchPlayerResponse('dQw4w9WgXcQ');

    expect(response?.videoDetails?.videoId).toBe('dQw4w9WgXcQ');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('gives up after the configured attempts', async () => {
    const fetchMock = fakeUpstream(() => rawPlayerResponse('aaaaaaaaaaA'));
    const client = new PlayerClient({ fetch: fetchMock, retryDelayMs: 0, attempts: 2 });

    expect(await client.fetchPlayerResponse('dQw4w9WgXcQ')).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('returns unvalidated responses when asked to', async () => {
    const fetchMock = fakeUpstream(() => ({ playabilityStatus: { status: 'ERROR' } }));
    const client = new PlayerClient({ fetch: fetchMock, retryDelayMs: 0 });

    const response = await client.fetchPlayerResponse('dQw4w9WgXcQ', { validate: false });

    expect(response).toEqual({
      videoDetails: null,
      playabilityStatus: { status: 'ERROR', scheduledStart: null },
      liveBroadcastDetails: null
    });
  });

  it('reads broadcast timestamps from the microformat', async () => {
    const fetchMock = fakeUpstream(() =>
      rawPlayerResponse('dQw4w9WgXcQ', {
        microformat: {
          playerMicroformatRenderer: {
            liveBroadcastDetails: {
              startTimestamp: '2024-06-01T12:00:00+00:00',
              endTimestamp: '2024-06-01T14:00:00+00:00',
              isLiveNow: false
            }
          }
        }
      })
    );
    const client = new PlayerClient({ fetch: fetchMock, retryDelayMs: 0 });

    const response = await client.fetchPlayerResponse('dQw4w9WgXcQ');

    expect(response?.liveBroadcastDetails).toEqual({
      startTimestamp: new Date('2024-06-01T12:00:00Z'),
      endTimestamp: new Date('2024-06-01T14:00:00Z'),
      isLiveNow: false
    });
    expect(response && estimatedBroadcastDuration(response)).toBe(7200);
  });
});
