import type { youtube_v3 } from 'googleapis';
import { vi, type Mock } from 'vitest';
import { YouTubeService } from '../../services/youtube.service.js';
import type { Logger } from '../../types/logger.types.js';
import type { VideoRecord, YouTubeApi } from '../../types/youtube.types.js';
import { RateLimiter, type RateLimiterOptions } from '../../utils/rate-limiter.js';

export type FakeYouTubeApi = { [K in keyof YouTubeApi]: Mock<YouTubeApi[K]> };

export interface FakeLogger extends Logger {
  info: Mock<Logger['info']>;
  warn: Mock<Logger['warn']>;
  error: Mock<Logger['error']>;
}

// Every endpoint answers with an empty page unless a test says otherwise
export function createFakeApi(): FakeYouTubeApi {
  return {
    searchList: vi.fn<YouTubeApi['searchList']>().mockResolvedValue({ items: [] }),
    channelsList: vi.fn<YouTubeApi['channelsList']>().mockResolvedValue({ items: [] }),
    videosList: vi.fn<YouTubeApi['videosList']>().mockResolvedValue({ items: [] }),
    playlistItemsList: vi.fn<YouTubeApi['playlistItemsList']>().mockResolvedValue({ items: [] }),
    videoCategoriesList: vi.fn<YouTubeApi['videoCategoriesList']>().mockResolvedValue({ items: [] }),
  };
}

export function createFakeLogger(): FakeLogger {
  return {
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}

/** No spacing, no real waiting. */
export function createTestLimiter(options: RateLimiterOptions = {}): RateLimiter {
  return new RateLimiter({
    minIntervalMs: 0,
    sleep: async () => {},
    logger: createFakeLogger(),
    ...options,
  });
}

export function createTestService(api: FakeYouTubeApi, options: RateLimiterOptions = {}): YouTubeService {
  return new YouTubeService(api, createTestLimiter(options));
}

/**
 * Error shaped like the ones googleapis throws for a failed request.
 */
export function upstreamError(status: number, reason?: string, message = `Request failed with status ${status}`): Error {
  return Object.assign(new Error(message), {
    status,
    code: status,
    errors: reason ? [{ reason, message }] : [],
  });
}

export function makeVideo(id: string, snippet: youtube_v3.Schema$VideoSnippet = {}): youtube_v3.Schema$Video {
  return {
    id,
    snippet: {
      title: `Video ${id}`,
      description: '',
      channelTitle: 'Test Channel',
      publishedAt: '2024-01-01T00:00:00Z',
      categoryId: '22',
      tags: [],
      thumbnails: { high: { url: `https://i.ytimg.com/vi/${id}/hqdefault.jpg` } },
      ...snippet,
    },
    statistics: { viewCount: '100', likeCount: '10', commentCount: '1' },
    contentDetails: { duration: 'PT4M13S' },
  };
}

export function makeRecord(overrides: Partial<VideoRecord> = {}): VideoRecord {
  const id = overrides.id ?? 'vid1';
  return {
    id,
    url: `https://www.youtube.com/watch?v=${id}`,
    title: `Video ${id}`,
    description: '',
    channelTitle: 'Test Channel',
    publishedAt: '2024-01-01T00:00:00Z',
    duration: '4:13',
    viewCount: 100,
    likeCount: 10,
    commentCount: 1,
    thumbnailUrl: '',
    tags: [],
    categoryId: '22',
    language: '',
    ...overrides,
  };
}

export function searchPage(videoIds: string[], nextPageToken?: string): youtube_v3.Schema$SearchListResponse {
  return {
    items: videoIds.map(videoId => ({ id: { kind: 'youtube#video', videoId } })),
    ...(nextPageToken ? { nextPageToken } : {}),
  };
}
