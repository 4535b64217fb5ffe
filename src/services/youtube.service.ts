import { google, type youtube_v3 } from 'googleapis';
import type { QuotaUsage, YouTubeApi } from '../types/youtube.types.js';
import { RateLimiter } from '../utils/rate-limiter.js';

export type YouTubeOperation = 'search' | 'channels' | 'videos' | 'playlistItems' | 'videoCategories';

// Units charged per request by the Data API
const QUOTA_COST: Record<YouTubeOperation, number> = {
  search: 100,
  channels: 1,
  videos: 1,
  playlistItems: 1,
  videoCategories: 1,
};

/**
 * Adapt the googleapis client to the calls this tool makes.
 */
export function createGoogleYouTubeApi(apiKey: string): YouTubeApi {
  const youtube = google.youtube({
    version: 'v3',
    auth: apiKey,
  });

  return {
    async searchList(params) {
      const response = await youtube.search.list(params);
      return response.data;
    },
    async channelsList(params) {
      const response = await youtube.channels.list(params);
      return response.data;
    },
    async videosList(params) {
      const response = await youtube.videos.list(params);
      return response.data;
    },
    async playlistItemsList(params) {
      const response = await youtube.playlistItems.list(params);
      return response.data;
    },
    async videoCategoriesList(params) {
      const response = await youtube.videoCategories.list(params);
      return response.data;
    },
  };
}

/**
 * Every request to the Data API goes through here: spaced and retried by the
 * rate limiter, and counted against the daily quota.
 */
export class YouTubeService {
  private quotaUsed: number = 0;
  private maxQuota: number = 10000; // Daily quota limit

  constructor(
    private readonly api: YouTubeApi,
    private readonly limiter: RateLimiter = new RateLimiter()
  ) {}

  static fromApiKey(apiKey: string, limiter?: RateLimiter): YouTubeService {
    return new YouTubeService(createGoogleYouTubeApi(apiKey), limiter);
  }

  search(params: youtube_v3.Params$Resource$Search$List): Promise<youtube_v3.Schema$SearchListResponse> {
    return this.request('search', () => this.api.searchList(params));
  }

  channels(params: youtube_v3.Params$Resource$Channels$List): Promise<youtube_v3.Schema$ChannelListResponse> {
    return this.request('channels', () => this.api.channelsList(params));
  }

  videos(params: youtube_v3.Params$Resource$Videos$List): Promise<youtube_v3.Schema$VideoListResponse> {
    return this.request('videos', () => this.api.videosList(params));
  }

  playlistItems(
    params: youtube_v3.Params$Resource$Playlistitems$List
  ): Promise<youtube_v3.Schema$PlaylistItemListResponse> {
    return this.request('playlistItems', () => this.api.playlistItemsList(params));
  }

  videoCategories(
    params: youtube_v3.Params$Resource$Videocategories$List
  ): Promise<youtube_v3.Schema$VideoCategoryListResponse> {
    return this.request('videoCategories', () => this.api.videoCategoriesList(params));
  }

  /**
   * Get current quota usage
   */
  getQuotaUsage(): QuotaUsage {
    return {
      used: this.quotaUsed,
      remaining: this.maxQuota - this.quotaUsed,
      percentage: (this.quotaUsed / this.maxQuota) * 100,
    };
  }

  getRequestStats(): { calls: number; rateLimitHits: number } {
    return this.limiter.stats();
  }

  private request<T>(operation: YouTubeOperation, call: () => Promise<T>): Promise<T> {
    return this.limiter.schedule(() => {
      // Retried attempts are charged too
      this.quotaUsed += QUOTA_COST[operation];
      return call();
    });
  }
}
