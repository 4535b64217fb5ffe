// YouTube API types and interfaces

import type { youtube_v3 } from 'googleapis';
import type { TransientBatchError } from '../utils/errors.js';

/**
 * The slice of the YouTube Data API v3 this tool calls. The googleapis client
 * is adapted to it in youtube.service.ts; tests supply an in-process fake.
 */
export interface YouTubeApi {
  searchList(params: youtube_v3.Params$Resource$Search$List): Promise<youtube_v3.Schema$SearchListResponse>;
  channelsList(params: youtube_v3.Params$Resource$Channels$List): Promise<youtube_v3.Schema$ChannelListResponse>;
  videosList(params: youtube_v3.Params$Resource$Videos$List): Promise<youtube_v3.Schema$VideoListResponse>;
  playlistItemsList(
    params: youtube_v3.Params$Resource$Playlistitems$List
  ): Promise<youtube_v3.Schema$PlaylistItemListResponse>;
  videoCategoriesList(
    params: youtube_v3.Params$Resource$Videocategories$List
  ): Promise<youtube_v3.Schema$VideoCategoryListResponse>;
}

export interface VideoRecord {
  readonly id: string;
  readonly url: string;
  readonly title: string;
  readonly description: string;
  readonly channelTitle: string;
  readonly publishedAt: string; // ISO 8601, as returned upstream
  readonly duration: string; // H:MM:SS or M:SS
  readonly viewCount: number;
  readonly likeCount: number;
  readonly commentCount: number;
  readonly thumbnailUrl: string;
  readonly tags: readonly string[];
  readonly categoryId: string;
  readonly language: string;
}

export interface ChannelRef {
  channelId: string;
  uploadsPlaylistId: string;
}

export interface ChannelSearchResult {
  rank: number;
  title: string;
  channelId: string;
  description: string;
  url: string;
}

export interface DateWindow {
  publishedAfter?: string;
  publishedBefore?: string;
  bufferDays: number;
}

export interface ListOptions {
  maxCount?: number;
  publishedAfter?: string;
  publishedBefore?: string;
}

export type ListingSource = 'search' | 'uploads';

export interface PaginationCursor {
  pageToken?: string;
  collected: string[];
  pages: number;
}

export interface FailedBatch {
  index: number;
  start: number; // inclusive offset into the requested ids
  end: number; // exclusive
  ids: string[];
  reason: string;
  error: TransientBatchError; // keeps the upstream failure as `cause`
}

export interface BatchFetchResult {
  records: VideoRecord[];
  failedBatches: FailedBatch[];
  complete: boolean;
}

export interface ScrapeRequest {
  channelIdentifier: string;
  maxCount?: number;
  publishedAfter?: string;
  publishedBefore?: string;
  bufferDays?: number;
}

export interface ScrapeResult extends BatchFetchResult {
  channel: ChannelRef;
  window: DateWindow;
  videoIds: string[];
}

// Quota tracking
export interface QuotaUsage {
  used: number;
  remaining: number;
  percentage: number;
}
