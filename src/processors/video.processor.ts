import type { youtube_v3 } from 'googleapis';
import type { VideoRecord } from '../types/youtube.types.js';
import { decodeDuration } from '../utils/duration.js';

const THUMBNAIL_PREFERENCE = ['maxres', 'high', 'medium', 'default'] as const;

export function buildVideoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/**
 * Highest quality thumbnail available, or '' when there is none.
 */
export function pickThumbnailUrl(thumbnails?: youtube_v3.Schema$ThumbnailDetails | null): string {
  if (!thumbnails) return '';

  for (const quality of THUMBNAIL_PREFERENCE) {
    const url = thumbnails[quality]?.url;
    if (url) return url;
  }
  return '';
}

/**
 * Statistics arrive as decimal strings ("1234"). Anything else counts as 0.
 */
export function toCount(value?: string | null): number {
  if (!value || !/^\d+$/.test(value.trim())) return 0;
  return parseInt(value, 10);
}

export function toVideoRecord(item: youtube_v3.Schema$Video): VideoRecord | null {
  if (!item.id) return null;

  const snippet = item.snippet ?? {};
  const statistics = item.statistics ?? {};

  return {
    id: item.id,
    url: buildVideoUrl(item.id),
    title: snippet.title ?? '',
    description: snippet.description ?? '',
    channelTitle: snippet.channelTitle ?? '',
    publishedAt: snippet.publishedAt ?? '',
    duration: decodeDuration(item.contentDetails?.duration ?? ''),
    viewCount: toCount(statistics.viewCount),
    likeCount: toCount(statistics.likeCount),
    commentCount: toCount(statistics.commentCount),
    thumbnailUrl: pickThumbnailUrl(snippet.thumbnails),
    tags: [...(snippet.tags ?? [])],
    categoryId: snippet.categoryId ?? '',
    language: snippet.defaultLanguage ?? '',
  };
}
