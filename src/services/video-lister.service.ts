import type { youtube_v3 } from 'googleapis';
import type { Logger } from '../types/logger.types.js';
import type { ListOptions, PaginationCursor } from '../types/youtube.types.js';
import { parseIsoDate } from '../utils/date-window.js';
import { MalformedResponseError } from '../utils/errors.js';
import type { YouTubeService } from './youtube.service.js';

export const PAGE_SIZE = 50; // Max per request

interface PageItems<T> {
  items?: T[] | null;
  nextPageToken?: string | null;
}

interface ListingPage {
  ids: Array<string | null>;
  nextPageToken?: string;
  // Uploads listing only: the page ran past the start of the date window
  reachedWindowStart: boolean;
}

function readItems<T>(endpoint: string, response: PageItems<T>): T[] {
  if (!response.items) {
    throw new MalformedResponseError(endpoint, 'items');
  }
  return response.items;
}

/**
 * Walks a channel's listing page by page and collects video IDs, latest first.
 * A cursor lives for one call; every call starts over from the first page.
 */
export class VideoLister {
  constructor(
    private readonly youtube: YouTubeService,
    private readonly logger: Logger = console
  ) {}

  /**
   * List video IDs through the search endpoint (100 quota units per page).
   */
  async list(channelId: string, options: ListOptions = {}): Promise<string[]> {
    const { maxCount, publishedAfter, publishedBefore } = options;
    this.logStart('search', options);

    return this.paginate(async pageToken => {
      const response = await this.youtube.search({
        part: ['id'],
        channelId,
        type: ['video'],
        order: 'date', // Most recent first
        maxResults: PAGE_SIZE,
        ...(pageToken ? { pageToken } : {}),
        ...(publishedAfter ? { publishedAfter } : {}),
        ...(publishedBefore ? { publishedBefore } : {}),
      });

      const items: youtube_v3.Schema$SearchResult[] = readItems('search', response);
      return {
        ids: items.map(item => item.id?.videoId ?? null),
        nextPageToken: response.nextPageToken ?? undefined,
        reachedWindowStart: false,
      };
    }, maxCount);
  }

  /**
   * List video IDs from the uploads playlist (1 quota unit per page). The
   * playlist is newest first, so the walk stops at the first video published
   * before `publishedAfter`.
   */
  async listFromUploads(uploadsPlaylistId: string, options: ListOptions = {}): Promise<string[]> {
    const after = options.publishedAfter ? parseIsoDate(options.publishedAfter) : null;
    const before = options.publishedBefore ? parseIsoDate(options.publishedBefore) : null;
    const hasWindow = after !== null || before !== null;
    this.logStart('uploads playlist', options);

    return this.paginate(async pageToken => {
      const response = await this.youtube.playlistItems({
        part: ['contentDetails'],
        playlistId: uploadsPlaylistId,
        maxResults: PAGE_SIZE,
        ...(pageToken ? { pageToken } : {}),
      });

      const items: youtube_v3.Schema$PlaylistItem[] = readItems('playlistItems', response);
      const ids: Array<string | null> = [];
      let reachedWindowStart = false;

      for (const item of items) {
        const publishedAt = item.contentDetails?.videoPublishedAt
          ? new Date(item.contentDetails.videoPublishedAt)
          : null;

        if (!publishedAt) {
          // Private and deleted entries carry no publish date
          if (!hasWindow) ids.push(item.contentDetails?.videoId ?? null);
          continue;
        }
        if (after && publishedAt < after) {
          reachedWindowStart = true;
          break;
        }
        if (before && publishedAt > before) continue;

        ids.push(item.contentDetails?.videoId ?? null);
      }

      return {
        ids,
        nextPageToken: response.nextPageToken ?? undefined,
        reachedWindowStart,
      };
    }, options.maxCount);
  }

  private async paginate(
    fetchPage: (pageToken?: string) => Promise<ListingPage>,
    maxCount?: number
  ): Promise<string[]> {
    const cursor: PaginationCursor = { collected: [], pages: 0 };
    const seen = new Set<string>();
    const limit = maxCount !== undefined && maxCount > 0 ? maxCount : undefined;

    for (;;) {
      let page: ListingPage;
      try {
        page = await fetchPage(cursor.pageToken);
      } catch (error) {
        if (error instanceof MalformedResponseError) {
          this.logger.warn(`⚠️ ${error.message}, stopping pagination`);
          break;
        }
        throw error;
      }
      cursor.pages++;

      for (const id of page.ids) {
        if (!id || seen.has(id)) continue;
        seen.add(id);
        cursor.collected.push(id);
        if (limit !== undefined && cursor.collected.length >= limit) break;
      }

      if (limit !== undefined && cursor.collected.length >= limit) {
        cursor.collected = cursor.collected.slice(0, limit);
        break;
      }

      if (page.reachedWindowStart || !page.nextPageToken) break;
      cursor.pageToken = page.nextPageToken;
    }

    this.logger.info(`📹 Found ${cursor.collected.length} videos (${cursor.pages} pages)`);
    return cursor.collected;
  }

  private logStart(source: string, options: ListOptions): void {
    this.logger.info(`🔍 Fetching video IDs from ${source} (latest first)...`);
    if (options.maxCount) this.logger.info(`   Limiting to ${options.maxCount} videos`);
    if (options.publishedAfter) this.logger.info(`   Published after: ${options.publishedAfter}`);
    if (options.publishedBefore) this.logger.info(`   Published before: ${options.publishedBefore}`);
  }
}
