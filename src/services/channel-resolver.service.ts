import type { Logger } from '../types/logger.types.js';
import type { ChannelRef, ChannelSearchResult } from '../types/youtube.types.js';
import { NotFoundError } from '../utils/errors.js';
import type { YouTubeService } from './youtube.service.js';

const CHANNEL_ID_PREFIX = 'UC';
const DESCRIPTION_PREVIEW_LENGTH = 100;

export function buildChannelUrl(channelId: string): string {
  return `https://www.youtube.com/channel/${channelId}`;
}

export class ChannelResolver {
  constructor(
    private readonly youtube: YouTubeService,
    private readonly logger: Logger = console
  ) {}

  /**
   * Resolve a channel ID, @handle or legacy username to the channel ID and
   * its uploads playlist.
   */
  async resolve(identifier: string): Promise<ChannelRef> {
    const channelId = await this.resolveChannelId(identifier);
    const uploadsPlaylistId = await this.getUploadsPlaylistId(channelId);
    return { channelId, uploadsPlaylistId };
  }

  async resolveChannelId(identifier: string): Promise<string> {
    const trimmed = identifier.trim();

    if (trimmed.startsWith(CHANNEL_ID_PREFIX)) {
      // Direct channel ID
      const response = await this.youtube.channels({
        part: ['id'],
        id: [trimmed],
      });
      if (response.items?.length) {
        return trimmed;
      }
    }

    if (trimmed.startsWith('@')) {
      const response = await this.youtube.channels({
        part: ['id'],
        forHandle: trimmed,
      });
      const channelId = response.items?.[0]?.id;
      if (channelId) {
        return channelId;
      }
    }

    const response = await this.youtube.channels({
      part: ['id'],
      forUsername: trimmed.replace(/^@/, ''),
    });
    const channelId = response.items?.[0]?.id;
    if (!channelId) {
      throw new NotFoundError('channel', identifier);
    }
    return channelId;
  }

  /**
   * Get channel uploads playlist ID
   */
  async getUploadsPlaylistId(channelId: string): Promise<string> {
    const response = await this.youtube.channels({
      part: ['contentDetails'],
      id: [channelId],
    });

    const uploadsPlaylistId = response.items?.[0]?.contentDetails?.relatedPlaylists?.uploads;
    if (!uploadsPlaylistId) {
      throw new NotFoundError('uploads-playlist', channelId);
    }
    return uploadsPlaylistId;
  }

  /**
   * Look up channels by name, for finding the ID to put in CHANNEL_ID.
   */
  async searchChannels(term: string, maxResults = 10): Promise<ChannelSearchResult[]> {
    const response = await this.youtube.search({
      part: ['snippet'],
      q: term,
      type: ['channel'],
      maxResults,
    });

    const results: ChannelSearchResult[] = [];
    for (const item of response.items ?? []) {
      const channelId = item.snippet?.channelId ?? item.id?.channelId;
      if (!channelId) {
        this.logger.warn(`⚠️ Skipping search result without a channel ID: ${item.snippet?.title ?? '(untitled)'}`);
        continue;
      }

      const description = item.snippet?.description ?? '';
      results.push({
        rank: results.length + 1,
        title: item.snippet?.title ?? '',
        channelId,
        description:
          description.length > DESCRIPTION_PREVIEW_LENGTH
            ? `${description.slice(0, DESCRIPTION_PREVIEW_LENGTH)}...`
            : description,
        url: buildChannelUrl(channelId),
      });
    }

    return results;
  }
}
