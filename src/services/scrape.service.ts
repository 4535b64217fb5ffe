import type { Logger } from '../types/logger.types.js';
import type { ListingSource, ScrapeRequest, ScrapeResult } from '../types/youtube.types.js';
import { bufferDateWindow } from '../utils/date-window.js';
import { errorMessage } from '../utils/errors.js';
import { ChannelResolver } from './channel-resolver.service.js';
import { MetadataBatcher } from './metadata-batcher.service.js';
import { VideoLister } from './video-lister.service.js';
import type { YouTubeService } from './youtube.service.js';

export interface ScrapeServiceConfig {
  listingSource?: ListingSource;
  batchSize?: number;
  logger?: Logger;
}

/**
 * Resolve the channel, list its video IDs, then fetch their metadata.
 * Every step runs after the previous one; nothing is fetched in parallel.
 */
export class ScrapeService {
  private readonly channelResolver: ChannelResolver;
  private readonly videoLister: VideoLister;
  private readonly metadataBatcher: MetadataBatcher;
  private readonly listingSource: ListingSource;
  private readonly logger: Logger;

  constructor(youtube: YouTubeService, config: ScrapeServiceConfig = {}) {
    this.logger = config.logger ?? console;
    this.listingSource = config.listingSource ?? 'search';
    this.channelResolver = new ChannelResolver(youtube, this.logger);
    this.videoLister = new VideoLister(youtube, this.logger);
    this.metadataBatcher = new MetadataBatcher(youtube, this.logger, config.batchSize);
  }

  /**
   * Main scrape method. Resolution and listing failures are thrown; failed
   * metadata batches only make the result partial.
   */
  async run(request: ScrapeRequest): Promise<ScrapeResult> {
    const { channelIdentifier, maxCount } = request;
    this.logger.info(`🚀 Starting scrape for channel: ${channelIdentifier}`);

    // Step 1: Widen the date window
    const window = bufferDateWindow(
      { publishedAfter: request.publishedAfter, publishedBefore: request.publishedBefore },
      request.bufferDays ?? 0,
      this.logger
    );

    try {
      // Step 2: Resolve channel
      const channel = await this.channelResolver.resolve(channelIdentifier);
      this.logger.info(`📡 Channel ID: ${channel.channelId}`);

      // Step 3: List video IDs, latest first
      const listOptions = {
        maxCount,
        publishedAfter: window.publishedAfter,
        publishedBefore: window.publishedBefore,
      };
      const videoIds =
        this.listingSource === 'uploads'
          ? await this.videoLister.listFromUploads(channel.uploadsPlaylistId, listOptions)
          : await this.videoLister.list(channel.channelId, listOptions);

      if (videoIds.length === 0) {
        this.logger.info('ℹ️ No videos found in channel');
        return { channel, window, videoIds, records: [], failedBatches: [], complete: true };
      }

      // Step 4: Fetch metadata
      const batchResult = await this.metadataBatcher.fetch(videoIds);

      if (batchResult.complete) {
        this.logger.info(`✅ Successfully scraped ${batchResult.records.length} videos`);
      } else {
        this.logger.warn(
          `⚠️ Scraped ${batchResult.records.length} of ${videoIds.length} videos, ` +
            `${batchResult.failedBatches.length} batch(es) failed`
        );
      }

      return { channel, window, videoIds, ...batchResult };
    } catch (error) {
      this.logger.error(`❌ Scrape failed for ${channelIdentifier}: ${errorMessage(error)}`);
      throw error;
    }
  }
}
