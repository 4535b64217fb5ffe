import { toVideoRecord } from '../processors/video.processor.js';
import type { Logger } from '../types/logger.types.js';
import type { BatchFetchResult, FailedBatch, VideoRecord } from '../types/youtube.types.js';
import { RateLimitedError, TransientBatchError } from '../utils/errors.js';
import type { YouTubeService } from './youtube.service.js';

export const BATCH_SIZE = 50; // Max 50 IDs per request

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export class MetadataBatcher {
  constructor(
    private readonly youtube: YouTubeService,
    private readonly logger: Logger = console,
    private readonly batchSize: number = BATCH_SIZE
  ) {}

  /**
   * Get detailed metadata for the given video IDs. Records follow the order
   * upstream returns them in. A batch that fails is skipped and reported in
   * `failedBatches`; only an exhausted rate-limit budget aborts the fetch.
   */
  async fetch(ids: readonly string[]): Promise<BatchFetchResult> {
    const records: VideoRecord[] = [];
    const failedBatches: FailedBatch[] = [];
    const batches = chunk(ids, this.batchSize);

    if (batches.length > 0) {
      this.logger.info(`📦 Fetching video metadata (${ids.length} videos, ${batches.length} batches)...`);
    }

    for (const [index, batch] of batches.entries()) {
      const start = index * this.batchSize;

      try {
        const response = await this.youtube.videos({
          part: ['snippet', 'statistics', 'contentDetails'],
          id: batch,
        });

        for (const item of response.items ?? []) {
          const record = toVideoRecord(item);
          if (record) records.push(record);
        }
      } catch (error) {
        if (error instanceof RateLimitedError) throw error;

        const failure = new TransientBatchError(index, batch, { cause: error });
        this.logger.warn(`⚠️ ${failure.message}`);
        failedBatches.push({
          index,
          start,
          end: start + batch.length,
          ids: batch,
          reason: failure.message,
          error: failure,
        });
      }
    }

    return {
      records,
      failedBatches,
      complete: failedBatches.length === 0,
    };
  }
}
