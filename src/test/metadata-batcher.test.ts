import { beforeEach, describe, expect, test } from 'vitest';
import { chunk, MetadataBatcher } from '../services/metadata-batcher.service.js';
import { errorMessage, RateLimitedError, TransientBatchError } from '../utils/errors.js';
import {
  createFakeApi,
  createFakeLogger,
  createTestService,
  makeVideo,
  upstreamError,
  type FakeLogger,
  type FakeYouTubeApi,
} from './helpers/fake-youtube.js';

const ids = Array.from({ length: 120 }, (_, i) => `v${i}`);

describe('chunk', () => {
  test('splits into fixed-size groups', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 50)).toEqual([]);
  });
});

describe('MetadataBatcher', () => {
  let api: FakeYouTubeApi;
  let logger: FakeLogger;

  beforeEach(() => {
    api = createFakeApi();
    logger = createFakeLogger();
    api.videosList.mockImplementation(async params => ({
      items: (params.id ?? []).map(id => makeVideo(id)),
    }));
  });

  test('fetches in batches of 50', async () => {
    const batcher = new MetadataBatcher(createTestService(api), logger);

    const result = await batcher.fetch(ids);

    expect(result.records).toHaveLength(120);
    expect(result.records.map(record => record.id)).toEqual(ids);
    expect(result.failedBatches).toEqual([]);
    expect(result.complete).toBe(true);
    expect(api.videosList).toHaveBeenCalledTimes(3);
    expect(api.videosList).toHaveBeenNthCalledWith(3, {
      part: ['snippet', 'statistics', 'contentDetails'],
      id: ids.slice(100),
    });
    expect(logger.info).toHaveBeenCalledWith('📦 Fetching video metadata (120 videos, 3 batches)...');
  });

  test('skips a failing batch and reports its range', async () => {
    api.videosList.mockImplementation(async params => {
      const batch = params.id ?? [];
      if (batch[0] === 'v50') throw new Error('backend error');
      return { items: batch.map(id => makeVideo(id)) };
    });
    const batcher = new MetadataBatcher(createTestService(api), logger);

    const result = await batcher.fetch(ids);

    expect(result.records).toHaveLength(70);
    expect(result.complete).toBe(false);
    expect(result.failedBatches).toHaveLength(1);
    const [failed] = result.failedBatches;
    expect(failed).toMatchObject({
      index: 1,
      start: 50,
      end: 100,
      ids: ids.slice(50, 100),
      reason: 'Batch 2 (50 videos) failed: backend error',
    });
    expect(failed.error).toBeInstanceOf(TransientBatchError);
    expect(failed.error.batchIndex).toBe(1);
    expect(failed.error.cause).toBeInstanceOf(Error);
    expect(errorMessage(failed.error.cause)).toBe('backend error');
    expect(logger.warn).toHaveBeenCalledWith('⚠️ Batch 2 (50 videos) failed: backend error');
  });

  test('aborts when the rate-limit budget runs out', async () => {
    api.videosList.mockRejectedValue(upstreamError(429));
    const batcher = new MetadataBatcher(createTestService(api, { maxRateLimitRetries: 0 }), logger);

    await expect(batcher.fetch(ids)).rejects.toBeInstanceOf(RateLimitedError);
    expect(api.videosList).toHaveBeenCalledTimes(1);
  });

  test('keeps the order upstream returns', async () => {
    api.videosList.mockResolvedValueOnce({ items: [makeVideo('c'), makeVideo('a'), makeVideo('b')] });
    const batcher = new MetadataBatcher(createTestService(api), logger);

    const result = await batcher.fetch(['a', 'b', 'c']);

    expect(result.records.map(record => record.id)).toEqual(['c', 'a', 'b']);
  });

  test('does nothing for an empty list', async () => {
    const batcher = new MetadataBatcher(createTestService(api), logger);

    await expect(batcher.fetch([])).resolves.toEqual({ records: [], failedBatches: [], complete: true });
    expect(api.videosList).not.toHaveBeenCalled();
    expect(logger.info).not.toHaveBeenCalled();
  });

  test('honours a smaller batch size', async () => {
    const batcher = new MetadataBatcher(createTestService(api), logger, 2);

    await batcher.fetch(['a', 'b', 'c']);

    expect(api.videosList).toHaveBeenCalledTimes(2);
  });
});
