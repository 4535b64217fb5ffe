import { beforeEach, describe, expect, test } from 'vitest';
import { ScrapeService } from '../services/scrape.service.js';
import type { YouTubeService } from '../services/youtube.service.js';
import { NotFoundError } from '../utils/errors.js';
import {
  createFakeApi,
  createFakeLogger,
  createTestService,
  makeVideo,
  searchPage,
  type FakeLogger,
  type FakeYouTubeApi,
} from './helpers/fake-youtube.js';

describe('ScrapeService', () => {
  let api: FakeYouTubeApi;
  let logger: FakeLogger;
  let youtube: YouTubeService;

  beforeEach(() => {
    api = createFakeApi();
    logger = createFakeLogger();
    youtube = createTestService(api);

    api.channelsList
      .mockResolvedValueOnce({ items: [{ id: 'UCchan' }] })
      .mockResolvedValueOnce({ items: [{ contentDetails: { relatedPlaylists: { uploads: 'UUchan' } } }] });
  });

  test('resolves, lists and fetches a channel', async () => {
    api.searchList.mockResolvedValueOnce(searchPage(['a', 'b'], 'next')).mockResolvedValueOnce(searchPage(['c']));
    api.videosList.mockResolvedValueOnce({ items: [makeVideo('c'), makeVideo('a'), makeVideo('b')] });
    const scraper = new ScrapeService(youtube, { logger });

    const result = await scraper.run({ channelIdentifier: '@chan' });

    expect(result.channel).toEqual({ channelId: 'UCchan', uploadsPlaylistId: 'UUchan' });
    expect(result.window).toEqual({ bufferDays: 0 });
    expect(result.videoIds).toEqual(['a', 'b', 'c']);
    expect(result.records.map(record => record.id)).toEqual(['c', 'a', 'b']);
    expect(result.failedBatches).toEqual([]);
    expect(result.complete).toBe(true);
    expect(api.videosList).toHaveBeenCalledWith({
      part: ['snippet', 'statistics', 'contentDetails'],
      id: ['a', 'b', 'c'],
    });
    expect(logger.info).toHaveBeenCalledWith('📡 Channel ID: UCchan');
    expect(logger.info).toHaveBeenCalledWith('✅ Successfully scraped 3 videos');
    // 2 channel lookups, 2 search pages, 1 metadata batch
    expect(youtube.getQuotaUsage().used).toBe(203);
  });

  test('searches with the buffered window', async () => {
    const scraper = new ScrapeService(youtube, { logger });

    await scraper.run({
      channelIdentifier: '@chan',
      publishedAfter: '2023-01-10T00:00:00Z',
      publishedBefore: '2023-01-20T00:00:00Z',
      bufferDays: 2,
    });

    expect(api.searchList).toHaveBeenCalledWith({
      part: ['id'],
      channelId: 'UCchan',
      type: ['video'],
      order: 'date',
      maxResults: 50,
      publishedAfter: '2023-01-08T00:00:00Z',
      publishedBefore: '2023-01-22T00:00:00Z',
    });
  });

  test('can list through the uploads playlist', async () => {
    api.playlistItemsList.mockResolvedValueOnce({
      items: [{ contentDetails: { videoId: 'u1', videoPublishedAt: '2024-01-01T00:00:00Z' } }],
    });
    api.videosList.mockResolvedValueOnce({ items: [makeVideo('u1')] });
    const scraper = new ScrapeService(youtube, { listingSource: 'uploads', logger });

    const result = await scraper.run({ channelIdentifier: '@chan', maxCount: 10 });

    expect(result.videoIds).toEqual(['u1']);
    expect(api.searchList).not.toHaveBeenCalled();
    expect(api.playlistItemsList).toHaveBeenCalledWith({
      part: ['contentDetails'],
      playlistId: 'UUchan',
      maxResults: 50,
    });
  });

  test('returns an empty result for a channel without videos', async () => {
    const scraper = new ScrapeService(youtube, { logger });

    const result = await scraper.run({ channelIdentifier: '@chan' });

    expect(result.records).toEqual([]);
    expect(result.complete).toBe(true);
    expect(api.videosList).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith('ℹ️ No videos found in channel');
  });

  test('marks the result partial when a batch fails', async () => {
    api.searchList.mockResolvedValueOnce(searchPage(['a', 'b']));
    api.videosList
      .mockRejectedValueOnce(new Error('backend error'))
      .mockResolvedValueOnce({ items: [makeVideo('b')] });
    const scraper = new ScrapeService(youtube, { logger, batchSize: 1 });

    const result = await scraper.run({ channelIdentifier: '@chan' });

    expect(result.complete).toBe(false);
    expect(result.records.map(record => record.id)).toEqual(['b']);
    expect(result.failedBatches.map(batch => batch.ids)).toEqual([['a']]);
    expect(logger.warn).toHaveBeenCalledWith('⚠️ Scraped 1 of 2 videos, 1 batch(es) failed');
  });

  test('logs and rethrows resolution failures', async () => {
    api.channelsList.mockReset();
    api.channelsList.mockResolvedValue({ items: [] });
    const scraper = new ScrapeService(youtube, { logger });

    await expect(scraper.run({ channelIdentifier: '@nobody' })).rejects.toBeInstanceOf(NotFoundError);
    expect(logger.error).toHaveBeenCalledWith('❌ Scrape failed for @nobody: Channel not found: @nobody');
  });
});
