import 'dotenv/config';
import { pathToFileURL } from 'node:url';
import { loadScraperConfig, type Env, type ScraperConfig } from './config/scraper.config.js';
import { CategoryService } from './services/category.service.js';
import { dateRangeLabel, ExportService } from './services/export.service.js';
import { ReportService } from './services/report.service.js';
import { ScrapeService } from './services/scrape.service.js';
import { YouTubeService } from './services/youtube.service.js';
import type { Logger } from './types/logger.types.js';
import { ConfigurationError, errorMessage } from './utils/errors.js';
import { RateLimiter } from './utils/rate-limiter.js';

export interface MainDependencies {
  env?: Env;
  logger?: Logger;
  createYouTube?: (apiKey: string, limiter: RateLimiter) => YouTubeService;
  now?: () => Date;
}

/**
 * Scrape the configured channel, export the catalog and print the report.
 * Resolves to the process exit code.
 */
async function main(deps: MainDependencies = {}): Promise<number> {
  const logger = deps.logger ?? console;
  const createYouTube = deps.createYouTube ?? YouTubeService.fromApiKey;

  let config: ScraperConfig;
  try {
    config = loadScraperConfig(deps.env ?? process.env, logger);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }

  const limiter = new RateLimiter({
    minIntervalMs: config.minIntervalMs,
    cooldownMs: config.cooldownMs,
    maxRateLimitRetries: config.maxRateLimitRetries,
    logger,
  });
  const youtube = createYouTube(config.apiKey, limiter);

  try {
    const categories = new CategoryService(undefined, logger);
    await categories.refresh(youtube, config.categoryRegion);

    const scraper = new ScrapeService(youtube, { listingSource: config.listingSource, logger });
    const result = await scraper.run({
      channelIdentifier: config.channelIdentifier,
      maxCount: config.maxCount,
      publishedAfter: config.publishedAfter,
      publishedBefore: config.publishedBefore,
      bufferDays: config.bufferDays,
    });

    for (const batch of result.failedBatches) {
      logger.warn(`⚠️ Videos ${batch.start + 1}-${batch.end} were not fetched: ${batch.reason}`);
    }

    if (result.records.length === 0) {
      logger.info('No videos found');
      return 0;
    }

    const exporter = new ExportService(categories, config.resultsDir, logger);
    await exporter.save(result.records, {
      channelName: result.records[0]?.channelTitle || config.channelIdentifier,
      // Label the files with the requested dates, not the buffered ones
      dateRange: dateRangeLabel(config.publishedAfter, config.publishedBefore),
      now: deps.now?.(),
    });

    new ReportService(categories, logger).print(result.records);

    const quota = youtube.getQuotaUsage();
    logger.info(`📈 Quota used: ${quota.used} units (${quota.percentage.toFixed(1)}% of daily limit)`);
    return 0;
  } catch (error) {
    logger.error(`💥 Error: ${errorMessage(error)}`);
    return 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = await main();
}

export { main };
