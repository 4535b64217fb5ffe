import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { pathToFileURL } from 'node:url';
import { loadApiConfig, type ApiConfig } from '../src/config/scraper.config.js';
import { ChannelResolver } from '../src/services/channel-resolver.service.js';
import { saveChannelSearch } from '../src/services/export.service.js';
import { YouTubeService } from '../src/services/youtube.service.js';
import { ConfigurationError, errorMessage } from '../src/utils/errors.js';
import { RateLimiter } from '../src/utils/rate-limiter.js';

async function promptForTerm(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question('Enter channel name to search: ');
  } finally {
    rl.close();
  }
}

async function findChannelId(): Promise<number> {
  let config: ApiConfig;
  try {
    config = loadApiConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }

  const searchTerm = (process.argv[2] ?? (await promptForTerm())).trim();
  if (!searchTerm) {
    console.error('❌ No search term given');
    return 1;
  }

  const youtube = YouTubeService.fromApiKey(
    config.apiKey,
    new RateLimiter({
      minIntervalMs: config.minIntervalMs,
      cooldownMs: config.cooldownMs,
      maxRateLimitRetries: config.maxRateLimitRetries,
    })
  );
  const resolver = new ChannelResolver(youtube);

  try {
    console.log(`🔍 Searching for channels matching: ${searchTerm}\n`);
    const results = await resolver.searchChannels(searchTerm);

    if (results.length === 0) {
      console.log('No channels found');
      return 0;
    }

    for (const result of results) {
      console.log(`${result.rank}. ${result.title}`);
      console.log(`   Channel ID: ${result.channelId}`);
      console.log(`   Description: ${result.description}`);
      console.log(`   URL: ${result.url}\n`);
    }

    await saveChannelSearch(searchTerm, results, { resultsDir: config.resultsDir });
    console.log(`💰 YouTube API quota used: ${youtube.getQuotaUsage().used} units`);
    return 0;
  } catch (error) {
    console.error(`❌ Search failed: ${errorMessage(error)}`);
    return 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = await findChannelId();
}

export { findChannelId };
