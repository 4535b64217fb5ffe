import { z } from 'zod';
import type { Logger } from '../types/logger.types.js';
import type { ListingSource } from '../types/youtube.types.js';
import { ConfigurationError } from '../utils/errors.js';
import { DEFAULT_COOLDOWN_MS, DEFAULT_MIN_INTERVAL_MS } from '../utils/rate-limiter.js';

export type Env = Record<string, string | undefined>;

export interface ApiConfig {
  apiKey: string;
  minIntervalMs: number;
  cooldownMs: number;
  maxRateLimitRetries?: number;
  resultsDir: string;
}

export interface ScraperConfig extends ApiConfig {
  channelIdentifier: string;
  maxCount?: number;
  publishedAfter?: string;
  publishedBefore?: string;
  bufferDays: number;
  listingSource: ListingSource;
  categoryRegion: string;
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const listingSourceSchema = z.enum(['search', 'uploads']);
const regionCodeSchema = z.string().regex(/^[A-Za-z]{2}$/).transform(code => code.toUpperCase());

/**
 * Read one optional setting. Blank means unset; a value that fails the schema
 * is reported and treated as unset.
 */
function readSetting<T>(env: Env, name: string, schema: z.ZodType<T>, logger: Logger): T | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;

  const result = schema.safeParse(raw);
  if (result.success) return result.data;

  logger.warn(`⚠️ Ignoring invalid ${name} value: ${raw}`);
  return undefined;
}

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * API key, rate limiting and output location: enough for any command that
 * talks to the API.
 */
export function loadApiConfig(env: Env = process.env, logger: Logger = console): ApiConfig {
  const apiKey = readString(env, 'YOUTUBE_API_KEY');
  if (!apiKey) {
    throw new ConfigurationError(['YOUTUBE_API_KEY']);
  }

  return {
    apiKey,
    minIntervalMs: readSetting(env, 'RATE_LIMIT_DELAY_MS', nonNegativeInt, logger) ?? DEFAULT_MIN_INTERVAL_MS,
    cooldownMs: readSetting(env, 'RATE_LIMIT_COOLDOWN_MS', nonNegativeInt, logger) ?? DEFAULT_COOLDOWN_MS,
    maxRateLimitRetries: readSetting(env, 'MAX_RATE_LIMIT_RETRIES', nonNegativeInt, logger),
    resultsDir: readString(env, 'RESULTS_DIR') ?? 'result',
  };
}

export function loadScraperConfig(env: Env = process.env, logger: Logger = console): ScraperConfig {
  const missing: string[] = [];
  if (!readString(env, 'YOUTUBE_API_KEY')) missing.push('YOUTUBE_API_KEY');

  const channelIdentifier = readString(env, 'CHANNEL_ID') ?? readString(env, 'CHANNEL_USERNAME');
  if (!channelIdentifier) missing.push('CHANNEL_ID or CHANNEL_USERNAME');

  if (missing.length > 0 || !channelIdentifier) {
    throw new ConfigurationError(missing);
  }

  return {
    ...loadApiConfig(env, logger),
    channelIdentifier,
    maxCount: readSetting(env, 'MAX_VIDEOS', positiveInt, logger),
    publishedAfter: readString(env, 'PUBLISHED_AFTER'),
    publishedBefore: readString(env, 'PUBLISHED_BEFORE'),
    bufferDays: readSetting(env, 'BUFFER_DAYS', nonNegativeInt, logger) ?? 0,
    listingSource: readSetting(env, 'LISTING_SOURCE', listingSourceSchema, logger) ?? 'search',
    categoryRegion: readSetting(env, 'CATEGORY_REGION', regionCodeSchema, logger) ?? 'US',
  };
}
