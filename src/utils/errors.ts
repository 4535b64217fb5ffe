import { z } from 'zod';

export class ScraperError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Upstream kept answering with a quota or rate-limit signal after the
 * configured number of retries.
 */
export class RateLimitedError extends ScraperError {
  constructor(readonly retries: number, options?: ErrorOptions) {
    super(`Rate limit still exceeded after ${retries} retries`, options);
  }
}

export class NotFoundError extends ScraperError {
  constructor(
    readonly resource: 'channel' | 'uploads-playlist',
    readonly identifier: string
  ) {
    super(
      resource === 'channel'
        ? `Channel not found: ${identifier}`
        : `No uploads playlist found for channel: ${identifier}`
    );
  }
}

export class TransientBatchError extends ScraperError {
  constructor(
    readonly batchIndex: number,
    readonly ids: string[],
    options?: ErrorOptions
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown error');
    super(`Batch ${batchIndex + 1} (${ids.length} videos) failed: ${reason}`, options);
  }
}

export class MalformedResponseError extends ScraperError {
  constructor(readonly endpoint: string, readonly missingKey: string) {
    super(`No '${missingKey}' in ${endpoint} response`);
  }
}

export class ConfigurationError extends ScraperError {
  constructor(readonly missing: string[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`);
  }
}

const RATE_LIMIT_REASONS = new Set([
  'quotaExceeded',
  'rateLimitExceeded',
  'userRateLimitExceeded',
  'dailyLimitExceeded',
]);

const reasonListSchema = z.array(z.object({ reason: z.string().optional() }).passthrough());

// Shape of the errors thrown by gaxios / googleapis-common.
const upstreamErrorSchema = z.object({
  status: z.number().optional().catch(undefined),
  code: z.union([z.number(), z.string()]).optional().catch(undefined),
  message: z.string().optional().catch(undefined),
  errors: reasonListSchema.optional().catch(undefined),
  response: z
    .object({
      status: z.number().optional().catch(undefined),
      data: z
        .object({
          error: z.object({ errors: reasonListSchema.optional() }).optional(),
        })
        .optional()
        .catch(undefined),
    })
    .optional()
    .catch(undefined),
});

/**
 * True when an upstream failure means "slow down" rather than "this request is wrong".
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof RateLimitedError) return true;

  const parsed = upstreamErrorSchema.safeParse(error);
  if (!parsed.success) return false;

  const { status, code, message, errors, response } = parsed.data;
  const httpStatus = status ?? response?.status ?? (typeof code === 'number' ? code : Number(code));

  if (httpStatus === 429) return true;
  if (httpStatus !== 403) return false;

  const reasons = [...(errors ?? []), ...(response?.data?.error?.errors ?? [])]
    .map(entry => entry.reason)
    .filter((reason): reason is string => reason !== undefined);

  if (reasons.some(reason => RATE_LIMIT_REASONS.has(reason))) return true;
  return /quota|rate limit/i.test(message ?? '');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
