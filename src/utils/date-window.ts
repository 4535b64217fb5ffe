import type { Logger } from '../types/logger.types.js';
import type { DateWindow } from '../types/youtube.types.js';

const ISO_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parse an ISO 8601 date or date-time. Values without an offset are read as UTC.
 */
export function parseIsoDate(value: string): Date | null {
  const trimmed = value.trim();
  const match = trimmed.match(ISO_DATE_PATTERN);
  if (!match) return null;

  const [, year, month, day, hour = '00', minute = '00', second = '00', offset] = match;
  // Date rolls 2023-02-30 over to March; reject fields that don't survive the round trip
  const fields = new Date(Date.UTC(+year, +month - 1, +day, +hour, +minute, +second));
  if (
    fields.getUTCFullYear() !== +year ||
    fields.getUTCMonth() !== +month - 1 ||
    fields.getUTCDate() !== +day ||
    fields.getUTCHours() !== +hour ||
    fields.getUTCMinutes() !== +minute ||
    fields.getUTCSeconds() !== +second
  ) {
    return null;
  }

  const hasTime = trimmed.includes('T');
  const normalized = hasTime && !offset ? `${trimmed}Z` : trimmed;
  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** YYYY-MM-DDTHH:MM:SSZ, the form the search endpoint takes. */
export function formatIsoDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function shiftIsoDate(value: string, days: number): string | null {
  const date = parseIsoDate(value);
  if (!date) return null;
  return formatIsoDate(new Date(date.getTime() + days * DAY_MS));
}

/**
 * Widen the publish window by `bufferDays` on both sides.
 * A date that can't be parsed is passed through untouched.
 */
export function bufferDateWindow(
  window: { publishedAfter?: string; publishedBefore?: string },
  bufferDays: number,
  logger: Logger = console
): DateWindow {
  let { publishedAfter, publishedBefore } = window;

  if (bufferDays <= 0) {
    return { publishedAfter, publishedBefore, bufferDays: 0 };
  }

  if (publishedAfter) {
    const buffered = shiftIsoDate(publishedAfter, -bufferDays);
    if (buffered) {
      publishedAfter = buffered;
      logger.info(`📅 Applied -${bufferDays} day buffer to start date: ${publishedAfter}`);
    } else {
      logger.warn(`⚠️ Could not parse publishedAfter date: ${publishedAfter}`);
    }
  }

  if (publishedBefore) {
    const buffered = shiftIsoDate(publishedBefore, bufferDays);
    if (buffered) {
      publishedBefore = buffered;
      logger.info(`📅 Applied +${bufferDays} day buffer to end date: ${publishedBefore}`);
    } else {
      logger.warn(`⚠️ Could not parse publishedBefore date: ${publishedBefore}`);
    }
  }

  return { publishedAfter, publishedBefore, bufferDays };
}
