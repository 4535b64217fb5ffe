import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createObjectCsvWriter } from 'csv-writer';
import type { Logger } from '../types/logger.types.js';
import {
  ChannelSearchExportSchema,
  type ChannelSearchExport,
  type CsvExportRow,
  type ExportRow,
  ExportRowSchema,
} from '../types/schemas.js';
import type { ChannelSearchResult, VideoRecord } from '../types/youtube.types.js';
import type { CategoryService } from './category.service.js';

export const DEFAULT_RESULTS_DIR = 'result';

const CSV_HEADER: Array<{ id: keyof CsvExportRow; title: string }> = [
  { id: 'video_id', title: 'video_id' },
  { id: 'url', title: 'url' },
  { id: 'title', title: 'title' },
  { id: 'description', title: 'description' },
  { id: 'channel_title', title: 'channel_title' },
  { id: 'published_at', title: 'published_at' },
  { id: 'duration', title: 'duration' },
  { id: 'view_count', title: 'view_count' },
  { id: 'like_count', title: 'like_count' },
  { id: 'comment_count', title: 'comment_count' },
  { id: 'thumbnail_url', title: 'thumbnail_url' },
  { id: 'tags', title: 'tags' },
  { id: 'category_id', title: 'category_id' },
  { id: 'category_name', title: 'category_name' },
  { id: 'language', title: 'language' },
];

export interface ExportOptions {
  channelName?: string;
  dateRange?: string;
  now?: Date;
}

export interface ExportedFiles {
  csvPath: string;
  jsonPath: string;
}

/**
 * "2022-2023", "2022" when both bounds fall in the same year, otherwise "all_dates".
 */
export function dateRangeLabel(publishedAfter?: string, publishedBefore?: string): string {
  if (!publishedAfter || !publishedBefore) {
    return 'all_dates';
  }
  const startYear = publishedAfter.slice(0, 4);
  const endYear = publishedBefore.slice(0, 4);
  return startYear === endYear ? startYear : `${startYear}-${endYear}`;
}

export function cleanFileComponent(name: string): string {
  return name.replace(/ /g, '_').replace(/@/g, '').replace(/\//g, '_');
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatFileTimestamp(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function exportBaseName(options: ExportOptions, now: Date): string {
  const timestamp = formatFileTimestamp(now);
  if (options.channelName && options.dateRange) {
    return `${cleanFileComponent(options.channelName)}_${options.dateRange}_${timestamp}`;
  }
  return `youtube_videos_${timestamp}`;
}

async function writeJson(filePath: string, data: unknown): Promise<void> {
  await writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
}

export interface ChannelSearchExportOptions {
  resultsDir?: string;
  now?: Date;
  logger?: Logger;
}

/**
 * Save channel search results as channel_search_{term}_{timestamp}.json.
 */
export async function saveChannelSearch(
  searchTerm: string,
  results: readonly ChannelSearchResult[],
  options: ChannelSearchExportOptions = {}
): Promise<string> {
  const { resultsDir = DEFAULT_RESULTS_DIR, now = new Date(), logger = console } = options;
  const timestamp = formatFileTimestamp(now);
  const payload: ChannelSearchExport = ChannelSearchExportSchema.parse({
    search_term: searchTerm,
    timestamp,
    total_results: results.length,
    results: results.map(result => ({
      rank: result.rank,
      title: result.title,
      channel_id: result.channelId,
      description: result.description,
      url: result.url,
    })),
  });

  await mkdir(resultsDir, { recursive: true });
  const filePath = path.join(resultsDir, `channel_search_${cleanFileComponent(searchTerm)}_${timestamp}.json`);
  await writeJson(filePath, payload);
  logger.info(`💾 Results saved to: ${filePath}`);
  return filePath;
}

export class ExportService {
  constructor(
    private readonly categories: CategoryService,
    private readonly resultsDir: string = DEFAULT_RESULTS_DIR,
    private readonly logger: Logger = console
  ) {}

  toExportRow(record: VideoRecord): ExportRow {
    return ExportRowSchema.parse({
      video_id: record.id,
      url: record.url,
      title: record.title,
      description: record.description,
      channel_title: record.channelTitle,
      published_at: record.publishedAt,
      duration: record.duration,
      view_count: record.viewCount,
      like_count: record.likeCount,
      comment_count: record.commentCount,
      thumbnail_url: record.thumbnailUrl,
      tags: [...record.tags],
      category_id: record.categoryId,
      category_name: this.categories.nameForId(record.categoryId),
      language: record.language,
    });
  }

  /**
   * Write the records as CSV and JSON under the results directory.
   */
  async save(records: readonly VideoRecord[], options: ExportOptions = {}): Promise<ExportedFiles> {
    const baseName = exportBaseName(options, options.now ?? new Date());
    const rows = records.map(record => this.toExportRow(record));

    await mkdir(this.resultsDir, { recursive: true });

    const csvPath = path.join(this.resultsDir, `${baseName}.csv`);
    await this.writeCsv(csvPath, rows);
    this.logger.info(`💾 Data saved to ${csvPath}`);

    const jsonPath = path.join(this.resultsDir, `${baseName}.json`);
    await writeJson(jsonPath, rows);
    this.logger.info(`💾 Data saved to ${jsonPath}`);

    return { csvPath, jsonPath };
  }

  private async writeCsv(filePath: string, rows: readonly ExportRow[]): Promise<void> {
    const writer = createObjectCsvWriter({
      path: filePath,
      header: CSV_HEADER,
      encoding: 'utf8',
    });
    const csvRows: CsvExportRow[] = rows.map(row => ({ ...row, tags: row.tags.join(', ') }));
    await writer.writeRecords(csvRows);
  }

}
