import type { Logger } from '../types/logger.types.js';
import type { VideoRecord } from '../types/youtube.types.js';
import type { CategoryService } from './category.service.js';

export interface CatalogTotals {
  videos: number;
  views: number;
  likes: number;
  comments: number;
}

const NAME_WIDTH = 25;

export function summarize(records: readonly VideoRecord[]): CatalogTotals {
  return records.reduce<CatalogTotals>(
    (totals, record) => ({
      videos: totals.videos + 1,
      views: totals.views + record.viewCount,
      likes: totals.likes + record.likeCount,
      comments: totals.comments + record.commentCount,
    }),
    { videos: 0, views: 0, likes: 0, comments: 0 }
  );
}

function formatNumber(value: number): string {
  return value.toLocaleString('en-US');
}

export class ReportService {
  constructor(
    private readonly categories: CategoryService,
    private readonly logger: Logger = console
  ) {}

  categoryLines(records: readonly VideoRecord[]): string[] {
    const stats = this.categories.categoryStats(records);
    if (stats.length === 0) {
      return [];
    }

    const lines = stats.map(
      stat =>
        `${stat.name.padEnd(NAME_WIDTH)}: ${stat.count.toString().padStart(3)} videos (${stat.percentage
          .toFixed(1)
          .padStart(5)}%)`
    );
    lines.push(`${'Total'.padEnd(NAME_WIDTH)}: ${records.length.toString().padStart(3)} videos`);
    return lines;
  }

  summaryLines(records: readonly VideoRecord[]): string[] {
    const totals = summarize(records);
    return [
      `Total videos: ${formatNumber(totals.videos)}`,
      `Total views: ${formatNumber(totals.views)}`,
      `Total likes: ${formatNumber(totals.likes)}`,
      `Total comments: ${formatNumber(totals.comments)}`,
    ];
  }

  print(records: readonly VideoRecord[]): void {
    if (records.length === 0) {
      this.logger.info('No videos to analyze');
      return;
    }

    this.logger.info('\n📊 Video Category Statistics:');
    this.logger.info('='.repeat(40));
    for (const line of this.categoryLines(records)) {
      this.logger.info(line);
    }

    this.logger.info('\n✅ Scraping completed!');
    for (const line of this.summaryLines(records)) {
      this.logger.info(line);
    }
  }
}
