import defaultCategories from '../../data/youtube-categories.json' with { type: 'json' };
import type { Logger } from '../types/logger.types.js';
import { CategoryTableSchema } from '../types/schemas.js';
import type { VideoRecord } from '../types/youtube.types.js';
import { errorMessage } from '../utils/errors.js';
import type { YouTubeService } from './youtube.service.js';

export interface CategoryStat {
  name: string;
  count: number;
  percentage: number;
}

function toCategoryMap(table: Record<string, string>): Map<number, string> {
  return new Map(Object.entries(table).map(([id, name]) => [parseInt(id, 10), name]));
}

/**
 * Category ID → name lookup. Starts from the US table shipped in
 * data/youtube-categories.json and can be refreshed for a region.
 */
export class CategoryService {
  private categories: Map<number, string>;

  constructor(
    table: Record<string, string> = CategoryTableSchema.parse(defaultCategories),
    private readonly logger: Logger = console
  ) {
    this.categories = toCategoryMap(table);
  }

  /**
   * Load the region's categories from the API. Keeps the current table if the
   * call fails or comes back empty.
   */
  async refresh(youtube: YouTubeService, regionCode = 'US'): Promise<boolean> {
    try {
      const response = await youtube.videoCategories({
        part: ['snippet'],
        regionCode,
      });

      const loaded = new Map<number, string>();
      for (const item of response.items ?? []) {
        const title = item.snippet?.title;
        if (item.id && /^\d+$/.test(item.id) && title) {
          loaded.set(parseInt(item.id, 10), title);
        }
      }

      if (loaded.size === 0) {
        this.logger.warn(`⚠️ No categories returned for region ${regionCode}, using default category mapping`);
        return false;
      }

      this.categories = loaded;
      return true;
    } catch (error) {
      this.logger.warn(`⚠️ Could not load categories from API: ${errorMessage(error)}`);
      this.logger.warn('   Using default category mapping');
      return false;
    }
  }

  nameForId(categoryId: string): string {
    const trimmed = categoryId.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
      return `Invalid ID: ${categoryId}`;
    }
    return this.categories.get(parseInt(trimmed, 10)) ?? `Unknown (ID: ${categoryId})`;
  }

  getAllCategories(): Map<number, string> {
    return new Map(this.categories);
  }

  /**
   * Video count per category name, most common first.
   */
  categoryStats(records: readonly VideoRecord[]): CategoryStat[] {
    const counts = new Map<string, number>();
    for (const record of records) {
      const name = this.nameForId(record.categoryId);
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }

    const total = records.length;
    return [...counts.entries()]
      .map(([name, count]) => ({ name, count, percentage: (count / total) * 100 }))
      .sort((a, b) => b.count - a.count);
  }
}
