import { z } from 'zod';

const countSchema = z.number().int().nonnegative();

// One exported video, as written to CSV and JSON
export const ExportRowSchema = z.object({
  video_id: z.string().min(1),
  url: z.string().url(),
  title: z.string(),
  description: z.string(),
  channel_title: z.string(),
  published_at: z.string(),
  duration: z.string().regex(/^\d+:\d{2}(?::\d{2})?$/),
  view_count: countSchema,
  like_count: countSchema,
  comment_count: countSchema,
  thumbnail_url: z.string(),
  tags: z.array(z.string()),
  category_id: z.string(),
  category_name: z.string(),
  language: z.string(),
});

export type ExportRow = z.infer<typeof ExportRowSchema>;

// csv-writer takes flat values, tags are joined
export type CsvExportRow = Omit<ExportRow, 'tags'> & { tags: string };

export const ChannelSearchExportSchema = z.object({
  search_term: z.string(),
  timestamp: z.string(),
  total_results: z.number().int().nonnegative(),
  results: z.array(
    z.object({
      rank: z.number().int().positive(),
      title: z.string(),
      channel_id: z.string(),
      description: z.string(),
      url: z.string().url(),
    })
  ),
});

export type ChannelSearchExport = z.infer<typeof ChannelSearchExportSchema>;

export const CategoryTableSchema = z.record(z.string().regex(/^\d+$/), z.string());
