import { z } from 'zod';
import { ENGINE_NAMES } from './crawl-spec.js';

export const ArticleSchema = z.object({
  id: z.string().regex(/^[a-f0-9]{32}$/),
  title: z.string(),
  url: z.string().url(),
  thumbnail_url: z.string().url().nullable(),
  raw_html_content: z.string().min(1),
  scraped_at: z.string().datetime(),
  scraped_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  source_url: z.string().url(),
  site: z.string(),
  category: z.string(),
  engine: z.enum(ENGINE_NAMES)
});

export type Article = z.infer<typeof ArticleSchema>;

/** Link found on an archive page, before the detail page is fetched */
export interface ArchiveItem {
  url: string;
  title?: string;
  thumbnailUrl?: string;
}
