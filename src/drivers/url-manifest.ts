import { z } from 'zod';
import type { CrawlSpec } from '../types/crawl-spec.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { readFileIfExists, writeFileAtomic } from '../utils/fs-utils.js';

const UrlManifestSchema = z.object({
  archive_url: z.string(),
  archive_selector: z.string(),
  content_selector: z.string(),
  total_urls: z.number().int().nonnegative(),
  urls: z.array(z.string().url())
});

export type UrlManifest = z.infer<typeof UrlManifestSchema>;

/** `data/raw/site.jsonl` + `news` -> `data/raw/site.jsonl.news.urls.json` */
export function manifestPath(outputPath: string, category: string): string {
  return `${outputPath}.${category}.urls.json`;
}

export async function writeManifest(path: string, spec: CrawlSpec, urls: string[]): Promise<void> {
  const manifest: UrlManifest = {
    archive_url: spec.archiveUrl,
    archive_selector: spec.itemSelector,
    content_selector: spec.contentSelector,
    total_urls: urls.length,
    urls
  };
  await writeFileAtomic(path, `${JSON.stringify(manifest, null, 2)}\n`);
}

export async function readManifest(path: string): Promise<UrlManifest> {
  const content = await readFileIfExists(path);
  if (content === undefined) {
    throw new ConfigurationError(`No URL manifest at ${path}; crawl the archive once without --skip-archive`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`URL manifest ${path} is not valid JSON: ${errorMessage(error)}`);
  }
  const parsed = UrlManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`URL manifest ${path} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}
