import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { ArticleSchema } from '../types/article.js';
import type { Article } from '../types/article.js';
import type { OutputFormat } from '../types/crawl-spec.js';
import { ConfigurationError, ExtractionError } from '../utils/errors.js';
import { readFileIfExists, writeFileAtomic } from '../utils/fs-utils.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('storage');

/**
 * Output artifact for crawled articles.
 *
 * `ndjson` appends one record per line. `json` keeps a single array and
 * rewrites the file on every append. An existing file is extended, never
 * truncated.
 */
export class ArticleStore {
  private readonly ids = new Set<string>();

  private constructor(
    readonly path: string,
    readonly format: OutputFormat,
    private readonly records: unknown[]
  ) {}

  static async open(path: string, format: OutputFormat): Promise<ArticleStore> {
    await mkdir(dirname(path), { recursive: true });
    if (format === 'ndjson') {
      return new ArticleStore(path, format, []);
    }

    const existing = await readFileIfExists(path);
    if (existing === undefined || existing.trim() === '') {
      return new ArticleStore(path, format, []);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(existing);
    } catch {
      throw new ConfigurationError(`Output file ${path} exists but is not a JSON array; refusing to overwrite it`);
    }
    if (!Array.isArray(parsed)) {
      throw new ConfigurationError(`Output file ${path} exists but is not a JSON array; refusing to overwrite it`);
    }

    log.debug(`Extending ${path} (${parsed.length} existing records)`);
    return new ArticleStore(path, format, parsed);
  }

  /** Seed identities that are already stored (from a resume scan) */
  remember(ids: Iterable<string>): void {
    for (const id of ids) {
      this.ids.add(id);
    }
  }

  exists(id: string): boolean {
    return this.ids.has(id);
  }

  async append(article: Article): Promise<void> {
    const validated = ArticleSchema.safeParse(article);
    if (!validated.success) {
      const issues = validated.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ExtractionError('invalid_record', article.url, `Invalid article ${article.url}: ${issues}`);
    }

    if (this.format === 'ndjson') {
      await appendFile(this.path, `${JSON.stringify(validated.data)}\n`, 'utf-8');
    } else {
      this.records.push(validated.data);
      await writeFileAtomic(this.path, `${JSON.stringify(this.records, null, 2)}\n`);
    }

    this.ids.add(validated.data.id);
  }
}
