import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { readFileIfExists, writeFileAtomic } from '../utils/fs-utils.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('ledger');

const CategoryEntrySchema = z.object({
  lastCommittedPage: z.number().int().nonnegative(),
  pagesVisited: z.number().int().nonnegative(),
  finished: z.boolean(),
  exhaustion: z.string().optional(),
  updatedAt: z.string()
});

const LedgerFileSchema = z.object({
  version: z.literal(1),
  site: z.string(),
  categories: z.record(CategoryEntrySchema)
});

export type CategoryLedgerEntry = z.infer<typeof CategoryEntrySchema>;
type LedgerFile = z.infer<typeof LedgerFileSchema>;

/**
 * Per-category crawl progress, persisted next to the output artifact.
 *
 * A page is committed only once every item on it was attempted, and commits
 * only move forward within a run. The file is rewritten atomically after
 * every change.
 */
export class ResumeLedger {
  private constructor(
    readonly path: string,
    private readonly data: LedgerFile,
    private readonly now: () => Date
  ) {}

  static async load(path: string, site: string, now: () => Date = () => new Date()): Promise<ResumeLedger> {
    const content = await readFileIfExists(path);
    if (content === undefined) {
      return new ResumeLedger(path, { version: 1, site, categories: {} }, now);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Ledger ${path} is not valid JSON: ${errorMessage(error)}`);
    }
    const parsed = LedgerFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Ledger ${path} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    if (parsed.data.site !== site) {
      log.normal(`Ledger ${path} belongs to site ${parsed.data.site}, starting a new one for ${site}`);
      return new ResumeLedger(path, { version: 1, site, categories: {} }, now);
    }
    return new ResumeLedger(path, parsed.data, now);
  }

  entry(category: string): CategoryLedgerEntry | undefined {
    return this.data.categories[category];
  }

  lastCommittedPage(category: string): number {
    return this.entry(category)?.lastCommittedPage ?? 0;
  }

  /**
   * Start (or restart) a category at `startPage`. Pages before it count as
   * committed.
   */
  async begin(category: string, startPage: number): Promise<void> {
    this.data.categories[category] = {
      lastCommittedPage: startPage - 1,
      pagesVisited: 0,
      finished: false,
      updatedAt: this.now().toISOString()
    };
    await this.save();
  }

  async commit(category: string, page: number): Promise<void> {
    const entry = this.requireEntry(category);
    if (page <= entry.lastCommittedPage) {
      throw new Error(`Ledger for ${category} is at page ${entry.lastCommittedPage}; cannot commit page ${page}`);
    }
    entry.lastCommittedPage = page;
    entry.pagesVisited++;
    entry.updatedAt = this.now().toISOString();
    await this.save();
  }

  async finish(category: string, exhaustion: string): Promise<void> {
    const entry = this.requireEntry(category);
    entry.finished = true;
    entry.exhaustion = exhaustion;
    entry.updatedAt = this.now().toISOString();
    await this.save();
  }

  private requireEntry(category: string): CategoryLedgerEntry {
    const entry = this.data.categories[category];
    if (!entry) {
      throw new Error(`Category ${category} was not started in the ledger`);
    }
    return entry;
  }

  private async save(): Promise<void> {
    await writeFileAtomic(this.path, `${JSON.stringify(this.data, null, 2)}\n`);
  }
}
