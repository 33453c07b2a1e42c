import type { CrawlSpec } from '../types/crawl-spec.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { readFileIfExists } from '../utils/fs-utils.js';
import { articleId } from './utils/url-utils.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('resume');

const CURSOR_PATTERN = /^([^,\s]+),(\d+)$/;

export type ResumeInput =
  | { kind: 'file'; path: string }
  | { kind: 'cursor'; category: string; page: number };

/**
 * `category,page` is a cursor; anything else is the path of an artifact.
 */
export function parseResumeInput(value: string): ResumeInput {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ConfigurationError('--resume needs a file path or a category,page cursor');
  }

  const match = trimmed.match(CURSOR_PATTERN);
  if (match) {
    const page = parseInt(match[2], 10);
    if (page < 1) {
      throw new ConfigurationError(`Invalid resume cursor ${trimmed}: pages start at 1`);
    }
    return { kind: 'cursor', category: match[1], page };
  }

  return { kind: 'file', path: trimmed };
}

export interface ArtifactScan {
  ids: Set<string>;
  records: number;
  malformed: number;
  shape: 'array' | 'lines' | 'missing';
}

function identityOf(record: unknown): string | undefined {
  if (typeof record !== 'object' || record === null) return undefined;
  if ('url' in record && typeof record.url === 'string' && record.url) {
    return articleId(record.url);
  }
  if ('id' in record && typeof record.id === 'string' && record.id) {
    return record.id;
  }
  return undefined;
}

/**
 * Collect the identities of every record in an existing output artifact.
 * Runs once, before any network activity. The shape (one JSON array or one
 * record per line) is detected from the content, not the file name.
 */
export async function scanArtifact(path: string): Promise<ArtifactScan> {
  const content = await readFileIfExists(path);
  const scan: ArtifactScan = { ids: new Set(), records: 0, malformed: 0, shape: 'missing' };
  if (content === undefined) {
    log.normal(`Resume file ${path} not found, starting fresh`);
    return scan;
  }

  const collect = (record: unknown) => {
    const id = identityOf(record);
    if (id) {
      scan.ids.add(id);
      scan.records++;
    } else {
      scan.malformed++;
    }
  };

  const trimmed = content.trimStart();
  if (trimmed.startsWith('[')) {
    scan.shape = 'array';
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new ConfigurationError(`Resume file ${path} looks like a JSON array but cannot be parsed: ${errorMessage(error)}`);
    }
    if (Array.isArray(parsed)) {
      parsed.forEach(collect);
    }
  } else {
    scan.shape = 'lines';
    for (const line of content.split(/\r?\n/)) {
      if (!line.trim()) continue;
      try {
        collect(JSON.parse(line));
      } catch {
        scan.malformed++;
      }
    }
  }

  log.normal(`Resume scan of ${path}: ${scan.ids.size} stored articles` +
    (scan.malformed > 0 ? `, ${scan.malformed} malformed records skipped` : ''));
  return scan;
}

export interface CategoryPlan {
  spec: CrawlSpec;
  startPage: number;
  skip: boolean;
}

/**
 * Apply a resume cursor to the ordered category list: categories before the
 * target are skipped, the target starts at the cursor page, later ones run
 * from the start. Fails before any fetch when the cursor cannot be honored.
 */
export function planCategories(specs: readonly CrawlSpec[], cursor?: { category: string; page: number }): CategoryPlan[] {
  if (!cursor) {
    return specs.map(spec => ({ spec, startPage: 1, skip: false }));
  }

  const targetIndex = specs.findIndex(spec => spec.category === cursor.category);
  if (targetIndex === -1) {
    const known = specs.map(spec => spec.category).join(', ');
    throw new ConfigurationError(`Resume category "${cursor.category}" is not configured (known: ${known || 'none'})`);
  }

  const target = specs[targetIndex];
  if (target.pagination.kind !== 'queryparam') {
    throw new ConfigurationError(
      `Cannot resume ${target.category} at page ${cursor.page}: only queryparam pagination has addressable pages (category uses ${target.pagination.kind})`
    );
  }

  return specs.map((spec, index) => ({
    spec,
    startPage: index === targetIndex ? cursor.page : 1,
    skip: index < targetIndex
  }));
}
