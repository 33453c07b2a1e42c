/**
 * Crawl error taxonomy.
 *
 * Every error the crawler raises on purpose extends CrawlError and carries a
 * stable `code`, so callers can branch on the class (or the code) instead of
 * matching message text.
 */

export type CrawlErrorCode =
  | 'CONFIG'
  | 'PAGINATION_UNSUPPORTED'
  | 'FETCH'
  | 'EXTRACTION'
  | 'ENGINE_SELECTION'
  | 'CATEGORY';

export class CrawlError extends Error {
  constructor(
    readonly code: CrawlErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad or incompatible configuration. Raised before any fetch happens and
 * aborts the run.
 */
export class ConfigurationError extends CrawlError {
  constructor(message: string, code: CrawlErrorCode = 'CONFIG') {
    super(code, message);
  }
}

export class UnsupportedPaginationError extends ConfigurationError {
  constructor(readonly strategy: string) {
    super(`Pagination strategy "${strategy}" is not supported`, 'PAGINATION_UNSUPPORTED');
  }
}

export type FetchErrorKind = 'network' | 'timeout' | 'http_status' | 'not_found' | 'blocked' | 'robots';

export class FetchError extends CrawlError {
  constructor(
    readonly kind: FetchErrorKind,
    readonly url: string,
    message: string,
    readonly status?: number
  ) {
    super('FETCH', message);
  }

  /** Failures that say something about the identity used for the request */
  get implicatesIdentity(): boolean {
    return this.kind === 'network' || this.kind === 'timeout' || this.kind === 'blocked';
  }
}

export type ExtractionErrorReason = 'selector_not_found' | 'empty_content' | 'invalid_record';

export class ExtractionError extends CrawlError {
  constructor(
    readonly reason: ExtractionErrorReason,
    readonly url: string,
    message: string
  ) {
    super('EXTRACTION', message);
  }
}

export class EngineSelectionError extends CrawlError {
  constructor(
    readonly archiveUrl: string,
    readonly attempts: Array<{ engine: string; reason: string }>
  ) {
    const tried = attempts.map(a => `${a.engine}: ${a.reason}`).join('; ');
    super(
      'ENGINE_SELECTION',
      `No engine passed the probe for ${archiveUrl} (check the archive selector). Tried ${tried || 'nothing'}`
    );
  }
}

export class CategoryError extends CrawlError {
  constructor(
    readonly category: string,
    message: string,
    cause?: unknown
  ) {
    super('CATEGORY', message, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
