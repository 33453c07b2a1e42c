import type { PaginationStrategy, PaginationKind } from '../types/crawl-spec.js';
import type { PageResult, PaginationPhase, ExhaustionReason, Advance } from '../types/page-result.js';
import { ConfigurationError, UnsupportedPaginationError } from '../utils/errors.js';
import { canonicalUrl } from './utils/url-utils.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('pagination');

export interface PaginationOptions {
  archiveUrl: string;
  strategy: PaginationStrategy;
  maxPages: number;  // 0 = unlimited
  startPage?: number;
  emptyPageThreshold: number;
  maxIdleClicks: number;
  /** Used in error messages */
  category?: string;
}

export interface PaginationState {
  page: number;
  strategy: PaginationStrategy;
  seen: Map<string, string>;  // canonical -> first-seen URL, insertion ordered
  consecutiveDegraded: number;
  consecutiveEmpty: number;
  idleClicks: number;
  pagesVisited: number;
  lastNetNew: number;
  phase: PaginationPhase;
  reason?: ExhaustionReason;
}

type StrategyOf<K extends PaginationKind> = Extract<PaginationStrategy, { kind: K }>;

/**
 * A variant handler inspects the page just observed and either ends the
 * pagination or returns undefined to let the shared limits decide.
 */
type AdvanceHandler<K extends PaginationKind> = (
  state: PaginationState,
  result: PageResult,
  strategy: StrategyOf<K>,
  options: PaginationOptions
) => ExhaustionReason | undefined;

const handlers: { [K in PaginationKind]: AdvanceHandler<K> } = {
  none: () => 'single_page',

  queryparam: (_state, result) => {
    if (result.status === 'not_found') return 'not_found';
    // A reachable archive page listing nothing is past the last page
    if (result.status === 'ok' && result.itemUrls.length === 0) return 'no_items';
    return undefined;
  },

  click: (state, result, _strategy, options) => {
    if (result.terminal) return 'control_missing';
    if (state.page > 1) {
      state.idleClicks = state.lastNetNew === 0 ? state.idleClicks + 1 : 0;
      if (state.idleClicks >= options.maxIdleClicks) return 'idle_clicks';
    }
    return undefined;
  },

  scroll: state => {
    throw new UnsupportedPaginationError(state.strategy.kind);
  }
};

function dispatch(state: PaginationState, result: PageResult, options: PaginationOptions): ExhaustionReason | undefined {
  const strategy = state.strategy;
  switch (strategy.kind) {
    case 'none':
      return handlers.none(state, result, strategy, options);
    case 'queryparam':
      return handlers.queryparam(state, result, strategy, options);
    case 'click':
      return handlers.click(state, result, strategy, options);
    case 'scroll':
      return handlers.scroll(state, result, strategy, options);
  }
}

/**
 * Build the URL of archive page `page` for a query-parameter template.
 * Page 1 is always the archive URL itself.
 */
export function buildPageUrl(archiveUrl: string, template: string, page: number, offsetStep: number): string {
  if (page <= 1) return archiveUrl;

  const param = template
    .replaceAll('{n}', String(page))
    .replaceAll('{offset}', String((page - 1) * offsetStep));

  if (param.startsWith('?') || param.startsWith('&')) {
    const separator = archiveUrl.includes('?') ? '&' : '?';
    return `${archiveUrl}${separator}${param.slice(1)}`;
  }

  return `${archiveUrl.replace(/\/+$/, '')}/${param.replace(/^\/+/, '')}`;
}

/**
 * Pagination state machine for one category: active -> exhausted.
 *
 * The driver fetches `currentUrl`, hands the resulting PageResult to
 * `observe` (dedup, returns net-new URLs), processes those items, then calls
 * `advance` to learn whether and where to continue.
 */
export class PaginationController {
  private readonly state: PaginationState;
  private observedPage = 0;

  constructor(private readonly options: PaginationOptions) {
    const { strategy } = options;
    if (strategy.kind === 'scroll') {
      throw new UnsupportedPaginationError('scroll');
    }

    const startPage = options.startPage ?? 1;
    if (!Number.isInteger(startPage) || startPage < 1) {
      throw new ConfigurationError(`Invalid start page: ${startPage}`);
    }
    if (startPage > 1 && strategy.kind !== 'queryparam') {
      throw new ConfigurationError(
        `Cannot start ${options.category ?? 'category'} at page ${startPage}: "${strategy.kind}" pagination has no addressable pages`
      );
    }

    this.state = {
      page: startPage,
      strategy,
      seen: new Map(),
      consecutiveDegraded: 0,
      consecutiveEmpty: 0,
      idleClicks: 0,
      pagesVisited: 0,
      lastNetNew: 0,
      phase: 'active'
    };

    if (options.maxPages > 0 && startPage > options.maxPages) {
      this.exhaust('page_limit');
    }
  }

  get phase(): PaginationPhase {
    return this.state.phase;
  }

  get reason(): ExhaustionReason | undefined {
    return this.state.reason;
  }

  get page(): number {
    return this.state.page;
  }

  get pagesVisited(): number {
    return this.state.pagesVisited;
  }

  get strategy(): PaginationStrategy {
    return this.state.strategy;
  }

  /** Every distinct item URL seen so far, in first-seen order */
  get urls(): string[] {
    return [...this.state.seen.values()];
  }

  get currentUrl(): string {
    return this.urlFor(this.state.page);
  }

  urlFor(page: number): string {
    const { strategy } = this.state;
    if (strategy.kind === 'queryparam') {
      return buildPageUrl(this.options.archiveUrl, strategy.template, page, strategy.offsetStep);
    }
    return this.options.archiveUrl;
  }

  /**
   * Record the items of the current page. Returns the URLs not seen on any
   * earlier page of this category, in document order.
   */
  observe(result: PageResult): string[] {
    if (this.state.phase === 'exhausted') {
      throw new Error('Cannot observe a page after pagination is exhausted');
    }
    if (result.page !== this.state.page) {
      throw new Error(`Expected page ${this.state.page}, got page ${result.page}`);
    }
    if (this.observedPage === result.page) {
      throw new Error(`Page ${result.page} was already observed`);
    }

    const netNew: string[] = [];
    for (const url of result.itemUrls) {
      const key = canonicalUrl(url);
      if (!this.state.seen.has(key)) {
        this.state.seen.set(key, url);
        netNew.push(url);
      }
    }

    this.observedPage = result.page;
    this.state.pagesVisited++;
    this.state.lastNetNew = netNew.length;
    return netNew;
  }

  /**
   * Decide what follows the page just processed. Observes the page first if
   * the caller has not.
   */
  advance(result: PageResult): Advance {
    if (this.state.phase === 'exhausted' && this.state.reason) {
      return { phase: 'exhausted', reason: this.state.reason };
    }
    if (this.observedPage !== result.page) {
      this.observe(result);
    }

    const reason = dispatch(this.state, result, this.options) ?? this.sharedLimits(result);
    if (reason) {
      return this.exhaust(reason);
    }

    this.state.page++;
    return { phase: 'active', page: this.state.page, url: this.currentUrl };
  }

  private sharedLimits(result: PageResult): ExhaustionReason | undefined {
    const { maxPages, emptyPageThreshold } = this.options;
    const unlimited = maxPages <= 0;
    const degraded = result.status === 'blocked' || result.status === 'error';

    this.state.consecutiveDegraded = degraded ? this.state.consecutiveDegraded + 1 : 0;

    const noItems = result.status === 'ok' && result.itemUrls.length === 0;
    const empty = unlimited
      ? degraded || this.state.lastNetNew === 0
      : noItems;
    this.state.consecutiveEmpty = empty ? this.state.consecutiveEmpty + 1 : 0;

    if (!unlimited && this.state.page >= maxPages) return 'page_limit';
    if (this.state.consecutiveDegraded >= emptyPageThreshold) return 'degraded';
    if (this.state.consecutiveEmpty >= emptyPageThreshold) {
      return noItems ? 'no_items' : 'empty_pages';
    }
    return undefined;
  }

  private exhaust(reason: ExhaustionReason): Advance {
    this.state.phase = 'exhausted';
    this.state.reason = reason;
    log.debug(`Pagination exhausted at page ${this.state.page}: ${reason}`);
    return { phase: 'exhausted', reason };
  }
}
