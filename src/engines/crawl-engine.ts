import type { ArchiveItem } from '../types/article.js';
import type { CrawlSpec, EngineName, OutputFormat } from '../types/crawl-spec.js';
import type { FetchEngine, InteractivePage } from '../types/fetch.js';
import { isInteractive } from '../types/fetch.js';
import type { PageResult, PageStatus } from '../types/page-result.js';
import { PaginationController } from '../core/pagination.js';
import { EngineSelector } from '../core/engine-selector.js';
import { ResumeLedger } from '../core/resume-ledger.js';
import { parseResumeInput, planCategories, scanArtifact } from '../core/resume.js';
import type { CategoryPlan } from '../core/resume.js';
import { Throttle } from '../core/throttle.js';
import type { ThrottleOptions } from '../core/throttle.js';
import { articleId } from '../core/utils/url-utils.js';
import type { EngineSet } from '../drivers/engine-set.js';
import { extractArchiveItems, extractArticle } from '../drivers/extractor.js';
import type { HeaderPool } from '../drivers/headers.js';
import type { ProxyPool } from '../drivers/proxy.js';
import { Requester } from '../drivers/requester.js';
import type { RequestSettings } from '../drivers/requester.js';
import { RobotsPolicy } from '../drivers/robots.js';
import { ArticleStore } from '../drivers/storage.js';
import { manifestPath, readManifest, writeManifest } from '../drivers/url-manifest.js';
import {
  CategoryError,
  ConfigurationError,
  CrawlError,
  ExtractionError,
  FetchError,
  errorMessage
} from '../utils/errors.js';
import type { FetchErrorKind } from '../utils/errors.js';
import { formatDelayPolicy } from '../utils/time-parser.js';
import { formatTime, logger } from '../utils/logger.js';

const log = logger.createContext('crawl-engine');

export interface CrawlOptions {
  output: string;
  format: OutputFormat;
  resume?: string;        // Artifact path or `category,page`
  skipArchive?: boolean;  // Read item URLs from the manifests of an earlier run
  signal?: AbortSignal;   // Stops between items; the page in progress is not committed
}

export interface CrawlDependencies {
  engines: EngineSet;
  headers: HeaderPool;
  proxies?: ProxyPool;    // Required when the specs ask for proxies
  robots?: RobotsPolicy;  // Default: a fresh policy when the specs respect robots.txt
  throttle?: ThrottleOptions;
  now?: () => Date;
}

export type CategoryOutcome = 'completed' | 'failed' | 'skipped' | 'interrupted';

export interface CategoryStats {
  category: string;
  outcome: CategoryOutcome;
  engine?: EngineName;
  startPage: number;
  pages: number;
  found: number;
  attempted: number;
  saved: number;
  skipped: number;  // Already in storage
  failed: number;
  exhaustion?: string;
  error?: string;
}

export type CrawlTotals = Pick<CategoryStats, 'pages' | 'found' | 'attempted' | 'saved' | 'skipped' | 'failed'>;

export interface CrawlResult {
  success: boolean;
  interrupted: boolean;
  site: string;
  output: string;
  categories: CategoryStats[];
  totals: CrawlTotals;
  failures: CategoryError[];
  resumeHint?: string;  // Value for --resume that continues this run
  duration: number;
}

/** Thrown inside a category when the run was cancelled */
class CrawlInterrupted extends Error {
  constructor() {
    super('Crawl interrupted');
  }
}

interface CategoryRun {
  spec: CrawlSpec;
  stats: CategoryStats;
  store: ArticleStore;
  ledger: ResumeLedger;
  requester: Requester;
  signal?: AbortSignal;
}

function pageStatusOf(kind: FetchErrorKind): PageStatus {
  switch (kind) {
    case 'not_found':
      return 'not_found';
    case 'blocked':
      return 'blocked';
    default:
      return 'error';
  }
}

function emptyStats(category: string, startPage: number, outcome: CategoryOutcome): CategoryStats {
  return { category, outcome, startPage, pages: 0, found: 0, attempted: 0, saved: 0, skipped: 0, failed: 0 };
}

/**
 * Crawls the categories of one site: archive pages through the pagination
 * controller, then every new item on each page into the output artifact.
 * Items of a page are finished before the page is committed to the ledger.
 */
export class CrawlEngine {
  private readonly now: () => Date;

  constructor(private readonly deps: CrawlDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async crawl(specs: readonly CrawlSpec[], options: CrawlOptions): Promise<CrawlResult> {
    const startTime = Date.now();
    const first = specs[0];
    if (!first) {
      throw new ConfigurationError('Nothing to crawl: no categories selected');
    }
    if (specs.some(spec => spec.site !== first.site)) {
      throw new ConfigurationError('All categories of one crawl must belong to the same site');
    }

    const requester = this.createRequester(first);
    const selector = new EngineSelector(this.deps.engines, requester);

    log.normal('Crawl configuration:');
    log.normal(`  Site: ${first.site}`);
    log.normal(`  Categories: ${specs.map(s => s.category).join(', ')}`);
    log.normal(`  Output: ${options.output} (${options.format})`);
    log.normal(`  Max pages: ${first.maxPages > 0 ? first.maxPages : 'unlimited'}`);
    log.normal(`  Delay: ${formatDelayPolicy(first.delay)}`);
    if (first.forceEngine) log.normal(`  Engine: ${first.forceEngine} (forced)`);
    if (first.useProxy) log.normal(`  Proxy: ${this.deps.proxies?.size ?? 0} in rotation`);
    if (!first.respectRobots) log.normal('  robots.txt: ignored');
    if (options.skipArchive) log.normal('  Archive: read from URL manifests');

    // Everything that can fail on configuration alone fails here, before any fetch
    const resume = options.resume ? parseResumeInput(options.resume) : undefined;
    const plan = planCategories(specs, resume?.kind === 'cursor' ? resume : undefined);
    const controllers = new Map<string, PaginationController>();
    const manifests = new Map<string, string[]>();
    for (const { spec, startPage, skip } of plan) {
      if (skip) continue;
      selector.validate(spec);
      controllers.set(spec.category, this.createController(spec, startPage));
      if (options.skipArchive) {
        manifests.set(spec.category, (await readManifest(manifestPath(options.output, spec.category))).urls);
      }
    }

    const store = await ArticleStore.open(options.output, options.format);
    const outputScan = await scanArtifact(options.output);
    store.remember(outputScan.ids);
    if (resume?.kind === 'file' && resume.path !== options.output) {
      store.remember((await scanArtifact(resume.path)).ids);
    }

    const ledger = await ResumeLedger.load(`${options.output}.ledger.json`, first.site, this.now);
    const categories: CategoryStats[] = [];
    const failures: CategoryError[] = [];
    let interrupted = false;

    try {
      for (const entry of plan) {
        const { spec, startPage } = entry;
        if (interrupted) {
          categories.push(emptyStats(spec.category, startPage, 'skipped'));
          continue;
        }
        if (entry.skip) {
          logger.skip(spec.category, 'before resume cursor');
          categories.push(emptyStats(spec.category, startPage, 'skipped'));
          continue;
        }

        const run: CategoryRun = {
          spec,
          stats: emptyStats(spec.category, startPage, 'completed'),
          store,
          ledger,
          requester,
          signal: options.signal
        };
        categories.push(run.stats);

        try {
          if (options.signal?.aborted) throw new CrawlInterrupted();
          logger.processing(spec.category, `${spec.archiveUrl} from page ${startPage}`);
          await ledger.begin(spec.category, startPage);

          const manifestUrls = manifests.get(spec.category);
          if (manifestUrls) {
            await this.crawlManifest(run, selector, manifestUrls);
          } else {
            const controller = controllers.get(spec.category);
            if (!controller) throw new Error(`No pagination controller for ${spec.category}`);
            await this.crawlArchive(run, selector, controller, options.output);
          }

          const { stats } = run;
          logger.success(
            spec.category,
            `${stats.saved} saved, ${stats.skipped} already stored, ${stats.failed} failed over ${stats.pages} pages (${stats.exhaustion})`
          );
        } catch (error) {
          if (error instanceof CrawlInterrupted) {
            interrupted = true;
            run.stats.outcome = 'interrupted';
            logger.failure(spec.category, 'interrupted');
            continue;
          }
          if (error instanceof ConfigurationError) {
            throw error;
          }

          const failure = error instanceof CategoryError
            ? error
            : new CategoryError(spec.category, `${spec.category}: ${errorMessage(error)}`, error);
          failures.push(failure);
          run.stats.outcome = 'failed';
          run.stats.error = failure.message;
          logger.failure(spec.category, failure.message);
          if (!(error instanceof CrawlError)) {
            log.debug(`Unexpected error in ${spec.category}`, error);
          }
        }
      }
    } finally {
      await this.deps.engines.closeAll();
    }

    const totals = this.sumTotals(categories);
    const resumeHint = this.resumeHint(plan, categories, ledger, options.output);
    const result: CrawlResult = {
      success: failures.length === 0 && !interrupted,
      interrupted,
      site: first.site,
      output: options.output,
      categories,
      totals,
      failures,
      ...(resumeHint ? { resumeHint } : {}),
      duration: Date.now() - startTime
    };

    log.normal(`Crawl of ${first.site} finished in ${formatTime(result.duration)}: ` +
      `${totals.saved} saved, ${totals.skipped} skipped, ${totals.failed} failed, ${failures.length} categories failed`);
    if (resumeHint) {
      log.normal(`Continue with --resume ${resumeHint}`);
    }
    return result;
  }

  private createRequester(spec: CrawlSpec): Requester {
    const { proxies } = this.deps;
    if (spec.useProxy && (!proxies || proxies.size === 0)) {
      throw new ConfigurationError('Proxy rotation requested but no proxies are configured');
    }

    return new Requester({
      headers: this.deps.headers,
      throttle: new Throttle(spec.delay, this.deps.throttle),
      ...(spec.useProxy && proxies ? { proxies } : {}),
      ...(spec.respectRobots ? { robots: this.deps.robots ?? new RobotsPolicy({ timeoutMs: spec.timeoutMs }) } : {})
    });
  }

  private createController(spec: CrawlSpec, startPage: number): PaginationController {
    return new PaginationController({
      archiveUrl: spec.archiveUrl,
      strategy: spec.pagination,
      maxPages: spec.maxPages,
      startPage,
      emptyPageThreshold: spec.emptyPageThreshold,
      maxIdleClicks: spec.maxIdleClicks,
      category: spec.category
    });
  }

  private settings(spec: CrawlSpec, forArchive: boolean): RequestSettings {
    return {
      timeoutMs: spec.timeoutMs,
      minContentBytes: spec.minContentBytes,
      ...(forArchive && spec.waitForSelector ? { waitForSelector: spec.waitForSelector } : {})
    };
  }

  private async crawlArchive(
    run: CategoryRun,
    selector: EngineSelector,
    controller: PaginationController,
    output: string
  ): Promise<void> {
    const { spec, stats } = run;

    if (controller.phase === 'exhausted') {
      stats.exhaustion = controller.reason;
      await run.ledger.finish(spec.category, controller.reason ?? 'page_limit');
      return;
    }

    const { engine } = await selector.select(spec);
    stats.engine = engine.name;

    if (spec.pagination.kind === 'click') {
      if (!isInteractive(engine)) {
        throw new ConfigurationError(`Engine ${engine.name} cannot drive click pagination`);
      }
      const opened = await run.requester.open(engine, spec.archiveUrl, this.settings(spec, true));
      if (!opened.ok) {
        throw new CategoryError(spec.category, `First archive page ${spec.archiveUrl} failed: ${opened.error.message}`, opened.error);
      }
      try {
        await this.paginateByClicking(run, engine, controller, opened.page, spec.pagination.selector);
      } finally {
        await opened.page.close();
      }
    } else {
      await this.paginateByFetching(run, engine, controller);
    }

    stats.exhaustion = controller.reason;
    await writeManifest(manifestPath(output, spec.category), spec, controller.urls);
    await run.ledger.finish(spec.category, controller.reason ?? 'unknown');
  }

  private async paginateByFetching(run: CategoryRun, engine: FetchEngine, controller: PaginationController): Promise<void> {
    const { spec } = run;
    const firstPage = controller.page;

    while (controller.phase === 'active') {
      const page = controller.page;
      const url = controller.currentUrl;
      this.checkSignal(run);

      const outcome = await run.requester.fetch(engine, url, this.settings(spec, true));
      let result: PageResult;
      let items = new Map<string, ArchiveItem>();

      if (outcome.ok) {
        const found = extractArchiveItems(outcome.html, outcome.finalUrl, spec.itemSelector, spec.thumbnailSelector);
        items = new Map(found.map(item => [item.url, item]));
        result = {
          page,
          url,
          itemUrls: found.map(item => item.url),
          bytes: outcome.bytes,
          status: 'ok',
          httpStatus: outcome.status,
          terminal: spec.pagination.kind === 'none'
        };
      } else {
        const status = pageStatusOf(outcome.error.kind);
        if (page === firstPage && status === 'error') {
          throw new CategoryError(spec.category, `First archive page ${url} failed: ${outcome.error.message}`, outcome.error);
        }
        log.verbose(`${spec.category} page ${page}: ${outcome.error.kind} (${outcome.error.message})`);
        result = {
          page,
          url,
          itemUrls: [],
          bytes: 0,
          status,
          ...(outcome.error.status !== undefined ? { httpStatus: outcome.error.status } : {}),
          terminal: false
        };
      }

      await this.processPage(run, controller, result, items, engine);
    }
  }

  /**
   * Page n of a click-paginated archive is the document after n-1 clicks.
   * A missing control makes the next page terminal.
   */
  private async paginateByClicking(
    run: CategoryRun,
    engine: FetchEngine,
    controller: PaginationController,
    livePage: InteractivePage,
    controlSelector: string
  ): Promise<void> {
    const { spec } = run;
    let terminal = false;

    while (controller.phase === 'active') {
      this.checkSignal(run);
      const html = await livePage.html();
      const found = extractArchiveItems(html, spec.archiveUrl, spec.itemSelector, spec.thumbnailSelector);
      const result: PageResult = {
        page: controller.page,
        url: spec.archiveUrl,
        itemUrls: found.map(item => item.url),
        bytes: Buffer.byteLength(html, 'utf-8'),
        status: 'ok',
        terminal
      };

      await this.processPage(run, controller, result, new Map(found.map(item => [item.url, item])), engine);

      if (controller.phase === 'active') {
        terminal = (await run.requester.click(livePage, controlSelector, spec.archiveUrl)) === 'missing';
        if (terminal) log.verbose(`${spec.category}: "${controlSelector}" is gone`);
      }
    }
  }

  private async processPage(
    run: CategoryRun,
    controller: PaginationController,
    result: PageResult,
    items: Map<string, ArchiveItem>,
    engine: FetchEngine
  ): Promise<void> {
    const { spec, stats } = run;
    const netNew = controller.observe(result);
    stats.found += netNew.length;
    log.verbose(`${spec.category} page ${result.page}: ${result.itemUrls.length} items, ${netNew.length} new`);

    await this.processItems(run, engine, netNew.map(url => items.get(url) ?? { url }));

    await run.ledger.commit(spec.category, result.page);
    stats.pages++;

    const next = controller.advance(result);
    if (next.phase === 'exhausted') {
      log.verbose(`${spec.category}: pagination finished (${next.reason}) after ${controller.pagesVisited} pages`);
    }
  }

  private async crawlManifest(run: CategoryRun, selector: EngineSelector, urls: string[]): Promise<void> {
    const { spec, stats } = run;
    const { engine } = await selector.select(spec);
    stats.engine = engine.name;
    stats.found = urls.length;

    await this.processItems(run, engine, urls.map(url => ({ url })));
    stats.exhaustion = 'manifest';
    await run.ledger.finish(spec.category, 'manifest');
  }

  private async processItems(run: CategoryRun, engine: FetchEngine, items: ArchiveItem[]): Promise<void> {
    const { spec, stats, store } = run;

    for (const item of items) {
      this.checkSignal(run);
      if (store.exists(articleId(item.url))) {
        stats.skipped++;
        continue;
      }

      stats.attempted++;
      try {
        const outcome = await run.requester.fetch(engine, item.url, this.settings(spec, false));
        if (!outcome.ok) throw outcome.error;

        const article = extractArticle(outcome.html, {
          url: item.url,
          contentSelector: spec.contentSelector,
          site: spec.site,
          category: spec.category,
          engine: engine.name,
          item,
          now: this.now()
        });
        await store.append(article);
        stats.saved++;
        log.debug(`Saved ${item.url}`);
      } catch (error) {
        if (!(error instanceof FetchError) && !(error instanceof ExtractionError)) {
          throw error;
        }
        stats.failed++;
        log.verbose(`Item failed ${item.url}: ${error.message}`);
      }
    }
  }

  private checkSignal(run: CategoryRun): void {
    if (run.signal?.aborted) throw new CrawlInterrupted();
  }

  private sumTotals(categories: CategoryStats[]): CrawlTotals {
    const totals: CrawlTotals = { pages: 0, found: 0, attempted: 0, saved: 0, skipped: 0, failed: 0 };
    for (const stats of categories) {
      totals.pages += stats.pages;
      totals.found += stats.found;
      totals.attempted += stats.attempted;
      totals.saved += stats.saved;
      totals.skipped += stats.skipped;
      totals.failed += stats.failed;
    }
    return totals;
  }

  /**
   * The first unfinished category decides how to continue: a page cursor
   * where its pages are addressable, the output artifact otherwise.
   */
  private resumeHint(
    plan: CategoryPlan[],
    categories: CategoryStats[],
    ledger: ResumeLedger,
    output: string
  ): string | undefined {
    for (const [index, { spec, skip }] of plan.entries()) {
      const outcome = categories[index]?.outcome;
      if (skip || outcome === 'completed') continue;
      if (outcome === undefined) return undefined;

      if (spec.pagination.kind === 'queryparam' && ledger.entry(spec.category)) {
        return `${spec.category},${ledger.lastCommittedPage(spec.category) + 1}`;
      }
      return output;
    }
    return undefined;
  }
}
