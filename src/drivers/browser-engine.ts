import type { BrowserContext, Page } from 'playwright-core';
import type { EngineName } from '../types/crawl-spec.js';
import type { FetchOutcome, FetchRequest, InteractiveEngine, InteractivePage } from '../types/fetch.js';
import type { Proxy } from '../types/proxy.js';
import type { Session } from '../types/session.js';
import { createBrowserFromSession } from './browser.js';
import type { BrowserFromSessionResult } from './browser.js';
import { formatProxyForPlaywright } from './proxy.js';
import { classifyError, classifyResponse } from './response-classifier.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('browser-engine');

export interface BrowserEngineOptions {
  headless?: boolean;
  /** Pause after clicking a "load more" control */
  clickSettleMs?: number;
}

type WaitUntil = 'domcontentloaded' | 'load';

interface SessionSlot {
  session?: Session;
  connection: Promise<BrowserFromSessionResult>;
}

const DIRECT = 'direct';

/**
 * Shared Playwright plumbing for the rendering engines.
 *
 * Browsers are started on first use. A local browser is shared and gets one
 * context per proxy. A remote browser is bound to the proxy it was created
 * with, so engines that use one open a session per proxy. The rotated
 * headers are applied per page.
 */
export abstract class BrowserEngine implements InteractiveEngine {
  abstract readonly name: EngineName;
  protected abstract readonly waitUntil: WaitUntil;

  protected readonly headless: boolean;
  private readonly clickSettleMs: number;
  private readonly slots = new Map<string, SessionSlot>();
  private readonly contexts = new Map<string, Promise<BrowserContext>>();

  constructor(options: BrowserEngineOptions = {}) {
    this.headless = options.headless ?? true;
    this.clickSettleMs = options.clickSettleMs ?? 1000;
  }

  /** `proxy` is only passed when `proxyPerSession()` holds */
  protected abstract createSession(proxy?: Proxy): Promise<Session>;

  /** Whether the proxy must be fixed when the session is created */
  protected proxyPerSession(): boolean {
    return false;
  }

  /** Extra waiting once navigation finished, before the DOM is read */
  protected async afterNavigation(_page: Page, _request: FetchRequest): Promise<void> {
    return;
  }

  async fetch(url: string, request: FetchRequest): Promise<FetchOutcome> {
    let page: Page | undefined;
    try {
      page = await this.newPage(request);
      const response = await page.goto(url, { waitUntil: this.waitUntil, timeout: request.timeoutMs });
      await this.settle(page, request);
      const html = await page.content();
      return classifyResponse(url, response?.status() ?? 200, html, request.minContentBytes, page.url());
    } catch (error) {
      const fetchError = classifyError(url, error);
      log.debug(`${this.name} ${url} failed (${fetchError.kind}): ${fetchError.message}`);
      return { ok: false, error: fetchError };
    } finally {
      if (page) await this.closePage(page);
    }
  }

  async open(url: string, request: FetchRequest): Promise<InteractivePage> {
    const page = await this.newPage(request);

    let status: number;
    try {
      const response = await page.goto(url, { waitUntil: this.waitUntil, timeout: request.timeoutMs });
      status = response?.status() ?? 200;
    } catch (error) {
      await this.closePage(page);
      throw classifyError(url, error);
    }

    await this.settle(page, request);
    const outcome = classifyResponse(url, status, await page.content(), request.minContentBytes, page.url());
    if (!outcome.ok) {
      await this.closePage(page);
      throw outcome.error;
    }

    const settleMs = this.clickSettleMs;
    const timeout = request.timeoutMs;
    return {
      html: () => page.content(),
      click: async selector => {
        const control = page.locator(selector).first();
        if ((await control.count()) === 0 || !(await control.isVisible())) {
          return 'missing';
        }
        await control.scrollIntoViewIfNeeded({ timeout });
        await control.click({ timeout });
        await page.waitForTimeout(settleMs);
        return 'clicked';
      },
      close: () => this.closePage(page)
    };
  }

  async close(): Promise<void> {
    const slots = [...this.slots.values()];
    this.slots.clear();
    this.contexts.clear();
    for (const slot of slots) {
      await this.release(slot);
    }
  }

  private async release(slot: SessionSlot): Promise<void> {
    try {
      await (await slot.connection).cleanup();
    } catch (error) {
      log.debug(`Closing ${this.name} browser: ${errorMessage(error)}`);
    }
    if (slot.session) {
      try {
        await slot.session.cleanup();
      } catch (error) {
        log.error(`Failed to release ${this.name} session: ${errorMessage(error)}`);
      }
    }
  }

  private async connect(proxy: Proxy | undefined): Promise<BrowserFromSessionResult> {
    const perSession = this.proxyPerSession();
    const key = perSession ? proxy?.id ?? DIRECT : DIRECT;

    const existing = this.slots.get(key);
    if (existing) {
      // A session that failed to start was already reported to the fetch that started it
      const current = await existing.connection.catch(() => undefined);
      if (current?.isConnected()) return current;
      log.normal(`${this.name} browser unavailable, starting a new one`);
      this.slots.delete(key);
      this.dropContexts(perSession ? [key] : [...this.contexts.keys()]);
      await this.release(existing);
    }

    const slot: SessionSlot = {
      connection: this.createSession(perSession ? proxy : undefined).then(session => {
        slot.session = session;
        return createBrowserFromSession(session);
      })
    };
    this.slots.set(key, slot);
    return slot.connection;
  }

  private dropContexts(keys: string[]): void {
    for (const key of keys) this.contexts.delete(key);
  }

  private async context(request: FetchRequest): Promise<BrowserContext> {
    const connection = await this.connect(request.proxy);
    const key = request.proxy?.id ?? DIRECT;

    let context = this.contexts.get(key);
    if (!context) {
      // A per-session proxy is already applied by the remote browser
      context = connection.createContext(
        request.proxy && !this.proxyPerSession() ? { proxy: formatProxyForPlaywright(request.proxy) } : {}
      );
      this.contexts.set(key, context);
    }
    return context;
  }

  private async newPage(request: FetchRequest): Promise<Page> {
    const context = await this.context(request);
    const page = await context.newPage();
    await page.setExtraHTTPHeaders(request.headers);
    return page;
  }

  private async settle(page: Page, request: FetchRequest): Promise<void> {
    await this.afterNavigation(page, request);
    if (!request.waitForSelector) return;

    try {
      await page.waitForSelector(request.waitForSelector, { timeout: request.timeoutMs });
    } catch (error) {
      // The page is still read; the archive selector decides whether it was usable
      log.debug(`Selector ${request.waitForSelector} did not appear on ${page.url()}: ${errorMessage(error)}`);
    }
  }

  private async closePage(page: Page): Promise<void> {
    try {
      await page.close();
    } catch (error) {
      log.debug(`Closing page: ${errorMessage(error)}`);
    }
  }
}
