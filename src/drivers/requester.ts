import type { Throttle } from '../core/throttle.js';
import type { FetchEngine, FetchOutcome, FetchRequest, InteractiveEngine, InteractivePage } from '../types/fetch.js';
import type { Proxy } from '../types/proxy.js';
import type { HeaderPool } from './headers.js';
import type { ProxyPool } from './proxy.js';
import type { RobotsPolicy } from './robots.js';
import { classifyError } from './response-classifier.js';
import { FetchError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('requester');

export interface RequestSettings {
  timeoutMs: number;
  minContentBytes: number;
  waitForSelector?: string;
}

export interface RequesterOptions {
  headers: HeaderPool;
  throttle: Throttle;
  proxies?: ProxyPool;   // No rotation when absent
  robots?: RobotsPolicy; // robots.txt ignored when absent
  /** Tries per fetch when the failure points at the proxy (default 3) */
  proxyAttempts?: number;
}

const DEFAULT_PROXY_ATTEMPTS = 3;

export interface SendOptions {
  /** Probes go out without waiting on the delay policy */
  throttled?: boolean;
}

export type OpenOutcome =
  | { ok: true; page: InteractivePage }
  | { ok: false; error: FetchError };

/**
 * Every request of a crawl goes through here: robots.txt check, delay,
 * identity rotation. Engines only ever see a ready FetchRequest.
 */
export class Requester {
  constructor(private readonly options: RequesterOptions) {}

  async fetch(
    engine: FetchEngine,
    url: string,
    settings: RequestSettings,
    sendOptions: SendOptions = {}
  ): Promise<FetchOutcome> {
    const denied = await this.checkRobots(url);
    if (denied) return { ok: false, error: denied };

    const { proxies } = this.options;
    const attempts = proxies && proxies.size > 1
      ? Math.min(this.options.proxyAttempts ?? DEFAULT_PROXY_ATTEMPTS, proxies.size)
      : 1;

    let outcome = await this.send(engine, url, settings, sendOptions);
    // Only failures that may be the proxy's fault are worth another proxy
    for (let attempt = 2; attempt <= attempts && !outcome.ok && outcome.error.implicatesIdentity; attempt++) {
      log.verbose(`${url} failed (${outcome.error.kind}), retrying through the next proxy`);
      outcome = await this.send(engine, url, settings, sendOptions);
    }
    return outcome;
  }

  private async send(
    engine: FetchEngine,
    url: string,
    settings: RequestSettings,
    sendOptions: SendOptions
  ): Promise<FetchOutcome> {
    if (sendOptions.throttled !== false) {
      await this.options.throttle.beforeFetch(await this.crawlDelayMs(url));
    }
    const request = this.buildRequest(settings);
    const outcome = await engine.fetch(url, request);
    this.report(request.proxy, outcome.ok ? undefined : outcome.error);
    return outcome;
  }

  /**
   * Open a live page for click pagination. Navigation failures come back as
   * a FetchError, like fetch().
   */
  async open(engine: InteractiveEngine, url: string, settings: RequestSettings): Promise<OpenOutcome> {
    const denied = await this.checkRobots(url);
    if (denied) return { ok: false, error: denied };

    await this.options.throttle.beforeFetch(await this.crawlDelayMs(url));
    const request = this.buildRequest(settings);
    try {
      const page = await engine.open(url, request);
      this.report(request.proxy);
      return { ok: true, page };
    } catch (error) {
      const fetchError = classifyError(url, error);
      this.report(request.proxy, fetchError);
      return { ok: false, error: fetchError };
    }
  }

  /**
   * A click is a network round trip too, so it waits on the delay policy and
   * on the Crawl-delay of `pageUrl`'s site.
   */
  async click(page: InteractivePage, selector: string, pageUrl: string): Promise<'clicked' | 'missing'> {
    await this.options.throttle.beforeFetch(await this.crawlDelayMs(pageUrl));
    return page.click(selector);
  }

  /** robots.txt Crawl-delay of the URL's site, 0 when unset or ignored */
  private async crawlDelayMs(url: string): Promise<number> {
    const delay = await this.options.robots?.crawlDelay(url);
    return delay ? Math.round(delay * 1000) : 0;
  }

  private async checkRobots(url: string): Promise<FetchError | undefined> {
    const { robots } = this.options;
    if (!robots || (await robots.isAllowed(url))) return undefined;
    log.verbose(`robots.txt disallows ${url}`);
    return new FetchError('robots', url, `Disallowed by robots.txt: ${url}`);
  }

  private buildRequest(settings: RequestSettings): FetchRequest {
    const request: FetchRequest = {
      timeoutMs: settings.timeoutMs,
      minContentBytes: settings.minContentBytes,
      headers: this.options.headers.next()
    };
    const proxy = this.options.proxies?.next();
    if (proxy) request.proxy = proxy;
    if (settings.waitForSelector) request.waitForSelector = settings.waitForSelector;
    return request;
  }

  private report(proxy: Proxy | undefined, error?: FetchError): void {
    const { proxies } = this.options;
    if (!proxy || !proxies) return;
    if (!error) {
      proxies.markSucceeded(proxy);
    } else if (error.implicatesIdentity) {
      proxies.markFailed(proxy);
    }
  }
}
