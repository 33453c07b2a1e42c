/**
 * Proxy Driver
 *
 * Round-robin proxy rotation for a crawl run, plus proxy formatting for the
 * fetch engines. The pool is owned by the crawl engine and handed to each
 * request; nothing here is module state.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosProxyConfig } from 'axios';
import type { Proxy, PlaywrightProxy } from '../types/proxy.js';
import { loadProxies } from '../providers/local-db.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('proxy-driver');

export class ProxyPool {
  private cursor = 0;
  private readonly failures = new Map<string, number>();

  constructor(private readonly proxies: readonly Proxy[]) {}

  /**
   * Build a pool from proxies.json. The default proxy, when set, goes first.
   */
  static async fromDb(): Promise<ProxyPool> {
    const store = await loadProxies();
    if (store.proxies.length === 0) {
      throw new ConfigurationError('Proxy rotation requested but db/proxies.json defines no proxies');
    }

    const ordered = [...store.proxies].sort((a, b) => {
      if (a.id === store.default) return -1;
      if (b.id === store.default) return 1;
      return 0;
    });
    log.debug(`Loaded ${ordered.length} proxies`);
    return new ProxyPool(ordered);
  }

  get size(): number {
    return this.proxies.length;
  }

  /**
   * Next proxy in rotation, preferring proxies with the fewest failures.
   * Returns undefined for an empty pool.
   */
  next(): Proxy | undefined {
    if (this.proxies.length === 0) return undefined;

    const fewest = Math.min(...this.proxies.map(proxy => this.failureCount(proxy)));
    for (let i = 0; i < this.proxies.length; i++) {
      const index = (this.cursor + i) % this.proxies.length;
      const candidate = this.proxies[index];
      if (this.failureCount(candidate) === fewest) {
        this.cursor = index + 1;
        return candidate;
      }
    }
    return undefined;
  }

  /**
   * A pool of the proxies that pass `check`, in the same order. Fails when
   * none does.
   */
  async healthy(check: ProxyCheck): Promise<ProxyPool> {
    const results = await Promise.all(this.proxies.map(async proxy => ({ proxy, passed: await check(proxy) })));
    const passing = results.filter(result => result.passed).map(result => result.proxy);

    for (const result of results) {
      if (!result.passed) log.normal(`Proxy ${result.proxy.id} failed the health check, leaving it out`);
    }
    if (passing.length === 0) {
      throw new ConfigurationError(`None of the ${this.proxies.length} proxies passed the health check`);
    }
    log.normal(`${passing.length} of ${this.proxies.length} proxies passed the health check`);
    return new ProxyPool(passing);
  }

  markFailed(proxy: Proxy): void {
    const count = this.failureCount(proxy) + 1;
    this.failures.set(proxy.id, count);
    log.debug(`Proxy ${proxy.id} failed (${count} failures)`);
  }

  markSucceeded(proxy: Proxy): void {
    this.failures.delete(proxy.id);
  }

  failureCount(proxy: Proxy): number {
    return this.failures.get(proxy.id) ?? 0;
  }
}

/**
 * Convert proxy to Playwright format
 */
export function formatProxyForPlaywright(proxy: Proxy): PlaywrightProxy {
  return {
    server: proxy.url,
    username: proxy.username,
    password: proxy.password
  };
}

/**
 * Convert proxy to axios format. Proxy URLs without a scheme are taken as http.
 */
export function formatProxyForAxios(proxy: Proxy): AxiosProxyConfig {
  const url = new URL(proxy.url.includes('://') ? proxy.url : `http://${proxy.url}`);
  const port = url.port ? parseInt(url.port, 10) : url.protocol === 'https:' ? 443 : 80;

  const config: AxiosProxyConfig = {
    protocol: url.protocol.replace(/:$/, ''),
    host: url.hostname,
    port
  };
  if (proxy.username) {
    config.auth = { username: proxy.username, password: proxy.password ?? '' };
  }
  return config;
}

export type ProxyCheck = (proxy: Proxy) => Promise<boolean>;

export interface ProxyCheckOptions {
  testUrl?: string;    // Default: https://httpbin.org/ip
  timeoutMs?: number;  // Default: 10s
  client?: Pick<AxiosInstance, 'get'>;
}

/**
 * Health check that GETs a known URL through the proxy. Any 2xx answer
 * within the timeout passes.
 */
export function axiosProxyCheck(options: ProxyCheckOptions = {}): ProxyCheck {
  const testUrl = options.testUrl ?? 'https://httpbin.org/ip';
  const timeout = options.timeoutMs ?? 10_000;
  const client = options.client ?? axios;

  return async proxy => {
    try {
      const response = await client.get(testUrl, {
        proxy: formatProxyForAxios(proxy),
        timeout,
        validateStatus: () => true
      });
      return response.status >= 200 && response.status < 300;
    } catch (error) {
      log.debug(`Proxy ${proxy.id} check failed: ${errorMessage(error)}`);
      return false;
    }
  };
}
