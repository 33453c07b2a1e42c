import type { Page } from 'playwright-core';
import type { FetchRequest } from '../types/fetch.js';
import type { Proxy } from '../types/proxy.js';
import type { Session } from '../types/session.js';
import { BrowserEngine } from './browser-engine.js';
import type { BrowserEngineOptions } from './browser-engine.js';
import { createSession as createLocalSession } from '../providers/local-browser.js';
import { createSession as createBrowserbaseSession, isBrowserbaseConfigured } from '../providers/browserbase.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('driver-engine');

const NETWORK_IDLE_MS = 10_000;

export interface BrowserDriverEngineOptions extends BrowserEngineOptions {
  /** Browserbase session timeout in seconds */
  sessionTimeout?: number;
}

/**
 * Full browser driver: a remote Browserbase browser when credentials are
 * set, otherwise local Chromium. Waits for the full load and for the network
 * to go quiet, so it is the slowest engine and the last one tried.
 */
export class BrowserDriverEngine extends BrowserEngine {
  readonly name = 'driver' as const;
  protected readonly waitUntil = 'load' as const;
  private readonly sessionTimeout?: number;
  private readonly remote: boolean;

  constructor(options: BrowserDriverEngineOptions = {}) {
    super(options);
    this.sessionTimeout = options.sessionTimeout;
    this.remote = isBrowserbaseConfigured();
  }

  // Browserbase takes the proxy when the session is created
  protected proxyPerSession(): boolean {
    return this.remote;
  }

  protected createSession(proxy?: Proxy): Promise<Session> {
    if (this.remote) {
      log.normal(`Starting Browserbase session${proxy ? ` through proxy ${proxy.id}` : ''}`);
      return createBrowserbaseSession({ timeout: this.sessionTimeout, proxy });
    }
    return createLocalSession({ headless: this.headless });
  }

  protected async afterNavigation(page: Page, request: FetchRequest): Promise<void> {
    try {
      await page.waitForLoadState('networkidle', { timeout: Math.min(request.timeoutMs, NETWORK_IDLE_MS) });
    } catch (error) {
      log.debug(`Network did not go idle on ${page.url()}: ${errorMessage(error)}`);
    }
  }
}
