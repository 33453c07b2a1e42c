import type { Browser } from 'playwright-core';
import type { Proxy } from './proxy.js';

export interface SessionOptions {
  proxy?: Proxy;       // Browserbase only; local browsers take proxies per context
  headless?: boolean;  // For local browser only, defaults to true
  timeout?: number;    // Session timeout in seconds (browserbase only, defaults to 60)
}

export interface BrowserbaseSession {
  id: string;
  connectUrl: string;
  projectId: string;
}

export interface LocalSession {
  id: string;
  browser: Browser;
}

export type Session =
  | { provider: 'browserbase'; browserbase: BrowserbaseSession; cleanup: () => Promise<void> }
  | { provider: 'local'; local: LocalSession; cleanup: () => Promise<void> };
