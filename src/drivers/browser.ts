import { chromium } from 'playwright-core';
import type { Browser, BrowserContext, BrowserContextOptions } from 'playwright-core';
import type { Session } from '../types/session.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('browser');

export interface BrowserFromSessionResult {
  browser: Browser;
  createContext: (options?: BrowserContextOptions) => Promise<BrowserContext>;
  isConnected: () => boolean;
  cleanup: () => Promise<void>;
}

/**
 * Create a Playwright browser instance from a session
 */
export async function createBrowserFromSession(session: Session): Promise<BrowserFromSessionResult> {
  let browser: Browser;
  let disconnected = false;

  if (session.provider === 'browserbase') {
    const sessionId = session.browserbase.id;
    try {
      browser = await chromium.connectOverCDP(session.browserbase.connectUrl);
    } catch (error) {
      const message = errorMessage(error);
      if (message.includes('Could not find a running session')) {
        throw new Error(`Browserbase session ${sessionId} not found or expired: ${message}`);
      }
      throw new Error(`Failed to connect to browserbase session ${sessionId}: ${message}`);
    }

    // Log but don't throw - this is expected when sessions expire
    browser.on('disconnected', () => {
      log.error(`Browser disconnected for session ${sessionId}`);
      disconnected = true;
    });
  } else {
    browser = session.local.browser;
    browser.on('disconnected', () => {
      log.debug('Local browser disconnected');
      disconnected = true;
    });
  }

  const createContext = async (contextOptions: BrowserContextOptions = {}): Promise<BrowserContext> => {
    // Remote browsers come with a context of their own
    if (session.provider === 'browserbase') {
      const [existing] = browser.contexts();
      if (existing) return existing;
    }

    const context = await browser.newContext(contextOptions);
    context.on('close', () => {
      log.debug('Browser context closed');
    });
    return context;
  };

  return {
    browser,
    createContext,
    isConnected: () => browser.isConnected() && !disconnected,
    cleanup: async () => {
      if (browser.isConnected()) {
        await browser.close();
      }
    }
  };
}
