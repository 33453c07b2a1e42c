import { randomUUID } from 'crypto';
import { chromium } from 'playwright-core';
import type { Session, SessionOptions, LocalSession } from '../types/session.js';

/**
 * Launch a local Chromium session. Proxies are applied per browser context
 * by the engines, not here.
 */
export async function createSession(options: SessionOptions = {}): Promise<Session> {
  const browser = await chromium.launch({
    headless: options.headless ?? true,
    // playwright-core ships no browser; CHROMIUM_PATH points at an installed one
    executablePath: process.env.CHROMIUM_PATH || undefined
  });

  const localSession: LocalSession = {
    id: randomUUID(),
    browser
  };

  return {
    provider: 'local',
    local: localSession,
    cleanup: async () => {
      if (browser.isConnected()) {
        await browser.close();
      }
    }
  };
}
