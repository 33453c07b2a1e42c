import type { Session } from '../types/session.js';
import { BrowserEngine } from './browser-engine.js';
import { createSession as createLocalSession } from '../providers/local-browser.js';

/**
 * Scripted renderer: local headless Chromium, DOM read once it is parsed.
 */
export class RenderEngine extends BrowserEngine {
  readonly name = 'render' as const;
  protected readonly waitUntil = 'domcontentloaded' as const;

  protected createSession(): Promise<Session> {
    return createLocalSession({ headless: this.headless });
  }
}
