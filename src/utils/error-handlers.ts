import { logger } from './logger.js';
import { errorMessage } from './errors.js';

const log = logger.createContext('process');

// Fragments of the messages playwright and remote browser sessions throw
// once the browser, context or page under them is gone
const BROWSER_GONE = [
  'target page, context or browser has been closed',
  'browser has been closed',
  'context has been closed',
  'target closed',
  'session not found',
  'session expired',
  'websocket',
  'disconnected',
  'connection closed',
  'browser is closed',
  'execution context was destroyed',
  'page has been closed'
];

const TIMED_OUT = ['timeout', 'timed out', 'etimedout', 'econnaborted'];

function mentions(message: string | null | undefined, fragments: string[]): boolean {
  if (!message) return false;
  const lower = message.toLowerCase();
  return fragments.some(fragment => lower.includes(fragment));
}

/**
 * Keep the crawl alive when a browser dies underneath a render or driver
 * engine: the affected fetch already failed and was recorded, so the stray
 * rejection that follows is logged and dropped. Anything else is fatal.
 */
export function installGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    const message = errorMessage(reason);
    if (isBrowserError(message)) {
      log.error(`Browser went away (continuing): ${message}`);
      return;
    }
    log.error('Unhandled promise rejection', reason);
  });

  process.on('uncaughtException', (err: Error, origin: string) => {
    if (isBrowserError(err.message)) {
      log.error(`Browser went away (continuing): ${err.message}`);
      return;
    }
    log.error(`Fatal ${origin}`, err);
    process.exit(1);
  });
}

export function isBrowserError(message: string | null | undefined): boolean {
  return mentions(message, BROWSER_GONE);
}

/** Navigation, selector-wait and socket timeouts all read the same way */
export function isTimeoutError(message: string | null | undefined): boolean {
  return mentions(message, TIMED_OUT);
}
