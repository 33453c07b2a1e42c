import type { FetchOutcome } from '../types/fetch.js';
import { FetchError, errorMessage } from '../utils/errors.js';
import { isTimeoutError } from '../utils/error-handlers.js';

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'challenge-running',
  'cf-browser-verification',
  'please verify you are a human',
  'access denied',
  'bot detection',
  'rate limit'
];

/**
 * Heuristic check for blocked/captcha pages
 */
export function looksLikeBlockedPage(html: string): boolean {
  const lowerHtml = html.toLowerCase();
  return BLOCK_INDICATORS.some(indicator => lowerHtml.includes(indicator));
}

/**
 * Turn a completed response into a FetchOutcome. Shared by every engine so
 * that "blocked" means the same thing whichever engine fetched the page.
 */
export function classifyResponse(
  url: string,
  status: number,
  html: string,
  minContentBytes: number,
  finalUrl: string = url
): FetchOutcome {
  const bytes = Buffer.byteLength(html, 'utf-8');

  if (status === 404 || status === 410) {
    return { ok: false, error: new FetchError('not_found', url, `HTTP ${status}`, status) };
  }

  if ((status === 403 || status === 429 || status === 503) && looksLikeBlockedPage(html)) {
    return {
      ok: false,
      error: new FetchError('blocked', url, `Request blocked (HTTP ${status}, captcha or access denied)`, status)
    };
  }

  if (status >= 400) {
    return { ok: false, error: new FetchError('http_status', url, `HTTP ${status}`, status) };
  }

  if (bytes < minContentBytes) {
    return {
      ok: false,
      error: new FetchError('blocked', url, `Content too small (${bytes} bytes, minimum ${minContentBytes})`, status)
    };
  }

  return { ok: true, html, status, bytes, finalUrl };
}

/**
 * Map a thrown transport error onto a FetchError
 */
export function classifyError(url: string, error: unknown): FetchError {
  if (error instanceof FetchError) return error;

  const message = errorMessage(error);
  const code = typeof error === 'object' && error !== null && 'code' in error ? String(error.code) : '';
  if (code === 'ECONNABORTED' || code === 'ETIMEDOUT' || isTimeoutError(message)) {
    return new FetchError('timeout', url, message);
  }
  return new FetchError('network', url, message);
}
