/**
 * URL utility functions
 */

import { createHash } from 'crypto';

const TRACKING_PARAM = /^utm_/i;

/**
 * Validate if a string is a valid http(s) URL
 */
export function isValidUrl(str: string): boolean {
  try {
    const url = new URL(str);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Get base URL from a full URL
 * @returns Base URL (protocol + host)
 */
export function getBaseUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}`;
  } catch {
    return url;
  }
}

/**
 * Resolve a possibly relative href against the page it was found on.
 * Returns null for hrefs that do not lead to an http(s) document.
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#') || /^(javascript|mailto|tel|data):/i.test(trimmed)) {
    return null;
  }
  try {
    const resolved = new URL(trimmed, baseUrl);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
    return resolved.toString();
  } catch {
    return null;
  }
}

/**
 * Canonical form used for item identity: fragment dropped, utm_* parameters
 * dropped, trailing slash dropped from non-root paths.
 */
export function canonicalUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return url.trim();
  }

  parsed.hash = '';
  const params = [...parsed.searchParams.entries()];
  const kept = params.filter(([key]) => !TRACKING_PARAM.test(key));
  if (kept.length !== params.length) {
    parsed.search = kept.length > 0 ? `?${new URLSearchParams(kept).toString()}` : '';
  }
  if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
  }

  return parsed.toString();
}

/**
 * Stable article identifier: md5 hex digest of the canonical URL
 */
export function articleId(url: string): string {
  return createHash('md5').update(canonicalUrl(url), 'utf-8').digest('hex');
}

/**
 * Normalize a free-form name into a slug usable in file names
 * ("Daily Example News" -> "daily_example_news")
 */
export function slugify(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '_')
    .replace(/^_+|_+$/g, '');
}
