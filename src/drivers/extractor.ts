import * as cheerio from 'cheerio';
import type { Article, ArchiveItem } from '../types/article.js';
import type { EngineName } from '../types/crawl-spec.js';
import { ConfigurationError, ExtractionError, errorMessage } from '../utils/errors.js';
import { articleId, canonicalUrl, getBaseUrl, resolveUrl } from '../core/utils/url-utils.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('extractor');

const ITEM_TITLE_SELECTORS = ['h1', 'h2', 'h3', '.title', '.headline', '.post-title', '.article-title'];
const THUMBNAIL_ATTRIBUTES = ['src', 'data-src', 'data-lazy-src', 'data-original', 'data-lazy'];
const MIN_TITLE_LENGTH = 6;

export function cleanText(text: string | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Throws a ConfigurationError when cheerio cannot parse the selector
 */
export function validateSelector(selector: string, label: string): void {
  try {
    cheerio.load('<html></html>')(selector);
  } catch (error) {
    throw new ConfigurationError(`Invalid ${label} "${selector}": ${errorMessage(error)}`);
  }
}

export function countMatches(html: string, selector: string): number {
  return cheerio.load(html)(selector).length;
}

/**
 * Extract the item links of an archive page, in document order, without
 * duplicates (compared by canonical URL). An item is the matched element itself when it is a link,
 * otherwise the first link inside it.
 */
export function extractArchiveItems(
  html: string,
  baseUrl: string,
  itemSelector: string,
  thumbnailSelector?: string
): ArchiveItem[] {
  const $ = cheerio.load(html);
  const items: ArchiveItem[] = [];
  const seen = new Set<string>();
  let missingLinks = 0;

  $(itemSelector).each((_, element) => {
    const item = $(element);
    const link = item.is('a[href]') ? item : item.find('a[href]').first();
    const href = link.attr('href');
    const url = href ? resolveUrl(href, baseUrl) : null;
    if (!url) {
      missingLinks++;
      return;
    }
    const key = canonicalUrl(url);
    if (seen.has(key)) return;
    seen.add(key);

    let title = cleanText(link.text());
    for (const selector of ITEM_TITLE_SELECTORS) {
      const candidate = cleanText(item.find(selector).first().text());
      if (candidate.length > title.length) {
        title = candidate;
        break;
      }
    }

    const archiveItem: ArchiveItem = { url };
    if (title) archiveItem.title = title;

    if (thumbnailSelector) {
      const thumb = item.is(thumbnailSelector) ? item : item.find(thumbnailSelector).first();
      for (const attr of THUMBNAIL_ATTRIBUTES) {
        const value = thumb.attr(attr);
        const thumbnailUrl = value ? resolveUrl(value, baseUrl) : null;
        if (thumbnailUrl) {
          archiveItem.thumbnailUrl = thumbnailUrl;
          break;
        }
      }
    }

    items.push(archiveItem);
  });

  if (missingLinks > 0) {
    log.debug(`${missingLinks} archive items on ${baseUrl} had no usable link`);
  }
  return items;
}

/**
 * Title of a detail page: <title>, og:title, twitter:title, then headings.
 * The first candidate longer than five characters wins.
 */
export function extractTitle($: cheerio.CheerioAPI, contentSelector?: string): string | undefined {
  const candidates: string[] = [
    cleanText($('title').first().text()),
    cleanText($('meta[property="og:title"]').attr('content')),
    cleanText($('meta[name="twitter:title"]').attr('content'))
  ];

  const headings = $('h1');
  headings.each((_, h1) => {
    candidates.push(cleanText($(h1).text()));
  });
  if (headings.length === 0) {
    $('h2').each((_, h2) => {
      candidates.push(cleanText($(h2).text()));
    });
  }
  if (contentSelector) {
    candidates.push(cleanText($(contentSelector).first().find('h1').first().text()));
  }

  return candidates.find(title => title.length >= MIN_TITLE_LENGTH);
}

export interface ArticleContext {
  url: string;
  contentSelector: string;
  site: string;
  category: string;
  engine: EngineName;
  item?: ArchiveItem;
  now?: Date;
}

/**
 * Build an Article from a detail page. The raw HTML of the content element
 * is kept as-is.
 */
export function extractArticle(html: string, context: ArticleContext): Article {
  const $ = cheerio.load(html);
  const content = $(context.contentSelector).first();

  if (content.length === 0) {
    throw new ExtractionError(
      'selector_not_found',
      context.url,
      `Content selector "${context.contentSelector}" not found in ${context.url}`
    );
  }

  const hasText = cleanText(content.text()).length > 0;
  const hasMedia = content.find('img, video, iframe, audio').length > 0;
  const rawHtml = $.html(content);
  if (!hasText && !hasMedia) {
    throw new ExtractionError('empty_content', context.url, `Content of ${context.url} is empty`);
  }

  const now = context.now ?? new Date();
  const scrapedAt = now.toISOString();

  return {
    id: articleId(context.url),
    title: extractTitle($, context.contentSelector) ?? context.item?.title ?? '',
    url: context.url,
    thumbnail_url: context.item?.thumbnailUrl ?? null,
    raw_html_content: rawHtml,
    scraped_at: scrapedAt,
    scraped_date: scrapedAt.slice(0, 10),
    source_url: getBaseUrl(context.url),
    site: context.site,
    category: context.category,
    engine: context.engine
  };
}
