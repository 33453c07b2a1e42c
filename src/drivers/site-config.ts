import type {
  CategoryConfig,
  CrawlSpec,
  DelayPolicy,
  EngineName,
  PaginationConfig,
  PaginationStrategy,
  SiteConfig,
  SitesFile
} from '../types/crawl-spec.js';
import { DEFAULT_CRAWL_SETTINGS } from '../types/crawl-spec.js';
import { loadSites } from '../providers/local-db.js';
import { validateSelector } from './extractor.js';
import { isValidUrl } from '../core/utils/url-utils.js';
import { parseDelayPolicy } from '../utils/time-parser.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('site-config');

/**
 * Command-line settings that take precedence over sites.json
 */
export interface CrawlOverrides {
  categories?: string[];  // Default: every configured category, in order
  maxPages?: number;      // 0 = unlimited (default)
  forceEngine?: EngineName;
  delay?: string;
  timeoutMs?: number;
  useProxy?: boolean;
  respectRobots?: boolean;  // Default: true
  minContentBytes?: number;
}

type ThresholdKey = 'minContentBytes' | 'minProbeMatches' | 'emptyPageThreshold' | 'maxIdleClicks';

function toStrategy(config: PaginationConfig): PaginationStrategy {
  switch (config.type) {
    case 'none':
      return { kind: 'none' };
    case 'queryparam':
      // Without a placeholder every page would resolve to the same URL
      if (!config.param.includes('{n}') && !config.param.includes('{offset}')) {
        throw new ConfigurationError(`Pagination template "${config.param}" needs a {n} or {offset} placeholder`);
      }
      return {
        kind: 'queryparam',
        template: config.param,
        offsetStep: config.offsetStep ?? DEFAULT_CRAWL_SETTINGS.offsetStep
      };
    case 'click':
      validateSelector(config.selector, 'pagination selector');
      return { kind: 'click', selector: config.selector };
    case 'scroll':
      return { kind: 'scroll' };
  }
}

function buildSpec(site: SiteConfig, category: CategoryConfig, delay: DelayPolicy, overrides: CrawlOverrides): CrawlSpec {
  if (!isValidUrl(category.archiveUrl)) {
    throw new ConfigurationError(`Archive URL of ${site.name}/${category.name} must be http(s): ${category.archiveUrl}`);
  }

  const itemSelector = category.itemSelector ?? site.itemSelector;
  const contentSelector = category.contentSelector ?? site.contentSelector;
  const thumbnailSelector = category.thumbnailSelector ?? site.thumbnailSelector ?? DEFAULT_CRAWL_SETTINGS.thumbnailSelector;
  const waitForSelector = category.waitForSelector ?? site.waitForSelector;

  validateSelector(itemSelector, 'archive item selector');
  validateSelector(contentSelector, 'content selector');
  validateSelector(thumbnailSelector, 'thumbnail selector');
  if (waitForSelector) validateSelector(waitForSelector, 'wait selector');

  // Category value, then site value, then the built-in default
  const threshold = (key: ThresholdKey): number =>
    category[key] ?? site[key] ?? DEFAULT_CRAWL_SETTINGS[key];

  const forceEngine = overrides.forceEngine ?? site.engine;
  const maxPages = overrides.maxPages ?? 0;
  if (!Number.isInteger(maxPages) || maxPages < 0) {
    throw new ConfigurationError(`Invalid page limit: ${maxPages}`);
  }

  const spec: CrawlSpec = {
    site: site.name,
    category: category.name,
    archiveUrl: category.archiveUrl,
    itemSelector,
    contentSelector,
    thumbnailSelector,
    ...(waitForSelector ? { waitForSelector } : {}),
    pagination: toStrategy(category.pagination),
    delay,
    maxPages,
    ...(forceEngine ? { forceEngine } : {}),
    useProxy: overrides.useProxy ?? false,
    respectRobots: overrides.respectRobots ?? true,
    timeoutMs: overrides.timeoutMs ?? DEFAULT_CRAWL_SETTINGS.timeoutMs,
    minContentBytes: overrides.minContentBytes ?? threshold('minContentBytes'),
    minProbeMatches: threshold('minProbeMatches'),
    emptyPageThreshold: threshold('emptyPageThreshold'),
    maxIdleClicks: threshold('maxIdleClicks')
  };
  return Object.freeze(spec);
}

export function findSite(sites: SitesFile, name: string): SiteConfig {
  const site = sites.sites.find(s => s.name === name);
  if (!site) {
    const known = sites.sites.map(s => s.name).join(', ');
    throw new ConfigurationError(`Unknown site "${name}" (configured: ${known || 'none'})`);
  }
  return site;
}

/**
 * Resolve one site into a frozen CrawlSpec per category, in configuration
 * order (or in the order the categories were requested).
 */
export function resolveCrawlSpecs(sites: SitesFile, siteName: string, overrides: CrawlOverrides = {}): CrawlSpec[] {
  const site = findSite(sites, siteName);
  const names = site.categories.map(c => c.name);
  const duplicate = names.find((name, index) => names.indexOf(name) !== index);
  if (duplicate) {
    throw new ConfigurationError(`Category "${duplicate}" is defined twice for ${site.name}`);
  }

  const delay = parseDelayPolicy(overrides.delay ?? site.delay ?? DEFAULT_CRAWL_SETTINGS.delay);

  let categories = site.categories;
  if (overrides.categories && overrides.categories.length > 0) {
    categories = overrides.categories.map(name => {
      const category = site.categories.find(c => c.name === name);
      if (!category) {
        const known = site.categories.map(c => c.name).join(', ');
        throw new ConfigurationError(`Unknown category "${name}" for ${site.name} (configured: ${known})`);
      }
      return category;
    });
  }

  const specs = categories.map(category => buildSpec(site, category, delay, overrides));
  log.debug(`Resolved ${specs.length} categories for ${site.name}`);
  return specs;
}

export async function loadCrawlSpecs(siteName: string, overrides: CrawlOverrides = {}): Promise<CrawlSpec[]> {
  return resolveCrawlSpecs(await loadSites(), siteName, overrides);
}

export interface SiteSummary {
  name: string;
  engine?: EngineName;
  categories: Array<{ name: string; archiveUrl: string; pagination: PaginationConfig['type'] }>;
}

export async function listSites(): Promise<SiteSummary[]> {
  const { sites } = await loadSites();
  return sites.map(site => ({
    name: site.name,
    ...(site.engine ? { engine: site.engine } : {}),
    categories: site.categories.map(c => ({ name: c.name, archiveUrl: c.archiveUrl, pagination: c.pagination.type }))
  }));
}
