import { describe, it, expect, vi, beforeEach } from 'vitest';
import { listSites, loadCrawlSpecs, resolveCrawlSpecs } from '../src/drivers/site-config.js';
import * as localDb from '../src/providers/local-db.js';
import type { SitesFile } from '../src/types/crawl-spec.js';
import { ConfigurationError } from '../src/utils/errors.js';

vi.mock('../src/providers/local-db.js');

const sites: SitesFile = {
  sites: [
    {
      name: 'test_daily',
      itemSelector: 'article h2 a',
      contentSelector: 'div.entry-content',
      delay: '0.5-2',
      categories: [
        {
          name: 'news',
          archiveUrl: 'https://daily.test/news',
          pagination: { type: 'queryparam', param: '?page={n}' }
        },
        {
          name: 'photos',
          archiveUrl: 'https://daily.test/photos',
          itemSelector: '.tile a',
          thumbnailSelector: 'img.thumb',
          pagination: { type: 'click', selector: 'button.more' }
        }
      ]
    },
    {
      name: 'test_weekly',
      itemSelector: '.row a',
      contentSelector: '.body',
      engine: 'render',
      minContentBytes: 200,
      categories: [
        { name: 'archive', archiveUrl: 'https://weekly.test/archive', pagination: { type: 'none' } }
      ]
    }
  ]
};

describe('site config', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('resolveCrawlSpecs', () => {
    it('should resolve every category with defaults', () => {
      const [news, photos] = resolveCrawlSpecs(sites, 'test_daily');

      expect(news).toEqual({
        site: 'test_daily',
        category: 'news',
        archiveUrl: 'https://daily.test/news',
        itemSelector: 'article h2 a',
        contentSelector: 'div.entry-content',
        thumbnailSelector: 'img',
        pagination: { kind: 'queryparam', template: '?page={n}', offsetStep: 10 },
        delay: { kind: 'range', min: 0.5, max: 2 },
        maxPages: 0,
        useProxy: false,
        respectRobots: true,
        timeoutMs: 30000,
        minContentBytes: 1000,
        minProbeMatches: 1,
        emptyPageThreshold: 2,
        maxIdleClicks: 2
      });
      expect(photos.itemSelector).toBe('.tile a');
      expect(photos.thumbnailSelector).toBe('img.thumb');
      expect(photos.pagination).toEqual({ kind: 'click', selector: 'button.more' });
    });

    it('should freeze the specs', () => {
      const [news] = resolveCrawlSpecs(sites, 'test_daily');

      expect(Object.isFrozen(news)).toBe(true);
    });

    it('should apply command line overrides', () => {
      const [archive] = resolveCrawlSpecs(sites, 'test_weekly', {
        maxPages: 5,
        delay: '0',
        timeoutMs: 5000,
        useProxy: true,
        respectRobots: false
      });

      expect(archive).toMatchObject({
        maxPages: 5,
        delay: { kind: 'none' },
        timeoutMs: 5000,
        useProxy: true,
        respectRobots: false,
        forceEngine: 'render',
        minContentBytes: 200
      });
    });

    it('should take thresholds from the category, then the site, then the defaults', () => {
      const tuned: SitesFile = {
        sites: [{
          ...sites.sites[0],
          minProbeMatches: 5,
          emptyPageThreshold: 4,
          categories: [
            { ...sites.sites[0].categories[0], minProbeMatches: 3, minContentBytes: 0 },
            { ...sites.sites[0].categories[1], maxIdleClicks: 6 }
          ]
        }]
      };

      const [news, photos] = resolveCrawlSpecs(tuned, 'test_daily');

      expect(news).toMatchObject({ minProbeMatches: 3, emptyPageThreshold: 4, maxIdleClicks: 2, minContentBytes: 0 });
      expect(photos).toMatchObject({ minProbeMatches: 5, emptyPageThreshold: 4, maxIdleClicks: 6, minContentBytes: 1000 });
    });

    it('should reject a page template without a placeholder', () => {
      const fixed: SitesFile = {
        sites: [{
          ...sites.sites[0],
          categories: [{ name: 'news', archiveUrl: 'https://daily.test/news', pagination: { type: 'queryparam', param: '?page=2' } }]
        }]
      };

      expect(() => resolveCrawlSpecs(fixed, 'test_daily'))
        .toThrow('Pagination template "?page=2" needs a {n} or {offset} placeholder');
    });

    it('should accept an offset-only page template', () => {
      const offset: SitesFile = {
        sites: [{
          ...sites.sites[0],
          categories: [{ name: 'news', archiveUrl: 'https://daily.test/news', pagination: { type: 'queryparam', param: '&start={offset}', offsetStep: 20 } }]
        }]
      };

      const [news] = resolveCrawlSpecs(offset, 'test_daily');

      expect(news.pagination).toEqual({ kind: 'queryparam', template: '&start={offset}', offsetStep: 20 });
    });

    it('should let a forced engine win over the site engine', () => {
      const [archive] = resolveCrawlSpecs(sites, 'test_weekly', { forceEngine: 'driver' });

      expect(archive.forceEngine).toBe('driver');
    });

    it('should keep the requested category order', () => {
      const specs = resolveCrawlSpecs(sites, 'test_daily', { categories: ['photos', 'news'] });

      expect(specs.map(spec => spec.category)).toEqual(['photos', 'news']);
    });

    it('should reject an unknown category', () => {
      expect(() => resolveCrawlSpecs(sites, 'test_daily', { categories: ['sport'] }))
        .toThrow('Unknown category "sport" for test_daily (configured: news, photos)');
    });

    it('should reject an unknown site', () => {
      expect(() => resolveCrawlSpecs(sites, 'test_monthly'))
        .toThrow('Unknown site "test_monthly" (configured: test_daily, test_weekly)');
    });

    it('should reject a selector cheerio cannot parse', () => {
      const broken: SitesFile = {
        sites: [{ ...sites.sites[0], itemSelector: 'article[data-id' }]
      };

      expect(() => resolveCrawlSpecs(broken, 'test_daily')).toThrow(ConfigurationError);
    });

    it('should reject an invalid delay', () => {
      expect(() => resolveCrawlSpecs(sites, 'test_daily', { delay: 'soon' }))
        .toThrow('Invalid delay format: soon. Use formats like 0, 1.5, 0.5-2');
    });

    it('should reject duplicate category names', () => {
      const duplicated: SitesFile = {
        sites: [{ ...sites.sites[1], categories: [sites.sites[1].categories[0], sites.sites[1].categories[0]] }]
      };

      expect(() => resolveCrawlSpecs(duplicated, 'test_weekly'))
        .toThrow('Category "archive" is defined twice for test_weekly');
    });
  });

  describe('loadCrawlSpecs', () => {
    it('should read sites.json through the local db', async () => {
      vi.mocked(localDb.loadSites).mockResolvedValue(sites);

      const specs = await loadCrawlSpecs('test_weekly');

      expect(localDb.loadSites).toHaveBeenCalledTimes(1);
      expect(specs.map(spec => spec.archiveUrl)).toEqual(['https://weekly.test/archive']);
    });
  });

  describe('listSites', () => {
    it('should summarize sites and categories', async () => {
      vi.mocked(localDb.loadSites).mockResolvedValue(sites);

      const summary = await listSites();

      expect(summary[1]).toEqual({
        name: 'test_weekly',
        engine: 'render',
        categories: [{ name: 'archive', archiveUrl: 'https://weekly.test/archive', pagination: 'none' }]
      });
    });
  });
});
