import { describe, it, expect, beforeAll } from 'vitest';
import { countMatches, extractArchiveItems, extractArticle, validateSelector } from '../extractor.js';
import { articleId } from '../../core/utils/url-utils.js';
import { ConfigurationError, ExtractionError } from '../../utils/errors.js';
import { LogLevel, logger } from '../../utils/logger.js';

const BASE = 'https://news.test/news/';

const ARCHIVE = `
<html><body>
  <div class="card">
    <img data-src="/img/a.jpg">
    <a href="/story/a"><span>Read</span></a>
    <h3>The first story of the day</h3>
  </div>
  <div class="card"><a href="story/b">Second story headline</a></div>
  <div class="card"><a href="/story/a#comments">Comments</a></div>
  <div class="card"><a href="javascript:void(0)">Share</a></div>
  <div class="card"><a href="https://news.test/story/a">Duplicate</a></div>
</body></html>`;

describe('extractor', () => {
  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  describe('extractArchiveItems', () => {
    it('should resolve links and drop duplicates in document order', () => {
      const items = extractArchiveItems(ARCHIVE, BASE, '.card', 'img');

      expect(items).toEqual([
        { url: 'https://news.test/story/a', title: 'The first story of the day', thumbnailUrl: 'https://news.test/img/a.jpg' },
        { url: 'https://news.test/news/story/b', title: 'Second story headline' }
      ]);
    });

    it('should take matched links as the items themselves', () => {
      const items = extractArchiveItems(ARCHIVE, BASE, '.card > a');

      expect(items.map(item => item.url)).toEqual([
        'https://news.test/story/a',
        'https://news.test/news/story/b'
      ]);
    });
  });

  describe('extractArticle', () => {
    const context = {
      url: 'https://news.test/story/a',
      contentSelector: 'div.body',
      site: 'test_site',
      category: 'news',
      engine: 'render' as const,
      now: new Date('2026-03-01T23:59:59.000Z')
    };

    it('should build the record from the content element', () => {
      const html = '<html><head><meta property="og:title" content="Council approves budget"></head>' +
        '<body><div class="body"><p>Text</p></div></body></html>';

      expect(extractArticle(html, context)).toEqual({
        id: articleId('https://news.test/story/a'),
        title: 'Council approves budget',
        url: 'https://news.test/story/a',
        thumbnail_url: null,
        raw_html_content: '<div class="body"><p>Text</p></div>',
        scraped_at: '2026-03-01T23:59:59.000Z',
        scraped_date: '2026-03-01',
        source_url: 'https://news.test',
        site: 'test_site',
        category: 'news',
        engine: 'render'
      });
    });

    it('should fall back to the archive title and thumbnail', () => {
      const html = '<html><body><div class="body"><img src="/x.jpg"></div></body></html>';

      const article = extractArticle(html, {
        ...context,
        item: { url: context.url, title: 'Archive headline', thumbnailUrl: 'https://news.test/thumb.jpg' }
      });

      expect(article.title).toBe('Archive headline');
      expect(article.thumbnail_url).toBe('https://news.test/thumb.jpg');
    });

    it('should fail when the content selector is missing', () => {
      expect(() => extractArticle('<html><body><p>x</p></body></html>', context)).toThrow(ExtractionError);
    });

    it('should fail on empty content', () => {
      try {
        extractArticle('<html><body><div class="body">  </div></body></html>', context);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ExtractionError);
        expect(error instanceof ExtractionError && error.reason).toBe('empty_content');
      }
    });
  });

  describe('selectors', () => {
    it('should count matches', () => {
      expect(countMatches(ARCHIVE, '.card')).toBe(5);
    });

    it('should reject a selector that cannot be parsed', () => {
      expect(() => validateSelector('div[data-id', 'content selector')).toThrow(ConfigurationError);
    });
  });
});
