import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ArticleStore } from '../storage.js';
import type { Article } from '../../types/article.js';
import { articleId } from '../../core/utils/url-utils.js';
import { ConfigurationError, ExtractionError } from '../../utils/errors.js';
import { LogLevel, logger } from '../../utils/logger.js';

function article(slug: string, overrides: Partial<Article> = {}): Article {
  const url = `https://news.test/story/${slug}`;
  return {
    id: articleId(url),
    title: `Story ${slug}`,
    url,
    thumbnail_url: null,
    raw_html_content: `<div><p>${slug}</p></div>`,
    scraped_at: '2026-03-01T08:30:00.000Z',
    scraped_date: '2026-03-01',
    source_url: 'https://news.test',
    site: 'test_site',
    category: 'news',
    engine: 'http',
    ...overrides
  };
}

describe('ArticleStore', () => {
  let dir: string;

  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'storage-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('ndjson', () => {
    it('should append one record per line', async () => {
      const path = join(dir, 'nested', 'out.jsonl');
      const store = await ArticleStore.open(path, 'ndjson');

      await store.append(article('a'));
      await store.append(article('b'));

      const lines = (await readFile(path, 'utf-8')).split('\n');
      expect(lines).toHaveLength(3);
      expect(lines[2]).toBe('');
      expect(JSON.parse(lines[1])).toEqual(article('b'));
    });

    it('should extend an existing file', async () => {
      const path = join(dir, 'out.jsonl');
      await writeFile(path, `${JSON.stringify(article('a'))}\n`);

      const store = await ArticleStore.open(path, 'ndjson');
      await store.append(article('b'));

      const urls = (await readFile(path, 'utf-8')).trim().split('\n').map(line => JSON.parse(line).url);
      expect(urls).toEqual(['https://news.test/story/a', 'https://news.test/story/b']);
    });
  });

  describe('json', () => {
    it('should keep a single array', async () => {
      const path = join(dir, 'out.json');
      const store = await ArticleStore.open(path, 'json');

      await store.append(article('a'));
      await store.append(article('b'));

      const content = await readFile(path, 'utf-8');
      expect(content.endsWith(']\n')).toBe(true);
      expect(JSON.parse(content)).toEqual([article('a'), article('b')]);
    });

    it('should extend an existing array', async () => {
      const path = join(dir, 'out.json');
      await writeFile(path, JSON.stringify([article('a')]));

      const store = await ArticleStore.open(path, 'json');
      await store.append(article('b'));

      expect(JSON.parse(await readFile(path, 'utf-8'))).toHaveLength(2);
    });

    it('should refuse to overwrite a file that is not an array', async () => {
      const path = join(dir, 'out.json');
      await writeFile(path, '{"url": "https://news.test/story/a"}');

      await expect(ArticleStore.open(path, 'json')).rejects.toThrow(ConfigurationError);
    });
  });

  it('should know stored and remembered identities', async () => {
    const store = await ArticleStore.open(join(dir, 'out.jsonl'), 'ndjson');
    store.remember([articleId('https://news.test/story/old')]);
    await store.append(article('a'));

    expect(store.exists(articleId('https://news.test/story/old'))).toBe(true);
    expect(store.exists(article('a').id)).toBe(true);
    expect(store.exists(articleId('https://news.test/story/b'))).toBe(false);
  });

  it('should reject an invalid record without writing it', async () => {
    const path = join(dir, 'out.jsonl');
    const store = await ArticleStore.open(path, 'ndjson');

    const invalid = article('a', { raw_html_content: '' });
    await expect(store.append(invalid)).rejects.toThrow(ExtractionError);
    await expect(readFile(path, 'utf-8')).rejects.toThrow();
    expect(store.exists(invalid.id)).toBe(false);
  });
});
