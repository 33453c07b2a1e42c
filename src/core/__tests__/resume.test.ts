import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseResumeInput, planCategories, scanArtifact } from '../resume.js';
import { articleId } from '../utils/url-utils.js';
import { ConfigurationError } from '../../utils/errors.js';
import { LogLevel, logger } from '../../utils/logger.js';
import { crawlSpec } from '../../engines/__tests__/fake-engines.js';

describe('parseResumeInput', () => {
  it('should read category,page as a cursor', () => {
    expect(parseResumeInput('opinion,3')).toEqual({ kind: 'cursor', category: 'opinion', page: 3 });
  });

  it('should read anything else as a file', () => {
    expect(parseResumeInput('data/raw/test_site.jsonl')).toEqual({ kind: 'file', path: 'data/raw/test_site.jsonl' });
    expect(parseResumeInput('runs/a,b.jsonl')).toEqual({ kind: 'file', path: 'runs/a,b.jsonl' });
  });

  it('should reject page 0', () => {
    expect(() => parseResumeInput('news,0')).toThrow('Invalid resume cursor news,0: pages start at 1');
  });

  it('should reject an empty value', () => {
    expect(() => parseResumeInput('  ')).toThrow(ConfigurationError);
  });
});

describe('scanArtifact', () => {
  let dir: string;

  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'resume-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should collect identities from line-delimited records', async () => {
    const path = join(dir, 'out.jsonl');
    await writeFile(path, [
      JSON.stringify({ url: 'https://news.test/story/a' }),
      '{"url": "https://news.test/story/b"',
      '',
      JSON.stringify({ id: 'f'.repeat(32) }),
      JSON.stringify({ title: 'no identity' })
    ].join('\n'));

    const scan = await scanArtifact(path);

    expect(scan.shape).toBe('lines');
    expect(scan.ids).toEqual(new Set([articleId('https://news.test/story/a'), 'f'.repeat(32)]));
    expect(scan.records).toBe(2);
    expect(scan.malformed).toBe(2);
  });

  it('should re-derive the identity from the canonical URL', async () => {
    const path = join(dir, 'out.json');
    await writeFile(path, JSON.stringify([
      { id: 'stale', url: 'https://news.test/story/a/?utm_source=feed#top' }
    ]));

    const scan = await scanArtifact(path);

    expect(scan.shape).toBe('array');
    expect([...scan.ids]).toEqual([articleId('https://news.test/story/a')]);
  });

  it('should detect the shape from the content, not the extension', async () => {
    const path = join(dir, 'out.jsonl');
    await writeFile(path, `\n  ${JSON.stringify([{ url: 'https://news.test/story/a' }])}`);

    expect((await scanArtifact(path)).shape).toBe('array');
  });

  it('should return an empty scan for a missing file', async () => {
    const scan = await scanArtifact(join(dir, 'missing.jsonl'));

    expect(scan).toEqual({ ids: new Set(), records: 0, malformed: 0, shape: 'missing' });
  });

  it('should reject a truncated array', async () => {
    const path = join(dir, 'out.json');
    await writeFile(path, '[{"url": "https://news.test/story/a"}');

    await expect(scanArtifact(path)).rejects.toThrow(ConfigurationError);
  });
});

describe('planCategories', () => {
  const specs = ['news', 'opinion', 'sport'].map(category => crawlSpec({ category }));

  it('should run everything from page 1 without a cursor', () => {
    expect(planCategories(specs).map(p => [p.spec.category, p.startPage, p.skip])).toEqual([
      ['news', 1, false],
      ['opinion', 1, false],
      ['sport', 1, false]
    ]);
  });

  it('should skip categories before the cursor', () => {
    expect(planCategories(specs, { category: 'opinion', page: 3 }).map(p => [p.spec.category, p.startPage, p.skip])).toEqual([
      ['news', 1, true],
      ['opinion', 3, false],
      ['sport', 1, false]
    ]);
  });

  it('should reject a cursor on a click-paginated category', () => {
    const click = [crawlSpec({ pagination: { kind: 'click', selector: '.more' } })];

    expect(() => planCategories(click, { category: 'news', page: 2 })).toThrow(
      'Cannot resume news at page 2: only queryparam pagination has addressable pages (category uses click)'
    );
  });
});
