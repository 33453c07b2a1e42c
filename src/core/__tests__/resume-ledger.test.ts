import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ResumeLedger } from '../resume-ledger.js';
import { ConfigurationError } from '../../utils/errors.js';
import { LogLevel, logger } from '../../utils/logger.js';

const now = () => new Date('2026-03-01T08:30:00.000Z');

describe('ResumeLedger', () => {
  let dir: string;
  let path: string;

  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledger-'));
    path = join(dir, 'out.jsonl.ledger.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should start empty when there is no file', async () => {
    const ledger = await ResumeLedger.load(path, 'test_site', now);

    expect(ledger.lastCommittedPage('news')).toBe(0);
    expect(ledger.entry('news')).toBeUndefined();
  });

  it('should persist commits after every page', async () => {
    const ledger = await ResumeLedger.load(path, 'test_site', now);
    await ledger.begin('news', 3);
    await ledger.commit('news', 3);
    await ledger.commit('news', 4);

    const saved = JSON.parse(await readFile(path, 'utf-8'));
    expect(saved).toEqual({
      version: 1,
      site: 'test_site',
      categories: {
        news: { lastCommittedPage: 4, pagesVisited: 2, finished: false, updatedAt: '2026-03-01T08:30:00.000Z' }
      }
    });
  });

  it('should only move forward', async () => {
    const ledger = await ResumeLedger.load(path, 'test_site', now);
    await ledger.begin('news', 1);
    await ledger.commit('news', 1);

    await expect(ledger.commit('news', 1)).rejects.toThrow('Ledger for news is at page 1; cannot commit page 1');
  });

  it('should refuse commits for a category that was not started', async () => {
    const ledger = await ResumeLedger.load(path, 'test_site', now);

    await expect(ledger.commit('news', 1)).rejects.toThrow('Category news was not started in the ledger');
  });

  it('should reload what an earlier run wrote', async () => {
    const first = await ResumeLedger.load(path, 'test_site', now);
    await first.begin('news', 1);
    await first.commit('news', 1);
    await first.finish('news', 'not_found');

    const second = await ResumeLedger.load(path, 'test_site', now);

    expect(second.lastCommittedPage('news')).toBe(1);
    expect(second.entry('news')?.finished).toBe(true);
    expect(second.entry('news')?.exhaustion).toBe('not_found');
  });

  it('should start over for a different site', async () => {
    const first = await ResumeLedger.load(path, 'test_site', now);
    await first.begin('news', 5);

    const other = await ResumeLedger.load(path, 'other_site', now);

    expect(other.entry('news')).toBeUndefined();
  });

  it('should reject a malformed ledger', async () => {
    await writeFile(path, JSON.stringify({ version: 2, site: 'test_site', categories: {} }));

    await expect(ResumeLedger.load(path, 'test_site', now)).rejects.toThrow(ConfigurationError);
  });
});
