import { afterEach, beforeAll, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatTime, logger, LogLevel, parseLogLevel } from '../src/utils/logger.js';

describe('logger', () => {
  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  afterEach(() => {
    logger.setConfig({ logFile: undefined });
  });

  it('should write every level to the log file regardless of console level', () => {
    const logFile = join(mkdtempSync(join(tmpdir(), 'crawler-log-')), 'nested', 'run.log');
    logger.setConfig({ logFile });

    const log = logger.createContext('pagination');
    log.debug('page 2 ok');
    log.error('page 3 failed', 'HTTP 500');
    logger.success('news', '3 pages');

    const lines = readFileSync(logFile, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ DEBUG   \[pagination\] page 2 ok$/);
    expect(lines[1]).toMatch(/^\S+ ERROR   \[pagination\] page 3 failed HTTP 500$/);
    expect(lines[2]).toMatch(/^\S+ STATUS  done news: 3 pages$/);
  });

  it('should parse log levels', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('v')).toBe(LogLevel.VERBOSE);
    expect(parseLogLevel('error')).toBe(LogLevel.QUIET);
    expect(parseLogLevel('loud')).toBe(LogLevel.NORMAL);
    expect(parseLogLevel(undefined)).toBe(LogLevel.NORMAL);
  });

  it('should format durations', () => {
    expect(formatTime(250.4)).toBe('250ms');
    expect(formatTime(1500)).toBe('1.5s');
    expect(formatTime(125000)).toBe('2m 5s');
  });
});
