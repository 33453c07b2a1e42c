import { describe, test, expect } from 'vitest';
import { parseArgs } from '../cli-args.js';
import { ConfigurationError } from '../errors.js';

describe('parseArgs', () => {
  test('should default to the crawl command', () => {
    const result = parseArgs(['--site', 'example_daily']);
    expect(result.command).toBe('crawl');
    expect(result.options).toEqual({ site: 'example_daily' });
  });

  test('should parse the sites command', () => {
    expect(parseArgs(['sites'])).toEqual({ command: 'sites', options: {} });
  });

  test('should reject an unknown command', () => {
    expect(() => parseArgs(['paginate'])).toThrow('Unknown command: paginate (expected crawl or sites)');
  });

  describe('value formats', () => {
    test('should parse --param=value format', () => {
      const result = parseArgs(['crawl', '--site=example_daily', '--max-pages=5']);
      expect(result.options).toEqual({ site: 'example_daily', maxPages: 5 });
    });

    test('should parse --param value format', () => {
      const result = parseArgs(['crawl', '--site', 'example_daily', '--max-pages', '5']);
      expect(result.options).toEqual({ site: 'example_daily', maxPages: 5 });
    });

    test('should require a value', () => {
      expect(() => parseArgs(['--site', '--use-proxy'])).toThrow('--site needs a value');
    });
  });

  test('should split and trim categories', () => {
    const result = parseArgs(['--category=news, opinion ,,sport']);
    expect(result.options.categories).toEqual(['news', 'opinion', 'sport']);
  });

  test('should keep the resume value as given', () => {
    expect(parseArgs(['--resume', 'opinion,3']).options.resume).toBe('opinion,3');
    expect(parseArgs(['--resume=data/raw/a.jsonl']).options.resume).toBe('data/raw/a.jsonl');
  });

  test('should parse every boolean flag', () => {
    const result = parseArgs(['--use-proxy', '--test-proxies', '--ignore-robots', '--skip-archive', '--headed']);
    expect(result.options).toEqual({
      useProxy: true,
      testProxies: true,
      ignoreRobots: true,
      skipArchive: true,
      headed: true
    });
  });

  test('should parse timeouts with units', () => {
    expect(parseArgs(['--timeout', '45']).options.timeoutMs).toBe(45000);
    expect(parseArgs(['--timeout=1500ms']).options.timeoutMs).toBe(1500);
  });

  test('should validate engine and format names', () => {
    expect(parseArgs(['--force-engine', 'render', '--format', 'json']).options).toEqual({
      forceEngine: 'render',
      format: 'json'
    });
    expect(() => parseArgs(['--force-engine', 'selenium'])).toThrow('--force-engine must be one of http, render, driver');
    expect(() => parseArgs(['--format', 'csv'])).toThrow(ConfigurationError);
  });

  test('should reject a negative page limit', () => {
    expect(() => parseArgs(['--max-pages', '-1'])).toThrow('--max-pages expects a non-negative integer, got "-1"');
    expect(() => parseArgs(['--max-pages=-1'])).toThrow('--max-pages expects a non-negative integer, got "-1"');
  });

  test('should reject unknown options', () => {
    expect(() => parseArgs(['--since', '2d'])).toThrow('Unknown option: --since');
  });

  test('should take log settings', () => {
    expect(parseArgs(['-h', '--log-level', 'debug', '--log', 'logs/run.log']).options).toEqual({
      help: true,
      logLevel: 'debug',
      logFile: 'logs/run.log'
    });
  });
});
