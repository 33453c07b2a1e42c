#!/usr/bin/env tsx

/**
 * CLI for the archive crawler
 * Usage:
 *   npm run crawl -- --site <name> [options]   # Crawl every category of a site
 *   npm run crawl -- sites                     # List configured sites
 */

import { join } from 'path';
import { CrawlEngine } from '../src/engines/crawl-engine.js';
import type { CrawlResult } from '../src/engines/crawl-engine.js';
import { EngineSet, defaultEngineFactories } from '../src/drivers/engine-set.js';
import { HeaderPool } from '../src/drivers/headers.js';
import { ProxyPool, axiosProxyCheck } from '../src/drivers/proxy.js';
import { listSites, loadCrawlSpecs } from '../src/drivers/site-config.js';
import { slugify } from '../src/core/utils/url-utils.js';
import { parseArgs } from '../src/utils/cli-args.js';
import type { CrawlCliOptions } from '../src/utils/cli-args.js';
import { ConfigurationError, errorMessage } from '../src/utils/errors.js';
import { installGlobalErrorHandlers } from '../src/utils/error-handlers.js';
import { formatTime, logger, parseLogLevel } from '../src/utils/logger.js';

const log = logger.createContext('crawl-cli');

function printUsage(): void {
  console.log('Usage:');
  console.log('  npm run crawl -- --site <name> [options]');
  console.log('  npm run crawl -- sites');
  console.log('');
  console.log('Options:');
  console.log('  --site NAME               Site from db/sites.json (required)');
  console.log('  --category a,b            Categories to crawl (default: all, in config order)');
  console.log('  --max-pages N             Archive page limit per category (default: unlimited)');
  console.log('  --resume FILE|CAT,PAGE    Skip stored articles, or restart at a category page');
  console.log('  --format ndjson|json      Output format (default: ndjson)');
  console.log('  --output FILE             Output file (default: data/raw/<site>.jsonl)');
  console.log('  --force-engine NAME       http, render or driver; skips probing');
  console.log('  --delay 0|1.5|0.5-2       Seconds between requests (default: site setting)');
  console.log('  --timeout 30s             Per-request timeout (default: 30s)');
  console.log('  --use-proxy               Rotate proxies from db/proxies.json');
  console.log('  --test-proxies            Drop proxies that fail a health check before crawling');
  console.log('  --ignore-robots           Do not check robots.txt');
  console.log('  --skip-archive            Read item URLs from the manifests of an earlier run');
  console.log('  --headed                  Show local browser windows');
  console.log('  --session-timeout N       Browserbase session timeout in seconds');
  console.log('  --log-level LEVEL         quiet, normal, verbose or debug');
  console.log('  --log FILE                Also write logs to FILE');
}

function defaultOutput(site: string, options: CrawlCliOptions): string {
  const extension = options.format === 'json' ? 'json' : 'jsonl';
  return join('data', 'raw', `${slugify(site)}.${extension}`);
}

async function runSites(): Promise<boolean> {
  const sites = await listSites();
  for (const site of sites) {
    console.log(`${site.name}${site.engine ? ` (engine: ${site.engine})` : ''}`);
    for (const category of site.categories) {
      console.log(`  ${category.name.padEnd(20)} ${category.pagination.padEnd(11)} ${category.archiveUrl}`);
    }
  }
  return true;
}

function printResult(result: CrawlResult): void {
  console.log(`\nSite ${result.site} -> ${result.output}`);
  for (const stats of result.categories) {
    const details = stats.outcome === 'skipped'
      ? 'skipped'
      : `${stats.outcome}: pages ${stats.pages}, found ${stats.found}, saved ${stats.saved}, ` +
        `skipped ${stats.skipped}, failed ${stats.failed}${stats.engine ? ` [${stats.engine}]` : ''}`;
    console.log(`  ${stats.category.padEnd(20)} ${details}`);
  }

  const { totals } = result;
  console.log(`Total: pages ${totals.pages}, found ${totals.found}, attempted ${totals.attempted}, ` +
    `saved ${totals.saved}, skipped ${totals.skipped}, failed ${totals.failed} in ${formatTime(result.duration)}`);

  if (result.failures.length > 0) {
    console.log('\nFailed categories:');
    for (const failure of result.failures) {
      console.log(`  ${failure.category}: ${failure.message}`);
    }
  }
  if (result.resumeHint) {
    console.log(`\nTo continue: --resume ${result.resumeHint}`);
  }
}

async function runCrawl(options: CrawlCliOptions): Promise<boolean> {
  if (!options.site) {
    throw new ConfigurationError('--site is required');
  }
  if (options.testProxies && !options.useProxy) {
    throw new ConfigurationError('--test-proxies needs --use-proxy');
  }

  const specs = await loadCrawlSpecs(options.site, {
    categories: options.categories,
    maxPages: options.maxPages,
    forceEngine: options.forceEngine,
    delay: options.delay,
    timeoutMs: options.timeoutMs,
    useProxy: options.useProxy,
    respectRobots: !options.ignoreRobots
  });

  let proxies: ProxyPool | undefined;
  if (options.useProxy) {
    proxies = await ProxyPool.fromDb();
    if (options.testProxies) {
      proxies = await proxies.healthy(axiosProxyCheck());
    }
  }

  const engine = new CrawlEngine({
    engines: new EngineSet(defaultEngineFactories({ headed: options.headed, sessionTimeout: options.sessionTimeout })),
    headers: await HeaderPool.fromDb(),
    ...(proxies ? { proxies } : {})
  });

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      log.error(`Received ${signal} again, exiting`);
      process.exit(130);
    }
    log.normal(`Received ${signal}, stopping after the current item`);
    controller.abort();
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  try {
    const result = await engine.crawl(specs, {
      output: options.output ?? defaultOutput(options.site, options),
      format: options.format ?? 'ndjson',
      resume: options.resume,
      skipArchive: options.skipArchive,
      signal: controller.signal
    });
    printResult(result);
    return result.success;
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}

async function main(): Promise<void> {
  installGlobalErrorHandlers();

  try {
    const { command, options } = parseArgs(process.argv.slice(2));
    logger.setLevel(parseLogLevel(options.logLevel ?? process.env.LOG_LEVEL));
    if (options.logFile) {
      logger.setConfig({ logFile: options.logFile });
    }

    if (options.help) {
      printUsage();
      process.exit(0);
    }
    if (command === 'crawl' && !options.site) {
      printUsage();
      process.exit(2);
    }

    const success = command === 'sites' ? await runSites() : await runCrawl(options);
    process.exit(success ? 0 : 1);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error(`Configuration error: ${error.message}`);
      process.exit(2);
    }
    log.error(`Crawl failed: ${errorMessage(error)}`, error);
    process.exit(1);
  }
}

main().catch(error => {
  log.error('Unexpected failure', error);
  process.exit(1);
});
