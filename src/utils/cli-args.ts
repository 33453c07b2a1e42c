import { ENGINE_NAMES, OUTPUT_FORMATS } from '../types/crawl-spec.js';
import type { EngineName, OutputFormat } from '../types/crawl-spec.js';
import { ConfigurationError } from './errors.js';
import { parseDurationMs } from './time-parser.js';

export const COMMANDS = ['crawl', 'sites'] as const;
export type Command = typeof COMMANDS[number];

export interface CrawlCliOptions {
  site?: string;
  categories?: string[];
  maxPages?: number;
  resume?: string;
  format?: OutputFormat;
  forceEngine?: EngineName;
  delay?: string;
  timeoutMs?: number;
  useProxy?: boolean;
  testProxies?: boolean;
  ignoreRobots?: boolean;
  logLevel?: string;
  logFile?: string;
  skipArchive?: boolean;
  output?: string;
  headed?: boolean;
  sessionTimeout?: number;
  help?: boolean;
}

export interface ParsedArgs {
  command: Command;
  options: CrawlCliOptions;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function isEngineName(value: string): value is EngineName {
  return ENGINE_NAMES.some(name => name === value);
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

function parseCount(flag: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

function splitList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

/**
 * Parse command line arguments supporting both formats:
 * - --param=value
 * - --param value
 *
 * Boolean flags (like --use-proxy) don't take values. The command defaults
 * to `crawl` when the first argument is a flag.
 */
export function parseArgs(args: string[]): ParsedArgs {
  let rest = args;
  let command: Command = 'crawl';
  const first = args[0];
  if (first !== undefined && !first.startsWith('-')) {
    if (!isCommand(first)) {
      throw new ConfigurationError(`Unknown command: ${first} (expected ${COMMANDS.join(' or ')})`);
    }
    command = first;
    rest = args.slice(1);
  }

  const options: CrawlCliOptions = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const equals = arg.indexOf('=');
    const flag = equals === -1 ? arg : arg.slice(0, equals);

    // Value from --flag=value, or from the next argument
    const value = (): string => {
      if (equals !== -1) return arg.slice(equals + 1);
      const next = rest[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ConfigurationError(`${flag} needs a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '--site':
        options.site = value().trim();
        break;
      case '--category':
      case '--categories':
        options.categories = splitList(value());
        break;
      case '--max-pages':
        options.maxPages = parseCount(flag, value());
        break;
      case '--resume':
        options.resume = value();
        break;
      case '--format': {
        const format = value();
        if (!isOutputFormat(format)) {
          throw new ConfigurationError(`--format must be one of ${OUTPUT_FORMATS.join(', ')}`);
        }
        options.format = format;
        break;
      }
      case '--force-engine':
      case '--engine': {
        const engine = value();
        if (!isEngineName(engine)) {
          throw new ConfigurationError(`${flag} must be one of ${ENGINE_NAMES.join(', ')}`);
        }
        options.forceEngine = engine;
        break;
      }
      case '--delay':
        options.delay = value();
        break;
      case '--timeout':
        options.timeoutMs = parseDurationMs(value());
        break;
      case '--use-proxy':
        options.useProxy = true;
        break;
      case '--test-proxies':
        options.testProxies = true;
        break;
      case '--ignore-robots':
        options.ignoreRobots = true;
        break;
      case '--log-level':
        options.logLevel = value();
        break;
      case '--log':
        options.logFile = value();
        break;
      case '--skip-archive':
        options.skipArchive = true;
        break;
      case '--output':
        options.output = value();
        break;
      case '--headed':
        options.headed = true;
        break;
      case '--session-timeout':
        options.sessionTimeout = parseCount(flag, value());
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  return { command, options };
}
