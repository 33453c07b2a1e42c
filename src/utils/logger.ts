import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export enum LogLevel {
  QUIET = 0,
  NORMAL = 1,
  VERBOSE = 2,
  DEBUG = 3
}

export interface LoggerConfig {
  level: LogLevel;
  /** Prefix console lines with an ISO timestamp */
  timestamps: boolean;
  /** Every line up to DEBUG is appended here, whatever the console level */
  logFile?: string;
}

/** Per-category status lines printed by the crawl loop */
export type CategoryStatus = 'started' | 'done' | 'failed' | 'skipped';

const STATUS_GLYPH: Record<CategoryStatus, string> = {
  started: '⏳',
  done: '✓',
  failed: '✗',
  skipped: '⏸ '
};

class Logger {
  private static instance: Logger;
  private config: LoggerConfig = {
    level: LogLevel.NORMAL,
    timestamps: false
  };

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  setConfig(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
    if (this.config.logFile) {
      mkdirSync(dirname(this.config.logFile), { recursive: true });
    }
  }

  createContext(context: string): ContextualLogger {
    return new ContextualLogger(context, this);
  }

  write(level: LogLevel | 'ERROR', context: string, message: string, data?: unknown): void {
    const line = `${this.stamp()}[${context}] ${message}`;
    const levelName = level === 'ERROR' ? level : LogLevel[level];
    this.append(levelName, `[${context}] ${message}`, data);

    // Errors reach the console at every level but QUIET
    const visible = level === 'ERROR'
      ? this.config.level > LogLevel.QUIET
      : level <= this.config.level;
    if (!visible) return;

    const print = level === 'ERROR' ? console.error : console.log;
    print(line);
    if (data !== undefined) print(data);
  }

  status(status: CategoryStatus, category: string, message: string): void {
    this.append('STATUS', `${status} ${category}: ${message}`);
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`${STATUS_GLYPH[status]} ${category.padEnd(20)} ${message}`);
    }
  }

  // Shorthands for the crawl loop
  processing(category: string, message: string): void {
    this.status('started', category, message);
  }

  success(category: string, message: string): void {
    this.status('done', category, message);
  }

  failure(category: string, message: string): void {
    this.status('failed', category, message);
  }

  skip(category: string, message: string): void {
    this.status('skipped', category, message);
  }

  private stamp(): string {
    return this.config.timestamps ? `${new Date().toISOString()} ` : '';
  }

  private append(levelName: string, message: string, data?: unknown): void {
    if (!this.config.logFile) return;

    let line = `${new Date().toISOString()} ${levelName.padEnd(7)} ${message}`;
    if (data !== undefined) {
      line += ` ${formatData(data)}`;
    }
    appendFileSync(this.config.logFile, `${line}\n`, 'utf-8');
  }
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return data.stack ?? data.message;
  }
  if (typeof data === 'string') {
    return data;
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

// Component logger: every line carries the component name
export class ContextualLogger {
  constructor(
    private readonly context: string,
    private readonly logger: Logger
  ) {}

  normal(message: string, data?: unknown): void {
    this.logger.write(LogLevel.NORMAL, this.context, message, data);
  }

  verbose(message: string, data?: unknown): void {
    this.logger.write(LogLevel.VERBOSE, this.context, message, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.write(LogLevel.DEBUG, this.context, message, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.write('ERROR', this.context, message, data);
  }
}

export const logger = Logger.getInstance();

/** Map a --log-level / LOG_LEVEL value; anything unknown is NORMAL */
export function parseLogLevel(level: string | undefined): LogLevel {
  switch (level?.trim().toLowerCase()) {
    case 'quiet':
    case 'q':
    case 'error':
      return LogLevel.QUIET;
    case 'verbose':
    case 'v':
      return LogLevel.VERBOSE;
    case 'debug':
    case 'd':
      return LogLevel.DEBUG;
    default:
      return LogLevel.NORMAL;
  }
}

export const formatTime = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};
