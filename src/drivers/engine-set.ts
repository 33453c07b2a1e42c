import type { EngineName } from '../types/crawl-spec.js';
import type { FetchEngine } from '../types/fetch.js';
import { HttpEngine } from './http-engine.js';
import { RenderEngine } from './render-engine.js';
import { BrowserDriverEngine } from './browser-driver-engine.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('engine-set');

export type EngineFactories = Record<EngineName, () => FetchEngine>;

export interface EngineSetOptions {
  headed?: boolean;         // Show the local browser windows
  sessionTimeout?: number;  // Browserbase session timeout in seconds
}

export function defaultEngineFactories(options: EngineSetOptions = {}): EngineFactories {
  const headless = !options.headed;
  return {
    http: () => new HttpEngine(),
    render: () => new RenderEngine({ headless }),
    driver: () => new BrowserDriverEngine({ headless, sessionTimeout: options.sessionTimeout })
  };
}

/**
 * Engines of one run, created on first use and shared by every category.
 */
export class EngineSet {
  private readonly engines = new Map<EngineName, FetchEngine>();

  constructor(private readonly factories: EngineFactories = defaultEngineFactories()) {}

  get(name: EngineName): FetchEngine {
    let engine = this.engines.get(name);
    if (!engine) {
      engine = this.factories[name]();
      this.engines.set(name, engine);
    }
    return engine;
  }

  /** Close every engine that was created. Never throws. */
  async closeAll(): Promise<void> {
    const engines = [...this.engines.values()];
    this.engines.clear();
    await Promise.all(engines.map(async engine => {
      try {
        await engine.close();
      } catch (error) {
        log.error(`Failed to close ${engine.name} engine: ${errorMessage(error)}`);
      }
    }));
  }
}
