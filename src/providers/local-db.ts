/**
 * Local Database Provider
 *
 * Loads the JSON configuration files from the db/ directory (or
 * CRAWLER_DB_DIR), validates them and caches the result to avoid repeated
 * file reads.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { ProxyStore } from '../types/proxy.js';
import { SitesFileSchema } from '../types/crawl-spec.js';
import type { SitesFile } from '../types/crawl-spec.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('local-db');

const ProxySchema = z.object({
  id: z.string().min(1),
  provider: z.string().optional(),
  type: z.enum(['residential', 'datacenter']),
  geo: z.string().optional(),
  url: z.string().min(1),
  username: z.string().optional(),
  password: z.string().optional()
});

const ProxyStoreSchema: z.ZodType<ProxyStore, z.ZodTypeDef, unknown> = z.object({
  proxies: z.array(ProxySchema),
  default: z.string().optional()
});

const UserAgentsSchema = z.object({
  userAgents: z.array(z.string().min(1)).min(1),
  accept: z.array(z.string().min(1)).min(1),
  acceptLanguage: z.array(z.string().min(1)).min(1)
});

export type UserAgentStore = z.infer<typeof UserAgentsSchema>;

// Cache for loaded data, keyed by filename
const cache = new Map<string, unknown>();

export function getDbDir(): string {
  return process.env.CRAWLER_DB_DIR || join(process.cwd(), 'db');
}

async function readJsonFile(filename: string): Promise<unknown> {
  const filePath = join(getDbDir(), filename);
  try {
    const data = await readFile(filePath, 'utf-8');
    return JSON.parse(data);
  } catch (error) {
    log.error(`Failed to load ${filename}`, { error: errorMessage(error) });
    throw new ConfigurationError(`Failed to load database file ${filename}: ${errorMessage(error)}`);
  }
}

/**
 * Load a JSON file from the db directory and validate it.
 * Validated results are cached until clearCache() is called.
 */
async function loadJsonFile<T>(filename: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  if (cache.has(filename)) {
    log.debug(`Returning cached data for ${filename}`);
  } else {
    cache.set(filename, await readJsonFile(filename));
    log.debug(`Loaded and cached ${filename}`);
  }

  const parsed = schema.safeParse(cache.get(filename));
  if (!parsed.success) {
    cache.delete(filename);
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid database file ${filename}: ${issues}`);
  }
  cache.set(filename, parsed.data);
  return parsed.data;
}

/**
 * Clear the cache for a specific file or all files
 * @param filename - Optional filename to clear from cache. If not provided, clears all cache.
 */
export function clearCache(filename?: string): void {
  if (filename) {
    cache.delete(filename);
    log.debug(`Cleared cache for ${filename}`);
  } else {
    cache.clear();
    log.debug('Cleared all cache');
  }
}

/**
 * Load site and category definitions from sites.json
 */
export async function loadSites(): Promise<SitesFile> {
  return loadJsonFile('sites.json', SitesFileSchema);
}

/**
 * Load proxies from proxies.json
 */
export async function loadProxies(): Promise<ProxyStore> {
  const store = await loadJsonFile('proxies.json', ProxyStoreSchema);

  if (store.default && !store.proxies.some(proxy => proxy.id === store.default)) {
    throw new ConfigurationError(`Invalid proxy store: default proxy "${store.default}" is not defined`);
  }

  return store;
}

/**
 * Load user agents and header variants from user-agents.json
 */
export async function loadUserAgents(): Promise<UserAgentStore> {
  return loadJsonFile('user-agents.json', UserAgentsSchema);
}
