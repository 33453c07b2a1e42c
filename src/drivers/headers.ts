import type { HeaderSet } from '../types/fetch.js';
import { loadUserAgents } from '../providers/local-db.js';
import type { UserAgentStore } from '../providers/local-db.js';

/**
 * Rotates browser-like request headers. User agents cycle in order, the
 * Accept and Accept-Language variants are drawn at random.
 */
export class HeaderPool {
  private cursor = 0;

  constructor(
    private readonly store: UserAgentStore,
    private readonly random: () => number = Math.random
  ) {}

  static async fromDb(random?: () => number): Promise<HeaderPool> {
    return new HeaderPool(await loadUserAgents(), random);
  }

  next(): HeaderSet {
    const userAgent = this.store.userAgents[this.cursor % this.store.userAgents.length];
    this.cursor++;

    return {
      'User-Agent': userAgent,
      'Accept': this.pick(this.store.accept),
      'Accept-Language': this.pick(this.store.acceptLanguage),
      'Upgrade-Insecure-Requests': '1'
    };
  }

  private pick(options: string[]): string {
    return options[Math.floor(this.random() * options.length) % options.length];
  }
}
