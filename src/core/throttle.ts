import type { DelayPolicy } from '../types/crawl-spec.js';

export type Sleep = (ms: number) => Promise<void>;

export interface ThrottleOptions {
  sleep?: Sleep;
  random?: () => number;
}

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Spaces out network fetches according to a delay policy.
 * The first fetch goes out immediately; every later one waits a freshly drawn delay.
 */
export class Throttle {
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private started = false;

  constructor(
    private readonly policy: DelayPolicy,
    options: ThrottleOptions = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  nextDelayMs(): number {
    switch (this.policy.kind) {
      case 'none':
        return 0;
      case 'fixed':
        return Math.round(this.policy.seconds * 1000);
      case 'range': {
        const seconds = this.policy.min + this.random() * (this.policy.max - this.policy.min);
        return Math.round(seconds * 1000);
      }
    }
  }

  /**
   * Call before every fetch. `minimumMs` raises the drawn delay, as a site's
   * robots.txt Crawl-delay does. Resolves with the milliseconds waited.
   */
  async beforeFetch(minimumMs = 0): Promise<number> {
    if (!this.started) {
      this.started = true;
      return 0;
    }

    const ms = Math.max(this.nextDelayMs(), minimumMs);
    if (ms > 0) {
      await this.sleep(ms);
    }
    return ms;
  }
}
