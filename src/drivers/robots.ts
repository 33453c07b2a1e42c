/**
 * robots.txt policy
 *
 * Rules are fetched once per origin and cached for the run. A robots.txt
 * that cannot be fetched (network error, 5xx) allows everything, as does a
 * missing one.
 */

import axios from 'axios';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = logger.createContext('robots');

interface RobotsRule {
  allow: boolean;
  pattern: string;
  regex: RegExp;
}

export interface RobotsRules {
  rules: RobotsRule[];
  crawlDelay: number | null;
}

export type RobotsFetcher = (robotsUrl: string) => Promise<string | null>;

export interface RobotsPolicyOptions {
  /** Product token matched against User-agent lines, in addition to `*` */
  userAgentName?: string;
  timeoutMs?: number;
  fetcher?: RobotsFetcher;
}

const ALLOW_ALL: RobotsRules = { rules: [], crawlDelay: null };

function toRegex(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = (anchored ? pattern.slice(0, -1) : pattern)
    .split('*')
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${body}${anchored ? '$' : ''}`);
}

/**
 * Parse robots.txt, keeping the group for our agent if there is one and
 * the `*` group otherwise.
 */
export function parseRobotsTxt(text: string, userAgentName: string): RobotsRules {
  const agent = userAgentName.toLowerCase();
  const groups = new Map<string, RobotsRules>();
  let currentAgents: string[] = [];
  let inRules = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) continue;

    const directive = line.slice(0, colonIndex).trim().toLowerCase();
    const value = line.slice(colonIndex + 1).trim();

    if (directive === 'user-agent') {
      // Consecutive User-agent lines share one group
      if (inRules) {
        currentAgents = [];
        inRules = false;
      }
      currentAgents.push(value.toLowerCase());
      continue;
    }

    if (directive !== 'allow' && directive !== 'disallow' && directive !== 'crawl-delay') continue;
    inRules = true;

    for (const name of currentAgents) {
      const group = groups.get(name) ?? { rules: [], crawlDelay: null };
      groups.set(name, group);

      if (directive === 'crawl-delay') {
        const delay = parseFloat(value);
        if (!isNaN(delay) && delay > 0) group.crawlDelay = delay;
      } else if (value) {
        // Empty Disallow allows everything
        group.rules.push({ allow: directive === 'allow', pattern: value, regex: toRegex(value) });
      }
    }
  }

  return groups.get(agent) ?? groups.get('*') ?? ALLOW_ALL;
}

/**
 * Longest matching pattern wins; Allow wins a tie.
 */
export function isPathAllowed(rules: RobotsRules, path: string): boolean {
  let best: RobotsRule | undefined;
  for (const rule of rules.rules) {
    if (!rule.regex.test(path)) continue;
    if (
      !best ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.allow)
    ) {
      best = rule;
    }
  }
  return best ? best.allow : true;
}

export class RobotsPolicy {
  private readonly cache = new Map<string, Promise<RobotsRules>>();
  private readonly userAgentName: string;
  private readonly fetcher: RobotsFetcher;

  constructor(options: RobotsPolicyOptions = {}) {
    this.userAgentName = options.userAgentName ?? 'archive-crawler';
    const timeoutMs = options.timeoutMs ?? 10_000;
    this.fetcher = options.fetcher ?? (url => fetchRobotsTxt(url, timeoutMs));
  }

  async isAllowed(url: string): Promise<boolean> {
    const target = new URL(url);
    const rules = await this.rulesFor(target.origin);
    return isPathAllowed(rules, `${target.pathname}${target.search}`);
  }

  async crawlDelay(url: string): Promise<number | null> {
    const rules = await this.rulesFor(new URL(url).origin);
    return rules.crawlDelay;
  }

  private rulesFor(origin: string): Promise<RobotsRules> {
    let pending = this.cache.get(origin);
    if (!pending) {
      pending = this.load(origin);
      this.cache.set(origin, pending);
    }
    return pending;
  }

  private async load(origin: string): Promise<RobotsRules> {
    const robotsUrl = `${origin}/robots.txt`;
    try {
      const text = await this.fetcher(robotsUrl);
      if (text === null) {
        log.debug(`No robots.txt at ${robotsUrl}, allowing all`);
        return ALLOW_ALL;
      }
      return parseRobotsTxt(text, this.userAgentName);
    } catch (error) {
      log.verbose(`Could not check ${robotsUrl}, allowing all: ${errorMessage(error)}`);
      return ALLOW_ALL;
    }
  }
}

async function fetchRobotsTxt(robotsUrl: string, timeoutMs: number): Promise<string | null> {
  const response = await axios.get<string>(robotsUrl, {
    timeout: timeoutMs,
    responseType: 'text',
    validateStatus: () => true
  });

  if (response.status >= 400 && response.status < 500) return null;
  if (response.status >= 500) {
    throw new Error(`robots.txt returned ${response.status}`);
  }
  return response.data;
}
