import type { CrawlSpec, EngineName } from '../types/crawl-spec.js';
import { ENGINE_NAMES } from '../types/crawl-spec.js';
import type { FetchEngine } from '../types/fetch.js';
import { isInteractive } from '../types/fetch.js';
import type { EngineSet } from '../drivers/engine-set.js';
import type { Requester } from '../drivers/requester.js';
import { countMatches } from '../drivers/extractor.js';
import { ConfigurationError, EngineSelectionError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('engine-selector');

export interface ProbeAttempt {
  engine: EngineName;
  matches: number;
  reason?: string;
}

export interface EngineSelection {
  engine: FetchEngine;
  forced: boolean;
  attempts: ProbeAttempt[];
}

/**
 * Picks the cheapest engine that can see the archive items of a category.
 * Candidates are tried in ENGINE_NAMES order; the first whose copy of the
 * archive page has at least `minProbeMatches` items wins.
 */
export class EngineSelector {
  constructor(
    private readonly engines: EngineSet,
    private readonly requester: Requester
  ) {}

  /**
   * Reject a forced engine that cannot serve the category. Makes no request.
   */
  validate(spec: CrawlSpec): void {
    if (!spec.forceEngine || spec.pagination.kind !== 'click') return;
    if (!isInteractive(this.engines.get(spec.forceEngine))) {
      throw new ConfigurationError(
        `Engine "${spec.forceEngine}" cannot drive click pagination for ${spec.site}/${spec.category}`
      );
    }
  }

  async select(spec: CrawlSpec): Promise<EngineSelection> {
    this.validate(spec);
    const needsInteraction = spec.pagination.kind === 'click';

    if (spec.forceEngine) {
      const engine = this.engines.get(spec.forceEngine);
      log.verbose(`${spec.category}: using forced engine ${spec.forceEngine}`);
      return { engine, forced: true, attempts: [] };
    }

    const attempts: ProbeAttempt[] = [];
    for (const name of ENGINE_NAMES) {
      const engine = this.engines.get(name);
      if (needsInteraction && !isInteractive(engine)) {
        log.debug(`${spec.category}: skipping ${name}, click pagination needs a browser`);
        continue;
      }

      const attempt = await this.probe(engine, spec);
      attempts.push(attempt);
      if (attempt.reason === undefined) {
        log.normal(`${spec.category}: selected ${name} engine (${attempt.matches} archive items)`);
        return { engine, forced: false, attempts };
      }
      log.verbose(`${spec.category}: ${name} probe failed: ${attempt.reason}`);
    }

    throw new EngineSelectionError(spec.archiveUrl, attempts.map(a => ({ engine: a.engine, reason: a.reason ?? 'unknown' })));
  }

  private async probe(engine: FetchEngine, spec: CrawlSpec): Promise<ProbeAttempt> {
    const outcome = await this.requester.fetch(
      engine,
      spec.archiveUrl,
      { timeoutMs: spec.timeoutMs, minContentBytes: spec.minContentBytes, waitForSelector: spec.waitForSelector },
      { throttled: false }
    );
    if (!outcome.ok) {
      return { engine: engine.name, matches: 0, reason: `${outcome.error.kind}: ${outcome.error.message}` };
    }

    const matches = countMatches(outcome.html, spec.itemSelector);
    if (matches < spec.minProbeMatches) {
      return {
        engine: engine.name,
        matches,
        reason: `${matches} matches for "${spec.itemSelector}", need ${spec.minProbeMatches}`
      };
    }
    return { engine: engine.name, matches };
  }
}
