import type { FetchError } from '../utils/errors.js';
import type { EngineName } from './crawl-spec.js';
import type { Proxy } from './proxy.js';

export type HeaderSet = Record<string, string>;

export interface FetchRequest {
  timeoutMs: number;
  headers: HeaderSet;
  proxy?: Proxy;
  /** Responses smaller than this are classified as blocked */
  minContentBytes: number;
  waitForSelector?: string;
}

export type FetchOutcome =
  | { ok: true; html: string; status: number; bytes: number; finalUrl: string }
  | { ok: false; error: FetchError };

export interface FetchEngine {
  readonly name: EngineName;
  fetch(url: string, request: FetchRequest): Promise<FetchOutcome>;
  close(): Promise<void>;
}

export type ClickResult = 'clicked' | 'missing';

/** A live document that can be extended by clicking a "load more" control */
export interface InteractivePage {
  html(): Promise<string>;
  click(selector: string): Promise<ClickResult>;
  close(): Promise<void>;
}

export interface InteractiveEngine extends FetchEngine {
  open(url: string, request: FetchRequest): Promise<InteractivePage>;
}

export function isInteractive(engine: FetchEngine): engine is InteractiveEngine {
  return 'open' in engine && typeof engine.open === 'function';
}
