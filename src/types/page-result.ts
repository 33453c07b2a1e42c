export type PageStatus = 'ok' | 'not_found' | 'blocked' | 'error';

export interface PageResult {
  page: number;
  url: string;
  itemUrls: string[];
  bytes: number;
  status: PageStatus;
  httpStatus?: number;
  terminal: boolean;
}

export type PaginationPhase = 'active' | 'exhausted';

export type ExhaustionReason =
  | 'single_page'
  | 'page_limit'
  | 'not_found'
  | 'no_items'
  | 'degraded'
  | 'empty_pages'
  | 'control_missing'
  | 'idle_clicks';

export type Advance =
  | { phase: 'active'; page: number; url: string }
  | { phase: 'exhausted'; reason: ExhaustionReason };
