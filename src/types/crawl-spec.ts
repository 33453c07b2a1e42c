import { z } from 'zod';

export const ENGINE_NAMES = ['http', 'render', 'driver'] as const;
export type EngineName = typeof ENGINE_NAMES[number];

export const OUTPUT_FORMATS = ['ndjson', 'json'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

/**
 * How further archive pages are discovered after the first one.
 * `template` accepts `{n}` (page index) and `{offset}` ((n-1) * offsetStep).
 */
export type PaginationStrategy =
  | { kind: 'none' }
  | { kind: 'queryparam'; template: string; offsetStep: number }
  | { kind: 'click'; selector: string }
  | { kind: 'scroll' };

export type PaginationKind = PaginationStrategy['kind'];

export type DelayPolicy =
  | { kind: 'none' }
  | { kind: 'fixed'; seconds: number }
  | { kind: 'range'; min: number; max: number };

/**
 * Resolved, immutable configuration for crawling one category of one site.
 */
export interface CrawlSpec {
  readonly site: string;
  readonly category: string;
  readonly archiveUrl: string;
  readonly itemSelector: string;
  readonly contentSelector: string;
  readonly thumbnailSelector: string;
  readonly waitForSelector?: string;
  readonly pagination: PaginationStrategy;
  readonly delay: DelayPolicy;
  readonly maxPages: number;  // 0 = unlimited
  readonly forceEngine?: EngineName;
  readonly useProxy: boolean;
  readonly respectRobots: boolean;
  readonly timeoutMs: number;
  readonly minContentBytes: number;
  readonly minProbeMatches: number;
  readonly emptyPageThreshold: number;
  readonly maxIdleClicks: number;
}

export const DEFAULT_CRAWL_SETTINGS = {
  thumbnailSelector: 'img',
  timeoutMs: 30_000,
  minContentBytes: 1000,
  minProbeMatches: 1,
  emptyPageThreshold: 2,
  maxIdleClicks: 2,
  offsetStep: 10,
  delay: '1'
} as const;

// db/sites.json

export const PaginationConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none') }),
  z.object({
    type: z.literal('queryparam'),
    param: z.string().min(1),
    offsetStep: z.number().int().positive().optional()
  }),
  z.object({ type: z.literal('click'), selector: z.string().min(1) }),
  z.object({ type: z.literal('scroll') })
]);

export type PaginationConfig = z.infer<typeof PaginationConfigSchema>;

// Tuning knobs accepted on a site and overridden per category
const ThresholdFields = {
  minContentBytes: z.number().int().nonnegative().optional(),
  minProbeMatches: z.number().int().positive().optional(),
  emptyPageThreshold: z.number().int().positive().optional(),
  maxIdleClicks: z.number().int().positive().optional()
};

export const CategoryConfigSchema = z.object({
  name: z.string().regex(/^[^,\s]+$/, 'category names cannot contain commas or whitespace'),
  archiveUrl: z.string().url(),
  itemSelector: z.string().min(1).optional(),
  contentSelector: z.string().min(1).optional(),
  thumbnailSelector: z.string().min(1).optional(),
  waitForSelector: z.string().min(1).optional(),
  pagination: PaginationConfigSchema.default({ type: 'none' }),
  ...ThresholdFields
});

export type CategoryConfig = z.infer<typeof CategoryConfigSchema>;

export const SiteConfigSchema = z.object({
  name: z.string().min(1),
  itemSelector: z.string().min(1),
  contentSelector: z.string().min(1),
  thumbnailSelector: z.string().min(1).optional(),
  waitForSelector: z.string().min(1).optional(),
  engine: z.enum(ENGINE_NAMES).optional(),
  delay: z.string().optional(),
  ...ThresholdFields,
  categories: z.array(CategoryConfigSchema).min(1)
});

export type SiteConfig = z.infer<typeof SiteConfigSchema>;

export const SitesFileSchema = z.object({
  sites: z.array(SiteConfigSchema)
});

export type SitesFile = z.infer<typeof SitesFileSchema>;
