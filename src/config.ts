/**
 * Crawl options: schema, defaults and validation
 */
import { z } from 'zod';

export const DEFAULT_CONCURRENCY = 25;
export const DEFAULT_TIMEOUT_MS = 20000;
export const DEFAULT_LINK_PREFIX = '/wiki/';
export const DEFAULT_USER_AGENT = 'linkpath/0.1 (+link path finder)';

export const CrawlOptionsSchema = z.object({
  /** Size of the fetch limiter: the bound on simultaneous outbound requests. */
  concurrency: z.number().int().positive().max(100).default(DEFAULT_CONCURRENCY),
  /** Number of worker loops. Defaults to `concurrency`. */
  workers: z.number().int().positive().max(200).optional(),
  /** Ordered keywords; earlier keywords rank links ahead of later ones. */
  keywords: z.array(z.string().min(1)).default([]),
  /** Cap on page expansions, start page included. Unbounded when absent. */
  maxPages: z.number().int().positive().optional(),
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  /** Path prefix an href must start with to count as an article link. */
  linkPrefix: z.string().startsWith('/').default(DEFAULT_LINK_PREFIX),
  /** Globs matched against the link path; matching links are dropped. */
  exclude: z.array(z.string().min(1)).default([]),
});

export type CrawlOptions = z.input<typeof CrawlOptionsSchema>;

export type ResolvedCrawlOptions = z.output<typeof CrawlOptionsSchema> & { workers: number };

/**
 * Validate options and fill in defaults. Throws if any option is invalid.
 */
export function resolveCrawlOptions(input: CrawlOptions = {}): ResolvedCrawlOptions {
  const result = CrawlOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new Error(`Invalid crawl options:\n${issues.join('\n')}`);
  }

  const options = result.data;
  return { ...options, workers: options.workers ?? options.concurrency };
}
