/**
 * linkpath - find a hyperlink path between two wiki pages by concurrent,
 * keyword-prioritized crawling.
 *
 * @module linkpath
 */
export * from './crawl/index.js';
export { fetchPage, createPageFetcher, validateDocument } from './fetch/index.js';
export { resolveCrawlOptions, CrawlOptionsSchema } from './config.js';
export type { CrawlOptions, ResolvedCrawlOptions } from './config.js';
export type { FetchPage, PageFetchResult, FetchError } from './fetch/index.js';
