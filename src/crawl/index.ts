/**
 * Crawl module barrel exports
 */
export { crawlForPath, findPath } from './crawler.js';
export { PriorityFrontier } from './frontier.js';
export { LinkGraph } from './link-graph.js';
export { TerminationSignal } from './termination-signal.js';
export { prioritizeLinks } from './prioritizer.js';
export { shortestPath } from './shortest-path.js';
export { extractArticleLinks, createLinkExtractor } from './link-extractor.js';
export { expandNode } from './expansion.js';
export { runWorkers } from './worker-pool.js';
export type { ExpansionContext } from './expansion.js';
export type { LinkExtractorOptions } from './link-extractor.js';
export type { PriorityFrontierOptions } from './frontier.js';
export type { WorkerPoolOptions, WorkerPoolResult } from './worker-pool.js';
export type {
  Collaborators,
  ExpansionOutcome,
  ExtractLinks,
  FrontierEntry,
  LinkAnchor,
  PathOutcome,
  PathSearchResult,
  PrioritizedLink,
} from './types.js';
