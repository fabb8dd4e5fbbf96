/**
 * Path-finding crawl orchestrator
 */
import pLimit from 'p-limit';
import { resolveCrawlOptions, type CrawlOptions } from '../config.js';
import { createPageFetcher } from '../fetch/page-fetcher.js';
import { logger } from '../logger.js';
import { expandNode, type ExpansionContext } from './expansion.js';
import { PriorityFrontier } from './frontier.js';
import { LinkGraph } from './link-graph.js';
import { createLinkExtractor } from './link-extractor.js';
import { shortestPath } from './shortest-path.js';
import { TerminationSignal } from './termination-signal.js';
import { runWorkers } from './worker-pool.js';
import type { Collaborators, PathOutcome, PathSearchResult } from './types.js';

/**
 * Crawl from `start` until some page links to `target`, then return the shortest
 * path within the recorded link graph, together with crawl statistics.
 *
 * Strategy:
 * 1. Expand the start page directly; if it cannot be fetched, give up
 * 2. Run the worker pool over the keyword-prioritized frontier
 * 3. Breadth-first search over the edges recorded when the pool stopped
 */
export async function crawlForPath(
  start: string,
  target: string,
  options: CrawlOptions = {},
  collaborators: Collaborators = {}
): Promise<PathSearchResult> {
  const opts = resolveCrawlOptions(options);
  const startUrl = new URL(start).href;
  const targetUrl = new URL(target).href;
  const crawlStartTime = Date.now();

  const graph = new LinkGraph();
  let pagesExpanded = 0;
  let pagesFailed = 0;

  function finish(path: string[], outcome: PathOutcome): PathSearchResult {
    const result = {
      path,
      outcome,
      start: startUrl,
      target: targetUrl,
      pagesExpanded,
      pagesFailed,
      edgeCount: graph.edgeCount,
      durationMs: Date.now() - crawlStartTime,
      graph,
    };
    logger.info(
      {
        outcome,
        hops: Math.max(path.length - 1, 0),
        pagesExpanded,
        pagesFailed,
        edgeCount: result.edgeCount,
        durationMs: result.durationMs,
      },
      'Crawl finished'
    );
    return result;
  }

  if (startUrl === targetUrl) {
    return finish([startUrl], 'found');
  }

  logger.info(
    {
      start: startUrl,
      target: targetUrl,
      concurrency: opts.concurrency,
      workers: opts.workers,
      keywords: opts.keywords,
    },
    'Starting path crawl'
  );

  const frontier = new PriorityFrontier({ consumers: opts.workers });
  const signal = new TerminationSignal();
  const context: ExpansionContext = {
    target: targetUrl,
    keywords: opts.keywords,
    graph,
    frontier,
    signal,
    fetchPage:
      collaborators.fetchPage ??
      createPageFetcher({ timeout: opts.timeout, userAgent: opts.userAgent }),
    extractLinks:
      collaborators.extractLinks ??
      createLinkExtractor({ linkPrefix: opts.linkPrefix, exclude: opts.exclude }),
    limit: pLimit(opts.concurrency),
  };

  // The start page is expanded here, before any worker runs
  graph.claim(startUrl);
  const first = await expandNode(startUrl, context);
  if (first.status !== 'expanded') {
    pagesFailed++;
    logger.error({ start: startUrl, outcome: first }, 'Initial fetch failed: start page not fetchable');
    return finish([], 'start_not_fetchable');
  }
  pagesExpanded++;

  const pool = await runWorkers({
    workers: opts.workers,
    frontier,
    graph,
    signal,
    expand: (node) => expandNode(node, context),
    maxPages: opts.maxPages,
    alreadyExpanded: 1,
  });
  pagesExpanded += pool.expanded;
  pagesFailed += pool.failed;

  const path = shortestPath(graph, startUrl, targetUrl);
  if (path.length > 0) return finish(path, 'found');
  return finish(path, pool.stoppedByLimit ? 'page_limit' : 'unreachable');
}

/**
 * Find a path of links from `start` to `target`. Returns `[]` when none was found;
 * use `crawlForPath` to tell the reasons apart.
 */
export async function findPath(
  start: string,
  target: string,
  options: CrawlOptions = {},
  collaborators: Collaborators = {}
): Promise<string[]> {
  const result = await crawlForPath(start, target, options, collaborators);
  return result.path;
}
