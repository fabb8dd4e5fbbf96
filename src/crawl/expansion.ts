/**
 * Page expansion: fetch a page, extract and rank its links, record them as edges
 * and feed the frontier
 */
import type pLimit from 'p-limit';
import { logger } from '../logger.js';
import type { FetchPage, PageFetchResult } from '../fetch/types.js';
import type { PriorityFrontier } from './frontier.js';
import type { LinkGraph } from './link-graph.js';
import { prioritizeLinks } from './prioritizer.js';
import type { TerminationSignal } from './termination-signal.js';
import type { ExpansionOutcome, ExtractLinks } from './types.js';

export interface ExpansionContext {
  target: string;
  keywords: readonly string[];
  graph: LinkGraph;
  frontier: PriorityFrontier;
  signal: TerminationSignal;
  fetchPage: FetchPage;
  extractLinks: ExtractLinks;
  /** Shared fetch limiter: bounds simultaneous fetches across all workers. */
  limit: ReturnType<typeof pLimit>;
}

function resolveHref(href: string, base: string): string | null {
  try {
    return new URL(href, base).href;
  } catch {
    return null;
  }
}

/**
 * Expand `current`. Fetch failures are reported as `not_fetchable` and leave no
 * trace in the graph; extractor errors propagate to the caller.
 */
export async function expandNode(
  current: string,
  context: ExpansionContext
): Promise<ExpansionOutcome> {
  const { target, keywords, graph, frontier, signal } = context;

  let fetched: PageFetchResult | null;
  try {
    fetched = await context.limit(async () => {
      // Waiting for a slot can outlast the crawl
      if (signal.isSet()) return null;
      return context.fetchPage(current);
    });
  } catch (error) {
    logger.debug({ url: current, error: String(error) }, 'Fetch threw, skipping page');
    return { status: 'not_fetchable', error: 'fetch_threw' };
  }

  if (fetched === null) {
    return { status: 'cancelled' };
  }

  if (!fetched.success) {
    logger.debug(
      { url: current, error: fetched.error, details: fetched.errorDetails },
      'Fetch failed, not a document'
    );
    return { status: 'not_fetchable', error: fetched.error };
  }

  const links = context.extractLinks(fetched.html);
  logger.debug({ url: current, links: links.length, latencyMs: fetched.latencyMs }, 'Fetched page');

  let targetFound = false;
  for (const { priority, href } of prioritizeLinks(links, keywords)) {
    const next = resolveHref(href, current);
    if (next === null) {
      logger.debug({ url: current, href }, 'Unresolvable href');
      continue;
    }

    graph.addEdge(current, next);
    if (next === target) {
      logger.info({ url: current, target }, 'Target found');
      signal.set();
      targetFound = true;
      break;
    }

    frontier.put(priority, next);
  }

  graph.markExpanded(current);
  return { status: 'expanded', links: links.length, targetFound };
}
