/**
 * Fixed pool of worker loops draining the frontier
 */
import { logger } from '../logger.js';
import type { PriorityFrontier } from './frontier.js';
import type { LinkGraph } from './link-graph.js';
import type { TerminationSignal } from './termination-signal.js';
import type { ExpansionOutcome } from './types.js';

export interface WorkerPoolOptions {
  workers: number;
  frontier: PriorityFrontier;
  graph: LinkGraph;
  signal: TerminationSignal;
  expand: (node: string) => Promise<ExpansionOutcome>;
  /** Cap on expansions, counting `alreadyExpanded`. */
  maxPages?: number;
  /** Expansions done before the pool started (the start page). */
  alreadyExpanded?: number;
}

export interface WorkerPoolResult {
  expanded: number;
  failed: number;
  stoppedByLimit: boolean;
}

/**
 * Run `workers` loops until the termination signal fires or the frontier closes.
 * The frontier should be built with `consumers: workers` so that it closes itself
 * when every loop is idle on an empty queue.
 * If an expansion throws, the frontier is closed so every loop exits, and the
 * first error is rethrown once they have all settled.
 */
export async function runWorkers(options: WorkerPoolOptions): Promise<WorkerPoolResult> {
  const { workers, frontier, graph, signal, expand, maxPages } = options;
  let pagesStarted = options.alreadyExpanded ?? 0;
  let expanded = 0;
  let failed = 0;
  let stoppedByLimit = false;

  // Wake workers suspended on an empty frontier once the target is found
  signal.onSet(() => frontier.close());

  async function worker(id: number): Promise<void> {
    while (!signal.isSet()) {
      const entry = await frontier.take();
      if (!entry) break;
      if (!graph.claim(entry.node)) continue;

      if (maxPages !== undefined && pagesStarted >= maxPages) {
        logger.info({ maxPages }, 'Page limit reached, stopping crawl');
        stoppedByLimit = true;
        frontier.close();
        break;
      }
      pagesStarted++;

      const outcome = await expand(entry.node);
      if (outcome.status === 'expanded') expanded++;
      else if (outcome.status === 'not_fetchable') failed++;
    }
    logger.trace({ worker: id }, 'Worker stopped');
  }

  const settled = await Promise.allSettled(
    Array.from({ length: workers }, (_, id) =>
      worker(id).catch((error: unknown) => {
        frontier.close();
        throw error;
      })
    )
  );

  const rejected = settled.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (rejected) throw rejected.reason;

  return { expanded, failed, stoppedByLimit };
}
