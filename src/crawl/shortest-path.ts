/**
 * Breadth-first path reconstruction over the recorded graph
 */
import type { LinkGraph } from './link-graph.js';

/**
 * Shortest path by edge count from `start` to `target`, using only the edges the
 * graph holds right now. Returns `[]` when `target` is unreachable.
 *
 * Each node keeps the path of whichever BFS step reached it first; ties among
 * same-level parents follow set iteration order. Because crawling stops at the first
 * page that links to the target, this is the shortest path in the explored part of
 * the site, which is not necessarily the shortest path that exists.
 */
export function shortestPath(graph: LinkGraph, start: string, target: string): string[] {
  const parents = new Map<string, string | null>([[start, null]]);
  const queue: string[] = [start];

  for (let head = 0; head < queue.length && !parents.has(target); head++) {
    const at = queue[head];
    for (const next of graph.neighbors(at)) {
      if (parents.has(next)) continue;
      parents.set(next, at);
      queue.push(next);
    }
  }

  if (!parents.has(target)) return [];

  const path: string[] = [];
  for (let node: string | null | undefined = target; node != null; node = parents.get(node)) {
    path.push(node);
  }
  return path.reverse();
}
