/**
 * Shared adjacency structure recording, per expanded page, the pages it links to.
 *
 * Workers interleave only at `await` points and every method here is synchronous,
 * so each call (including the check-then-mark in `claim`) is atomic with respect to
 * other workers. Edges are only ever added.
 */
export class LinkGraph {
  private adjacency = new Map<string, Set<string>>();
  private claimed = new Set<string>();
  private edgeTotal = 0;

  /** Has this node been expanded, or has a worker already claimed its expansion? */
  hasEntry(node: string): boolean {
    return this.adjacency.has(node) || this.claimed.has(node);
  }

  /**
   * Claim a node for expansion. Returns false when it is already expanded or
   * claimed, in which case the caller must skip it.
   */
  claim(node: string): boolean {
    if (this.hasEntry(node)) return false;
    this.claimed.add(node);
    return true;
  }

  /** Record `source → target`. Adding an existing edge is a no-op. */
  addEdge(source: string, target: string): void {
    let targets = this.adjacency.get(source);
    if (!targets) {
      targets = new Set();
      this.adjacency.set(source, targets);
    }
    if (!targets.has(target)) {
      targets.add(target);
      this.edgeTotal++;
    }
  }

  /** Mark a node as expanded, even if it links nowhere. */
  markExpanded(node: string): void {
    if (!this.adjacency.has(node)) this.adjacency.set(node, new Set());
    this.claimed.delete(node);
  }

  neighbors(node: string): ReadonlySet<string> {
    return this.adjacency.get(node) ?? new Set();
  }

  get edgeCount(): number {
    return this.edgeTotal;
  }

  /** Number of nodes with a recorded out-edge entry. */
  get expandedCount(): number {
    return this.adjacency.size;
  }

  *edges(): IterableIterator<[string, string]> {
    for (const [source, targets] of this.adjacency) {
      for (const target of targets) yield [source, target];
    }
  }
}
