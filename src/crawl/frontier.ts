/**
 * Priority frontier with suspending consumers.
 *
 * Lower priority values dequeue first; equal priorities dequeue in insertion order.
 * The queue is unbounded. `take()` suspends while the queue is empty and resolves
 * `null` once the frontier is closed, either explicitly or because every consumer
 * is waiting on an empty queue (no producer is left to refill it).
 */
import type { FrontierEntry } from './types.js';

interface HeapItem extends FrontierEntry {
  seq: number;
}

export interface PriorityFrontierOptions {
  /**
   * Number of consumers calling `take()`. When all of them are suspended on an
   * empty queue, the frontier closes itself. Defaults to no idle shutdown.
   */
  consumers?: number;
}

function before(a: HeapItem, b: HeapItem): boolean {
  return a.priority < b.priority || (a.priority === b.priority && a.seq < b.seq);
}

export class PriorityFrontier {
  private heap: HeapItem[] = [];
  private waiters: Array<() => void> = [];
  private nextSeq = 0;
  private isClosed = false;
  private isExhausted = false;
  private consumers: number;

  constructor(options: PriorityFrontierOptions = {}) {
    this.consumers = options.consumers ?? Infinity;
  }

  /** Insert an entry. Returns false, dropping the entry, once the frontier is closed. */
  put(priority: number, node: string): boolean {
    if (this.isClosed) return false;

    this.heap.push({ priority, node, seq: this.nextSeq++ });
    this.siftUp(this.heap.length - 1);

    // The woken taker resumes after the current synchronous run of puts,
    // so it sees the lowest entry of the whole batch, not just this one.
    this.waiters.shift()?.();
    return true;
  }

  /** Remove and return the lowest entry, suspending while the queue is empty. */
  async take(): Promise<FrontierEntry | null> {
    for (;;) {
      if (this.isClosed) return null;

      const item = this.pop();
      if (item) return { priority: item.priority, node: item.node };

      if (this.waiters.length + 1 >= this.consumers) {
        this.isExhausted = true;
        this.close();
        return null;
      }

      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  /** Stop accepting entries and wake every suspended `take()`. Idempotent. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }

  get size(): number {
    return this.heap.length;
  }

  /** Number of consumers currently suspended in `take()`. */
  get waiting(): number {
    return this.waiters.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** True when the frontier closed itself because it ran dry with every consumer idle. */
  get exhausted(): boolean {
    return this.isExhausted;
  }

  private pop(): HeapItem | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private siftUp(index: number): void {
    const heap = this.heap;
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const heap = this.heap;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < heap.length && before(heap[left], heap[smallest])) smallest = left;
      if (right < heap.length && before(heap[right], heap[smallest])) smallest = right;
      if (smallest === i) return;
      [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
      i = smallest;
    }
  }
}
