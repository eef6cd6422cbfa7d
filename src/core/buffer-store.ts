/**
 * Per-node bounded FIFO storage for store-and-forward
 */

import { BufferFullError } from './errors.js';
import type { Bundle } from './bundle.js';

export type BufferOccupancy = Readonly<Record<string, number>>;

export class BufferStore {
  readonly capacity: number;
  private readonly queues = new Map<string, Bundle[]>();
  private readonly locations = new Map<string, string>();
  private peak = 0;

  constructor(capacity: number, nodeIds: Iterable<string> = []) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    for (const id of nodeIds) {
      this.queues.set(id, []);
    }
  }

  /**
   * Append a bundle to a node's queue. Storing a bundle the node already
   * holds is a no-op.
   * @throws BufferFullError when the node is at capacity
   */
  store(nodeId: string, bundle: Bundle): void {
    const holder = this.locations.get(bundle.id);
    if (holder === nodeId) {
      return;
    }
    if (holder !== undefined) {
      throw new Error(`Bundle ${bundle.id} is already buffered at ${holder}`);
    }

    const queue = this.queueFor(nodeId);
    if (queue.length >= this.capacity) {
      throw new BufferFullError(nodeId, this.capacity);
    }

    queue.push(bundle);
    this.locations.set(bundle.id, nodeId);
    this.peak = Math.max(this.peak, queue.length);
  }

  /**
   * Remove a bundle from a node's queue. Returns false if it was not there.
   */
  remove(nodeId: string, bundle: Bundle): boolean {
    const queue = this.queues.get(nodeId);
    if (!queue) return false;

    const index = queue.findIndex((b) => b.id === bundle.id);
    if (index === -1) return false;

    queue.splice(index, 1);
    this.locations.delete(bundle.id);
    return true;
  }

  has(nodeId: string, bundleId: string): boolean {
    return this.locations.get(bundleId) === nodeId;
  }

  /**
   * Node currently holding the bundle, if any
   */
  locate(bundleId: string): string | undefined {
    return this.locations.get(bundleId);
  }

  /**
   * Oldest bundle waiting at a node
   */
  peek(nodeId: string): Bundle | undefined {
    return this.queues.get(nodeId)?.[0];
  }

  size(nodeId: string): number {
    return this.queues.get(nodeId)?.length ?? 0;
  }

  /**
   * Highest single-node occupancy seen since construction or clear()
   */
  get peakOccupancy(): number {
    return this.peak;
  }

  snapshot(): BufferOccupancy {
    const counts: Record<string, number> = {};
    for (const [nodeId, queue] of this.queues) {
      counts[nodeId] = queue.length;
    }
    return Object.freeze(counts);
  }

  clear(): void {
    for (const queue of this.queues.values()) {
      queue.length = 0;
    }
    this.locations.clear();
    this.peak = 0;
  }

  private queueFor(nodeId: string): Bundle[] {
    let queue = this.queues.get(nodeId);
    if (!queue) {
      queue = [];
      this.queues.set(nodeId, queue);
    }
    return queue;
  }
}
