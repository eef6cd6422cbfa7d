/**
 * Folds transition events into the immutable per-run statistics record
 */

import type { BufferOccupancy } from './buffer-store.js';
import type { FailureReason, TransmissionEvent } from './events.js';
import type { PathAttempt } from './routing/types.js';
import { linkKey } from '../graph/index.js';

export type RunStatus = 'Delivered' | 'Failed';

export interface StatsRecord {
  readonly bundleId: string;
  readonly source: string;
  readonly destination: string;
  readonly status: RunStatus;
  readonly reason: FailureReason | null;
  readonly totalDelay: number;
  readonly hopCount: number;
  readonly totalRetransmissions: number;
  readonly disruptionCount: number;
  readonly storageEvents: number;
  readonly finalPath: readonly string[];
  readonly traversedPath: readonly string[];
  readonly pathHistory: readonly PathAttempt[];
  readonly pathsAttempted: number;
  readonly pathsAvailable: number;
  readonly bufferOccupancy: BufferOccupancy;
  readonly maxStoredBundles: number;
  readonly disruptedLinks: ReadonlyArray<readonly [string, string]>;
  readonly eventCount: number;
}

export interface BufferReport {
  snapshot(): BufferOccupancy;
  readonly peakOccupancy: number;
}

export class StatsRecorder {
  private bundleId = '';
  private source = '';
  private destination = '';
  private status: RunStatus | undefined;
  private reason: FailureReason | null = null;
  private totalDelay = 0;
  private retransmissions = 0;
  private disruptions = 0;
  private storageEvents = 0;
  private pathsAvailable = 0;
  private activePath: readonly string[] = [];
  private traversed: string[] = [];
  private history: PathAttempt[] = [];
  private disrupted = new Map<string, readonly [string, string]>();
  private eventCount = 0;

  /**
   * Consume one engine event. Usable directly as an EventSink.
   */
  readonly record = (event: TransmissionEvent): void => {
    this.eventCount++;

    switch (event.type) {
      case 'run:started':
        this.bundleId = event.attributes.bundleId;
        this.source = event.attributes.source;
        this.destination = event.attributes.destination;
        this.pathsAvailable = event.attributes.pathsAvailable;
        this.traversed = [event.attributes.source];
        break;

      case 'path:selected':
        this.activePath = event.attributes.path;
        this.history.push({
          attemptIndex: event.attributes.attemptIndex,
          path: event.attributes.path,
          status: 'Selected',
        });
        break;

      case 'path:rerouted':
        this.activePath = event.attributes.path;
        this.history.push({
          attemptIndex: event.attributes.attemptIndex,
          path: event.attributes.path,
          status: 'Rerouted',
        });
        break;

      case 'path:failed':
        this.history.push({
          attemptIndex: event.attributes.attemptIndex,
          path: event.attributes.path,
          status: 'Failed',
        });
        break;

      case 'hop:committed':
        this.traversed.push(event.attributes.to);
        this.totalDelay = event.attributes.totalDelay;
        this.disrupted.delete(linkKey(event.attributes.from, event.attributes.to));
        break;

      case 'link:disrupted':
        this.disruptions++;
        this.disrupted.set(linkKey(event.attributes.from, event.attributes.to), [
          event.attributes.from,
          event.attributes.to,
        ]);
        break;

      case 'bundle:stored':
        this.storageEvents++;
        break;

      case 'retry:attempted':
        this.retransmissions++;
        if (event.attributes.recovered) {
          this.disrupted.delete(linkKey(event.attributes.from, event.attributes.to));
        }
        break;

      case 'bundle:delivered':
        this.status = 'Delivered';
        this.totalDelay = event.attributes.totalDelay;
        break;

      case 'run:failed':
        this.status = 'Failed';
        this.reason = event.attributes.reason;
        break;

      default:
        break;
    }
  };

  /**
   * Freeze the aggregate. Call once the engine reached a terminal state.
   */
  finalize(buffers: BufferReport): StatsRecord {
    if (this.status === undefined) {
      throw new Error('Cannot finalize statistics before the run terminated');
    }

    const pathHistory = this.history.map((attempt) =>
      Object.freeze({ ...attempt, path: Object.freeze([...attempt.path]) })
    );

    return Object.freeze({
      bundleId: this.bundleId,
      source: this.source,
      destination: this.destination,
      status: this.status,
      reason: this.reason,
      totalDelay: this.totalDelay,
      hopCount: this.traversed.length - 1,
      totalRetransmissions: this.retransmissions,
      disruptionCount: this.disruptions,
      storageEvents: this.storageEvents,
      finalPath: Object.freeze([...this.activePath]),
      traversedPath: Object.freeze([...this.traversed]),
      pathHistory: Object.freeze(pathHistory),
      pathsAttempted: this.history.filter((a) => a.status !== 'Failed').length,
      pathsAvailable: this.pathsAvailable,
      bufferOccupancy: buffers.snapshot(),
      maxStoredBundles: buffers.peakOccupancy,
      disruptedLinks: Object.freeze(
        Array.from(this.disrupted.entries())
          .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
          .map(([, pair]) => pair)
      ),
      eventCount: this.eventCount,
    });
  }
}
