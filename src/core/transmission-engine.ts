/**
 * Store-and-forward state machine driving one bundle from source to
 * destination
 *
 * SelectPath → AdvanceHop → LinkCheck → Commit | Disrupted
 * Disrupted → Reroute | RecoveryRetry → AdvanceHop | Reroute
 * ... → Delivered | Failed(reason)
 *
 * Each step performs one transition and emits exactly one event. The loop
 * never waits: logical time only accumulates in state.totalDelay.
 */

import { TypedEventEmitter } from '../utils/event-emitter.js';
import { linkKey, type TopologyGraph } from '../graph/index.js';
import { isExpired, type Bundle } from './bundle.js';
import type { BufferStore } from './buffer-store.js';
import type { SimulationConfig } from './config.js';
import type { DisruptionModel } from './disruption-model.js';
import { BufferFullError, NoPathError } from './errors.js';
import type {
  FailureReason,
  TransmissionEventAttributes,
  TransmissionEventMap,
  TransmissionEventType,
} from './events.js';
import type { Path, Router } from './routing/types.js';

export interface SimulationState {
  readonly bundle: Bundle;
  currentNode: string;
  activePath: readonly string[];
  hopIndex: number; // index of currentNode in activePath
  attemptIndex: number; // index of the active path attempt, from 1
  totalDelay: number; // logical seconds
  readonly disrupted: Set<string>;
  readonly retries: Map<string, number>;
  readonly exhausted: Set<string>;
  readonly triedPaths: Set<string>;
  readonly startedAt: number; // wall clock, ms
}

type RerouteTrigger = 'disruption' | 'exhaustion';

type Phase =
  | { kind: 'SelectPath' }
  | { kind: 'AdvanceHop' }
  | { kind: 'LinkCheck'; next: string }
  | { kind: 'Disrupted'; next: string }
  | { kind: 'Reroute'; next: string; trigger: RerouteTrigger }
  | { kind: 'RecoveryRetry'; next: string }
  | { kind: 'Delivered' }
  | { kind: 'Failed'; reason: FailureReason };

export type RunOutcome =
  | { status: 'Delivered' }
  | { status: 'Failed'; reason: FailureReason };

export interface TransmissionEngineDeps {
  topology: TopologyGraph;
  router: Router;
  disruption: DisruptionModel;
  buffers: BufferStore;
  config: SimulationConfig;
  signal?: AbortSignal;
  clock?: () => number;
}

function pathKey(nodes: readonly string[]): string {
  return nodes.join('>');
}

export class TransmissionEngine extends TypedEventEmitter<TransmissionEventMap> {
  private readonly topology: TopologyGraph;
  private readonly router: Router;
  private readonly disruption: DisruptionModel;
  private readonly buffers: BufferStore;
  private readonly config: SimulationConfig;
  private readonly signal: AbortSignal | undefined;
  private readonly clock: () => number;
  private current: SimulationState | undefined;

  constructor(deps: TransmissionEngineDeps) {
    super();
    this.topology = deps.topology;
    this.router = deps.router;
    this.disruption = deps.disruption;
    this.buffers = deps.buffers;
    this.config = deps.config;
    this.signal = deps.signal;
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * State of the run, once started
   */
  get state(): Readonly<SimulationState> | undefined {
    return this.current;
  }

  /**
   * Drive the bundle to a terminal state. An engine runs exactly once.
   */
  run(bundle: Bundle): RunOutcome {
    if (this.current) {
      throw new Error('TransmissionEngine instances are single-use');
    }

    const state: SimulationState = {
      bundle,
      currentNode: bundle.source,
      activePath: [bundle.source],
      hopIndex: 0,
      attemptIndex: 0,
      totalDelay: 0,
      disrupted: new Set(),
      retries: new Map(),
      exhausted: new Set(),
      triedPaths: new Set(),
      startedAt: this.clock(),
    };
    this.current = state;

    this.record(state, 'run:started', {
      bundleId: bundle.id,
      source: bundle.source,
      destination: bundle.destination,
      size: bundle.size,
      pathsAvailable: this.countAvailablePaths(bundle),
    });

    let phase: Phase = { kind: 'SelectPath' };
    while (phase.kind !== 'Delivered' && phase.kind !== 'Failed') {
      const interrupted = this.interruption(state);
      phase = interrupted ? this.fail(state, interrupted.reason, interrupted.detail) : this.step(state, phase);
    }

    return phase.kind === 'Delivered'
      ? { status: 'Delivered' }
      : { status: 'Failed', reason: phase.reason };
  }

  private step(state: SimulationState, phase: Phase): Phase {
    switch (phase.kind) {
      case 'SelectPath':
        return this.selectPath(state);
      case 'AdvanceHop':
        return this.advanceHop(state);
      case 'LinkCheck':
        return this.linkCheck(state, phase.next);
      case 'Disrupted':
        return this.storeBundle(state, phase.next);
      case 'Reroute':
        return this.reroute(state, phase.next, phase.trigger);
      case 'RecoveryRetry':
        return this.recoveryRetry(state, phase.next);
      default:
        return phase;
    }
  }

  private selectPath(state: SimulationState): Phase {
    const candidate = this.nextCandidate(state, state.disrupted);
    if (!candidate) {
      return this.fail(state, 'NoPath', `no route from ${state.currentNode} to ${state.bundle.destination}`);
    }

    this.activate(state, candidate);
    this.record(state, 'path:selected', {
      attemptIndex: state.attemptIndex,
      path: state.activePath,
      score: candidate.score,
    });
    return { kind: 'AdvanceHop' };
  }

  private advanceHop(state: SimulationState): Phase {
    const { bundle } = state;
    if (state.currentNode === bundle.destination) {
      this.buffers.remove(state.currentNode, bundle);
      this.record(state, 'bundle:delivered', {
        path: state.activePath.slice(0, state.hopIndex + 1),
        totalDelay: state.totalDelay,
        hopCount: state.hopIndex,
      });
      return { kind: 'Delivered' };
    }

    const next = state.activePath[state.hopIndex + 1];
    if (next === undefined) {
      throw new Error(`Active path ${pathKey(state.activePath)} ends before ${bundle.destination}`);
    }

    this.record(state, 'hop:attempted', { from: state.currentNode, to: next });
    return { kind: 'LinkCheck', next };
  }

  /**
   * The single disruption check for this hop attempt
   */
  private linkCheck(state: SimulationState, next: string): Phase {
    const from = state.currentNode;
    const check = this.disruption.checkHop(from, next);
    const key = linkKey(from, next);

    if (check.disrupted) {
      state.disrupted.add(key);
      this.record(state, 'link:disrupted', { from, to: next, cause: check.cause ?? 'outage' });
      return { kind: 'Disrupted', next };
    }

    const link = this.topology.getLink(from, next);
    this.buffers.remove(from, state.bundle);
    state.disrupted.delete(key);
    state.totalDelay += link.delay;
    state.currentNode = next;
    state.hopIndex += 1;

    this.record(state, 'hop:committed', {
      from,
      to: next,
      delay: link.delay,
      totalDelay: state.totalDelay,
    });
    return { kind: 'AdvanceHop' };
  }

  private storeBundle(state: SimulationState, next: string): Phase {
    const nodeId = state.currentNode;
    try {
      this.buffers.store(nodeId, state.bundle);
    } catch (error) {
      if (!(error instanceof BufferFullError)) {
        throw error;
      }
      // Custody stays with the node; try to move on without storing
      this.record(state, 'buffer:full', { nodeId, capacity: error.capacity });
      return { kind: 'Reroute', next, trigger: 'disruption' };
    }

    this.record(state, 'bundle:stored', { nodeId, occupancy: this.buffers.size(nodeId) });
    return { kind: 'Reroute', next, trigger: 'disruption' };
  }

  private reroute(state: SimulationState, next: string, trigger: RerouteTrigger): Phase {
    const blocked = trigger === 'disruption' ? state.disrupted : state.exhausted;
    const candidate = this.nextCandidate(state, blocked);

    if (candidate) {
      this.activate(state, candidate);
      this.record(state, 'path:rerouted', {
        attemptIndex: state.attemptIndex,
        path: state.activePath,
        score: candidate.score,
        at: state.currentNode,
        trigger,
      });
      return { kind: 'AdvanceHop' };
    }

    if (trigger === 'exhaustion') {
      return this.fail(state, 'Exhausted', `no untried route from ${state.currentNode}`);
    }

    this.record(state, 'reroute:unavailable', {
      at: state.currentNode,
      blockedLink: [state.currentNode, next],
    });
    return { kind: 'RecoveryRetry', next };
  }

  /**
   * One retry per step, so cancellation is observed between attempts
   */
  private recoveryRetry(state: SimulationState, next: string): Phase {
    const from = state.currentNode;
    const key = linkKey(from, next);
    const used = state.retries.get(key) ?? 0;
    const maxRetries = this.config.maxRetriesPerLink;

    if (used >= maxRetries) {
      state.exhausted.add(key);
      this.record(state, 'path:failed', {
        attemptIndex: state.attemptIndex,
        path: state.activePath,
        link: [from, next],
      });
      return { kind: 'Reroute', next, trigger: 'exhaustion' };
    }

    const attempt = used + 1;
    state.retries.set(key, attempt);
    const recovered = this.disruption.checkRecovery(from, next);
    if (recovered) {
      state.disrupted.delete(key);
      this.buffers.remove(from, state.bundle);
    }

    this.record(state, 'retry:attempted', { from, to: next, attempt, maxRetries, recovered });
    return recovered ? { kind: 'AdvanceHop' } : { kind: 'RecoveryRetry', next };
  }

  /**
   * Best untried candidate from the current node whose first hop is not
   * blocked and which does not revisit a traversed node
   */
  private nextCandidate(state: SimulationState, blocked: ReadonlySet<string>): Path | undefined {
    const prefix = state.activePath.slice(0, state.hopIndex);
    let candidates: Path[];
    try {
      candidates = this.router.selectAlternatives(
        state.currentNode,
        state.bundle.destination,
        blocked,
        this.config.maxAlternatePaths,
        { exclude: new Set(prefix), maxDepth: this.config.maxPathDepth }
      );
    } catch (error) {
      if (error instanceof NoPathError) {
        return undefined;
      }
      throw error;
    }

    return candidates.find(
      (candidate) => !state.triedPaths.has(pathKey([...prefix, ...candidate.nodes]))
    );
  }

  private activate(state: SimulationState, candidate: Path): void {
    const full = [...state.activePath.slice(0, state.hopIndex), ...candidate.nodes];
    state.activePath = Object.freeze(full);
    state.triedPaths.add(pathKey(full));
    state.attemptIndex += 1;
  }

  private countAvailablePaths(bundle: Bundle): number {
    try {
      return this.router.enumeratePaths(bundle.source, bundle.destination, this.config.maxPathDepth).length;
    } catch (error) {
      if (error instanceof NoPathError) {
        return 0;
      }
      throw error;
    }
  }

  private interruption(
    state: SimulationState
  ): { reason: FailureReason; detail: string } | undefined {
    if (this.signal?.aborted) {
      return { reason: 'Cancelled', detail: 'cancellation requested' };
    }

    const { maxTotalDelay, maxWallTimeMs } = this.config;
    if (maxTotalDelay !== undefined && state.totalDelay > maxTotalDelay) {
      return { reason: 'Timeout', detail: `logical delay ${state.totalDelay}s exceeds ${maxTotalDelay}s` };
    }

    const now = this.clock();
    if (maxWallTimeMs !== undefined && now - state.startedAt > maxWallTimeMs) {
      return { reason: 'Timeout', detail: `wall time exceeds ${maxWallTimeMs}ms` };
    }
    if (isExpired(state.bundle, now)) {
      return { reason: 'Timeout', detail: `bundle ${state.bundle.id} expired` };
    }
    return undefined;
  }

  private fail(state: SimulationState, reason: FailureReason, detail: string): Phase {
    this.record(state, 'run:failed', { reason, nodeId: state.currentNode, detail });
    return { kind: 'Failed', reason };
  }

  private record<K extends TransmissionEventType>(
    state: SimulationState,
    type: K,
    attributes: TransmissionEventAttributes[K]
  ): void {
    // TransmissionEventMap[K] is not narrowed for a generic K
    this.emit(type, { type, timestamp: state.totalDelay, attributes } as TransmissionEventMap[K]);
  }
}
