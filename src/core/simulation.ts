/**
 * Bundle relay simulation: wires topology, routing, disruption, buffers and
 * statistics for each run
 */

import type { Logger } from 'pino';
import { TypedEventEmitter } from '../utils/event-emitter.js';
import {
  createSeededRandom,
  type RandomSource,
  type SeededRandom,
} from '../utils/random.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { TopologyGraph } from '../graph/index.js';
import { createBundle, type Bundle } from './bundle.js';
import { BufferStore } from './buffer-store.js';
import { resolveConfig, type SimulationConfig } from './config.js';
import { DisruptionModel } from './disruption-model.js';
import { ConfigError } from './errors.js';
import type { EventSink, TransmissionEvent, TransmissionEventMap } from './events.js';
import { PathRouter } from './routing/path-router.js';
import { StatsRecorder, type StatsRecord } from './stats-recorder.js';
import { TransmissionEngine } from './transmission-engine.js';

export interface SimulationOptions {
  logger?: Logger;
}

export interface RunOptions {
  random?: RandomSource; // overrides the per-run fork of the seeded source
  signal?: AbortSignal;
  sink?: EventSink;
  buffers?: BufferStore; // pre-occupied buffers; must not be shared between runs
  clock?: () => number;
  bundleId?: string;
}

/**
 * Observer that writes each transition to a pino logger at debug level
 */
export function createLogSink(log: Logger): EventSink {
  return (event: TransmissionEvent) => {
    log.debug({ at: event.timestamp, ...event.attributes }, event.type);
  };
}

export class Simulation extends TypedEventEmitter<TransmissionEventMap> {
  readonly config: SimulationConfig;
  readonly topology: TopologyGraph;
  readonly random: SeededRandom;
  readonly router: PathRouter;
  private readonly log: Logger;
  private runCount = 0;

  /**
   * @throws ConfigError when the parameters are invalid
   */
  constructor(
    topology: TopologyGraph,
    config: Partial<SimulationConfig> = {},
    options: SimulationOptions = {}
  ) {
    super();
    this.config = resolveConfig(config);
    this.topology = topology;
    this.random = createSeededRandom(this.config.seed ?? Date.now());
    this.router = new PathRouter(topology, { maxDepth: this.config.maxPathDepth });
    this.log = (options.logger ?? defaultLogger).child({ component: 'simulation' });

    for (const [a, b] of this.config.forcedDisruptions) {
      if (!topology.hasLink(a, b)) {
        throw new ConfigError('forcedDisruptions', `no link between ${a} and ${b}`);
      }
    }
  }

  get runs(): number {
    return this.runCount;
  }

  /**
   * Relay one bundle from source to destination. Each run owns its random
   * source, buffers and disrupted-link set; only the topology is shared.
   */
  run(
    source: string,
    destination: string,
    payload: string | Uint8Array,
    options: RunOptions = {}
  ): StatsRecord {
    for (const [field, id] of [
      ['source', source],
      ['destination', destination],
    ] as const) {
      if (!this.topology.hasNode(id)) {
        throw new ConfigError(field, `unknown node "${id}"`);
      }
    }

    const random = options.random ?? this.random.fork();
    const clock = options.clock ?? Date.now;
    const bundle = createBundle(source, destination, payload, {
      ...(options.bundleId !== undefined ? { id: options.bundleId } : {}),
      ...(this.config.bundleTtlMs !== undefined ? { ttlMs: this.config.bundleTtlMs } : {}),
      createdAt: clock(),
      random,
    });

    return this.execute(bundle, random, clock, options);
  }

  private execute(
    bundle: Bundle,
    random: RandomSource,
    clock: () => number,
    options: RunOptions
  ): StatsRecord {
    this.runCount++;
    const buffers =
      options.buffers ??
      new BufferStore(this.config.bufferCapacityPerNode, this.topology.getNodeIds());
    const engine = new TransmissionEngine({
      topology: this.topology,
      router: this.router,
      disruption: new DisruptionModel(
        {
          errorRate: this.config.errorRate,
          disruptionRate: this.config.disruptionRate,
          forcedLinks: this.config.forcedDisruptions,
        },
        random
      ),
      buffers,
      config: this.config,
      ...(options.signal ? { signal: options.signal } : {}),
      clock,
    });

    const recorder = new StatsRecorder();
    const runLog = this.log.child({ bundleId: bundle.id });
    const sinks: EventSink[] = [recorder.record, createLogSink(runLog)];
    if (options.sink) {
      sinks.push(options.sink);
    }
    engine.onAny((type, event) => {
      for (const sink of sinks) {
        sink(event);
      }
      this.emit(type, event);
    });

    const outcome = engine.run(bundle);
    const stats = recorder.finalize(buffers);

    if (outcome.status === 'Delivered') {
      runLog.info(
        {
          path: stats.finalPath.join(' -> '),
          totalDelay: stats.totalDelay,
          retransmissions: stats.totalRetransmissions,
          disruptions: stats.disruptionCount,
        },
        'bundle delivered'
      );
    } else {
      runLog.warn(
        {
          reason: outcome.reason,
          retransmissions: stats.totalRetransmissions,
          disruptions: stats.disruptionCount,
          heldAt: buffers.locate(bundle.id) ?? null,
        },
        'bundle not delivered'
      );
    }

    return stats;
  }

  /**
   * Restore the seeded random source so the next runs replay
   */
  reset(): void {
    this.random.reset();
    this.runCount = 0;
  }
}

/**
 * One-shot run on a shared topology
 */
export function simulate(
  topology: TopologyGraph,
  source: string,
  destination: string,
  payload: string | Uint8Array,
  config: Partial<SimulationConfig> = {},
  options: RunOptions & SimulationOptions = {}
): StatsRecord {
  const { logger, ...runOptions } = options;
  const simulation = new Simulation(topology, config, logger ? { logger } : {});
  return simulation.run(source, destination, payload, runOptions);
}
