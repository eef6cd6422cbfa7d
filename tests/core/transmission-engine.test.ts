import { describe, it, expect } from 'vitest';
import { TransmissionEngine } from '@/core/transmission-engine';
import { PathRouter } from '@/core/routing/path-router';
import { DisruptionModel } from '@/core/disruption-model';
import { BufferStore } from '@/core/buffer-store';
import { resolveConfig, type SimulationConfig } from '@/core/config';
import { createBundle } from '@/core/bundle';
import type { TransmissionEvent } from '@/core/events';
import type { TopologyGraph } from '@/graph';
import { createScriptedRandom, createSeededRandom, type RandomSource } from '@/utils/random';
import { buildTopology, diamondTopology, lineTopology } from '../support/topologies';

interface Harness {
  engine: TransmissionEngine;
  buffers: BufferStore;
  events: TransmissionEvent[];
}

function setup(
  topology: TopologyGraph,
  overrides: Partial<SimulationConfig> = {},
  options: { random?: RandomSource; buffers?: BufferStore; signal?: AbortSignal } = {}
): Harness {
  const config = resolveConfig({ errorRate: 0, disruptionRate: 0, ...overrides });
  const buffers =
    options.buffers ?? new BufferStore(config.bufferCapacityPerNode, topology.getNodeIds());
  const engine = new TransmissionEngine({
    topology,
    router: new PathRouter(topology, { maxDepth: config.maxPathDepth }),
    disruption: new DisruptionModel(
      {
        errorRate: config.errorRate,
        disruptionRate: config.disruptionRate,
        forcedLinks: config.forcedDisruptions,
      },
      options.random ?? createSeededRandom(7)
    ),
    buffers,
    config,
    ...(options.signal ? { signal: options.signal } : {}),
    clock: () => 0,
  });

  const events: TransmissionEvent[] = [];
  engine.onAny((_type, event) => {
    events.push(event);
  });
  return { engine, buffers, events };
}

const bundleFor = (source: string, destination: string) =>
  createBundle(source, destination, 'payload', { id: 'b-1', createdAt: 0 });

const types = (events: TransmissionEvent[]) => events.map((e) => e.type);

describe('TransmissionEngine', () => {
  it('should deliver along the only path without disruptions', () => {
    const { engine, events } = setup(lineTopology());

    const outcome = engine.run(bundleFor('A', 'C'));

    expect(outcome).toEqual({ status: 'Delivered' });
    expect(types(events)).toEqual([
      'run:started',
      'path:selected',
      'hop:attempted',
      'hop:committed',
      'hop:attempted',
      'hop:committed',
      'bundle:delivered',
    ]);
    const delivered = events[events.length - 1];
    expect(delivered?.type).toBe('bundle:delivered');
    if (delivered?.type === 'bundle:delivered') {
      expect(delivered.attributes).toEqual({ path: ['A', 'B', 'C'], totalDelay: 30, hopCount: 2 });
      expect(delivered.timestamp).toBe(30);
    }
    expect(engine.state?.totalDelay).toBe(30);
  });

  it('should stamp events with accumulated logical delay', () => {
    const { engine, events } = setup(lineTopology());

    engine.run(bundleFor('A', 'C'));

    expect(events.map((e) => e.timestamp)).toEqual([0, 0, 0, 10, 10, 30, 30]);
  });

  it('should exhaust retries on a permanently disrupted link', () => {
    const { engine, events, buffers } = setup(lineTopology(), {
      forcedDisruptions: [['B', 'C']],
      maxRetriesPerLink: 3,
    });

    const outcome = engine.run(bundleFor('A', 'C'));

    expect(outcome).toEqual({ status: 'Failed', reason: 'Exhausted' });
    expect(types(events)).toEqual([
      'run:started',
      'path:selected',
      'hop:attempted',
      'hop:committed',
      'hop:attempted',
      'link:disrupted',
      'bundle:stored',
      'reroute:unavailable',
      'retry:attempted',
      'retry:attempted',
      'retry:attempted',
      'path:failed',
      'run:failed',
    ]);
    expect(buffers.locate('b-1')).toBe('B');
  });

  it('should fail a link immediately when no retries are allowed', () => {
    const { engine, events } = setup(lineTopology(), {
      forcedDisruptions: [['B', 'C']],
      maxRetriesPerLink: 0,
    });

    engine.run(bundleFor('A', 'C'));

    expect(types(events).filter((t) => t === 'retry:attempted')).toHaveLength(0);
    expect(types(events).slice(-2)).toEqual(['path:failed', 'run:failed']);
  });

  it('should reroute around a disrupted first hop', () => {
    const { engine, events, buffers } = setup(diamondTopology(), {
      forcedDisruptions: [['A', 'B']],
    });

    const outcome = engine.run(bundleFor('A', 'C'));

    expect(outcome).toEqual({ status: 'Delivered' });
    const rerouted = events.find((e) => e.type === 'path:rerouted');
    expect(rerouted?.attributes).toMatchObject({
      attemptIndex: 2,
      path: ['A', 'D', 'C'],
      at: 'A',
      trigger: 'disruption',
    });
    expect(types(events)).not.toContain('retry:attempted');
    expect(engine.state?.totalDelay).toBe(30);
    expect(buffers.size('A')).toBe(0);
    expect(buffers.peakOccupancy).toBe(1);
  });

  it('should retry a transient disruption until the link recovers', () => {
    // A→B clean, B→C error, retry fails, retry recovers, B→C clean
    const random = createScriptedRandom([0.9, 0.9, 0.1, 0.9, 0.4, 0.8, 0.9, 0.9]);
    const { engine, events, buffers } = setup(
      lineTopology(),
      { errorRate: 0.5, disruptionRate: 0.5 },
      { random }
    );

    const outcome = engine.run(bundleFor('A', 'C'));

    expect(outcome).toEqual({ status: 'Delivered' });
    expect(types(events)).toEqual([
      'run:started',
      'path:selected',
      'hop:attempted',
      'hop:committed',
      'hop:attempted',
      'link:disrupted',
      'bundle:stored',
      'reroute:unavailable',
      'retry:attempted',
      'retry:attempted',
      'hop:attempted',
      'hop:committed',
      'bundle:delivered',
    ]);
    const retries = events.filter((e) => e.type === 'retry:attempted').map((e) => e.attributes);
    expect(retries).toEqual([
      { from: 'B', to: 'C', attempt: 1, maxRetries: 3, recovered: false },
      { from: 'B', to: 'C', attempt: 2, maxRetries: 3, recovered: true },
    ]);
    expect(buffers.size('B')).toBe(0);
  });

  it('should deliver immediately when source is destination', () => {
    const { engine, events } = setup(lineTopology());

    const outcome = engine.run(bundleFor('A', 'A'));

    expect(outcome).toEqual({ status: 'Delivered' });
    expect(types(events)).toEqual(['run:started', 'path:selected', 'bundle:delivered']);
    expect(events[2]?.attributes).toEqual({ path: ['A'], totalDelay: 0, hopCount: 0 });
  });

  it('should fail with NoPath when the destination is unreachable', () => {
    const topology = buildTopology(['A', 'B', 'Z'], [['A', 'B', 10, '1 km']]);
    const { engine, events } = setup(topology);

    const outcome = engine.run(bundleFor('A', 'Z'));

    expect(outcome).toEqual({ status: 'Failed', reason: 'NoPath' });
    expect(events[0]?.attributes).toMatchObject({ pathsAvailable: 0 });
    expect(types(events)).toEqual(['run:started', 'run:failed']);
  });

  it('should stop before the first step when already cancelled', () => {
    const controller = new AbortController();
    controller.abort();
    const { engine, events } = setup(lineTopology(), {}, { signal: controller.signal });

    const outcome = engine.run(bundleFor('A', 'C'));

    expect(outcome).toEqual({ status: 'Failed', reason: 'Cancelled' });
    expect(types(events)).toEqual(['run:started', 'run:failed']);
  });

  it('should time out once logical delay exceeds the budget', () => {
    const { engine, events } = setup(lineTopology(), { maxTotalDelay: 5 });

    const outcome = engine.run(bundleFor('A', 'C'));

    expect(outcome).toEqual({ status: 'Failed', reason: 'Timeout' });
    const failed = events[events.length - 1];
    expect(failed?.attributes).toMatchObject({ reason: 'Timeout', nodeId: 'B' });
    expect(failed?.timestamp).toBe(10);
  });

  it('should still reroute when the buffer is full', () => {
    const topology = diamondTopology();
    const buffers = new BufferStore(1, topology.getNodeIds());
    buffers.store('A', createBundle('A', 'C', 'other', { id: 'occupant', createdAt: 0 }));
    const { engine, events } = setup(topology, { forcedDisruptions: [['A', 'B']] }, { buffers });

    const outcome = engine.run(bundleFor('A', 'C'));

    expect(outcome).toEqual({ status: 'Delivered' });
    expect(types(events)).toContain('buffer:full');
    expect(types(events)).not.toContain('bundle:stored');
    expect(events.find((e) => e.type === 'buffer:full')?.attributes).toEqual({
      nodeId: 'A',
      capacity: 1,
    });
  });

  it('should fall back to an untried path once retries on a link run out', () => {
    const topology = buildTopology(['A', 'B', 'C', 'D', 'X'], [
      ['A', 'B', 10, '1 km'],
      ['B', 'C', 10, '1 km'],
      ['B', 'X', 10, '1 km'],
      ['X', 'C', 10, '1 km'],
      ['A', 'D', 15, '1 km'],
      ['D', 'C', 15, '1 km'],
    ]);
    const { engine, events } = setup(topology, {
      forcedDisruptions: [
        ['A', 'B'],
        ['A', 'D'],
      ],
    });

    const outcome = engine.run(bundleFor('A', 'C'));

    expect(outcome).toEqual({ status: 'Failed', reason: 'Exhausted' });
    const switches = events
      .filter((e) => e.type === 'path:rerouted')
      .map((e) => (e.type === 'path:rerouted' ? [e.attributes.trigger, e.attributes.path.join('')] : []));
    expect(switches).toEqual([
      ['disruption', 'ADC'],
      ['exhaustion', 'ABXC'],
    ]);
    expect(types(events).filter((t) => t === 'retry:attempted')).toHaveLength(6);
  });

  it('should observe cancellation between steps of a running transfer', () => {
    const controller = new AbortController();
    const { engine, events } = setup(lineTopology(), {}, { signal: controller.signal });
    engine.once('hop:committed', () => {
      controller.abort();
    });

    const outcome = engine.run(bundleFor('A', 'C'));

    expect(outcome).toEqual({ status: 'Failed', reason: 'Cancelled' });
    expect(types(events).slice(-2)).toEqual(['hop:committed', 'run:failed']);
    expect(events[events.length - 1]?.attributes).toMatchObject({ nodeId: 'B' });
  });

  it('should be single-use', () => {
    const { engine } = setup(lineTopology());
    engine.run(bundleFor('A', 'C'));

    expect(() => engine.run(bundleFor('A', 'C'))).toThrow('single-use');
  });

  it('should replay identically for the same seed', () => {
    const run = () => {
      const { engine, events } = setup(
        diamondTopology(),
        { errorRate: 0.3, disruptionRate: 0.3 },
        { random: createSeededRandom(2024) }
      );
      engine.run(bundleFor('A', 'C'));
      return events;
    };

    expect(run()).toEqual(run());
  });
});
