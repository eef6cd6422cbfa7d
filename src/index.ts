/**
 * DTN Relay - Delay-Tolerant Network bundle relay simulator
 * Main entry point
 */

// Core exports
export { Simulation, simulate, createLogSink } from './core/simulation.js';
export type { SimulationOptions, RunOptions } from './core/simulation.js';

export { TransmissionEngine } from './core/transmission-engine.js';
export type {
  SimulationState,
  RunOutcome,
  TransmissionEngineDeps,
} from './core/transmission-engine.js';

export { StatsRecorder } from './core/stats-recorder.js';
export type { StatsRecord, RunStatus, BufferReport } from './core/stats-recorder.js';

export { DisruptionModel } from './core/disruption-model.js';
export type {
  DisruptionModelConfig,
  DisruptionCause,
  HopCheck,
} from './core/disruption-model.js';

export { BufferStore } from './core/buffer-store.js';
export type { BufferOccupancy } from './core/buffer-store.js';

export { createBundle, encodePayload, isExpired } from './core/bundle.js';
export type { Bundle, BundleOptions } from './core/bundle.js';

export { resolveConfig, DEFAULT_CONFIG } from './core/config.js';
export type { SimulationConfig } from './core/config.js';

export {
  RelayError,
  ConfigError,
  UnknownLinkError,
  NoPathError,
  BufferFullError,
  isRelayError,
} from './core/errors.js';
export type { RelayErrorCode } from './core/errors.js';

export type {
  EventSink,
  FailureReason,
  TransmissionEvent,
  TransmissionEventMap,
  TransmissionEventType,
  TransmissionEventAttributes,
} from './core/events.js';

// Routing exports
export { PathRouter } from './core/routing/path-router.js';
export type { PathRouterConfig } from './core/routing/path-router.js';
export type {
  Path,
  PathAttempt,
  PathStatus,
  Router,
  AlternativeOptions,
} from './core/routing/types.js';

// Graph exports
export {
  TopologyGraph,
  linkKey,
  parseTopology,
  loadTopologyFile,
  parseDistance,
  formatDistance,
} from './graph/index.js';
export type {
  NodeData,
  LinkData,
  NodeSpec,
  LinkSpec,
  NeighborInfo,
  SerializedTopology,
  DistanceClass,
  LinkDistance,
} from './graph/index.js';

// Utility exports
export { createSeededRandom, createScriptedRandom } from './utils/random.js';
export type { RandomSource, SeededRandom } from './utils/random.js';

export { TypedEventEmitter } from './utils/event-emitter.js';
export type { EventEmitter, EventHandler, AnyEventHandler } from './utils/event-emitter.js';

export { logger, makeLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogTarget } from './utils/logger.js';
