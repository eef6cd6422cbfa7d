/**
 * Transition events emitted by the transmission engine
 */

import type { DisruptionCause } from './disruption-model.js';

export type FailureReason = 'NoPath' | 'Exhausted' | 'Timeout' | 'Cancelled';

export type TransmissionEventAttributes = {
  'run:started': {
    bundleId: string;
    source: string;
    destination: string;
    size: number;
    pathsAvailable: number;
  };
  'path:selected': { attemptIndex: number; path: readonly string[]; score: number };
  'hop:attempted': { from: string; to: string };
  'hop:committed': { from: string; to: string; delay: number; totalDelay: number };
  'link:disrupted': { from: string; to: string; cause: DisruptionCause };
  'bundle:stored': { nodeId: string; occupancy: number };
  'buffer:full': { nodeId: string; capacity: number };
  'path:rerouted': {
    attemptIndex: number;
    path: readonly string[];
    score: number;
    at: string;
    trigger: 'disruption' | 'exhaustion';
  };
  'reroute:unavailable': { at: string; blockedLink: readonly [string, string] };
  'retry:attempted': {
    from: string;
    to: string;
    attempt: number;
    maxRetries: number;
    recovered: boolean;
  };
  'path:failed': { attemptIndex: number; path: readonly string[]; link: readonly [string, string] };
  'bundle:delivered': { path: readonly string[]; totalDelay: number; hopCount: number };
  'run:failed': { reason: FailureReason; nodeId: string; detail: string };
};

export type TransmissionEventType = keyof TransmissionEventAttributes;

export type TransmissionEventOf<K extends TransmissionEventType> = {
  readonly type: K;
  readonly timestamp: number; // logical seconds since the run started
  readonly attributes: TransmissionEventAttributes[K];
};

export type TransmissionEventMap = {
  [K in TransmissionEventType]: TransmissionEventOf<K>;
};

export type TransmissionEvent = TransmissionEventMap[TransmissionEventType];

/**
 * Observer port: receives every transition event in emission order
 */
export type EventSink = (event: TransmissionEvent) => void;
