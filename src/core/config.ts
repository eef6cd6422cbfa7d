/**
 * Run parameters, defaults and validation
 */

import { ConfigError } from './errors.js';

export interface SimulationConfig {
  errorRate: number; // 0-1
  disruptionRate: number; // 0-1
  maxRetriesPerLink: number; // >= 0
  maxAlternatePaths: number; // >= 1, candidates kept per selection
  bufferCapacityPerNode: number; // >= 1, bundles
  maxPathDepth: number; // >= 1, hops considered during enumeration
  maxTotalDelay?: number; // seconds of logical time before Timeout
  maxWallTimeMs?: number; // wall-clock budget before Timeout
  bundleTtlMs?: number; // bundle lifetime, checked against the run clock
  seed?: number; // For deterministic PRNG
  forcedDisruptions: ReadonlyArray<readonly [string, string]>;
}

export const DEFAULT_CONFIG: SimulationConfig = {
  errorRate: 0.1,
  disruptionRate: 0.2,
  maxRetriesPerLink: 3,
  maxAlternatePaths: 3,
  bufferCapacityPerNode: 10,
  maxPathDepth: 10,
  forcedDisruptions: [],
};

function checkRate(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(field, `must be within [0, 1], got ${value}`);
  }
}

function checkInteger(value: number, field: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(field, `must be an integer >= ${min}, got ${value}`);
  }
}

function checkPositive(value: number | undefined, field: string): void {
  if (value !== undefined && (!Number.isFinite(value) || value <= 0)) {
    throw new ConfigError(field, `must be a positive number, got ${value}`);
  }
}

/**
 * Merge overrides onto the defaults and validate the result
 * @throws ConfigError naming the first offending field
 */
export function resolveConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  const config: SimulationConfig = { ...DEFAULT_CONFIG, ...overrides };

  checkRate(config.errorRate, 'errorRate');
  checkRate(config.disruptionRate, 'disruptionRate');
  checkInteger(config.maxRetriesPerLink, 'maxRetriesPerLink', 0);
  checkInteger(config.maxAlternatePaths, 'maxAlternatePaths', 1);
  checkInteger(config.bufferCapacityPerNode, 'bufferCapacityPerNode', 1);
  checkInteger(config.maxPathDepth, 'maxPathDepth', 1);
  checkPositive(config.maxTotalDelay, 'maxTotalDelay');
  checkPositive(config.maxWallTimeMs, 'maxWallTimeMs');
  checkPositive(config.bundleTtlMs, 'bundleTtlMs');

  if (config.seed !== undefined && !Number.isInteger(config.seed)) {
    throw new ConfigError('seed', `must be an integer, got ${config.seed}`);
  }

  for (const pair of config.forcedDisruptions) {
    if (pair[0] === pair[1]) {
      throw new ConfigError('forcedDisruptions', `"${pair[0]}" cannot be linked to itself`);
    }
  }

  return config;
}
