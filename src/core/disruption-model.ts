/**
 * Stochastic link disruption: independent per-hop draws, no channel model
 */

import type { RandomSource } from '../utils/random.js';
import { linkKey } from '../graph/index.js';

export interface DisruptionModelConfig {
  errorRate: number; // 0-1, transmission error probability per hop
  disruptionRate: number; // 0-1, link outage probability per hop
  forcedLinks: ReadonlyArray<readonly [string, string]>; // always down, never recover
}

export type DisruptionCause = 'error' | 'outage' | 'forced';

export interface HopCheck {
  disrupted: boolean;
  cause?: DisruptionCause;
}

const DEFAULT_CONFIG: DisruptionModelConfig = {
  errorRate: 0,
  disruptionRate: 0,
  forcedLinks: [],
};

export class DisruptionModel {
  readonly config: DisruptionModelConfig;
  private readonly random: RandomSource;
  private readonly forced: ReadonlySet<string>;

  constructor(config: Partial<DisruptionModelConfig>, random: RandomSource) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.random = random;
    this.forced = new Set(this.config.forcedLinks.map(([a, b]) => linkKey(a, b)));
  }

  /**
   * Midpoint of the two rates; a recovery draw must exceed it
   */
  get recoveryThreshold(): number {
    return (this.config.errorRate + this.config.disruptionRate) / 2;
  }

  isForced(a: string, b: string): boolean {
    return this.forced.has(linkKey(a, b));
  }

  /**
   * One trial against errorRate and one against disruptionRate; either
   * success disrupts the hop. Forced links skip the draws.
   */
  checkHop(a: string, b: string): HopCheck {
    if (this.isForced(a, b)) {
      return { disrupted: true, cause: 'forced' };
    }

    const error = this.random.next() < this.config.errorRate;
    const outage = this.random.next() < this.config.disruptionRate;

    if (error) return { disrupted: true, cause: 'error' };
    if (outage) return { disrupted: true, cause: 'outage' };
    return { disrupted: false };
  }

  /**
   * True when the disrupted link a–b comes back on this retry
   */
  checkRecovery(a: string, b: string): boolean {
    if (this.isForced(a, b)) {
      return false;
    }
    return this.random.next() > this.recoveryThreshold;
  }
}
