/**
 * Seeded pseudo-random number generator for reproducible simulation runs
 * Uses a simple LCG (Linear Congruential Generator) implementation
 */

/**
 * Minimal source of uniform draws in [0, 1). Anything the disruption model
 * consumes must come through one of these, never from Math.random.
 */
export interface RandomSource {
  next(): number;
}

export interface SeededRandom extends RandomSource {
  readonly seed: number;
  nextInt(min: number, max: number): number;
  fork(): SeededRandom;
  reset(): void;
}

class SeededRandomImpl implements SeededRandom {
  private state: number;
  private readonly initialSeed: number;

  // LCG parameters (from Numerical Recipes)
  private readonly a = 1664525;
  private readonly c = 1013904223;
  private readonly m = 2 ** 32;

  constructor(seed: number) {
    this.initialSeed = seed >>> 0;
    this.state = this.initialSeed;
  }

  get seed(): number {
    return this.initialSeed;
  }

  /**
   * Generate next random number in range [0, 1)
   */
  next(): number {
    this.state = (this.a * this.state + this.c) % this.m;
    return this.state / this.m;
  }

  /**
   * Generate random integer in range [min, max] (inclusive)
   */
  nextInt(min: number, max: number): number {
    if (min > max) {
      throw new Error('min must be <= max');
    }
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /**
   * Create a new SeededRandom with a derived seed
   */
  fork(): SeededRandom {
    const newSeed = this.nextInt(0, 2 ** 31 - 1);
    return new SeededRandomImpl(newSeed);
  }

  /**
   * Reset to initial seed state
   */
  reset(): void {
    this.state = this.initialSeed;
  }
}

/**
 * Create a new seeded random number generator
 */
export function createSeededRandom(seed: number): SeededRandom {
  return new SeededRandomImpl(seed);
}

/**
 * Random source that replays a fixed list of draws, cycling when exhausted.
 * Useful for scripting exact disruption sequences.
 */
export function createScriptedRandom(draws: readonly number[]): RandomSource {
  if (draws.length === 0) {
    throw new Error('Scripted random needs at least one draw');
  }
  let index = 0;
  return {
    next(): number {
      const value = draws[index % draws.length] ?? 0;
      index++;
      return value;
    },
  };
}
