/**
 * Routing types shared by the router and the transmission engine
 */

export interface Path {
  readonly nodes: readonly string[];
  readonly totalDelay: number; // seconds
  readonly reliability: number; // 0-1, product of per-hop factors
  readonly score: number; // lower is better
}

export interface AlternativeOptions {
  /** Nodes a candidate must not pass through after its first node */
  exclude?: ReadonlySet<string>;
  maxDepth?: number;
}

export interface Router {
  enumeratePaths(source: string, destination: string, maxDepth?: number): Path[];
  score(nodes: readonly string[]): number;
  selectAlternatives(
    source: string,
    destination: string,
    disruptedLinks: ReadonlySet<string>,
    k: number,
    options?: AlternativeOptions
  ): Path[];
}

export type PathStatus = 'Selected' | 'Rerouted' | 'Failed';

export interface PathAttempt {
  readonly attemptIndex: number;
  readonly path: readonly string[];
  readonly status: PathStatus;
}
