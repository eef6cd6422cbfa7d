/**
 * Multi-path router: bounded simple-path enumeration ranked by
 * delay over reliability
 */

import { nba, type PathFinder } from 'ngraph.path';
import { NoPathError } from '../errors.js';
import {
  linkKey,
  type LinkData,
  type NodeData,
  type TopologyGraph,
} from '../../graph/index.js';
import type { AlternativeOptions, Path, Router } from './types.js';

export interface PathRouterConfig {
  maxDepth: number; // hops
  maxEnumeratedPaths: number; // hard cap on enumeration size
  nearReliability: number;
  deepReliability: number;
}

const DEFAULT_CONFIG: PathRouterConfig = {
  maxDepth: 10,
  maxEnumeratedPaths: 5000,
  nearReliability: 0.9,
  deepReliability: 0.7,
};

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// Code-unit order, independent of the host locale
function comparePaths(a: Path, b: Path): number {
  return (
    a.score - b.score ||
    a.nodes.length - b.nodes.length ||
    compareIds(a.nodes.join('\u0000'), b.nodes.join('\u0000'))
  );
}

export class PathRouter implements Router {
  readonly config: PathRouterConfig;
  private readonly topology: TopologyGraph;
  private pathFinder: PathFinder<NodeData> | undefined;
  private blockedLinks: ReadonlySet<string> = new Set();
  private readonly enumerationCache = new Map<string, Path[]>();

  constructor(topology: TopologyGraph, config: Partial<PathRouterConfig> = {}) {
    this.topology = topology;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * All simple paths from source to destination with at most maxDepth hops.
   * If the depth bound hides every route, the best unbounded route is
   * returned on its own.
   * @throws NoPathError when the graph does not connect the two nodes
   */
  enumeratePaths(
    source: string,
    destination: string,
    maxDepth: number = this.config.maxDepth
  ): Path[] {
    const cacheKey = `${source}\u0000${destination}\u0000${maxDepth}`;
    const cached = this.enumerationCache.get(cacheKey);
    if (cached) {
      return [...cached];
    }

    if (!this.topology.hasNode(source) || !this.topology.hasNode(destination)) {
      throw new NoPathError(source, destination);
    }

    let found: string[][];
    if (source === destination) {
      found = [[source]];
    } else {
      found = this.depthFirst(source, destination, maxDepth);
      if (found.length === 0) {
        const best = this.findBestPath(source, destination);
        if (best.length === 0) {
          throw new NoPathError(source, destination);
        }
        found = [best];
      }
    }

    const paths = found.map((nodes) => this.annotate(nodes));
    this.enumerationCache.set(cacheKey, paths);
    return [...paths];
  }

  /**
   * Cumulative delay multiplied by the inverse of the path reliability
   */
  score(nodes: readonly string[]): number {
    return this.annotate(nodes).score;
  }

  /**
   * Rank candidates whose first hop is usable. An empty result means routes
   * exist but none is usable right now.
   */
  selectAlternatives(
    source: string,
    destination: string,
    disruptedLinks: ReadonlySet<string>,
    k: number,
    options: AlternativeOptions = {}
  ): Path[] {
    const exclude = options.exclude;
    const candidates = this.enumeratePaths(source, destination, options.maxDepth).filter((path) => {
      const [first, second] = path.nodes;
      if (first !== undefined && second !== undefined && disruptedLinks.has(linkKey(first, second))) {
        return false;
      }
      return !exclude || path.nodes.slice(1).every((id) => !exclude.has(id));
    });

    return candidates.sort(comparePaths).slice(0, Math.max(0, k));
  }

  /**
   * Lowest-cost route by NBA*, weighting each link by delay × (1 + km).
   * Blocked links are canonical link keys. Returns [] when unreachable.
   */
  findBestPath(
    source: string,
    destination: string,
    blocked: ReadonlySet<string> = new Set()
  ): string[] {
    if (!this.topology.hasNode(source) || !this.topology.hasNode(destination)) {
      return [];
    }
    if (source === destination) {
      return [source];
    }

    this.blockedLinks = blocked;
    if (!this.pathFinder) {
      this.pathFinder = nba<NodeData, LinkData>(this.topology.raw, {
        oriented: false,
        distance: (_fromNode, _toNode, link) =>
          link.data.delay * (1 + link.data.distance.km),
        blocked: (fromNode, toNode) =>
          this.blockedLinks.has(linkKey(String(fromNode.id), String(toNode.id))),
      });
    }

    const path = this.pathFinder.find(source, destination);
    // ngraph.path returns path from destination to source, so reverse it
    return path.map((node) => String(node.id)).reverse();
  }

  private depthFirst(source: string, destination: string, maxDepth: number): string[][] {
    const results: string[][] = [];
    const stack: string[] = [source];
    const onPath = new Set<string>([source]);

    const visit = (current: string): void => {
      if (results.length >= this.config.maxEnumeratedPaths) return;
      if (current === destination) {
        results.push([...stack]);
        return;
      }
      if (stack.length - 1 >= maxDepth) return;

      const neighbors = this.topology
        .getNeighbors(current)
        .map((n) => n.id)
        .sort();
      for (const next of neighbors) {
        if (onPath.has(next)) continue;
        stack.push(next);
        onPath.add(next);
        visit(next);
        onPath.delete(next);
        stack.pop();
      }
    };

    visit(source);
    return results;
  }

  private annotate(nodes: readonly string[]): Path {
    let totalDelay = 0;
    let reliability = 1;
    for (let i = 0; i < nodes.length - 1; i++) {
      const from = nodes[i];
      const to = nodes[i + 1];
      if (from === undefined || to === undefined) continue;
      const link = this.topology.getLink(from, to);
      totalDelay += link.delay;
      reliability *=
        link.distance.class === 'deep'
          ? this.config.deepReliability
          : this.config.nearReliability;
    }

    return Object.freeze({
      nodes: Object.freeze([...nodes]),
      totalDelay,
      reliability,
      score: totalDelay * (1 / reliability),
    });
  }
}
