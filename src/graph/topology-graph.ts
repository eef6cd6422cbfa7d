/**
 * Immutable undirected topology of relay nodes and links
 * Wraps ngraph.graph; nothing outside the constructor mutates it
 */

import createGraph, { type Graph } from 'ngraph.graph';
import { ConfigError, UnknownLinkError } from '../core/errors.js';
import { formatDistance, type LinkDistance } from './distance.js';

export interface NodeData {
  label?: string;
}

export interface LinkData {
  delay: number; // seconds
  distance: LinkDistance;
}

export interface NodeSpec {
  id: string;
  label?: string;
}

export interface LinkSpec {
  source: string;
  target: string;
  delay: number;
  distance: LinkDistance;
}

export interface NeighborInfo {
  id: string;
  link: LinkData;
}

export interface SerializedTopology {
  nodes: Array<{ id: string }>;
  links: Array<{ source: string; target: string; delay: number; distance: string }>;
}

/**
 * Canonical key for an undirected link
 */
export function linkKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

export class TopologyGraph {
  private readonly graph: Graph<NodeData, LinkData>;
  private readonly nodeIds: readonly string[];
  private readonly links: readonly LinkSpec[];

  constructor(nodes: readonly NodeSpec[], links: readonly LinkSpec[]) {
    this.graph = createGraph<NodeData, LinkData>();
    const seenNodes = new Set<string>();
    const seenLinks = new Set<string>();

    this.graph.beginUpdate();
    try {
      for (const node of nodes) {
        if (seenNodes.has(node.id)) {
          throw new ConfigError('nodes', `duplicate node "${node.id}"`);
        }
        seenNodes.add(node.id);
        this.graph.addNode(node.id, node.label !== undefined ? { label: node.label } : {});
      }

      for (const link of links) {
        const where = `links[${link.source}-${link.target}]`;
        if (!seenNodes.has(link.source) || !seenNodes.has(link.target)) {
          throw new ConfigError(where, 'references an unknown node');
        }
        if (link.source === link.target) {
          throw new ConfigError(where, 'self-loops are not allowed');
        }
        if (!Number.isFinite(link.delay) || link.delay < 0) {
          throw new ConfigError(where, `delay must be a non-negative number, got ${link.delay}`);
        }
        const key = linkKey(link.source, link.target);
        if (seenLinks.has(key)) {
          throw new ConfigError(where, 'duplicate link');
        }
        seenLinks.add(key);
        this.graph.addLink(link.source, link.target, {
          delay: link.delay,
          distance: { ...link.distance },
        });
      }
    } finally {
      this.graph.endUpdate();
    }

    this.nodeIds = Object.freeze(nodes.map((n) => n.id));
    this.links = Object.freeze(links.map((l) => Object.freeze({ ...l })));
  }

  /**
   * Underlying ngraph instance, for read-only path searches
   */
  get raw(): Graph<NodeData, LinkData> {
    return this.graph;
  }

  hasNode(id: string): boolean {
    return this.graph.hasNode(id) !== undefined;
  }

  hasLink(a: string, b: string): boolean {
    return this.findLink(a, b) !== undefined;
  }

  /**
   * Link attributes in either orientation
   * @throws UnknownLinkError when the pair is not adjacent
   */
  getLink(a: string, b: string): LinkData {
    const data = this.findLink(a, b);
    if (!data) {
      throw new UnknownLinkError(a, b);
    }
    return data;
  }

  /**
   * Neighbors in insertion order of the links
   */
  getNeighbors(nodeId: string): NeighborInfo[] {
    const neighbors: NeighborInfo[] = [];
    if (!this.hasNode(nodeId)) {
      return neighbors;
    }

    this.graph.forEachLinkedNode(
      nodeId,
      (_otherNode, link) => {
        const neighborId = link.fromId === nodeId ? String(link.toId) : String(link.fromId);
        neighbors.push({ id: neighborId, link: link.data });
      },
      false
    );

    return neighbors;
  }

  getNodeIds(): readonly string[] {
    return this.nodeIds;
  }

  getLinks(): readonly LinkSpec[] {
    return this.links;
  }

  getNodeCount(): number {
    return this.graph.getNodeCount();
  }

  getLinkCount(): number {
    return this.graph.getLinkCount();
  }

  toJSON(): SerializedTopology {
    return {
      nodes: this.nodeIds.map((id) => ({ id })),
      links: this.links.map((link) => ({
        source: link.source,
        target: link.target,
        delay: link.delay,
        distance: formatDistance(link.distance),
      })),
    };
  }

  private findLink(a: string, b: string): LinkData | undefined {
    const link = this.graph.getLink(a, b) ?? this.graph.getLink(b, a);
    return link?.data;
  }
}
