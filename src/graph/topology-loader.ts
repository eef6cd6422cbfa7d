/**
 * Parses topology documents of the form
 * { nodes: [{ id }], links: [{ source, target, delay, distance }] }
 */

import { readFile } from 'node:fs/promises';
import { ConfigError } from '../core/errors.js';
import { parseDistance } from './distance.js';
import { TopologyGraph, type LinkSpec, type NodeSpec } from './topology-graph.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string, field: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${field}.${key}`, 'expected a non-empty string');
  }
  return value;
}

function parseNode(raw: unknown, index: number): NodeSpec {
  const field = `nodes[${index}]`;
  if (!isRecord(raw)) {
    throw new ConfigError(field, 'expected an object');
  }
  const id = readString(raw, 'id', field);
  const label = raw['label'];
  return typeof label === 'string' ? { id, label } : { id };
}

function parseLink(raw: unknown, index: number): LinkSpec {
  const field = `links[${index}]`;
  if (!isRecord(raw)) {
    throw new ConfigError(field, 'expected an object');
  }

  const delay = raw['delay'];
  if (typeof delay !== 'number') {
    throw new ConfigError(`${field}.delay`, 'expected a number of seconds');
  }

  return {
    source: readString(raw, 'source', field),
    target: readString(raw, 'target', field),
    delay,
    distance: parseDistance(readString(raw, 'distance', field), `${field}.distance`),
  };
}

/**
 * Build a graph from an already-decoded topology document
 */
export function parseTopology(document: unknown): TopologyGraph {
  if (!isRecord(document)) {
    throw new ConfigError('topology', 'expected an object with nodes and links');
  }
  const { nodes, links } = document;
  if (!Array.isArray(nodes) || nodes.length === 0) {
    throw new ConfigError('nodes', 'expected a non-empty array');
  }
  if (!Array.isArray(links)) {
    throw new ConfigError('links', 'expected an array');
  }

  return new TopologyGraph(nodes.map(parseNode), links.map(parseLink));
}

export async function loadTopologyFile(path: string): Promise<TopologyGraph> {
  const text = await readFile(path, 'utf8');
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError('topology', `${path} is not valid JSON (${reason})`);
  }
  return parseTopology(document);
}
