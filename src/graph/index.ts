/**
 * Graph module for relay topologies
 *
 * This module provides:
 * - TopologyGraph: immutable undirected graph of nodes and links
 * - parseTopology / loadTopologyFile: topology document parsing
 * - parseDistance: tagged "km" / "M km" distance strings
 */

export {
  TopologyGraph,
  linkKey,
  type NodeData,
  type LinkData,
  type NodeSpec,
  type LinkSpec,
  type NeighborInfo,
  type SerializedTopology,
} from './topology-graph.js';

export { parseTopology, loadTopologyFile } from './topology-loader.js';

export {
  parseDistance,
  formatDistance,
  type DistanceClass,
  type LinkDistance,
} from './distance.js';
