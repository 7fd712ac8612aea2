/**
 * @arch hexgraph.core.barrel
 */
export { ArchitectureGraph, DEFAULT_GRAPH_DESCRIPTION } from './graph.js';
export { GraphBuilder, buildGraph } from './builder.js';
export { GraphQuery } from './query.js';
export { GraphAnalysis } from './analysis.js';
export { identifyPatterns } from './patterns.js';
export { nodeIdFor } from './node-id.js';
export type { NodeId } from './node-id.js';
export type { QueryFilter } from './query.js';
export type { CouplingMetrics } from './analysis.js';
export type { ArchitecturalPattern } from './patterns.js';
export type {
  GraphNode,
  GraphEdge,
  GraphParts,
  Relation,
  BuildOptions,
  BuildResult,
} from './types.js';
