/**
 * @arch hexgraph.core.types
 */
import type { Layer, Role } from '../registry/schema.js';
import type { Finding } from '../validation/types.js';
import type { NodeId } from './node-id.js';
import type { ArchitectureGraph } from './graph.js';

/** Relationship kinds between components. */
export type Relation = 'depends_on';

/**
 * Node in the architecture graph, one per distinct NodeId.
 */
export interface GraphNode {
  readonly id: NodeId;
  readonly layer: Layer;
  readonly role: Role;
  /** Informational location of the component */
  readonly modulePath: string;
}

/**
 * Directed edge: `from` references `to` by name.
 */
export interface GraphEdge {
  readonly from: NodeId;
  readonly to: NodeId;
  readonly relation: Relation;
}

/**
 * Raw material for ArchitectureGraph.fromParts.
 */
export interface GraphParts {
  nodes: readonly GraphNode[];
  edges: readonly GraphEdge[];
  description?: string;
}

export interface BuildOptions {
  /** Free-text description carried by the graph */
  description?: string;
}

/**
 * Output of a build: the best graph obtainable from well-formed entries,
 * plus everything that had to be skipped or flagged on the way.
 */
export interface BuildResult {
  graph: ArchitectureGraph;
  findings: readonly Finding[];
}
