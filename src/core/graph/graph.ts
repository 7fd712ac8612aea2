/**
 * @arch hexgraph.core.domain
 *
 * Immutable architecture graph and its read-only query surface.
 */
import { GraphIntegrityError, ErrorCodes } from '../../utils/errors.js';
import { LAYERS, type Layer, type Role } from '../registry/schema.js';
import type { NodeId } from './node-id.js';
import type { GraphEdge, GraphNode, GraphParts } from './types.js';
import { GraphQuery } from './query.js';

export const DEFAULT_GRAPH_DESCRIPTION = 'Hexagonal Architecture Graph';

const NO_EDGES: readonly GraphEdge[] = Object.freeze([]);
const NO_NODES: readonly GraphNode[] = Object.freeze([]);

function appendTo<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const bucket = index.get(key);
  if (bucket) {
    bucket.push(value);
  } else {
    index.set(key, [value]);
  }
}

function freezeIndex<K, V>(index: Map<K, V[]>): ReadonlyMap<K, readonly V[]> {
  const frozen = new Map<K, readonly V[]>();
  for (const [key, values] of index) {
    frozen.set(key, Object.freeze(values));
  }
  return frozen;
}

/**
 * Frozen graph of components and their dependencies.
 *
 * Every edge endpoint is a node of the same graph. Nothing is added, removed
 * or altered after construction, and every returned array or object is frozen,
 * so a graph can be shared among any number of readers.
 */
export class ArchitectureGraph {
  readonly description: string;

  private readonly nodeIndex: ReadonlyMap<NodeId, GraphNode>;
  private readonly nodeList: readonly GraphNode[];
  private readonly edgeList: readonly GraphEdge[];
  private readonly outgoing: ReadonlyMap<NodeId, readonly GraphEdge[]>;
  private readonly incoming: ReadonlyMap<NodeId, readonly GraphEdge[]>;
  private readonly byLayer: ReadonlyMap<Layer, readonly GraphNode[]>;
  private readonly byRole: ReadonlyMap<Role, readonly GraphNode[]>;

  private constructor(
    description: string,
    nodeIndex: Map<NodeId, GraphNode>,
    edges: GraphEdge[]
  ) {
    const outgoing = new Map<NodeId, GraphEdge[]>();
    const incoming = new Map<NodeId, GraphEdge[]>();
    const byLayer = new Map<Layer, GraphNode[]>();
    const byRole = new Map<Role, GraphNode[]>();

    for (const node of nodeIndex.values()) {
      appendTo(byLayer, node.layer, node);
      appendTo(byRole, node.role, node);
    }
    for (const edge of edges) {
      appendTo(outgoing, edge.from, edge);
      appendTo(incoming, edge.to, edge);
    }

    this.description = description;
    this.nodeIndex = nodeIndex;
    this.nodeList = Object.freeze([...nodeIndex.values()]);
    this.edgeList = Object.freeze(edges);
    this.outgoing = freezeIndex(outgoing);
    this.incoming = freezeIndex(incoming);
    this.byLayer = freezeIndex(byLayer);
    this.byRole = freezeIndex(byRole);
    Object.freeze(this);
  }

  /**
   * Assemble a graph from nodes and edges, copying and freezing both.
   * Throws GraphIntegrityError on repeated node ids or unknown edge endpoints.
   */
  static fromParts(parts: GraphParts): ArchitectureGraph {
    const nodeIndex = new Map<NodeId, GraphNode>();
    for (const node of parts.nodes) {
      if (nodeIndex.has(node.id)) {
        throw new GraphIntegrityError(
          ErrorCodes.DUPLICATE_NODE,
          `Node '${node.id}' appears more than once`,
          { node: node.id }
        );
      }
      nodeIndex.set(node.id, Object.freeze({
        id: node.id,
        layer: node.layer,
        role: node.role,
        modulePath: node.modulePath,
      }));
    }

    const edges: GraphEdge[] = [];
    for (const edge of parts.edges) {
      for (const endpoint of [edge.from, edge.to]) {
        if (!nodeIndex.has(endpoint)) {
          throw new GraphIntegrityError(
            ErrorCodes.UNKNOWN_EDGE_ENDPOINT,
            `Edge ${edge.from} -> ${edge.to} references unknown node '${endpoint}'`,
            { from: edge.from, to: edge.to }
          );
        }
      }
      edges.push(Object.freeze({ from: edge.from, to: edge.to, relation: edge.relation }));
    }

    return new ArchitectureGraph(parts.description ?? DEFAULT_GRAPH_DESCRIPTION, nodeIndex, edges);
  }

  static empty(description: string = DEFAULT_GRAPH_DESCRIPTION): ArchitectureGraph {
    return new ArchitectureGraph(description, new Map(), []);
  }

  node(id: NodeId): GraphNode | undefined {
    return this.nodeIndex.get(id);
  }

  hasNode(id: NodeId): boolean {
    return this.nodeIndex.has(id);
  }

  /** Nodes whose layer matches, in registration order. */
  nodesByLayer(layer: Layer): readonly GraphNode[] {
    return this.byLayer.get(layer) ?? NO_NODES;
  }

  /** Nodes whose role matches, in registration order. */
  nodesByRole(role: Role): readonly GraphNode[] {
    return this.byRole.get(role) ?? NO_NODES;
  }

  /** Edges leaving `id` (its dependencies), in declaration order. */
  edgesFrom(id: NodeId): readonly GraphEdge[] {
    return this.outgoing.get(id) ?? NO_EDGES;
  }

  /** Edges arriving at `id` (its dependents). */
  edgesTo(id: NodeId): readonly GraphEdge[] {
    return this.incoming.get(id) ?? NO_EDGES;
  }

  allNodes(): readonly GraphNode[] {
    return this.nodeList;
  }

  allEdges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  get nodeCount(): number {
    return this.nodeList.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  /** Number of distinct layers with at least one node. */
  get layerCount(): number {
    return LAYERS.filter((layer) => this.byLayer.has(layer)).length;
  }

  get isEmpty(): boolean {
    return this.nodeList.length === 0;
  }

  /** Start a fluent query over this graph's nodes. */
  query(): GraphQuery {
    return new GraphQuery(this);
  }
}
