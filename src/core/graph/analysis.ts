/**
 * @arch hexgraph.core.engine
 * @intent:stateless
 *
 * Structural analysis over a built graph: cycles, coupling, closures, roots and leaves.
 */
import type { Layer } from '../registry/schema.js';
import type { ArchitectureGraph } from './graph.js';
import type { NodeId } from './node-id.js';
import type { GraphEdge } from './types.js';

/**
 * Afferent/efferent coupling for one node.
 * instability = efferent / (afferent + efferent), 0 for an isolated node.
 */
export interface CouplingMetrics {
  afferent: number;
  efferent: number;
  instability: number;
}

/** One level of the cycle search: a node and the next outgoing edge to follow. */
interface SearchFrame {
  id: NodeId;
  edges: readonly GraphEdge[];
  next: number;
}

export class GraphAnalysis {
  constructor(private readonly graph: ArchitectureGraph) {}

  /**
   * Find dependency cycles with a depth-first search in node order.
   * Each back edge yields one cycle: its nodes in path order, starting from
   * the node the back edge points at. A cycle whose node set was already
   * reported is skipped.
   */
  detectCycles(): NodeId[][] {
    const cycles: NodeId[][] = [];
    const seenKeys = new Set<string>();
    const visited = new Set<NodeId>();
    const recursionStack = new Set<NodeId>();
    const pathStack: NodeId[] = [];
    const frames: SearchFrame[] = [];

    const enter = (id: NodeId): void => {
      visited.add(id);
      recursionStack.add(id);
      pathStack.push(id);
      frames.push({ id, edges: this.graph.edgesFrom(id), next: 0 });
    };

    for (const node of this.graph.allNodes()) {
      if (visited.has(node.id)) continue;
      enter(node.id);

      while (frames.length > 0) {
        const frame = frames[frames.length - 1];
        if (frame.next >= frame.edges.length) {
          frames.pop();
          pathStack.pop();
          recursionStack.delete(frame.id);
          continue;
        }

        const edge = frame.edges[frame.next++];
        if (!visited.has(edge.to)) {
          enter(edge.to);
        } else if (recursionStack.has(edge.to)) {
          const cycle = pathStack.slice(pathStack.lastIndexOf(edge.to));
          const key = [...cycle].sort().join('|');
          if (!seenKeys.has(key)) {
            seenKeys.add(key);
            cycles.push(cycle);
          }
        }
      }
    }

    return cycles;
  }

  /**
   * Nodes nothing depends on, in node order.
   */
  rootNodes(): NodeId[] {
    return this.graph
      .allNodes()
      .filter((node) => this.graph.edgesTo(node.id).length === 0)
      .map((node) => node.id);
  }

  /**
   * Nodes that depend on nothing, in node order.
   */
  leafNodes(): NodeId[] {
    return this.graph
      .allNodes()
      .filter((node) => this.graph.edgesFrom(node.id).length === 0)
      .map((node) => node.id);
  }

  /**
   * Coupling metrics, or undefined for an unknown node.
   */
  coupling(id: NodeId): CouplingMetrics | undefined {
    if (!this.graph.hasNode(id)) {
      return undefined;
    }
    const afferent = this.graph.edgesTo(id).length;
    const efferent = this.graph.edgesFrom(id).length;
    const total = afferent + efferent;
    return {
      afferent,
      efferent,
      instability: total === 0 ? 0 : efferent / total,
    };
  }

  /**
   * Everything `id` depends on, directly or indirectly, in BFS order.
   */
  transitiveDependencies(id: NodeId): NodeId[] {
    return this.reach(id, (current) => this.graph.edgesFrom(current).map((edge) => edge.to));
  }

  /**
   * Everything that depends on `id`, directly or indirectly, in BFS order.
   */
  transitiveDependents(id: NodeId): NodeId[] {
    return this.reach(id, (current) => this.graph.edgesTo(current).map((edge) => edge.from));
  }

  /**
   * Node count per layer; every layer is present.
   */
  layerSummary(): Record<Layer, number> {
    const count = (layer: Layer): number => this.graph.nodesByLayer(layer).length;
    return {
      domain: count('domain'),
      port: count('port'),
      application: count('application'),
      adapter: count('adapter'),
      infrastructure: count('infrastructure'),
    };
  }

  /**
   * Nodes ranked by total incident edges, most connected first.
   */
  mostConnected(limit: number = 10): Array<{ id: NodeId } & CouplingMetrics> {
    const ranked: Array<{ id: NodeId } & CouplingMetrics> = [];
    for (const node of this.graph.allNodes()) {
      const metrics = this.coupling(node.id);
      if (metrics) {
        ranked.push({ id: node.id, ...metrics });
      }
    }
    return ranked
      .sort((a, b) => (b.afferent + b.efferent) - (a.afferent + a.efferent))
      .slice(0, limit);
  }

  private reach(start: NodeId, next: (id: NodeId) => NodeId[]): NodeId[] {
    if (!this.graph.hasNode(start)) {
      return [];
    }
    const seen = new Set<NodeId>([start]);
    const order: NodeId[] = [];
    const queue: NodeId[] = [start];

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      for (const neighbour of next(current)) {
        if (!seen.has(neighbour)) {
          seen.add(neighbour);
          order.push(neighbour);
          queue.push(neighbour);
        }
      }
    }
    return order;
  }
}
