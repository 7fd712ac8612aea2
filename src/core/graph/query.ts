/**
 * @arch hexgraph.core.domain
 *
 * Fluent node queries. Filters combine with AND; each call returns a new
 * query, so partially built queries can be reused.
 */
import { minimatch } from 'minimatch';
import type { Layer, Role } from '../registry/schema.js';
import type { ArchitectureGraph } from './graph.js';
import type { GraphNode } from './types.js';

export type QueryFilter =
  | { kind: 'layer'; layer: Layer }
  | { kind: 'role'; role: Role }
  | { kind: 'name'; substring: string }
  | { kind: 'module'; pattern: string };

function matches(node: GraphNode, filter: QueryFilter): boolean {
  switch (filter.kind) {
    case 'layer':
      return node.layer === filter.layer;
    case 'role':
      return node.role === filter.role;
    case 'name':
      return node.id.includes(filter.substring);
    case 'module':
      return minimatch(node.modulePath, filter.pattern);
  }
}

export class GraphQuery {
  constructor(
    private readonly graph: ArchitectureGraph,
    private readonly filters: readonly QueryFilter[] = []
  ) {}

  layer(layer: Layer): GraphQuery {
    return this.with({ kind: 'layer', layer });
  }

  role(role: Role): GraphQuery {
    return this.with({ kind: 'role', role });
  }

  typeNameContains(substring: string): GraphQuery {
    return this.with({ kind: 'name', substring });
  }

  /** Match module paths against a glob, e.g. `src/domain/**`. */
  modulePath(pattern: string): GraphQuery {
    return this.with({ kind: 'module', pattern });
  }

  getFilters(): readonly QueryFilter[] {
    return this.filters;
  }

  execute(): GraphNode[] {
    return this.candidates().filter((node) => this.filters.every((filter) => matches(node, filter)));
  }

  count(): number {
    return this.execute().length;
  }

  first(): GraphNode | undefined {
    return this.candidates().find((node) => this.filters.every((filter) => matches(node, filter)));
  }

  private with(filter: QueryFilter): GraphQuery {
    return new GraphQuery(this.graph, [...this.filters, filter]);
  }

  /**
   * Narrow the starting set through the layer or role index when possible.
   */
  private candidates(): readonly GraphNode[] {
    for (const filter of this.filters) {
      if (filter.kind === 'layer') return this.graph.nodesByLayer(filter.layer);
      if (filter.kind === 'role') return this.graph.nodesByRole(filter.role);
    }
    return this.graph.allNodes();
  }
}
