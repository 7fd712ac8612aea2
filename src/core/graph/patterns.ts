/**
 * @arch hexgraph.core.engine
 * @intent:stateless
 *
 * Infers common architectural patterns from node roles and edges.
 */
import type { ArchitectureGraph } from './graph.js';
import type { NodeId } from './node-id.js';

export type ArchitecturalPattern =
  | { kind: 'repository'; repositories: NodeId[] }
  | { kind: 'cqrs'; directives: number; queries: number }
  | { kind: 'aggregate_root'; aggregates: Array<{ id: NodeId; members: NodeId[] }> };

function detectRepositories(graph: ArchitectureGraph): ArchitecturalPattern | null {
  const repositories = graph.nodesByRole('repository').map((node) => node.id);
  return repositories.length > 0 ? { kind: 'repository', repositories } : null;
}

function detectCqrs(graph: ArchitectureGraph): ArchitecturalPattern | null {
  const directives = graph.nodesByRole('directive').length;
  const queries = graph.nodesByRole('query').length;
  return directives > 0 || queries > 0 ? { kind: 'cqrs', directives, queries } : null;
}

/**
 * Aggregates together with the entities and value objects they depend on.
 */
function detectAggregateRoots(graph: ArchitectureGraph): ArchitecturalPattern | null {
  const aggregates = graph.nodesByRole('aggregate').map((aggregate) => {
    const members: NodeId[] = [];
    for (const edge of graph.edgesFrom(aggregate.id)) {
      const member = graph.node(edge.to);
      if (member && (member.role === 'entity' || member.role === 'value_object')) {
        members.push(member.id);
      }
    }
    return { id: aggregate.id, members };
  });
  return aggregates.length > 0 ? { kind: 'aggregate_root', aggregates } : null;
}

/**
 * Identify every pattern present, in a fixed order: repository, cqrs, aggregate_root.
 */
export function identifyPatterns(graph: ArchitectureGraph): ArchitecturalPattern[] {
  const patterns: ArchitecturalPattern[] = [];
  for (const detect of [detectRepositories, detectCqrs, detectAggregateRoots]) {
    const pattern = detect(graph);
    if (pattern) {
      patterns.push(pattern);
    }
  }
  return patterns;
}
