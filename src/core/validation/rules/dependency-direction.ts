/**
 * @arch hexgraph.core.domain.rule
 */
import type { ArchitectureGraph } from '../../graph/graph.js';
import type { Layer } from '../../registry/schema.js';
import type { Finding } from '../types.js';
import { BaseGraphRule } from './base.js';

/**
 * Distance of each layer from the business core. Dependencies may point to
 * the same rank or inward, never outward.
 */
export const LAYER_RANK: Readonly<Record<Layer, number>> = {
  domain: 0,
  port: 1,
  application: 2,
  adapter: 3,
  infrastructure: 4,
};

export function isOutwardDependency(from: Layer, to: Layer): boolean {
  return LAYER_RANK[to] > LAYER_RANK[from];
}

/**
 * Flags every edge from an inner layer to an outer one.
 * Code: R001
 */
export class DependencyDirectionRule extends BaseGraphRule {
  readonly id = 'dependency_direction' as const;
  readonly description = 'Dependencies must point toward or within the same layer, never outward';
  readonly defaultSeverity = 'violation' as const;

  check(graph: ArchitectureGraph): Finding[] {
    const findings: Finding[] = [];

    for (const edge of graph.allEdges()) {
      const from = graph.node(edge.from);
      const to = graph.node(edge.to);
      if (!from || !to) continue;

      if (isOutwardDependency(from.layer, to.layer)) {
        findings.push(
          this.createFinding(
            [from.id, to.id],
            `'${from.id}' (${from.layer}) depends on '${to.id}' (${to.layer}); ${from.layer} may not depend on an outer layer`,
            { fromLayer: from.layer, toLayer: to.layer }
          )
        );
      }
    }

    return findings;
  }

  protected getFixHint(): string {
    return 'Introduce a port in an inner layer and let the outer component implement it.';
  }
}
