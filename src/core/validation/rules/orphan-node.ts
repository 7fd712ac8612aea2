/**
 * @arch hexgraph.core.domain.rule
 */
import type { ArchitectureGraph } from '../../graph/graph.js';
import type { Finding } from '../types.js';
import { BaseGraphRule } from './base.js';

/**
 * Reports nodes with no incident edges. Informational only: standalone
 * value objects are legitimate.
 * Code: R002
 */
export class OrphanNodeRule extends BaseGraphRule {
  readonly id = 'orphan_node' as const;
  readonly description = 'Components with neither dependencies nor dependents';
  readonly defaultSeverity = 'info' as const;

  check(graph: ArchitectureGraph): Finding[] {
    return graph
      .allNodes()
      .filter((node) => graph.edgesFrom(node.id).length === 0 && graph.edgesTo(node.id).length === 0)
      .map((node) =>
        this.createFinding([node.id], `'${node.id}' has no dependencies and no dependents`, {
          layer: node.layer,
          role: node.role,
        })
      );
  }
}
