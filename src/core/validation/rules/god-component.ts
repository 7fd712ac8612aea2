/**
 * @arch hexgraph.core.domain.rule
 */
import type { ArchitectureGraph } from '../../graph/graph.js';
import type { Finding, RuleContext } from '../types.js';
import { BaseGraphRule } from './base.js';

/**
 * Flags nodes whose incident edge count exceeds the configured threshold.
 * Code: R005
 */
export class GodComponentRule extends BaseGraphRule {
  readonly id = 'god_component' as const;
  readonly description = 'Components connected to too many others';
  readonly defaultSeverity = 'warning' as const;

  check(graph: ArchitectureGraph, context: RuleContext): Finding[] {
    const findings: Finding[] = [];

    for (const node of graph.allNodes()) {
      const dependents = graph.edgesTo(node.id).length;
      const dependencies = graph.edgesFrom(node.id).length;
      const connections = dependents + dependencies;

      if (connections > context.godComponentThreshold) {
        findings.push(
          this.createFinding(
            [node.id],
            `'${node.id}' has ${connections} connections (threshold: ${context.godComponentThreshold})`,
            { connections, dependents, dependencies, threshold: context.godComponentThreshold }
          )
        );
      }
    }

    return findings;
  }

  protected getFixHint(): string {
    return 'Split the component along its responsibilities.';
  }
}
