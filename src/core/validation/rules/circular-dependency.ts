/**
 * @arch hexgraph.core.domain.rule
 */
import { GraphAnalysis } from '../../graph/analysis.js';
import type { ArchitectureGraph } from '../../graph/graph.js';
import type { Finding } from '../types.js';
import { BaseGraphRule } from './base.js';

/**
 * One finding per dependency cycle, naming its nodes in path order.
 * Code: R004
 */
export class CircularDependencyRule extends BaseGraphRule {
  readonly id = 'circular_dependency' as const;
  readonly description = 'Components that depend on themselves through a chain of dependencies';
  readonly defaultSeverity = 'warning' as const;

  check(graph: ArchitectureGraph): Finding[] {
    return new GraphAnalysis(graph).detectCycles().map((cycle) => {
      const path = [...cycle, cycle[0]].join(' -> ');
      return this.createFinding(cycle, `Dependency cycle: ${path}`, { length: cycle.length });
    });
  }

  protected getFixHint(): string {
    return 'Break the cycle by extracting the shared contract into a port both sides depend on.';
  }
}
