/**
 * @arch hexgraph.core.domain.rule
 */
import type { ArchitectureGraph } from '../../graph/graph.js';
import type { Finding, RuleContext } from '../types.js';
import { BaseGraphRule } from './base.js';

/**
 * Warns about expected layers without any node. Advisory: small programs
 * may leave a layer out on purpose.
 * Code: R003
 */
export class MissingLayerRule extends BaseGraphRule {
  readonly id = 'missing_layer' as const;
  readonly description = 'Expected layers that contain no components';
  readonly defaultSeverity = 'warning' as const;

  check(graph: ArchitectureGraph, context: RuleContext): Finding[] {
    return context.expectedLayers
      .filter((layer) => graph.nodesByLayer(layer).length === 0)
      .map((layer) =>
        this.createFinding([], `No components registered in the '${layer}' layer`, { layer })
      );
  }
}
