/**
 * @arch hexgraph.core.domain.rule
 */
import type { ArchitectureGraph } from '../../graph/graph.js';
import type { Layer } from '../../registry/schema.js';
import type { Finding } from '../types.js';
import { BaseGraphRule } from './base.js';

const IMPLEMENTING_LAYERS: ReadonlySet<Layer> = new Set<Layer>(['adapter', 'infrastructure']);

/**
 * A port counts as implemented when some adapter or infrastructure node
 * depends on it.
 * Code: R006
 */
export class UnimplementedPortRule extends BaseGraphRule {
  readonly id = 'unimplemented_port' as const;
  readonly description = 'Ports that no adapter or infrastructure component implements';
  readonly defaultSeverity = 'warning' as const;

  check(graph: ArchitectureGraph): Finding[] {
    return graph
      .nodesByLayer('port')
      .filter((port) =>
        !graph.edgesTo(port.id).some((edge) => {
          const implementer = graph.node(edge.from);
          return implementer !== undefined && IMPLEMENTING_LAYERS.has(implementer.layer);
        })
      )
      .map((port) =>
        this.createFinding([port.id], `Port '${port.id}' has no adapter implementing it`, { role: port.role })
      );
  }

  protected getFixHint(): string {
    return 'Register an adapter that declares a dependency on the port.';
  }
}
