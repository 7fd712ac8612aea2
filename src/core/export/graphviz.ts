/**
 * @arch hexgraph.core.engine
 * @intent:stateless
 */
import type { ArchitectureGraph } from '../graph/graph.js';
import { LAYERS } from '../registry/schema.js';
import { LAYER_COLORS, exported, type ExportResult, type IGraphExporter } from './types.js';

function escapeDot(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/** Quote a string as a DOT identifier or attribute value. */
export function quoteDot(value: string): string {
  return `"${escapeDot(value)}"`;
}

/**
 * Graphviz DOT exporter. Each non-empty layer becomes a cluster subgraph.
 */
export class GraphvizExporter implements IGraphExporter {
  readonly format = 'graphviz' as const;
  readonly fileExtension = 'dot';

  export(graph: ArchitectureGraph): ExportResult {
    const lines: string[] = [
      'digraph architecture {',
      `    label=${quoteDot(graph.description)};`,
      '    rankdir=TB;',
      '    node [shape=box, style=filled];',
    ];

    for (const layer of LAYERS) {
      const members = graph.nodesByLayer(layer);
      if (members.length === 0) continue;

      lines.push('');
      lines.push(`    subgraph cluster_${layer} {`);
      lines.push(`        label=${quoteDot(layer)};`);
      for (const node of members) {
        const label = `"${escapeDot(node.id)}\\n(${node.role})"`;
        lines.push(`        ${quoteDot(node.id)} [label=${label}, fillcolor="${LAYER_COLORS[layer]}"];`);
      }
      lines.push('    }');
    }

    if (graph.edgeCount > 0) {
      lines.push('');
      for (const edge of graph.allEdges()) {
        lines.push(`    ${quoteDot(edge.from)} -> ${quoteDot(edge.to)} [label=${quoteDot(edge.relation)}];`);
      }
    }

    lines.push('}');
    return exported(lines.join('\n'));
  }
}
