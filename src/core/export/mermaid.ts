/**
 * @arch hexgraph.core.engine
 * @intent:stateless
 */
import { ExportError, ErrorCodes } from '../../utils/errors.js';
import type { ArchitectureGraph } from '../graph/graph.js';
import type { NodeId } from '../graph/node-id.js';
import { LAYERS } from '../registry/schema.js';
import { LAYER_COLORS, exported, exportFailed, type ExportResult, type IGraphExporter } from './types.js';

export type MermaidDirection = 'TD' | 'LR' | 'BT' | 'RL';

/** Flowchart keywords that cannot stand as a node id, compared lowercased. */
const RESERVED_IDS = new Set([
  'end',
  'graph',
  'flowchart',
  'subgraph',
  'class',
  'classdef',
  'style',
  'click',
  'linkstyle',
  'default',
  'direction',
  'call',
  'href',
]);

/**
 * Mermaid identifiers allow only word characters; everything else becomes '_'.
 * Ids starting with a digit or spelling a keyword get an `n_` prefix.
 */
export function sanitizeMermaidId(id: NodeId): string {
  const safe = id.replace(/[^A-Za-z0-9_]/g, '_');
  return /^[0-9]/.test(safe) || RESERVED_IDS.has(safe.toLowerCase()) ? `n_${safe}` : safe;
}

function escapeLabel(text: string): string {
  return text.replace(/"/g, '#quot;');
}

/**
 * Mermaid flowchart exporter.
 *
 * Fails when two node ids sanitize to the same Mermaid identifier, since the
 * diagram would silently merge them.
 */
export class MermaidExporter implements IGraphExporter {
  readonly format = 'mermaid' as const;
  readonly fileExtension = 'mmd';

  constructor(private readonly direction: MermaidDirection = 'TD') {}

  export(graph: ArchitectureGraph): ExportResult {
    const ids = new Map<NodeId, string>();
    const owners = new Map<string, NodeId>();
    for (const node of graph.allNodes()) {
      const safe = sanitizeMermaidId(node.id);
      const owner = owners.get(safe);
      if (owner !== undefined) {
        return exportFailed(new ExportError(
          ErrorCodes.EXPORT_FAILED,
          `Nodes '${owner}' and '${node.id}' both map to Mermaid id '${safe}'`,
          { format: this.format, nodes: [owner, node.id] }
        ));
      }
      owners.set(safe, node.id);
      ids.set(node.id, safe);
    }

    const lines: string[] = [`graph ${this.direction}`];

    for (const node of graph.allNodes()) {
      lines.push(`  ${ids.get(node.id)}["${escapeLabel(node.id)}<br/>(${node.role})"]`);
    }

    if (graph.edgeCount > 0) {
      lines.push('');
      for (const edge of graph.allEdges()) {
        lines.push(`  ${ids.get(edge.from)} -->|${edge.relation}| ${ids.get(edge.to)}`);
      }
    }

    const present = LAYERS.filter((layer) => graph.nodesByLayer(layer).length > 0);
    if (present.length > 0) {
      lines.push('');
      for (const layer of present) {
        lines.push(`  classDef ${layer} fill:${LAYER_COLORS[layer]}`);
      }
      for (const layer of present) {
        const members = graph.nodesByLayer(layer).map((node) => ids.get(node.id));
        lines.push(`  class ${members.join(',')} ${layer}`);
      }
    }

    return exported(lines.join('\n'));
  }
}
