/**
 * @arch hexgraph.core.types
 *
 * Export adapter contract. Exporters are stateless and read a graph only
 * through allNodes()/allEdges().
 */
import type { ExportError } from '../../utils/errors.js';
import type { ArchitectureGraph } from '../graph/graph.js';
import type { Layer } from '../registry/schema.js';

export const EXPORT_FORMATS = ['mermaid', 'graphviz', 'json'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type ExportResult =
  | { ok: true; document: string }
  | { ok: false; error: ExportError };

export interface IGraphExporter {
  readonly format: ExportFormat;
  readonly fileExtension: string;
  export(graph: ArchitectureGraph): ExportResult;
}

/** Fill colour per layer, shared by the diagram exporters. */
export const LAYER_COLORS: Readonly<Record<Layer, string>> = {
  domain: '#fff3e0',
  port: '#e8f5e9',
  application: '#e3f2fd',
  adapter: '#f3e5f5',
  infrastructure: '#eceff1',
};

export function exported(document: string): ExportResult {
  return { ok: true, document };
}

export function exportFailed(error: ExportError): ExportResult {
  return { ok: false, error };
}
