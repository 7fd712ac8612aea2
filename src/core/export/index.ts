/**
 * @arch hexgraph.core.barrel
 */
import { ExportError, ErrorCodes } from '../../utils/errors.js';
import { GraphvizExporter } from './graphviz.js';
import { JsonExporter } from './json.js';
import { MermaidExporter } from './mermaid.js';
import { EXPORT_FORMATS, type ExportFormat, type IGraphExporter } from './types.js';

export { MermaidExporter, sanitizeMermaidId } from './mermaid.js';
export type { MermaidDirection } from './mermaid.js';
export { GraphvizExporter, quoteDot } from './graphviz.js';
export { JsonExporter, parseGraphJson } from './json.js';
export type { GraphDocument } from './json.js';
export { EXPORT_FORMATS, LAYER_COLORS } from './types.js';
export type { ExportFormat, ExportResult, IGraphExporter } from './types.js';

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/**
 * Get an exporter by format name.
 */
export function getExporter(format: string): IGraphExporter {
  if (!isExportFormat(format)) {
    throw new ExportError(
      ErrorCodes.UNKNOWN_FORMAT,
      `Unknown export format '${format}'. Expected one of: ${EXPORT_FORMATS.join(', ')}`,
      { format }
    );
  }
  switch (format) {
    case 'mermaid':
      return new MermaidExporter();
    case 'graphviz':
      return new GraphvizExporter();
    case 'json':
      return new JsonExporter();
  }
}
