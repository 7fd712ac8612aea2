/**
 * @arch hexgraph.core.engine
 *
 * JSON export and its reader. parseGraphJson(new JsonExporter().export(g))
 * yields a graph with the same nodes and edges as g.
 */
import { z } from 'zod';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/format.js';
import { ArchitectureGraph } from '../graph/graph.js';
import { LayerSchema, RoleSchema } from '../registry/schema.js';
import { exported, type ExportResult, type IGraphExporter } from './types.js';

const GraphDocumentSchema = z.object({
  description: z.string(),
  nodes: z.array(z.object({
    id: z.string().min(1),
    layer: LayerSchema,
    role: RoleSchema,
    modulePath: z.string().default(''),
  })),
  edges: z.array(z.object({
    from: z.string().min(1),
    to: z.string().min(1),
    relation: z.literal('depends_on'),
  })),
});

export type GraphDocument = z.infer<typeof GraphDocumentSchema>;

export class JsonExporter implements IGraphExporter {
  readonly format = 'json' as const;
  readonly fileExtension = 'json';

  export(graph: ArchitectureGraph): ExportResult {
    const document: GraphDocument = {
      description: graph.description,
      nodes: graph.allNodes().map((node) => ({
        id: node.id,
        layer: node.layer,
        role: node.role,
        modulePath: node.modulePath,
      })),
      edges: graph.allEdges().map((edge) => ({
        from: edge.from,
        to: edge.to,
        relation: edge.relation,
      })),
    };
    return exported(JSON.stringify(document, null, 2));
  }
}

/**
 * Read a document produced by JsonExporter back into a graph.
 *
 * Throws SystemError INVALID_GRAPH_DOCUMENT for text that is not JSON or does
 * not match the document shape, and GraphIntegrityError for edges that name
 * unknown nodes or repeated node ids.
 */
export function parseGraphJson(document: string): ArchitectureGraph {
  let raw: unknown;
  try {
    raw = JSON.parse(document);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.INVALID_GRAPH_DOCUMENT,
      `Graph document is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = GraphDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.INVALID_GRAPH_DOCUMENT,
      `Invalid graph document: ${formatZodError(result.error)}`
    );
  }

  return ArchitectureGraph.fromParts(result.data);
}
