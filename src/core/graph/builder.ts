/**
 * @arch hexgraph.core.engine
 * @intent:stateless
 *
 * Turns a snapshot of entry candidates into an immutable graph plus the
 * findings observed while doing so. Never throws for bad entries and never logs.
 */
import { ComponentEntrySchema, type ComponentEntry } from '../registry/schema.js';
import type { EntryCandidate } from '../registry/types.js';
import { createFinding } from '../validation/findings.js';
import type { Finding } from '../validation/types.js';
import { formatZodError, type IssueList } from '../../utils/format.js';
import { ArchitectureGraph, DEFAULT_GRAPH_DESCRIPTION } from './graph.js';
import { nodeIdFor, type NodeId } from './node-id.js';
import type { BuildOptions, BuildResult, GraphEdge, GraphNode } from './types.js';

const DEFAULT_OPTIONS: Required<BuildOptions> = {
  description: DEFAULT_GRAPH_DESCRIPTION,
};

interface KeptEntry {
  entry: ComponentEntry;
  position: number;
}

/**
 * Read a string-valued field from a candidate without trusting its shape.
 */
function stringField(candidate: EntryCandidate, key: string): string | undefined {
  if (typeof candidate !== 'object' || candidate === null) return undefined;
  const value: unknown = Reflect.get(candidate, key);
  return typeof value === 'string' ? value : undefined;
}

function malformedEntry(candidate: EntryCandidate, position: number, error: IssueList): Finding {
  const typeName = stringField(candidate, 'typeName');
  const source = stringField(candidate, 'source');
  const label = typeName?.trim() ? `'${typeName.trim()}'` : `#${position}`;
  return createFinding(
    'malformed_entry',
    'warning',
    [],
    `Component entry ${label} is malformed and was excluded: ${formatZodError(error)}`,
    {
      position,
      issues: Object.freeze(
        error.issues.map((issue) => Object.freeze({ path: issue.path.map(String).join('.'), message: issue.message }))
      ),
      ...(typeName !== undefined ? { typeName } : {}),
      ...(source !== undefined ? { source } : {}),
    }
  );
}

function duplicateNodeId(id: NodeId, kept: KeptEntry, discarded: ComponentEntry, position: number): Finding {
  return createFinding(
    'duplicate_node_id',
    'warning',
    [id],
    `Component '${id}' is registered more than once; keeping the first registration (entry #${kept.position}) and discarding entry #${position}`,
    {
      keptPosition: kept.position,
      discardedPosition: position,
      kept: Object.freeze({ layer: kept.entry.layer, role: kept.entry.role, modulePath: kept.entry.modulePath }),
      discarded: Object.freeze({
        layer: discarded.layer,
        role: discarded.role,
        modulePath: discarded.modulePath,
        dependencies: Object.freeze([...discarded.dependencies]),
      }),
    }
  );
}

function danglingDependency(from: NodeId, missing: NodeId): Finding {
  return createFinding(
    'dangling_dependency',
    'warning',
    [from],
    `'${from}' depends on '${missing}', which is not registered`,
    { from, missing }
  );
}

/**
 * Build a graph from entry candidates.
 *
 * - Malformed candidates are excluded and reported.
 * - The first registration of a NodeId wins; later ones are reported and dropped
 *   together with their dependencies.
 * - Each distinct dependency name yields one edge, or one dangling-dependency
 *   finding when it names no node.
 *
 * Findings are ordered: malformed, duplicate, dangling; each in input order.
 */
export function buildGraph(entries: Iterable<EntryCandidate>, options: BuildOptions = {}): BuildResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const malformed: Finding[] = [];
  const duplicates: Finding[] = [];
  const dangling: Finding[] = [];
  const kept = new Map<NodeId, KeptEntry>();

  let position = 0;
  for (const candidate of entries) {
    const current = position++;
    const parsed = ComponentEntrySchema.safeParse(candidate);
    if (!parsed.success) {
      malformed.push(malformedEntry(candidate, current, parsed.error));
      continue;
    }

    const id = nodeIdFor(parsed.data.typeName);
    const existing = kept.get(id);
    if (existing) {
      duplicates.push(duplicateNodeId(id, existing, parsed.data, current));
      continue;
    }
    kept.set(id, { entry: parsed.data, position: current });
  }

  const nodes: GraphNode[] = [];
  for (const [id, { entry }] of kept) {
    nodes.push({ id, layer: entry.layer, role: entry.role, modulePath: entry.modulePath });
  }

  const edges: GraphEdge[] = [];
  for (const [id, { entry }] of kept) {
    const resolved = new Set<NodeId>();
    for (const name of entry.dependencies) {
      const target = nodeIdFor(name);
      if (resolved.has(target)) continue;
      resolved.add(target);

      if (kept.has(target)) {
        edges.push({ from: id, to: target, relation: 'depends_on' });
      } else {
        dangling.push(danglingDependency(id, target));
      }
    }
  }

  const graph = ArchitectureGraph.fromParts({ nodes, edges, description: opts.description });
  return {
    graph,
    findings: Object.freeze([...malformed, ...duplicates, ...dangling]),
  };
}

/**
 * Builder with fixed options, for callers that build repeatedly.
 */
export class GraphBuilder {
  private readonly options: Required<BuildOptions>;

  constructor(options: BuildOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  build(entries: Iterable<EntryCandidate>): BuildResult {
    return buildGraph(entries, this.options);
  }
}
