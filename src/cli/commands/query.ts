/**
 * @arch hexgraph.cli.command
 * @intent:cli-output
 */
import { Command } from 'commander';
import chalk from 'chalk';
import type { ArchitectureGraph } from '../../core/graph/graph.js';
import type { GraphEdge, GraphNode } from '../../core/graph/types.js';
import { LayerSchema, RoleSchema } from '../../core/registry/schema.js';
import { logger } from '../../utils/logger.js';
import { pluralize } from '../../utils/format.js';
import { loadProject } from './project.js';

export interface QueryOptions {
  config?: string;
  layer?: string;
  role?: string;
  name?: string;
  module?: string;
  edgesFrom?: string;
  edgesTo?: string;
  json?: boolean;
}

/**
 * Create the query command.
 */
export function createQueryCommand(): Command {
  return new Command('query')
    .description('List components or edges matching filters')
    .option('--layer <layer>', 'Filter by layer')
    .option('--role <role>', 'Filter by role')
    .option('--name <substring>', 'Filter by type name substring')
    .option('--module <glob>', 'Filter by module path glob')
    .option('--edges-from <type>', 'List the dependencies of a component')
    .option('--edges-to <type>', 'List the dependents of a component')
    .option('--json', 'Output as JSON')
    .option('--config <path>', 'Path to config file')
    .action(async (options: QueryOptions) => {
      try {
        await runQuery(options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

/**
 * Apply the command's node filters to a graph.
 */
export function selectNodes(graph: ArchitectureGraph, options: QueryOptions): GraphNode[] {
  let query = graph.query();
  if (options.layer !== undefined) {
    const layer = LayerSchema.safeParse(options.layer);
    if (!layer.success) {
      throw new Error(`Unknown layer '${options.layer}'. Use: ${LayerSchema.options.join(', ')}`);
    }
    query = query.layer(layer.data);
  }
  if (options.role !== undefined) {
    const role = RoleSchema.safeParse(options.role);
    if (!role.success) {
      throw new Error(`Unknown role '${options.role}'. Use: ${RoleSchema.options.join(', ')}`);
    }
    query = query.role(role.data);
  }
  if (options.name !== undefined) {
    query = query.typeNameContains(options.name);
  }
  if (options.module !== undefined) {
    query = query.modulePath(options.module);
  }
  return query.execute();
}

async function runQuery(options: QueryOptions): Promise<void> {
  const { snapshot } = await loadProject(process.cwd(), { config: options.config });
  const { graph } = snapshot;

  if (options.edgesFrom !== undefined || options.edgesTo !== undefined) {
    const edges: GraphEdge[] = [];
    if (options.edgesFrom !== undefined) {
      edges.push(...graph.edgesFrom(options.edgesFrom.trim()));
    }
    if (options.edgesTo !== undefined) {
      edges.push(...graph.edgesTo(options.edgesTo.trim()));
    }
    printEdges(edges, options.json ?? false);
    return;
  }

  const nodes = selectNodes(graph, options);
  if (options.json) {
    console.log(JSON.stringify(nodes, null, 2));
    return;
  }

  for (const node of nodes) {
    const location = node.modulePath ? chalk.dim(` ${node.modulePath}`) : '';
    console.log(`${chalk.bold(node.id)} ${chalk.cyan(node.layer)}/${node.role}${location}`);
  }
  console.log(chalk.dim(pluralize(nodes.length, 'component')));
}

function printEdges(edges: readonly GraphEdge[], json: boolean): void {
  if (json) {
    console.log(JSON.stringify(edges, null, 2));
    return;
  }
  for (const edge of edges) {
    console.log(`${edge.from} ${chalk.dim(`-[${edge.relation}]->`)} ${edge.to}`);
  }
  console.log(chalk.dim(pluralize(edges.length, 'edge')));
}
