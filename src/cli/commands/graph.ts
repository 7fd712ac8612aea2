/**
 * @arch hexgraph.cli.command
 * @intent:cli-output
 */
import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { getExporter } from '../../core/export/index.js';
import { writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { loadProject } from './project.js';

interface GraphOptions {
  config?: string;
  format: string;
  output?: string;
}

/**
 * Create the graph command.
 */
export function createGraphCommand(): Command {
  return new Command('graph')
    .description('Export the architecture graph')
    .option('-c, --config <path>', 'Path to config file')
    .option('-f, --format <format>', 'Output format (mermaid, graphviz, json)', 'mermaid')
    .option('-o, --output <file>', 'Write the document to a file instead of stdout')
    .action(async (options: GraphOptions) => {
      try {
        await runGraph(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runGraph(options: GraphOptions): Promise<void> {
  const projectRoot = process.cwd();
  const exporter = getExporter(options.format);
  const { snapshot } = await loadProject(projectRoot, { config: options.config });
  const { graph } = snapshot;

  if (graph.isEmpty) {
    log.warn('No components registered');
  }

  const result = exporter.export(graph);
  if (!result.ok) {
    throw result.error;
  }

  if (options.output) {
    const target = path.resolve(projectRoot, options.output);
    await writeFile(target, `${result.document}\n`);
    log.success(`Wrote ${exporter.format} graph to ${path.relative(projectRoot, target)}`);
    return;
  }

  if (exporter.format === 'json') {
    console.log(result.document);
    return;
  }

  console.log();
  console.log(chalk.bold(`${graph.description} (${exporter.format})`));
  console.log(chalk.dim('─'.repeat(50)));
  console.log();
  console.log(result.document);
  console.log();
  console.log(chalk.dim('─'.repeat(50)));
  console.log(chalk.dim(`Nodes: ${graph.nodeCount}, Edges: ${graph.edgeCount}, Layers: ${graph.layerCount}`));
}
