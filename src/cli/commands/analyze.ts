/**
 * @arch hexgraph.cli.command
 * @intent:cli-output
 *
 * Structural analysis: cycles, roots and leaves, coupling hot spots,
 * inferred patterns and layer population.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { GraphAnalysis } from '../../core/graph/analysis.js';
import type { ArchitectureGraph } from '../../core/graph/graph.js';
import { identifyPatterns, type ArchitecturalPattern } from '../../core/graph/patterns.js';
import { LAYERS } from '../../core/registry/schema.js';
import { logger } from '../../utils/logger.js';
import { formatNodeList } from '../../utils/format.js';
import { loadProject } from './project.js';

interface AnalyzeOptions {
  config?: string;
  json?: boolean;
  top: string;
}

/**
 * Create the analyze command.
 */
export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Report cycles, roots and leaves, coupling, patterns and layer summary')
    .option('--top <n>', 'Number of most connected components to show', '5')
    .option('--json', 'Output as JSON')
    .option('--config <path>', 'Path to config file')
    .action(async (options: AnalyzeOptions) => {
      try {
        await runAnalyze(options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

export interface AnalysisOutput {
  cycles: string[][];
  roots: string[];
  leaves: string[];
  mostConnected: ReturnType<GraphAnalysis['mostConnected']>;
  patterns: ArchitecturalPattern[];
  layers: ReturnType<GraphAnalysis['layerSummary']>;
}

export function analyzeGraph(graph: ArchitectureGraph, top: number): AnalysisOutput {
  const analysis = new GraphAnalysis(graph);
  return {
    cycles: analysis.detectCycles(),
    roots: analysis.rootNodes(),
    leaves: analysis.leafNodes(),
    mostConnected: analysis.mostConnected(top),
    patterns: identifyPatterns(graph),
    layers: analysis.layerSummary(),
  };
}

function describePattern(pattern: ArchitecturalPattern): string {
  switch (pattern.kind) {
    case 'repository':
      return `Repository: ${formatNodeList(pattern.repositories)}`;
    case 'cqrs':
      return `CQRS: ${pattern.directives} directive(s), ${pattern.queries} query(ies)`;
    case 'aggregate_root':
      return `Aggregate roots: ${pattern.aggregates
        .map((aggregate) => `${aggregate.id} (${aggregate.members.length} members)`)
        .join(', ')}`;
  }
}

async function runAnalyze(options: AnalyzeOptions): Promise<void> {
  const top = Number.parseInt(options.top, 10);
  if (!Number.isInteger(top) || top < 1) {
    throw new Error(`Invalid --top value: ${options.top}`);
  }

  const { snapshot } = await loadProject(process.cwd(), { config: options.config });
  const output = analyzeGraph(snapshot.graph, top);

  if (options.json) {
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  console.log(chalk.bold('\nLayers'));
  for (const layer of LAYERS) {
    console.log(`  ${layer.padEnd(16)} ${output.layers[layer]}`);
  }

  console.log(chalk.bold('\nCycles'));
  if (output.cycles.length === 0) {
    console.log(chalk.green('  none'));
  }
  for (const cycle of output.cycles) {
    console.log(chalk.red(`  ${[...cycle, cycle[0]].join(' -> ')}`));
  }

  console.log(chalk.bold('\nEntry points and leaves'));
  console.log(`  roots  ${output.roots.length > 0 ? formatNodeList(output.roots) : chalk.dim('none')}`);
  console.log(`  leaves ${output.leaves.length > 0 ? formatNodeList(output.leaves) : chalk.dim('none')}`);

  console.log(chalk.bold('\nMost connected'));
  for (const entry of output.mostConnected) {
    console.log(
      `  ${entry.id.padEnd(32)} in ${entry.afferent}, out ${entry.efferent}, instability ${entry.instability.toFixed(2)}`
    );
  }

  console.log(chalk.bold('\nPatterns'));
  if (output.patterns.length === 0) {
    console.log(chalk.dim('  none detected'));
  }
  for (const pattern of output.patterns) {
    console.log(`  ${describePattern(pattern)}`);
  }
  console.log();
}
