/**
 * @arch hexgraph.cli.barrel
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createCheckCommand } from './commands/check.js';
import { createGraphCommand } from './commands/graph.js';
import { createQueryCommand } from './commands/query.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('hexgraph')
    .description('Build, query and validate hexagonal architecture graphs')
    .version(readVersion());
  [createGraphCommand, createCheckCommand, createQueryCommand, createAnalyzeCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
