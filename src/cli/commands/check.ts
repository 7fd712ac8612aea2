/**
 * @arch hexgraph.cli.command
 * @intent:cli-output
 */
import { Command } from 'commander';
import { OutputFormatSchema } from '../../core/config/schema.js';
import { hasRule } from '../../core/validation/rules/index.js';
import type { GraphRuleId, ValidationOptions } from '../../core/validation/types.js';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';
import { loadProject, parseList } from './project.js';

interface CheckOptions {
  config?: string;
  format?: string;
  strict?: boolean;
  rules?: string;
  verbose?: boolean;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Validate the architecture graph')
    .option('--format <format>', 'Output format: human, json, or compact')
    .option('--strict', 'Escalate dangling dependencies and fail on warnings')
    .option('--rules <ids>', 'Comma-separated rule ids to run')
    .option('--verbose', 'Show info findings and sources')
    .option('--config <path>', 'Path to config file')
    .action(async (options: CheckOptions) => {
      try {
        process.exit(await runCheck(options));
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

export function parseRules(value: string): GraphRuleId[] {
  const ids = parseList(value);
  const rules: GraphRuleId[] = [];
  for (const id of ids) {
    if (!hasRule(id)) {
      throw new ValidationError(ErrorCodes.UNKNOWN_RULE, `Unknown rule '${id}'`, { rule: id });
    }
    rules.push(id);
  }
  return rules;
}

/**
 * Run validation and print the report. Resolves to the exit code.
 */
async function runCheck(options: CheckOptions): Promise<number> {
  const overrides: ValidationOptions = {};
  if (options.strict) {
    overrides.strict = true;
  }
  if (options.rules) {
    overrides.rules = parseRules(options.rules);
  }

  const { config, engine, snapshot } = await loadProject(process.cwd(), {
    config: options.config,
    validation: overrides,
  });

  const parsedFormat = OutputFormatSchema.safeParse(options.format ?? config.output.format);
  if (!parsedFormat.success) {
    throw new Error(`Invalid format: ${options.format}. Use: ${OutputFormatSchema.options.join(', ')}`);
  }
  const format = parsedFormat.data;
  const report = engine.validate();
  const formatter = createFormatter(format, {
    colors: process.stdout.isTTY === true,
    verbose: options.verbose ?? false,
  });

  console.log(formatter.formatReport(report, snapshot.graph));

  const { exit_codes: exitCodes } = config.validation;
  return report.passed ? exitCodes.success : exitCodes.error;
}
