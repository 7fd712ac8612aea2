/**
 * @arch hexgraph.cli.types
 *
 * Formatter type definitions.
 */
import type { ArchitectureGraph } from '../../core/graph/graph.js';
import type { ValidationReport } from '../../core/validation/types.js';
import type { OutputFormat } from '../../core/config/schema.js';

export type { OutputFormat };

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Include info findings and finding details */
  verbose: boolean;
}

/**
 * Interface for validation report formatters.
 */
export interface IFormatter {
  formatReport(report: ValidationReport, graph: ArchitectureGraph): string;
}
