/**
 * @arch hexgraph.cli.formatter
 */
import chalk from 'chalk';
import type { ArchitectureGraph } from '../../core/graph/graph.js';
import type { Finding, Severity, ValidationReport } from '../../core/validation/types.js';
import { formatNodeList } from '../../utils/format.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'yellow' | 'green' | 'cyan' | 'blue' | 'dim';

const SECTIONS: ReadonlyArray<{ severity: Severity; title: string; color: Color }> = [
  { severity: 'violation', title: 'VIOLATIONS', color: 'red' },
  { severity: 'warning', title: 'WARNINGS', color: 'yellow' },
  { severity: 'info', title: 'INFO', color: 'blue' },
];

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatReport(report: ValidationReport, graph: ArchitectureGraph): string {
    const lines: string[] = [];

    const status = report.passed
      ? `${this.colorize('✓', 'green')} ${this.colorize('PASSED', 'green')}`
      : `${this.colorize('✗', 'red')} ${this.colorize('FAILED', 'red')}`;
    lines.push(`${status}: ${graph.description}`);
    lines.push(`   Nodes: ${graph.nodeCount}, Edges: ${graph.edgeCount}, Layers: ${graph.layerCount}`);

    for (const section of SECTIONS) {
      if (section.severity === 'info' && !this.options.verbose) continue;
      const findings = report.findings.filter((finding) => finding.severity === section.severity);
      if (findings.length === 0) continue;

      lines.push('');
      lines.push(`   ${this.colorize(`${section.title} (${findings.length}):`, section.color)}`);
      for (const finding of findings) {
        lines.push(...this.formatFinding(finding));
      }
    }

    lines.push('');
    lines.push(this.formatSummary(report));

    return lines.join('\n');
  }

  private formatFinding(finding: Finding): string[] {
    const lines: string[] = [];
    const nodes = finding.nodes.length > 0 ? `: ${formatNodeList(finding.nodes)}` : '';
    lines.push(`      [${finding.code}] ${finding.ruleId}${nodes}`);
    lines.push(`        ${finding.message}`);

    const fixHint = finding.details?.fixHint;
    if (typeof fixHint === 'string') {
      lines.push(`        ${this.colorize(`Fix: ${fixHint}`, 'cyan')}`);
    }

    const source = finding.details?.source;
    if (this.options.verbose && typeof source === 'string') {
      lines.push(`        ${this.colorize(`Source: ${source}`, 'dim')}`);
    }

    return lines;
  }

  private formatSummary(report: ValidationReport): string {
    const { summary } = report;
    const lines: string[] = [];

    lines.push('═'.repeat(60));

    const violations = this.colorize(`${summary.violation} violations`, 'red');
    const warnings = this.colorize(`${summary.warning} warnings`, 'yellow');
    const info = this.colorize(`${summary.info} info`, 'blue');
    lines.push(`SUMMARY: ${violations}, ${warnings}, ${info}`);

    if (report.strict) {
      lines.push('Strict mode: warnings fail the check');
    }

    return lines.join('\n');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }
    return chalk[color](text);
  }
}
