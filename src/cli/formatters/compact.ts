/**
 * @arch hexgraph.cli.formatter
 * @intent:cli-output
 *
 * Compact output formatter for CI.
 * One line per finding for easy parsing.
 */
import type { ArchitectureGraph } from '../../core/graph/graph.js';
import type { Finding, Severity, ValidationReport } from '../../core/validation/types.js';
import { pluralize } from '../../utils/format.js';
import type { IFormatter } from './types.js';

const SEVERITY_LABELS: Record<Severity, string> = {
  violation: 'ERROR',
  warning: 'WARN',
  info: 'INFO',
};

/**
 * Format: `location: SEVERITY [code:rule] message`, where location is the
 * first node's module path, else its id, else `<graph>`.
 */
export class CompactFormatter implements IFormatter {
  formatReport(report: ValidationReport, graph: ArchitectureGraph): string {
    const lines = report.findings.map((finding) => this.formatFinding(finding, graph));
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(this.formatSummary(report, graph));
    return lines.join('\n');
  }

  private formatFinding(finding: Finding, graph: ArchitectureGraph): string {
    return `${this.location(finding, graph)}: ${SEVERITY_LABELS[finding.severity]} [${finding.code}:${finding.ruleId}] ${finding.message}`;
  }

  private location(finding: Finding, graph: ArchitectureGraph): string {
    const [first] = finding.nodes;
    if (first === undefined) {
      return '<graph>';
    }
    const modulePath = graph.node(first)?.modulePath;
    return modulePath ? modulePath : first;
  }

  private formatSummary(report: ValidationReport, graph: ArchitectureGraph): string {
    const { summary } = report;
    const parts: string[] = [];

    if (summary.violation > 0) {
      parts.push(pluralize(summary.violation, 'violation'));
    }
    if (summary.warning > 0) {
      parts.push(pluralize(summary.warning, 'warning'));
    }
    if (summary.info > 0) {
      parts.push(`${summary.info} info`);
    }
    if (parts.length === 0) {
      parts.push('0 issues');
    }

    const status = report.passed ? 'PASSED' : 'FAILED';
    return `SUMMARY: ${status}: ${parts.join(', ')} (${pluralize(graph.nodeCount, 'node')} checked)`;
  }
}
