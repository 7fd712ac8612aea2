/**
 * @arch hexgraph.cli.formatter
 */
import type { ArchitectureGraph } from '../../core/graph/graph.js';
import type { Finding, ValidationReport } from '../../core/validation/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatReport(report: ValidationReport, graph: ArchitectureGraph): string {
    return JSON.stringify({
      passed: report.passed,
      strict: report.strict,
      graph: {
        description: graph.description,
        nodes: graph.nodeCount,
        edges: graph.edgeCount,
        layers: graph.layerCount,
      },
      rules: report.rules,
      summary: report.summary,
      findings: report.findings.map((finding) => this.transformFinding(finding)),
    }, null, 2);
  }

  private transformFinding(finding: Finding): Record<string, unknown> {
    const result: Record<string, unknown> = {
      code: finding.code,
      rule: finding.ruleId,
      severity: finding.severity,
      nodes: finding.nodes,
      message: finding.message,
    };

    const fixHint = finding.details?.fixHint;
    if (typeof fixHint === 'string') {
      result.fix_hint = fixHint;
    }
    if (finding.details) {
      result.details = finding.details;
    }

    return result;
  }
}
