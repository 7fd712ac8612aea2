/**
 * @arch hexgraph.core.domain
 *
 * Finding construction and aggregation helpers.
 */
import type { NodeId } from '../graph/node-id.js';
import type { Finding, RuleId, Severity, ValidationSummary } from './types.js';

export const FindingCodes: Readonly<Record<RuleId, string>> = {
  // Build (B001-B003)
  malformed_entry: 'B001',
  duplicate_node_id: 'B002',
  dangling_dependency: 'B003',
  // Rules (R001-R006)
  dependency_direction: 'R001',
  orphan_node: 'R002',
  missing_layer: 'R003',
  circular_dependency: 'R004',
  god_component: 'R005',
  unimplemented_port: 'R006',
};

const SEVERITY_RANK: Record<Severity, number> = {
  info: 0,
  warning: 1,
  violation: 2,
};

/**
 * Create a frozen finding.
 */
export function createFinding(
  ruleId: RuleId,
  severity: Severity,
  nodes: readonly NodeId[],
  message: string,
  details?: Record<string, unknown>
): Finding {
  const finding: Finding = {
    ruleId,
    code: FindingCodes[ruleId],
    severity,
    nodes: Object.freeze([...nodes]),
    message,
    ...(details ? { details: Object.freeze({ ...details }) } : {}),
  };
  return Object.freeze(finding);
}

/**
 * Copy of a finding with a different severity.
 */
export function withSeverity(finding: Finding, severity: Severity): Finding {
  return createFinding(finding.ruleId, severity, finding.nodes, finding.message, {
    ...finding.details,
    escalatedFrom: finding.severity,
  });
}

export function summarizeFindings(findings: readonly Finding[]): ValidationSummary {
  const summary: ValidationSummary = { info: 0, warning: 0, violation: 0, total: findings.length };
  for (const finding of findings) {
    summary[finding.severity]++;
  }
  return summary;
}

/**
 * Order by severity, most severe first. Stable for equal severities.
 */
export function sortBySeverity(findings: readonly Finding[]): Finding[] {
  return [...findings].sort((a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity]);
}

export function findingsForRule(findings: readonly Finding[], ruleId: RuleId): Finding[] {
  return findings.filter((finding) => finding.ruleId === ruleId);
}
