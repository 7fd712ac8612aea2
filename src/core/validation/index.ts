/**
 * @arch hexgraph.core.barrel
 */
export { ValidationEngine, validateGraph, DEFAULT_VALIDATION_OPTIONS } from './engine.js';
export {
  createFinding,
  withSeverity,
  summarizeFindings,
  sortBySeverity,
  findingsForRule,
  FindingCodes,
} from './findings.js';
export * from './rules/index.js';
export { SEVERITIES, BUILD_RULE_IDS, GRAPH_RULE_IDS } from './types.js';
export type {
  Severity,
  BuildRuleId,
  GraphRuleId,
  RuleId,
  Finding,
  RuleContext,
  IGraphRule,
  ValidationOptions,
  ValidationSummary,
  ValidationReport,
} from './types.js';
