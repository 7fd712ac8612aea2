/**
 * @arch hexgraph.core.types
 *
 * Finding and validation type definitions.
 */
import type { Layer } from '../registry/schema.js';
import type { NodeId } from '../graph/node-id.js';
import type { ArchitectureGraph } from '../graph/graph.js';

export const SEVERITIES = ['info', 'warning', 'violation'] as const;

export type Severity = (typeof SEVERITIES)[number];

/** Findings emitted while building a graph. */
export const BUILD_RULE_IDS = ['malformed_entry', 'duplicate_node_id', 'dangling_dependency'] as const;

/** Findings emitted by validation rules over a built graph. */
export const GRAPH_RULE_IDS = [
  'dependency_direction',
  'orphan_node',
  'missing_layer',
  'circular_dependency',
  'god_component',
  'unimplemented_port',
] as const;

export type BuildRuleId = (typeof BUILD_RULE_IDS)[number];
export type GraphRuleId = (typeof GRAPH_RULE_IDS)[number];
export type RuleId = BuildRuleId | GraphRuleId;

/**
 * An advisory record about the component set or the graph built from it.
 * Never stored in the graph.
 */
export interface Finding {
  readonly ruleId: RuleId;
  /** Stable short code (B001, R001, ...) */
  readonly code: string;
  readonly severity: Severity;
  /** Affected nodes; empty when the finding concerns no node */
  readonly nodes: readonly NodeId[];
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

/**
 * Settings shared by every rule during one validation run.
 */
export interface RuleContext {
  /** Layers that should contain at least one node */
  expectedLayers: readonly Layer[];
  /** Incident edge count above which a node is a god component */
  godComponentThreshold: number;
}

/**
 * A single, independently invocable validation rule.
 */
export interface IGraphRule {
  readonly id: GraphRuleId;
  readonly code: string;
  readonly description: string;
  readonly defaultSeverity: Severity;
  check(graph: ArchitectureGraph, context: RuleContext): Finding[];
}

export interface ValidationOptions {
  /** Rules to run (default: all registered rules) */
  rules?: readonly GraphRuleId[];
  expectedLayers?: readonly Layer[];
  godComponentThreshold?: number;
  /** Escalate dangling dependencies to violations and fail on warnings */
  strict?: boolean;
}

export interface ValidationSummary {
  info: number;
  warning: number;
  violation: number;
  total: number;
}

/**
 * Outcome of a validation run. Always returned as data, never thrown.
 */
export interface ValidationReport {
  /** Build findings first, then rule findings in rule registry order */
  findings: readonly Finding[];
  summary: ValidationSummary;
  passed: boolean;
  strict: boolean;
  /** Rules that were run */
  rules: readonly GraphRuleId[];
}
