/**
 * @arch hexgraph.core.engine
 * @intent:stateless
 *
 * Runs graph rules and assembles a validation report. Never mutates the
 * graph and never throws for anything found in it.
 */
import type { ArchitectureGraph } from '../graph/graph.js';
import { LAYERS } from '../registry/schema.js';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import { summarizeFindings, withSeverity } from './findings.js';
import { getAllRules, getRule } from './rules/index.js';
import {
  GRAPH_RULE_IDS,
  type Finding,
  type GraphRuleId,
  type RuleContext,
  type ValidationOptions,
  type ValidationReport,
} from './types.js';

export const DEFAULT_VALIDATION_OPTIONS: Required<ValidationOptions> = {
  rules: GRAPH_RULE_IDS,
  expectedLayers: LAYERS,
  godComponentThreshold: 10,
  strict: false,
};

export class ValidationEngine {
  private readonly options: Required<ValidationOptions>;

  constructor(options: ValidationOptions = {}) {
    this.options = {
      rules: options.rules ?? DEFAULT_VALIDATION_OPTIONS.rules,
      expectedLayers: options.expectedLayers ?? DEFAULT_VALIDATION_OPTIONS.expectedLayers,
      godComponentThreshold: options.godComponentThreshold ?? DEFAULT_VALIDATION_OPTIONS.godComponentThreshold,
      strict: options.strict ?? DEFAULT_VALIDATION_OPTIONS.strict,
    };
  }

  /**
   * Validate a graph. Build findings, if given, lead the report; in strict
   * mode dangling dependencies among them become violations.
   */
  validate(graph: ArchitectureGraph, buildFindings: readonly Finding[] = []): ValidationReport {
    const findings: Finding[] = buildFindings.map((finding) => this.escalate(finding));
    const enabled = new Set<string>(this.options.rules);
    const context = this.context();
    const ran: GraphRuleId[] = [];

    for (const rule of getAllRules()) {
      if (!enabled.has(rule.id)) continue;
      ran.push(rule.id);
      findings.push(...rule.check(graph, context));
    }

    const summary = summarizeFindings(findings);
    const passed = summary.violation === 0 && (!this.options.strict || summary.warning === 0);

    return {
      findings: Object.freeze(findings),
      summary,
      passed,
      strict: this.options.strict,
      rules: Object.freeze(ran),
    };
  }

  /**
   * Run a single rule. Unknown ids are a programming error and throw.
   */
  runRule(id: string, graph: ArchitectureGraph): Finding[] {
    const rule = getRule(id);
    if (!rule) {
      throw new ValidationError(
        ErrorCodes.UNKNOWN_RULE,
        `Unknown rule '${id}'. Available: ${getAllRules().map((r) => r.id).join(', ')}`,
        { rule: id }
      );
    }
    return rule.check(graph, this.context());
  }

  getOptions(): Readonly<Required<ValidationOptions>> {
    return this.options;
  }

  private context(): RuleContext {
    return {
      expectedLayers: this.options.expectedLayers,
      godComponentThreshold: this.options.godComponentThreshold,
    };
  }

  private escalate(finding: Finding): Finding {
    if (this.options.strict && finding.ruleId === 'dangling_dependency' && finding.severity !== 'violation') {
      return withSeverity(finding, 'violation');
    }
    return finding;
  }
}

/**
 * Validate with a one-off engine.
 */
export function validateGraph(
  graph: ArchitectureGraph,
  buildFindings: readonly Finding[] = [],
  options: ValidationOptions = {}
): ValidationReport {
  return new ValidationEngine(options).validate(graph, buildFindings);
}
