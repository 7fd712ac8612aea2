/**
 * @arch hexgraph.core.domain.rule
 */
import type { ArchitectureGraph } from '../../graph/graph.js';
import type { NodeId } from '../../graph/node-id.js';
import { createFinding, FindingCodes } from '../findings.js';
import type { Finding, GraphRuleId, IGraphRule, RuleContext, Severity } from '../types.js';

/**
 * Base class for graph rules.
 * Findings carry the rule's code, its default severity and its fix hint.
 */
export abstract class BaseGraphRule implements IGraphRule {
  abstract readonly id: GraphRuleId;
  abstract readonly description: string;
  abstract readonly defaultSeverity: Severity;

  get code(): string {
    return FindingCodes[this.id];
  }

  abstract check(graph: ArchitectureGraph, context: RuleContext): Finding[];

  protected createFinding(
    nodes: readonly NodeId[],
    message: string,
    details: Record<string, unknown> = {}
  ): Finding {
    const fixHint = this.getFixHint();
    return createFinding(this.id, this.defaultSeverity, nodes, message, {
      ...details,
      ...(fixHint ? { fixHint } : {}),
    });
  }

  protected getFixHint(): string | undefined {
    return undefined;
  }
}
