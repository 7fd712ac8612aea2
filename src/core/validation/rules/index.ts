/**
 * @arch hexgraph.core.domain
 *
 * Rule registry - maps rule ids to rule instances, in evaluation order.
 */
import type { GraphRuleId, IGraphRule } from '../types.js';
import { DependencyDirectionRule } from './dependency-direction.js';
import { OrphanNodeRule } from './orphan-node.js';
import { MissingLayerRule } from './missing-layer.js';
import { CircularDependencyRule } from './circular-dependency.js';
import { GodComponentRule } from './god-component.js';
import { UnimplementedPortRule } from './unimplemented-port.js';

const ruleRegistry = new Map<string, IGraphRule>();

for (const rule of [
  new DependencyDirectionRule(),
  new OrphanNodeRule(),
  new MissingLayerRule(),
  new CircularDependencyRule(),
  new GodComponentRule(),
  new UnimplementedPortRule(),
]) {
  ruleRegistry.set(rule.id, rule);
}

/**
 * Get a rule by id. Accepts any string so callers can pass user input.
 */
export function getRule(id: string): IGraphRule | undefined {
  return ruleRegistry.get(id);
}

/**
 * All registered rules, in evaluation order.
 */
export function getAllRules(): IGraphRule[] {
  return [...ruleRegistry.values()];
}

export function hasRule(id: string): id is GraphRuleId {
  return ruleRegistry.has(id);
}

export { BaseGraphRule } from './base.js';
export { DependencyDirectionRule, LAYER_RANK, isOutwardDependency } from './dependency-direction.js';
export { OrphanNodeRule } from './orphan-node.js';
export { MissingLayerRule } from './missing-layer.js';
export { CircularDependencyRule } from './circular-dependency.js';
export { GodComponentRule } from './god-component.js';
export { UnimplementedPortRule } from './unimplemented-port.js';
