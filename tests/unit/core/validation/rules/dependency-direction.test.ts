/**
 * @arch hexgraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import {
  DependencyDirectionRule,
  isOutwardDependency,
  LAYER_RANK,
} from '../../../../../src/core/validation/rules/dependency-direction.js';
import { LAYERS } from '../../../../../src/core/registry/schema.js';
import { graphOf, outwardScenario, shopScenario, userScenario } from '../../../../helpers/components.js';

describe('DependencyDirectionRule', () => {
  const rule = new DependencyDirectionRule();

  it('should rank layers from the core outward', () => {
    expect(LAYERS.map((layer) => LAYER_RANK[layer])).toEqual([0, 1, 2, 3, 4]);
  });

  it('should flag a domain component depending on an adapter', () => {
    const findings = rule.check(graphOf(outwardScenario));

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      ruleId: 'dependency_direction',
      code: 'R001',
      severity: 'violation',
      nodes: ['Order', 'OrderMapper'],
      message: "'Order' (domain) depends on 'OrderMapper' (adapter); domain may not depend on an outer layer",
      details: { fromLayer: 'domain', toLayer: 'adapter' },
    });
    expect(findings[0].details?.fixHint).toBe(
      'Introduce a port in an inner layer and let the outer component implement it.'
    );
  });

  it('should accept inward dependencies', () => {
    expect(rule.check(graphOf(userScenario))).toEqual([]);
    expect(rule.check(graphOf(shopScenario))).toEqual([]);
  });

  it('should never flag same-rank or inward pairs', () => {
    for (const from of LAYERS) {
      for (const to of LAYERS) {
        expect(isOutwardDependency(from, to)).toBe(LAYER_RANK[to] > LAYER_RANK[from]);
      }
    }
    expect(isOutwardDependency('infrastructure', 'domain')).toBe(false);
    expect(isOutwardDependency('port', 'port')).toBe(false);
  });

  it('should expose its code and default severity', () => {
    expect(rule.code).toBe('R001');
    expect(rule.defaultSeverity).toBe('violation');
  });
});
