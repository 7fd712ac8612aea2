/**
 * @arch hexgraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import {
  createFinding,
  withSeverity,
  summarizeFindings,
  sortBySeverity,
  findingsForRule,
} from '../../../../src/core/validation/findings.js';

describe('findings', () => {
  const info = createFinding('orphan_node', 'info', ['A'], 'orphan');
  const warning = createFinding('missing_layer', 'warning', [], 'missing');
  const violation = createFinding('dependency_direction', 'violation', ['A', 'B'], 'outward');

  it('should assign the rule code and omit absent details', () => {
    expect(info).toEqual({ ruleId: 'orphan_node', code: 'R002', severity: 'info', nodes: ['A'], message: 'orphan' });
    expect('details' in info).toBe(false);
  });

  it('should freeze findings', () => {
    expect(Object.isFrozen(info)).toBe(true);
    expect(Object.isFrozen(info.nodes)).toBe(true);
  });

  it('should record the original severity when changing it', () => {
    const escalated = withSeverity(warning, 'violation');

    expect(escalated.severity).toBe('violation');
    expect(escalated.details).toEqual({ escalatedFrom: 'warning' });
    expect(warning.severity).toBe('warning');
  });

  it('should count findings by severity', () => {
    expect(summarizeFindings([info, warning, violation, warning])).toEqual({
      info: 1,
      warning: 2,
      violation: 1,
      total: 4,
    });
  });

  it('should sort most severe first', () => {
    expect(sortBySeverity([info, warning, violation]).map((f) => f.severity)).toEqual([
      'violation',
      'warning',
      'info',
    ]);
  });

  it('should select findings for one rule', () => {
    expect(findingsForRule([info, warning, violation], 'missing_layer')).toEqual([warning]);
  });
});
