/**
 * @arch hexgraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import { ArchitectureEngine } from '../../../../src/core/engine/architecture-engine.js';
import { defineComponents } from '../../../../src/core/registry/registration.js';
import type { ComponentEntryInput } from '../../../../src/core/registry/schema.js';
import type { ComponentModule } from '../../../../src/core/registry/types.js';
import { missingGatewayScenario, userScenario } from '../../../helpers/components.js';

describe('ArchitectureEngine', () => {
  it('should have no snapshot before the first rebuild', () => {
    expect(new ArchitectureEngine([]).current()).toBeUndefined();
  });

  it('should build a snapshot from its modules', () => {
    const engine = new ArchitectureEngine([defineComponents(...userScenario)], { description: 'Users' });

    const snapshot = engine.rebuild();

    expect(snapshot.graph.nodeCount).toBe(3);
    expect(snapshot.graph.description).toBe('Users');
    expect(snapshot.entryCount).toBe(3);
    expect(snapshot.findings).toEqual([]);
    expect(engine.current()).toBe(snapshot);
  });

  it('should re-run registration on every rebuild', () => {
    const pending: ComponentEntryInput[] = [{ typeName: 'User', layer: 'domain', role: 'entity' }];
    const dynamic: ComponentModule = (registry) => {
      registry.registerAll(pending);
    };
    const engine = new ArchitectureEngine([dynamic]);

    const first = engine.rebuild();
    pending.push({ typeName: 'UserRepository', layer: 'port', role: 'repository', dependencies: ['User'] });
    const second = engine.rebuild();

    expect(first.graph.nodeCount).toBe(1);
    expect(second.graph.nodeCount).toBe(2);
    expect(second.graph.edgeCount).toBe(1);
    expect(engine.current()).toBe(second);
  });

  it('should carry build findings in the snapshot', () => {
    const snapshot = new ArchitectureEngine([defineComponents(...missingGatewayScenario)]).rebuild();

    expect(snapshot.findings.map((finding) => finding.ruleId)).toEqual(['dangling_dependency']);
  });

  describe('validate', () => {
    it('should build on demand and include build findings', () => {
      const engine = new ArchitectureEngine([defineComponents(...missingGatewayScenario)], {
        validation: { rules: [], strict: true },
      });

      const report = engine.validate();

      expect(engine.current()).toBeDefined();
      expect(report.findings.map((finding) => finding.severity)).toEqual(['violation']);
      expect(report.passed).toBe(false);
    });

    it('should validate the current snapshot without rebuilding', () => {
      const pending: ComponentEntryInput[] = [];
      const engine = new ArchitectureEngine([(registry) => { registry.registerAll(pending); }], {
        validation: { rules: ['missing_layer'], expectedLayers: ['domain'] },
      });
      engine.rebuild();

      pending.push({ typeName: 'User', layer: 'domain', role: 'entity' });

      expect(engine.validate().summary.warning).toBe(1);
    });
  });
});
