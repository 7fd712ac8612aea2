/**
 * @arch hexgraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import {
  composeRegistry,
  defineComponents,
  candidatesModule,
  registryModule,
  manifestModule,
} from '../../../../src/core/registry/registration.js';
import type { ComponentModule } from '../../../../src/core/registry/types.js';

describe('composeRegistry', () => {
  it('should run modules in order against a sealed registry', () => {
    const registry = composeRegistry([
      defineComponents({ typeName: 'User', layer: 'domain', role: 'entity' }),
      defineComponents(
        { typeName: 'UserRepository', layer: 'port', role: 'repository' },
        { typeName: 'InMemoryUserRepository', layer: 'adapter', role: 'adapter', dependencies: ['UserRepository'] }
      ),
    ]);

    const names = [...registry.collectAll()].map((entry) => Reflect.get(entry, 'typeName'));
    expect(names).toEqual(['User', 'UserRepository', 'InMemoryUserRepository']);
    expect(registry.isSealed).toBe(true);
  });

  it('should give every call a fresh registry', () => {
    const modules: ComponentModule[] = [defineComponents({ typeName: 'User', layer: 'domain', role: 'entity' })];

    const first = composeRegistry(modules);
    const second = composeRegistry(modules);

    expect(first).not.toBe(second);
    expect(second.size).toBe(1);
  });

  it('should pass untyped candidates through unchanged', () => {
    const registry = composeRegistry([candidatesModule([{ typeName: 42, layer: 'nowhere' }])]);

    const [entry] = [...registry.collectAll()];
    expect(entry).toEqual({ typeName: 42, layer: 'nowhere' });
  });

  it('should replay another registry', () => {
    const source = composeRegistry([defineComponents({ typeName: 'User', layer: 'domain', role: 'entity' })]);

    const copy = composeRegistry([registryModule(source), registryModule(source)]);

    expect(copy.size).toBe(2);
  });

  it('should register manifest components in file order', () => {
    const registry = composeRegistry([
      manifestModule([
        { filePath: '/p/a.components.yaml', components: [{ typeName: 'A', layer: 'domain', role: 'entity' }] },
        { filePath: '/p/b.components.yaml', components: [{ typeName: 'B', layer: 'port', role: 'service' }] },
      ]),
    ]);

    expect([...registry.collectAll()].map((entry) => Reflect.get(entry, 'typeName'))).toEqual(['A', 'B']);
  });
});
