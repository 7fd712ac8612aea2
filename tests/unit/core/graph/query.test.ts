/**
 * @arch hexgraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import { graphOf, shopScenario } from '../../../helpers/components.js';

describe('GraphQuery', () => {
  const graph = graphOf(shopScenario);
  const ids = (nodes: ReadonlyArray<{ id: string }>): string[] => nodes.map((node) => node.id);

  it('should return every node without filters', () => {
    expect(graph.query().count()).toBe(11);
  });

  it('should filter by layer', () => {
    expect(ids(graph.query().layer('port').execute())).toEqual(['OrderRepository', 'Notifier']);
  });

  it('should filter by role', () => {
    expect(ids(graph.query().role('repository').execute())).toEqual(['OrderRepository']);
  });

  it('should filter by type name substring', () => {
    expect(ids(graph.query().typeNameContains('Repository').execute())).toEqual([
      'OrderRepository',
      'SqlOrderRepository',
    ]);
  });

  it('should filter by module path glob', () => {
    expect(ids(graph.query().modulePath('src/domain/**').execute())).toEqual(['Order', 'OrderLine', 'Money']);
  });

  it('should combine filters with AND', () => {
    const result = graph.query().layer('application').role('service').typeNameContains('Order').execute();

    expect(ids(result)).toEqual(['OrderService']);
  });

  it('should leave earlier queries untouched when refined', () => {
    const application = graph.query().layer('application');
    const services = application.role('service');

    expect(application.count()).toBe(4);
    expect(services.count()).toBe(2);
    expect(application.getFilters()).toEqual([{ kind: 'layer', layer: 'application' }]);
  });

  it('should return the first match or undefined', () => {
    expect(graph.query().layer('infrastructure').first()?.id).toBe('Database');
    expect(graph.query().role('use_case').first()).toBeUndefined();
  });
});
