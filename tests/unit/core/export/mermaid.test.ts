/**
 * @arch hexgraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import { MermaidExporter, sanitizeMermaidId } from '../../../../src/core/export/mermaid.js';
import { ExportError } from '../../../../src/utils/errors.js';
import { graphOf, userScenario } from '../../../helpers/components.js';

describe('MermaidExporter', () => {
  it('should render nodes, edges and layer classes', () => {
    const result = new MermaidExporter().export(graphOf(userScenario));

    expect(result).toEqual({
      ok: true,
      document: [
        'graph TD',
        '  User["User<br/>(entity)"]',
        '  UserRepository["UserRepository<br/>(repository)"]',
        '  InMemoryUserRepository["InMemoryUserRepository<br/>(adapter)"]',
        '',
        '  InMemoryUserRepository -->|depends_on| UserRepository',
        '',
        '  classDef domain fill:#fff3e0',
        '  classDef port fill:#e8f5e9',
        '  classDef adapter fill:#f3e5f5',
        '  class User domain',
        '  class UserRepository port',
        '  class InMemoryUserRepository adapter',
      ].join('\n'),
    });
  });

  it('should honour the direction', () => {
    const result = new MermaidExporter('LR').export(graphOf([]));

    expect(result).toEqual({ ok: true, document: 'graph LR' });
  });

  it('should sanitize ids and escape labels', () => {
    const result = new MermaidExporter().export(
      graphOf([{ typeName: 'Result<"User">', layer: 'domain', role: 'value_object' }])
    );

    expect(result.ok && result.document.split('\n')[1]).toBe('  Result__User__["Result<#quot;User#quot;><br/>(value_object)"]');
  });

  it('should fail when two ids sanitize to the same identifier', () => {
    const result = new MermaidExporter().export(
      graphOf([
        { typeName: 'Order.Line', layer: 'domain', role: 'entity' },
        { typeName: 'Order_Line', layer: 'domain', role: 'entity' },
      ])
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ExportError);
      expect(result.error.code).toBe('X001');
      expect(result.error.details).toEqual({ format: 'mermaid', nodes: ['Order.Line', 'Order_Line'] });
    }
  });

  describe('sanitizeMermaidId', () => {
    it('should prefix ids Mermaid would misread', () => {
      expect(sanitizeMermaidId('3DModel')).toBe('n_3DModel');
      expect(sanitizeMermaidId('end')).toBe('n_end');
      expect(sanitizeMermaidId('Vendor::Client')).toBe('Vendor__Client');
    });

    it('should prefix flowchart keywords in any case', () => {
      const keywords = ['graph', 'subgraph', 'class', 'classDef', 'style', 'click', 'linkStyle', 'default', 'End'];

      expect(keywords.map(sanitizeMermaidId)).toEqual([
        'n_graph',
        'n_subgraph',
        'n_class',
        'n_classDef',
        'n_style',
        'n_click',
        'n_linkStyle',
        'n_default',
        'n_End',
      ]);
      expect(sanitizeMermaidId('Graphite')).toBe('Graphite');
    });

    it('should emit prefixed ids for keyword-named components', () => {
      const result = new MermaidExporter().export(
        graphOf([
          { typeName: 'style', layer: 'domain', role: 'value_object' },
          { typeName: 'Theme', layer: 'domain', role: 'entity', dependencies: ['style'] },
        ])
      );
      if (!result.ok) throw result.error;

      const lines = result.document.split('\n');
      expect(lines).toContain('  n_style["style<br/>(value_object)"]');
      expect(lines).toContain('  Theme -->|depends_on| n_style');
    });
  });
});
