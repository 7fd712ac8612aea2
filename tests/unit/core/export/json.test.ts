/**
 * @arch hexgraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import { JsonExporter, parseGraphJson } from '../../../../src/core/export/json.js';
import { getExporter, isExportFormat } from '../../../../src/core/export/index.js';
import { ExportError, GraphIntegrityError, SystemError } from '../../../../src/utils/errors.js';
import { graphOf, missingGatewayScenario, shopScenario, userScenario } from '../../../helpers/components.js';

function exportJson(entries: Parameters<typeof graphOf>[0]): string {
  const result = new JsonExporter().export(graphOf(entries));
  if (!result.ok) {
    throw result.error;
  }
  return result.document;
}

describe('JsonExporter', () => {
  it('should write description, nodes and edges with two-space indent', () => {
    const document = exportJson(missingGatewayScenario);

    expect(document).toBe(
      [
        '{',
        '  "description": "Hexagonal Architecture Graph",',
        '  "nodes": [',
        '    {',
        '      "id": "Order",',
        '      "layer": "domain",',
        '      "role": "aggregate",',
        '      "modulePath": ""',
        '    }',
        '  ],',
        '  "edges": []',
        '}',
      ].join('\n')
    );
  });

  it('should list edges as from, to, relation', () => {
    const parsed: unknown = JSON.parse(exportJson(userScenario));

    expect(parsed).toMatchObject({
      edges: [{ from: 'InMemoryUserRepository', to: 'UserRepository', relation: 'depends_on' }],
    });
  });
});

describe('parseGraphJson', () => {
  it('should round-trip node and edge counts', () => {
    const live = graphOf(shopScenario);
    const restored = parseGraphJson(exportJson(shopScenario));

    expect(restored.nodeCount).toBe(live.nodeCount);
    expect(restored.edgeCount).toBe(live.edgeCount);
    expect(restored.allEdges()).toEqual(live.allEdges());
    expect(restored.node('Money')).toEqual(live.node('Money'));
  });

  it('should reject text that is not JSON', () => {
    expect(() => parseGraphJson('graph TD')).toThrow(SystemError);
  });

  it('should reject documents with an unknown layer', () => {
    const document = JSON.stringify({
      description: 'x',
      nodes: [{ id: 'A', layer: 'presentation', role: 'entity' }],
      edges: [],
    });

    expect(() => parseGraphJson(document)).toThrow(/Invalid graph document: nodes\.0\.layer/);
  });

  it('should reject edges to unknown nodes', () => {
    const document = JSON.stringify({
      description: 'x',
      nodes: [{ id: 'A', layer: 'domain', role: 'entity', modulePath: '' }],
      edges: [{ from: 'A', to: 'B', relation: 'depends_on' }],
    });

    expect(() => parseGraphJson(document)).toThrow(GraphIntegrityError);
  });
});

describe('getExporter', () => {
  it('should return an exporter per format', () => {
    expect(getExporter('mermaid').fileExtension).toBe('mmd');
    expect(getExporter('graphviz').fileExtension).toBe('dot');
    expect(getExporter('json').format).toBe('json');
  });

  it('should reject unknown formats', () => {
    expect(() => getExporter('svg')).toThrow(ExportError);
    expect(isExportFormat('svg')).toBe(false);
  });
});
