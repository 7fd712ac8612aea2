/**
 * @arch hexgraph.test.unit
 */
import { describe, it, expect } from 'vitest';
import { GraphvizExporter, quoteDot } from '../../../../src/core/export/graphviz.js';
import { graphOf, userScenario } from '../../../helpers/components.js';

describe('GraphvizExporter', () => {
  it('should render one cluster per populated layer', () => {
    const result = new GraphvizExporter().export(graphOf(userScenario));

    expect(result).toEqual({
      ok: true,
      document: [
        'digraph architecture {',
        '    label="Hexagonal Architecture Graph";',
        '    rankdir=TB;',
        '    node [shape=box, style=filled];',
        '',
        '    subgraph cluster_domain {',
        '        label="domain";',
        '        "User" [label="User\\n(entity)", fillcolor="#fff3e0"];',
        '    }',
        '',
        '    subgraph cluster_port {',
        '        label="port";',
        '        "UserRepository" [label="UserRepository\\n(repository)", fillcolor="#e8f5e9"];',
        '    }',
        '',
        '    subgraph cluster_adapter {',
        '        label="adapter";',
        '        "InMemoryUserRepository" [label="InMemoryUserRepository\\n(adapter)", fillcolor="#f3e5f5"];',
        '    }',
        '',
        '    "InMemoryUserRepository" -> "UserRepository" [label="depends_on"];',
        '}',
      ].join('\n'),
    });
  });

  it('should render an empty graph', () => {
    const result = new GraphvizExporter().export(graphOf([]));

    expect(result.ok && result.document.split('\n')).toEqual([
      'digraph architecture {',
      '    label="Hexagonal Architecture Graph";',
      '    rankdir=TB;',
      '    node [shape=box, style=filled];',
      '}',
    ]);
  });

  it('should escape quotes and backslashes', () => {
    expect(quoteDot('say "hi"')).toBe('"say \\"hi\\""');
    expect(quoteDot('a\\b')).toBe('"a\\\\b"');
  });
});
