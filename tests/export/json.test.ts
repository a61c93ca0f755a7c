/**
 * Tests for the JSON export.
 */

import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../../src/core/config.js';
import type { TraceNode } from '../../src/core/types.js';
import { exportJson, serializeGraph } from '../../src/export/json.js';
import { TraceGraph } from '../../src/graph/graph.js';
import { annotateCoverage } from '../../src/graph/metrics.js';
import { assertion, edge, requirement } from '../graph/nodes.js';

const P = 'REQ-p00001';
const D = 'REQ-d00001';

function sampleGraph(reverse = false): TraceGraph {
  const graph = new TraceGraph(resolveConfig());
  const nodes: TraceNode[] = [
    { ...requirement(P, { level: 'prd' }), source: { path: 'spec/prd.md', line: 3, endLine: 9 } },
    assertion(P, 'A'),
    requirement(D),
  ];
  for (const node of reverse ? [...nodes].reverse() : nodes) graph.createNode(node);

  const edges = [edge(P, `${P}-A`, 'contains'), edge(D, P, 'implements', ['A']), edge(D, P, 'refines')];
  for (const link of reverse ? [...edges].reverse() : edges) graph.addEdge(link);
  graph.addUnresolved({ ...edge(D, 'REQ-p00404', 'implements'), state: 'broken' });
  return graph;
}

describe('serializeGraph', () => {
  it('should sort nodes and edges and leave out optional sections', () => {
    const serialized = serializeGraph(sampleGraph());

    expect(serialized.nodes.map((node) => node.id)).toEqual([D, P, `${P}-A`]);
    expect(serialized.nodes[1]).toEqual({
      id: P,
      kind: 'requirement',
      label: `Title of ${P}`,
      source: { path: 'spec/prd.md', line: 3, endLine: 9 },
      fields: {
        title: `Title of ${P}`,
        level: 'prd',
        status: 'Active',
        body: '',
        hash: null,
        contentHash: '00000000',
      },
    });
    expect(serialized.edges.map((e) => [e.source, e.kind, e.target])).toEqual([
      [D, 'implements', P],
      [D, 'refines', P],
      [P, 'contains', `${P}-A`],
    ]);
    expect(serialized.unresolved).toEqual([
      { source: D, target: 'REQ-p00404', kind: 'implements', assertionTargets: [], state: 'broken' },
    ]);
  });

  it('should not depend on insertion order', () => {
    expect(exportJson(sampleGraph(true))).toBe(exportJson(sampleGraph()));
  });

  it('should include classification on request', () => {
    const serialized = serializeGraph(sampleGraph(), { classification: true });

    expect(serialized.nodes.map((node) => [node.id, node.classification])).toEqual([
      [D, undefined],
      [P, 'root'],
      [`${P}-A`, undefined],
    ]);
  });

  it('should include metrics on request', () => {
    const graph = sampleGraph();
    annotateCoverage(graph);

    const serialized = serializeGraph(graph, { metrics: true });
    expect(serialized.nodes[1]?.metrics).toMatchObject({ totalAssertions: 1, explicitCovered: 1, coveragePct: 100 });
    expect(serializeGraph(graph).nodes[1]).not.toHaveProperty('metrics');
  });

  it('should mark conflict copies', () => {
    const graph = sampleGraph();
    graph.createNode({ ...requirement(`${D}__conflict`), isConflict: true, conflictWith: D });

    const copy = serializeGraph(graph).nodes.find((node) => node.id === `${D}__conflict`);
    expect(copy).toMatchObject({ isConflict: true, conflictWith: D });
  });

  it('should copy edges rather than share them', () => {
    const graph = sampleGraph();
    const stored = [...graph.outgoing(D, 'implements')][0];
    const copied = serializeGraph(graph).edges[0];

    expect(copied).toEqual(stored);
    expect(copied).not.toBe(stored);
    expect(copied?.assertionTargets).not.toBe(stored?.assertionTargets);
  });
});

describe('exportJson', () => {
  it('should write indented JSON that parses back to the serialized graph', () => {
    const graph = sampleGraph();
    const json = exportJson(graph, { classification: true });

    expect(json.split('\n')[1]).toBe('  "nodes": [');
    expect(JSON.parse(json)).toEqual(serializeGraph(graph, { classification: true }));
  });
});
