/**
 * Tests for authority cycle detection.
 */

import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../../src/core/config.js';
import { cycleDiagnostics, findCycles } from '../../src/graph/cycles.js';
import { TraceGraph } from '../../src/graph/graph.js';
import { assertion, edge, requirement, test } from './nodes.js';

function graphOf(ids: string[]): TraceGraph {
  const graph = new TraceGraph(resolveConfig());
  for (const id of ids) graph.createNode(requirement(id));
  return graph;
}

describe('findCycles', () => {
  it('should report a loop once, starting from its smallest id', () => {
    const graph = graphOf(['REQ-d00003', 'REQ-d00001', 'REQ-d00002']);
    graph.addEdge(edge('REQ-d00003', 'REQ-d00001', 'implements'));
    graph.addEdge(edge('REQ-d00001', 'REQ-d00002', 'implements'));
    graph.addEdge(edge('REQ-d00002', 'REQ-d00003', 'refines'));

    expect(findCycles(graph)).toEqual([['REQ-d00001', 'REQ-d00002', 'REQ-d00003', 'REQ-d00001']]);
  });

  it('should find a self reference', () => {
    const graph = graphOf(['REQ-d00004']);
    graph.addEdge(edge('REQ-d00004', 'REQ-d00004', 'refines'));

    expect(findCycles(graph)).toEqual([['REQ-d00004', 'REQ-d00004']]);
  });

  it('should ignore contains, validates and addresses edges', () => {
    const graph = graphOf(['REQ-d00001', 'REQ-d00002']);
    graph.createNode(assertion('REQ-d00001', 'A'));
    graph.createNode(test('tests/t.py', 'test_x'));
    graph.addEdge(edge('REQ-d00001', 'REQ-d00001-A', 'contains'));
    graph.addEdge(edge('test:tests/t.py::test_x', 'REQ-d00001', 'validates'));
    graph.addEdge(edge('REQ-d00001', 'REQ-d00002', 'implements'));

    expect(findCycles(graph)).toEqual([]);
  });

  it('should keep acyclic diamonds out of the report', () => {
    const graph = graphOf(['REQ-p00001', 'REQ-o00001', 'REQ-o00002', 'REQ-d00001']);
    graph.addEdge(edge('REQ-o00001', 'REQ-p00001', 'implements'));
    graph.addEdge(edge('REQ-o00002', 'REQ-p00001', 'implements'));
    graph.addEdge(edge('REQ-d00001', 'REQ-o00001', 'implements'));
    graph.addEdge(edge('REQ-d00001', 'REQ-o00002', 'implements'));

    expect(findCycles(graph)).toEqual([]);
  });

  it('should walk a very deep chain and close its loop', () => {
    const ids = Array.from({ length: 20_000 }, (_, i) => `REQ-d${String(i + 1).padStart(5, '0')}`);
    const graph = graphOf(ids);
    for (let i = 0; i + 1 < ids.length; i++) graph.addEdge(edge(ids[i], ids[i + 1], 'implements'));

    expect(findCycles(graph)).toEqual([]);

    graph.addEdge(edge(ids[ids.length - 1], ids[0], 'refines'));
    const cycles = findCycles(graph);
    expect(cycles).toHaveLength(1);
    expect(cycles[0]).toHaveLength(20_001);
    expect(cycles[0]?.slice(0, 2)).toEqual(['REQ-d00001', 'REQ-d00002']);
    expect(cycles[0]?.at(-1)).toBe('REQ-d00001');
  });
});

describe('cycleDiagnostics', () => {
  it('should downgrade cycles to info when allowed', () => {
    const graph = graphOf(['REQ-d00001', 'REQ-d00002']);
    graph.addEdge(edge('REQ-d00001', 'REQ-d00002', 'refines'));
    graph.addEdge(edge('REQ-d00002', 'REQ-d00001', 'refines'));

    expect(cycleDiagnostics(graph).map((d) => d.severity)).toEqual(['error']);
    expect(cycleDiagnostics(graph, resolveConfig({ allowCycles: true }))).toEqual([
      {
        code: 'cycle',
        severity: 'info',
        message: 'Cycle: REQ-d00001 -> REQ-d00002 -> REQ-d00001',
        ids: ['REQ-d00001', 'REQ-d00002'],
      },
    ]);
  });
});
