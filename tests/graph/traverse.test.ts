/**
 * Tests for graph traversal and drift detection.
 */

import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../../src/core/config.js';
import { TraceGraph } from '../../src/graph/graph.js';
import { findDrift, traverseGraph } from '../../src/graph/traverse.js';
import { assertion, edge, requirement, test } from './nodes.js';

const P = 'REQ-p00001';
const D = 'REQ-d00001';
const TEST = 'test:tests/test_auth.py::test_login';

function sampleGraph(devHash: string | null = null): TraceGraph {
  const graph = new TraceGraph(resolveConfig());
  graph.createNode(requirement(P, { level: 'prd' }));
  graph.createNode(assertion(P, 'A'));
  graph.addEdge(edge(P, `${P}-A`, 'contains'));
  graph.createNode(requirement(D, { hash: devHash }));
  graph.addEdge(edge(D, P, 'implements', ['A']));
  graph.createNode(test('tests/test_auth.py', 'test_login'));
  graph.addEdge(edge(TEST, D, 'validates'));
  return graph;
}

function visited(steps: ReturnType<typeof traverseGraph>): [string, number][] {
  return steps.map((step) => [step.node.id, step.depth]);
}

describe('traverseGraph', () => {
  it('should follow claims upstream', () => {
    const steps = traverseGraph(sampleGraph(), D, 'upstream');

    expect(visited(steps)).toEqual([
      [D, 0],
      [P, 1],
    ]);
    expect(steps[0]?.edges).toEqual([{ kind: 'implements', target: P, assertionTargets: ['A'], direction: 'outgoing' }]);
  });

  it('should follow contained nodes and claimants downstream', () => {
    const steps = traverseGraph(sampleGraph(), P, 'downstream');

    expect(visited(steps)).toEqual([
      [P, 0],
      [`${P}-A`, 1],
      [D, 1],
      [TEST, 2],
    ]);
    expect(steps[0]?.edges.map((e) => [e.kind, e.target, e.direction])).toEqual([
      ['contains', `${P}-A`, 'outgoing'],
      ['implements', D, 'incoming'],
    ]);
  });

  it('should stop at the depth limit', () => {
    expect(visited(traverseGraph(sampleGraph(), P, 'downstream', 1))).toEqual([
      [P, 0],
      [`${P}-A`, 1],
      [D, 1],
    ]);
  });

  it('should visit each node once in both directions', () => {
    expect(visited(traverseGraph(sampleGraph(), TEST, 'both'))).toEqual([
      [TEST, 0],
      [D, 1],
      [P, 2],
      [`${P}-A`, 3],
    ]);
  });

  it('should return nothing for an unknown start', () => {
    expect(traverseGraph(sampleGraph(), 'REQ-p00404')).toEqual([]);
  });
});

describe('findDrift', () => {
  it('should report a requirement whose declared hash is out of date', () => {
    expect(findDrift(sampleGraph('0a1b2c3d'))).toEqual([
      { nodeId: D, declaredHash: '0a1b2c3d', currentHash: '00000000', dependents: [TEST] },
    ]);
  });

  it('should ignore undeclared and matching hashes', () => {
    expect(findDrift(sampleGraph())).toEqual([]);
    expect(findDrift(sampleGraph('00000000'))).toEqual([]);
  });

  it('should skip conflict copies', () => {
    const graph = sampleGraph();
    graph.createNode({ ...requirement(`${D}__conflict`, { hash: 'ffffffff' }), isConflict: true, conflictWith: D });

    expect(findDrift(graph)).toEqual([]);
  });
});
