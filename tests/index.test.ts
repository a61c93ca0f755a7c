/**
 * End-to-end: the fixture project through the public API.
 */

import { describe, it, expect } from 'vitest';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import {
  annotateCoverage,
  buildGraph,
  collectSourceUnits,
  findDrift,
  findProjectRoot,
  GraphMutator,
  loadConfigFile,
  type BuildResult,
  type RollupMetrics,
  type TraceGraph,
} from '../src/index.js';

const FIXTURE_ROOT = join(dirname(fileURLToPath(import.meta.url)), 'fixtures', 'project');

function loadFixture(): BuildResult {
  const root = findProjectRoot(join(FIXTURE_ROOT, 'spec'));
  if (root === null) throw new Error('fixture project not found');
  const config = loadConfigFile(root);
  return buildGraph(collectSourceUnits(root, config), config);
}

function metricsOf(graph: TraceGraph, id: string): RollupMetrics {
  const metrics = graph.getMetrics(id);
  if (!metrics) throw new Error(`no metrics for ${id}`);
  return metrics;
}

function ids(nodes: Iterable<{ id: string }>): string[] {
  return [...nodes].map((node) => node.id);
}

describe('fixture project', () => {
  it('should build without diagnostics', () => {
    const { graph, diagnostics } = loadFixture();

    expect(diagnostics).toEqual([]);
    expect(graph.size).toBe(10);
    expect(ids(graph.nodesOfKind('code'))).toEqual(['code:src/auth.py:1']);
    expect(findDrift(graph)).toEqual([]);
  });

  it('should roll coverage and test results up to the product requirement', () => {
    const { graph } = loadFixture();
    annotateCoverage(graph);

    expect(metricsOf(graph, 'REQ-p00001')).toMatchObject({
      totalAssertions: 2,
      explicitCovered: 1,
      coveredAssertions: 1,
      coveragePct: 50,
      totalTests: 1,
      passedTests: 1,
      passRatePct: 100,
    });
    expect(metricsOf(graph, 'REQ-d00001')).toMatchObject({ totalAssertions: 0, totalTests: 1, passedTests: 1 });
    expect(ids(graph.roots())).toEqual(['REQ-p00001']);
    expect(ids(graph.orphans())).toEqual([]);
  });

  it('should recompute after a mutation and again after its undo', () => {
    const { graph } = loadFixture();
    const mutator = new GraphMutator(graph);

    mutator.deleteEdge('REQ-d00001', 'REQ-p00001', 'implements', { confirm: true });
    annotateCoverage(graph);
    expect(metricsOf(graph, 'REQ-p00001')).toMatchObject({ explicitCovered: 0, totalTests: 0 });
    expect(ids(graph.roots())).toEqual(['REQ-d00001']);
    expect(ids(graph.orphans())).toEqual(['REQ-p00001']);

    mutator.undoLast();
    annotateCoverage(graph);
    expect(metricsOf(graph, 'REQ-p00001')).toMatchObject({ explicitCovered: 1, totalTests: 1 });
  });
});
