/**
 * Coverage and test rollup.
 *
 * One post-order pass: every node's metrics are computed after its
 * children's. A node counts the distinct assertions and tests below it, so a
 * test reached through two paths is counted once. The metrics table is
 * cleared first, so a run never depends on the previous one.
 */

import type { GraphConfig } from '../core/config.js';
import type { AssertionNode, CoverageTier, Edge, RollupMetrics, TraceNode } from '../core/types.js';
import type { TraceGraph } from './graph.js';

/** Strongest first. */
export const TIER_ORDER: readonly CoverageTier[] = ['direct', 'explicit', 'inferred', 'indirect'];

export function emptyMetrics(): RollupMetrics {
  return {
    totalAssertions: 0,
    coveredAssertions: 0,
    directCovered: 0,
    explicitCovered: 0,
    inferredCovered: 0,
    indirectCovered: 0,
    totalTests: 0,
    passedTests: 0,
    failedTests: 0,
    skippedTests: 0,
    coveragePct: 0,
    indirectCoveragePct: 0,
    passRatePct: 0,
  };
}

function percent(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}

/**
 * Fill in the covered total and the percentages from the raw counters.
 */
export function deriveMetrics(metrics: RollupMetrics): RollupMetrics {
  const covered = metrics.directCovered + metrics.explicitCovered + metrics.inferredCovered;
  return {
    ...metrics,
    coveredAssertions: covered,
    coveragePct: percent(covered, metrics.totalAssertions),
    indirectCoveragePct: percent(covered + metrics.indirectCovered, metrics.totalAssertions),
    passRatePct: percent(metrics.passedTests, metrics.totalTests),
  };
}

function isExcluded(node: TraceNode, config: GraphConfig): boolean {
  return node.kind === 'requirement' && config.statusExclusions.includes(node.fields.status);
}

/**
 * The tier one incoming claim on a requirement gives to one of its
 * assertions, or null when it gives none.
 */
export function contributionTier(
  edge: Edge,
  contributor: TraceNode,
  label: string,
  config: GraphConfig
): CoverageTier | null {
  const targeted = edge.assertionTargets.includes(label);
  const whole = edge.assertionTargets.length === 0;

  if (edge.kind === 'validates' && contributor.kind === 'test') {
    if (targeted) return 'direct';
    if (whole) return 'indirect';
    return null;
  }
  if (edge.kind === 'implements' && contributor.kind === 'code' && targeted) {
    return 'direct';
  }
  if (contributor.kind === 'requirement') {
    if (edge.kind === 'implements' && targeted) return 'explicit';
    if (edge.kind === 'implements' && whole && config.strictMode) return 'inferred';
    if (edge.kind === 'refines' && (whole || targeted) && config.strictMode && config.inferFromRefines) {
      return 'inferred';
    }
  }
  return null;
}

/**
 * Strongest tier covering an assertion, from the claims on its requirement.
 */
export function assertionTier(graph: TraceGraph, assertion: AssertionNode, config: GraphConfig): CoverageTier | null {
  let best: CoverageTier | null = null;

  for (const containment of graph.incoming(assertion.id, 'contains')) {
    for (const edge of graph.incoming(containment.source)) {
      if (edge.kind === 'contains') continue;
      const contributor = graph.findNode(edge.source);
      if (!contributor || isExcluded(contributor, config)) continue;

      const tier = contributionTier(edge, contributor, assertion.fields.label, config);
      if (tier !== null && (best === null || TIER_ORDER.indexOf(tier) < TIER_ORDER.indexOf(best))) {
        best = tier;
      }
    }
  }
  return best;
}

type TestOutcome = 'passed' | 'failed' | 'skipped' | 'unrun';

/** Assertions and tests at or below a node, keyed by id. */
interface Contributions {
  assertions: Map<string, CoverageTier | null>;
  tests: Map<string, TestOutcome>;
}

function testOutcome(graph: TraceGraph, id: string): TestOutcome {
  const statuses = new Set<string>();
  for (const edge of graph.outgoing(id, 'contains')) {
    const result = graph.findNode(edge.target);
    if (result?.kind === 'result') statuses.add(result.fields.status);
  }

  if (statuses.has('failed') || statuses.has('error')) return 'failed';
  if (statuses.has('passed')) return 'passed';
  if (statuses.has('skipped')) return 'skipped';
  return 'unrun';
}

function ownContributions(graph: TraceGraph, node: TraceNode, config: GraphConfig): Contributions {
  const own: Contributions = { assertions: new Map(), tests: new Map() };
  if (node.kind === 'assertion') own.assertions.set(node.id, assertionTier(graph, node, config));
  else if (node.kind === 'test') own.tests.set(node.id, testOutcome(graph, node.id));
  return own;
}

function toMetrics(contributions: Contributions): RollupMetrics {
  const metrics = emptyMetrics();
  for (const tier of contributions.assertions.values()) {
    metrics.totalAssertions++;
    if (tier === 'direct') metrics.directCovered++;
    else if (tier === 'explicit') metrics.explicitCovered++;
    else if (tier === 'inferred') metrics.inferredCovered++;
    else if (tier === 'indirect') metrics.indirectCovered++;
  }
  for (const outcome of contributions.tests.values()) {
    metrics.totalTests++;
    if (outcome === 'passed') metrics.passedTests++;
    else if (outcome === 'failed') metrics.failedTests++;
    else if (outcome === 'skipped') metrics.skippedTests++;
  }
  return deriveMetrics(metrics);
}

/**
 * Nodes whose contributions roll into this one: contained nodes and
 * claimants through implements, validates and addresses. Refines never rolls
 * up, and only requirements, journeys and code aggregate.
 */
function rollupChildren(graph: TraceGraph, node: TraceNode, config: GraphConfig): TraceNode[] {
  if (node.kind !== 'requirement' && node.kind !== 'journey' && node.kind !== 'code') return [];

  const ids = new Set<string>();
  for (const edge of graph.outgoing(node.id, 'contains')) ids.add(edge.target);
  for (const edge of graph.incoming(node.id)) {
    if (edge.kind === 'implements' || edge.kind === 'validates' || edge.kind === 'addresses') {
      ids.add(edge.source);
    }
  }

  const children: TraceNode[] = [];
  for (const id of ids) {
    const child = graph.findNode(id);
    if (child && !isExcluded(child, config)) children.push(child);
  }
  return children;
}

interface Frame {
  node: TraceNode;
  children: TraceNode[];
  next: number;
}

/**
 * Recompute every node's metrics from scratch.
 */
export function annotateCoverage(graph: TraceGraph, config: GraphConfig = graph.config): void {
  graph.clearMetrics();
  const done = new Map<string, Contributions>();
  const onStack = new Set<string>();

  const finish = (frame: Frame) => {
    const own = ownContributions(graph, frame.node, config);
    for (const child of frame.children) {
      // A child still on the stack closes a cycle and contributes nothing.
      const below = done.get(child.id);
      if (!below) continue;
      for (const [id, tier] of below.assertions) own.assertions.set(id, tier);
      for (const [id, outcome] of below.tests) own.tests.set(id, outcome);
    }
    done.set(frame.node.id, own);
    graph.setMetrics(frame.node.id, toMetrics(own));
  };

  for (const start of graph.nodes()) {
    if (done.has(start.id)) continue;

    const frames: Frame[] = [{ node: start, children: rollupChildren(graph, start, config), next: 0 }];
    onStack.add(start.id);
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame.next < frame.children.length) {
        const child = frame.children[frame.next++];
        if (!done.has(child.id) && !onStack.has(child.id)) {
          onStack.add(child.id);
          frames.push({ node: child, children: rollupChildren(graph, child, config), next: 0 });
        }
        continue;
      }
      frames.pop();
      onStack.delete(frame.node.id);
      finish(frame);
    }
  }
}
