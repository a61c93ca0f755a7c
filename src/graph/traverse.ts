/**
 * Graph traversal and hash drift detection.
 */

import type { EdgeKind, RequirementNode, TraceNode } from '../core/types.js';
import type { TraceGraph } from './graph.js';

/**
 * Direction for graph traversal. Upstream follows parents (what a node
 * implements or validates); downstream follows children.
 */
export type TraversalDirection = 'upstream' | 'downstream' | 'both';

/**
 * A node in the traversal result with its relationships.
 */
export interface TraversalStep {
  node: TraceNode;
  depth: number;
  edges: {
    kind: EdgeKind;
    target: string;
    assertionTargets: readonly string[];
    direction: 'incoming' | 'outgoing';
  }[];
}

/**
 * A requirement whose declared hash no longer matches its text.
 */
export interface DriftReport {
  nodeId: string;
  declaredHash: string;
  currentHash: string;
  /** Nodes that implement, refine or validate the drifted requirement. */
  dependents: string[];
}

/**
 * Depth-first walk from a starting node, up to `maxDepth` hops away.
 */
export function traverseGraph(
  graph: TraceGraph,
  startId: string,
  direction: TraversalDirection = 'both',
  maxDepth: number = 3
): TraversalStep[] {
  const visited = new Set<string>();
  const result: TraversalStep[] = [];

  function traverse(nodeId: string, depth: number) {
    if (depth > maxDepth || visited.has(nodeId)) return;
    visited.add(nodeId);

    const node = graph.findNode(nodeId);
    if (!node) return;

    const step: TraversalStep = { node, depth, edges: [] };
    const next: string[] = [];

    // Upstream: structural parent and claimed parents
    if (direction === 'upstream' || direction === 'both') {
      for (const edge of graph.outgoing(nodeId)) {
        if (edge.kind === 'contains') continue;
        step.edges.push({ kind: edge.kind, target: edge.target, assertionTargets: edge.assertionTargets, direction: 'outgoing' });
        next.push(edge.target);
      }
      for (const edge of graph.incoming(nodeId, 'contains')) {
        step.edges.push({ kind: edge.kind, target: edge.source, assertionTargets: edge.assertionTargets, direction: 'incoming' });
        next.push(edge.source);
      }
    }

    // Downstream: contained nodes and claimants
    if (direction === 'downstream' || direction === 'both') {
      for (const edge of graph.outgoing(nodeId, 'contains')) {
        step.edges.push({ kind: edge.kind, target: edge.target, assertionTargets: edge.assertionTargets, direction: 'outgoing' });
        next.push(edge.target);
      }
      for (const edge of graph.incoming(nodeId)) {
        if (edge.kind === 'contains') continue;
        step.edges.push({ kind: edge.kind, target: edge.source, assertionTargets: edge.assertionTargets, direction: 'incoming' });
        next.push(edge.source);
      }
    }

    result.push(step);
    for (const id of next) traverse(id, depth + 1);
  }

  traverse(startId, 0);
  return result;
}

function hasDrifted(node: RequirementNode): node is RequirementNode & { fields: { hash: string } } {
  return node.fields.hash !== null && node.fields.hash !== node.fields.contentHash;
}

/**
 * Find every requirement whose declared hash differs from its content hash.
 */
export function findDrift(graph: TraceGraph): DriftReport[] {
  const reports: DriftReport[] = [];

  for (const node of graph.nodesOfKind('requirement')) {
    if (node.isConflict || !hasDrifted(node)) continue;

    const dependents = new Set<string>();
    for (const edge of graph.incoming(node.id)) {
      if (edge.kind !== 'contains' && edge.kind !== 'addresses') dependents.add(edge.source);
    }

    reports.push({
      nodeId: node.id,
      declaredHash: node.fields.hash,
      currentHash: node.fields.contentHash,
      dependents: [...dependents],
    });
  }

  return reports;
}
