/**
 * JSON export - a deterministic plain-object view of a graph.
 *
 * Nodes, edges and unresolved references are sorted, so two graphs with the
 * same structure serialize identically whatever order they were built in.
 */

import type { Edge, RollupMetrics, TraceNode } from '../core/types.js';
import type { Classification, TraceGraph } from '../graph/graph.js';

export interface SerializedNode {
  id: string;
  kind: TraceNode['kind'];
  label: string;
  source?: TraceNode['source'];
  isConflict?: boolean;
  conflictWith?: string;
  fields: TraceNode['fields'];
  classification?: Classification;
  metrics?: RollupMetrics;
}

export interface SerializedGraph {
  nodes: SerializedNode[];
  edges: Edge[];
  unresolved: Edge[];
}

export interface SerializeOptions {
  /** Include the metrics table (run `annotateCoverage` first). */
  metrics?: boolean;
  /** Include root/orphan status. */
  classification?: boolean;
}

function compareEdges(a: Edge, b: Edge): number {
  return (
    a.source.localeCompare(b.source) ||
    a.target.localeCompare(b.target) ||
    a.kind.localeCompare(b.kind) ||
    a.assertionTargets.join(',').localeCompare(b.assertionTargets.join(','))
  );
}

function copyEdge(edge: Edge): Edge {
  return { ...edge, assertionTargets: [...edge.assertionTargets] };
}

export function serializeGraph(graph: TraceGraph, options: SerializeOptions = {}): SerializedGraph {
  const nodes: SerializedNode[] = [];
  for (const node of graph.nodes()) {
    const entry: SerializedNode = {
      id: node.id,
      kind: node.kind,
      label: node.label,
      fields: { ...node.fields },
    };
    if (node.source) entry.source = { ...node.source };
    if (node.isConflict) {
      entry.isConflict = true;
      entry.conflictWith = node.conflictWith;
    }
    if (options.classification) {
      const status = graph.classify(node.id);
      if (status) entry.classification = status;
    }
    if (options.metrics) {
      const metrics = graph.getMetrics(node.id);
      if (metrics) entry.metrics = { ...metrics };
    }
    nodes.push(entry);
  }
  nodes.sort((a, b) => a.id.localeCompare(b.id));

  return {
    nodes,
    edges: [...graph.edges()].map(copyEdge).sort(compareEdges),
    unresolved: [...graph.unresolved()].map(copyEdge).sort(compareEdges),
  };
}

/**
 * Serialize to a JSON string.
 */
export function exportJson(graph: TraceGraph, options: SerializeOptions = {}): string {
  return JSON.stringify(serializeGraph(graph, options), null, 2);
}
