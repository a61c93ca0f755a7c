/**
 * Root and orphan reporting.
 */

import type { GraphConfig } from '../core/config.js';
import type { Diagnostic } from '../core/types.js';
import type { TraceGraph } from './graph.js';

export interface ClassificationResult {
  roots: string[];
  orphans: string[];
}

export function classifyNodes(graph: TraceGraph): ClassificationResult {
  const roots: string[] = [];
  const orphans: string[] = [];
  for (const node of graph.nodes()) {
    const status = graph.classify(node.id);
    if (status === 'root') roots.push(node.id);
    else if (status === 'orphan') orphans.push(node.id);
  }
  return { roots, orphans };
}

export function orphanDiagnostics(graph: TraceGraph, config: GraphConfig = graph.config): Diagnostic[] {
  return classifyNodes(graph).orphans.map((id): Diagnostic => {
    const node = graph.getNode(id);
    const detail = node.isConflict && node.conflictWith ? ` (duplicate of ${node.conflictWith})` : '';
    return {
      code: 'orphan',
      severity: config.allowOrphans ? 'info' : 'warning',
      message: `Orphan ${node.kind}: ${id}${detail}`,
      ids: [id],
      location: node.source,
    };
  });
}
