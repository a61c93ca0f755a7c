/**
 * Plain-text coverage report, one tree per root.
 *
 * Run `annotateCoverage` first; nodes without metrics are shown as
 * zero coverage.
 */

import type { RollupMetrics, TraceNode } from '../core/types.js';
import type { TraceGraph } from '../graph/graph.js';
import { emptyMetrics } from '../graph/metrics.js';

export interface ReportOptions {
  /** Deepest requirement level to descend to below each root. */
  maxDepth?: number;
}

function formatPct(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * One-line summary of a metrics record.
 */
export function formatMetrics(metrics: RollupMetrics): string {
  const parts = [
    `${metrics.coveredAssertions}/${metrics.totalAssertions} assertions covered (${formatPct(metrics.coveragePct)})`,
  ];
  if (metrics.indirectCovered > 0) {
    parts.push(`${formatPct(metrics.indirectCoveragePct)} with indirect`);
  }
  if (metrics.totalTests > 0) {
    parts.push(`${metrics.passedTests}/${metrics.totalTests} tests passed`);
    if (metrics.failedTests > 0) parts.push(`${metrics.failedTests} failed`);
  }
  return parts.join(', ');
}

function describe(node: TraceNode): string {
  if (node.kind === 'requirement') {
    return `${node.id} ${node.fields.title} [${node.fields.level}, ${node.fields.status}]`;
  }
  return `${node.id} ${node.label}`;
}

/**
 * Render the coverage tree under every root, then a summary line.
 */
export function formatCoverageReport(graph: TraceGraph, options: ReportOptions = {}): string {
  const maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
  const lines: string[] = [];
  const roots = [...graph.roots()].sort((a, b) => a.id.localeCompare(b.id));

  const render = (node: TraceNode, depth: number, path: Set<string>) => {
    const metrics = graph.getMetrics(node.id) ?? emptyMetrics();
    lines.push(`${'  '.repeat(depth)}${describe(node)}: ${formatMetrics(metrics)}`);
    if (depth >= maxDepth) return;

    for (const child of graph.children(node.id)) {
      if (child.kind !== 'requirement' || path.has(child.id)) continue;
      render(child, depth + 1, new Set([...path, child.id]));
    }
  };

  for (const root of roots) {
    render(root, 0, new Set([root.id]));
  }

  const orphanCount = [...graph.orphans()].length;
  if (lines.length > 0) lines.push('');
  lines.push(`${roots.length} roots, ${orphanCount} orphans, ${graph.size} nodes`);
  return lines.join('\n');
}
