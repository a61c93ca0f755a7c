/**
 * Cycle detection over authority edges (implements, refines).
 *
 * Contains, validates and addresses edges cannot form authority loops, so
 * only the two hierarchy kinds are followed.
 */

import type { GraphConfig } from '../core/config.js';
import type { Diagnostic, Edge, EdgeKind } from '../core/types.js';
import type { TraceGraph } from './graph.js';

const AUTHORITY_KINDS: ReadonlySet<EdgeKind> = new Set<EdgeKind>(['implements', 'refines']);

type Color = 'grey' | 'black';

/**
 * Every distinct cycle, each as a closed path (`[a, b, a]`). A cycle found
 * from different entry points is reported once.
 */
export function findCycles(graph: TraceGraph): string[][] {
  const color = new Map<string, Color>();
  const stack: string[] = [];
  const seen = new Set<string>();
  const cycles: string[][] = [];

  const record = (loop: string[]) => {
    // Rotate so the smallest id leads; the same loop then has one key.
    let start = 0;
    for (let i = 1; i < loop.length; i++) {
      if (loop[i] < loop[start]) start = i;
    }
    const rotated = [...loop.slice(start), ...loop.slice(0, start)];
    const key = rotated.join('\u0000');
    if (seen.has(key)) return;
    seen.add(key);
    cycles.push([...rotated, rotated[0]]);
  };

  const visit = (root: string) => {
    // Explicit frames so deep chains do not exhaust the call stack.
    const frames: Array<{ id: string; edges: Iterator<Edge> }> = [];
    const enter = (id: string) => {
      color.set(id, 'grey');
      stack.push(id);
      frames.push({ id, edges: graph.outgoing(id)[Symbol.iterator]() });
    };

    enter(root);
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const next = frame.edges.next();
      if (next.done) {
        frames.pop();
        stack.pop();
        color.set(frame.id, 'black');
        continue;
      }
      const edge = next.value;
      if (!AUTHORITY_KINDS.has(edge.kind)) continue;
      const state = color.get(edge.target);
      if (state === 'grey') {
        record(stack.slice(stack.lastIndexOf(edge.target)));
      } else if (state === undefined) {
        enter(edge.target);
      }
    }
  };

  for (const node of graph.nodes()) {
    if (!color.has(node.id)) visit(node.id);
  }
  return cycles;
}

export function cycleDiagnostics(graph: TraceGraph, config: GraphConfig = graph.config): Diagnostic[] {
  return findCycles(graph).map((path): Diagnostic => ({
    code: 'cycle',
    severity: config.allowCycles ? 'info' : 'error',
    message: `Cycle: ${path.join(' -> ')}`,
    ids: path.slice(0, -1),
  }));
}
