/**
 * Resolution of pending links into edges.
 *
 * Runs after every node exists, so references may point forward across
 * files. Each pending link ends as one or more resolved edges, or as a
 * broken reference; broken references are downgraded to suppressed while
 * the declaring file's expected-broken-links budget lasts.
 */

import type { GraphConfig } from '../core/config.js';
import type { IdGrammar } from '../core/ids.js';
import type { Diagnostic, Edge, NodeKind, PendingLink, TraceNode } from '../core/types.js';
import type { LinkKind } from '../parsers/types.js';
import type { TraceGraph } from './graph.js';

/**
 * The pending links of one source file, in file order.
 */
export interface FileLinks {
  path: string;
  expectedBrokenLinks: number;
  links: PendingLink[];
}

const LINK_KINDS: readonly LinkKind[] = ['implements', 'refines', 'validates', 'addresses'];

/** Node kinds that may make each kind of claim. */
export const ALLOWED_SOURCE_KINDS: Record<LinkKind, readonly NodeKind[]> = {
  implements: ['requirement', 'code'],
  refines: ['requirement'],
  validates: ['test'],
  addresses: ['requirement'],
};

/** Node kinds each kind of claim may point at. */
export const ALLOWED_TARGET_KINDS: Record<LinkKind, readonly NodeKind[]> = {
  implements: ['requirement'],
  refines: ['requirement'],
  validates: ['requirement'],
  addresses: ['journey'],
};

/**
 * Case-insensitive lookup over requirement and journey ids. Conflict copies
 * are never link targets.
 */
export class TargetIndex {
  private readonly byKey = new Map<string, string>();

  constructor(graph: TraceGraph) {
    for (const node of graph.nodes()) {
      if ((node.kind === 'requirement' || node.kind === 'journey') && !node.isConflict) {
        this.byKey.set(node.id.toLowerCase(), node.id);
      }
    }
  }

  lookup(id: string): string | undefined {
    return this.byKey.get(id.toLowerCase());
  }
}

interface Resolution {
  edges: Edge[];
  missing: string[];
}

/**
 * Look up a pending link's target. Returns the edges to add (one per
 * assertion label) and the references that could not be found.
 */
export function resolveLink(
  link: PendingLink,
  graph: TraceGraph,
  grammar: IdGrammar,
  index: TargetIndex
): Resolution {
  const { base } = grammar.parseReference(link.target);
  const targetId = index.lookup(base);
  if (targetId === undefined) {
    const display = [base, ...link.assertionLabels].join('-');
    return { edges: [], missing: [display] };
  }

  if (link.assertionLabels.length === 0) {
    return {
      edges: [{ source: link.sourceId, target: targetId, kind: link.kind, assertionTargets: [], state: 'resolved' }],
      missing: [],
    };
  }

  const edges: Edge[] = [];
  const missing: string[] = [];
  for (const label of new Set(link.assertionLabels)) {
    const assertion = graph.findNode(`${targetId}-${label}`);
    if (assertion?.kind !== 'assertion') {
      missing.push(`${targetId}-${label}`);
      continue;
    }
    edges.push({ source: link.sourceId, target: targetId, kind: link.kind, assertionTargets: [label], state: 'resolved' });
  }
  return { edges, missing };
}

/**
 * Kind and hierarchy checks for one resolved edge.
 */
export function checkRelationship(
  edge: Edge,
  source: TraceNode,
  target: TraceNode,
  config: GraphConfig,
  location: PendingLink['location']
): Diagnostic[] {
  if (edge.kind === 'contains') return [];
  const diagnostics: Diagnostic[] = [];

  if (!ALLOWED_SOURCE_KINDS[edge.kind].includes(source.kind)) {
    const allowed = LINK_KINDS.filter((kind) =>
      ALLOWED_SOURCE_KINDS[kind].includes(source.kind)
    );
    diagnostics.push({
      code: 'invalid-relationship-kind',
      severity: 'warning',
      message: `${source.kind} ${source.id} cannot use ${edge.kind} (allowed: ${allowed.join(', ') || 'none'})`,
      ids: [source.id, target.id],
      location,
    });
  }

  if (!ALLOWED_TARGET_KINDS[edge.kind].includes(target.kind)) {
    diagnostics.push({
      code: 'invalid-relationship-kind',
      severity: 'warning',
      message: `${edge.kind} cannot target ${target.kind} ${target.id}`,
      ids: [source.id, target.id],
      location,
    });
  }

  if (edge.kind === 'implements' && source.kind === 'requirement' && target.kind === 'requirement') {
    const from = source.fields.level;
    const to = target.fields.level;
    const allowed = config.allowedImplements[from];
    if (allowed && !allowed.includes(to)) {
      diagnostics.push({
        code: 'hierarchy-violation',
        severity: 'warning',
        message: `${source.id} (${from}) may not implement ${target.id} (${to}); ${from} may implement ${allowed.join(', ') || 'nothing'}`,
        ids: [source.id, target.id],
        location,
      });
    }
  }

  return diagnostics;
}

/**
 * Resolve every pending link, file by file, adding edges and unresolved
 * references to the graph. Returns the diagnostics raised on the way.
 */
export function resolveLinks(
  graph: TraceGraph,
  files: readonly FileLinks[],
  grammar: IdGrammar
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const index = new TargetIndex(graph);

  for (const file of files) {
    let budget = file.expectedBrokenLinks;

    for (const link of file.links) {
      const source = graph.getNode(link.sourceId);
      const { edges, missing } = resolveLink(link, graph, grammar, index);

      for (const edge of edges) {
        if (!graph.addEdge(edge)) continue;
        const target = graph.getNode(edge.target);
        diagnostics.push(...checkRelationship(edge, source, target, graph.config, link.location));
      }

      for (const reference of missing) {
        const suppressed = budget > 0;
        if (suppressed) budget--;

        const { base, assertionLabels } = grammar.parseReference(reference);
        graph.addUnresolved({
          source: link.sourceId,
          target: base,
          kind: link.kind,
          assertionTargets: assertionLabels,
          state: suppressed ? 'suppressed' : 'broken',
        });
        diagnostics.push({
          code: suppressed ? 'suppressed-reference' : 'broken-reference',
          severity: suppressed ? 'info' : 'warning',
          message: suppressed
            ? `Expected broken reference ${reference} from ${link.sourceId}`
            : `Broken reference: ${link.sourceId} ${link.kind} ${reference}, which does not exist`,
          ids: [link.sourceId],
          location: link.location,
        });
      }
    }
  }

  return diagnostics;
}
