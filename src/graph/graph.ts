/**
 * The trace graph: an id-indexed node table plus per-node edge tables.
 *
 * Nodes never hold references to each other. Every relationship is an
 * {@link Edge} keyed by ids, so removing a node leaves at worst a dangling
 * id that shows up as a broken reference.
 *
 * Consumers use the read API (lazy generators) and the mutation API in
 * `mutations.ts`. Methods tagged `@internal` are the primitives the builder
 * and the mutator are written against.
 */

import type { GraphConfig } from '../core/config.js';
import { DuplicateIdError, InvalidMutationError, NotFoundError, UnknownNodeIdError } from '../core/errors.js';
import type { Edge, EdgeKind, NodeKind, NodeOfKind, RollupMetrics, TraceNode } from '../core/types.js';

export type Classification = 'root' | 'orphan';

/** Kinds that are never roots or orphans themselves. */
const UNCLASSIFIED_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>(['assertion', 'remainder']);

/**
 * Outgoing claims that place a node under another. Addresses is
 * informational and never makes the journey a parent.
 */
const PARENT_CLAIM_KINDS: ReadonlySet<EdgeKind> = new Set<EdgeKind>(['implements', 'refines', 'validates']);

/**
 * Saved rows of a region of the graph, enough to put it back exactly.
 */
export interface RegionSnapshot {
  readonly nodes: ReadonlyMap<string, TraceNode | null>;
  readonly outgoing: ReadonlyMap<string, readonly Edge[]>;
  readonly incoming: ReadonlyMap<string, readonly Edge[]>;
  readonly unresolved: readonly Edge[];
}

export function isNodeOfKind<K extends NodeKind>(node: TraceNode, kind: K): node is NodeOfKind<K> {
  return node.kind === kind;
}

/**
 * Identity of an edge: two edges with the same key are the same edge.
 */
export function edgeKey(edge: Pick<Edge, 'source' | 'target' | 'kind' | 'assertionTargets'>): string {
  return [edge.source, edge.target, edge.kind, edge.assertionTargets.join(',')].join('\u0000');
}

export class TraceGraph {
  private readonly nodeIndex = new Map<string, TraceNode>();
  private readonly outEdges = new Map<string, Edge[]>();
  private readonly inEdges = new Map<string, Edge[]>();
  private unresolvedEdges: Edge[] = [];
  private readonly metricsTable = new Map<string, RollupMetrics>();

  constructor(readonly config: GraphConfig) {}

  // ---------------------------------------------------------------------------
  // Read API
  // ---------------------------------------------------------------------------

  get size(): number {
    return this.nodeIndex.size;
  }

  has(id: string): boolean {
    return this.nodeIndex.has(id);
  }

  /**
   * @throws NotFoundError
   */
  getNode(id: string): TraceNode {
    const node = this.nodeIndex.get(id);
    if (!node) throw new NotFoundError(id);
    return node;
  }

  findNode(id: string): TraceNode | undefined {
    return this.nodeIndex.get(id);
  }

  *nodes(): Generator<TraceNode> {
    yield* this.nodeIndex.values();
  }

  *nodesOfKind<K extends NodeKind>(kind: K): Generator<NodeOfKind<K>> {
    for (const node of this.nodeIndex.values()) {
      if (isNodeOfKind(node, kind)) yield node;
    }
  }

  *outgoing(id: string, kind?: EdgeKind): Generator<Edge> {
    for (const edge of this.outEdges.get(id) ?? []) {
      if (kind === undefined || edge.kind === kind) yield edge;
    }
  }

  *incoming(id: string, kind?: EdgeKind): Generator<Edge> {
    for (const edge of this.inEdges.get(id) ?? []) {
      if (kind === undefined || edge.kind === kind) yield edge;
    }
  }

  /**
   * Contained nodes in document order, then the nodes that claim this one
   * through implements, refines, validates or addresses.
   */
  *children(id: string): Generator<TraceNode> {
    const seen = new Set<string>();
    for (const edge of this.outEdges.get(id) ?? []) {
      if (edge.kind === 'contains') yield* this.visit(edge.target, seen);
    }
    for (const edge of this.inEdges.get(id) ?? []) {
      if (edge.kind !== 'contains') yield* this.visit(edge.source, seen);
    }
  }

  /**
   * The structural parent, then the nodes this one claims.
   */
  *parents(id: string): Generator<TraceNode> {
    const seen = new Set<string>();
    for (const edge of this.inEdges.get(id) ?? []) {
      if (edge.kind === 'contains') yield* this.visit(edge.source, seen);
    }
    for (const edge of this.outEdges.get(id) ?? []) {
      if (edge.kind !== 'contains') yield* this.visit(edge.target, seen);
    }
  }

  private *visit(id: string, seen: Set<string>): Generator<TraceNode> {
    if (seen.has(id)) return;
    seen.add(id);
    const node = this.nodeIndex.get(id);
    if (node) yield node;
  }

  *edges(): Generator<Edge> {
    for (const list of this.outEdges.values()) yield* list;
  }

  /**
   * Broken and suppressed references, in the order they were recorded.
   */
  *unresolved(): Generator<Edge> {
    yield* this.unresolvedEdges;
  }

  /**
   * Whether a node sits under another: it is contained, or it implements,
   * refines or validates a node.
   */
  hasParent(id: string): boolean {
    for (const edge of this.inEdges.get(id) ?? []) {
      if (edge.kind === 'contains' && this.nodeIndex.has(edge.source)) return true;
    }
    for (const edge of this.outEdges.get(id) ?? []) {
      if (PARENT_CLAIM_KINDS.has(edge.kind) && this.nodeIndex.has(edge.target)) return true;
    }
    return false;
  }

  /**
   * Root/orphan status, derived from the current structure. Assertions and
   * remainders, and nodes with a parent, are neither.
   */
  classify(id: string): Classification | null {
    const node = this.getNode(id);
    if (UNCLASSIFIED_KINDS.has(node.kind)) return null;
    if (node.isConflict) return 'orphan';
    if (this.hasParent(id)) return null;

    const satellites = new Set<NodeKind>(this.config.satelliteKinds);
    for (const child of this.children(id)) {
      // Section text is part of the requirement body, not a child.
      if (child.kind === 'remainder') continue;
      if (!satellites.has(child.kind)) return 'root';
    }
    return 'orphan';
  }

  *roots(): Generator<TraceNode> {
    for (const node of this.nodeIndex.values()) {
      if (this.classify(node.id) === 'root') yield node;
    }
  }

  *orphans(): Generator<TraceNode> {
    for (const node of this.nodeIndex.values()) {
      if (this.classify(node.id) === 'orphan') yield node;
    }
  }

  getMetrics(id: string): RollupMetrics | undefined {
    return this.metricsTable.get(id);
  }

  // ---------------------------------------------------------------------------
  // Primitives
  // ---------------------------------------------------------------------------

  /**
   * @internal
   * @throws DuplicateIdError
   */
  createNode(node: TraceNode): void {
    if (this.nodeIndex.has(node.id)) throw new DuplicateIdError(node.id);
    this.nodeIndex.set(node.id, node);
    this.outEdges.set(node.id, []);
    this.inEdges.set(node.id, []);
  }

  /**
   * Swap in a new version of an existing node (same id).
   * @internal
   */
  replaceNode(node: TraceNode): void {
    if (!this.nodeIndex.has(node.id)) throw new UnknownNodeIdError(node.id);
    this.nodeIndex.set(node.id, node);
  }

  /**
   * Remove a node and every resolved edge touching it.
   * @internal
   */
  removeNode(id: string): Edge[] {
    if (!this.nodeIndex.has(id)) throw new UnknownNodeIdError(id);
    const removed = [...(this.outEdges.get(id) ?? []), ...(this.inEdges.get(id) ?? [])];
    for (const edge of removed) this.removeEdge(edge);
    this.nodeIndex.delete(id);
    this.outEdges.delete(id);
    this.inEdges.delete(id);
    this.metricsTable.delete(id);
    return removed;
  }

  /**
   * Add a resolved edge. Returns false when the same edge already exists.
   * @internal
   * @throws UnknownNodeIdError when either endpoint is missing
   */
  addEdge(edge: Edge): boolean {
    const out = this.outEdges.get(edge.source);
    const inc = this.inEdges.get(edge.target);
    if (!out) throw new UnknownNodeIdError(edge.source);
    if (!inc) throw new UnknownNodeIdError(edge.target);

    const key = edgeKey(edge);
    if (out.some((existing) => edgeKey(existing) === key)) return false;
    out.push(edge);
    inc.push(edge);
    return true;
  }

  /**
   * @internal
   */
  removeEdge(edge: Edge): boolean {
    const key = edgeKey(edge);
    const out = this.outEdges.get(edge.source);
    const inc = this.inEdges.get(edge.target);
    const outIndex = out?.findIndex((existing) => edgeKey(existing) === key) ?? -1;
    if (!out || outIndex === -1) return false;
    out.splice(outIndex, 1);
    const inIndex = inc?.findIndex((existing) => edgeKey(existing) === key) ?? -1;
    if (inc && inIndex !== -1) inc.splice(inIndex, 1);
    return true;
  }

  /**
   * Replace an edge in place, keeping its position in both endpoint lists.
   * Both edges must join the same endpoints.
   * @internal
   */
  replaceEdge(previous: Edge, next: Edge): boolean {
    if (previous.source !== next.source || previous.target !== next.target) {
      throw new InvalidMutationError('replaceEdge cannot move an edge to other endpoints');
    }
    const key = edgeKey(previous);
    const out = this.outEdges.get(previous.source) ?? [];
    const inc = this.inEdges.get(previous.target) ?? [];
    const outIndex = out.findIndex((existing) => edgeKey(existing) === key);
    const inIndex = inc.findIndex((existing) => edgeKey(existing) === key);
    if (outIndex === -1 || inIndex === -1) return false;
    out[outIndex] = next;
    inc[inIndex] = next;
    return true;
  }

  /**
   * Move a node to a new id, rewriting every edge endpoint that named the
   * old one. Edge positions in neighbouring lists are kept.
   * @internal
   * @throws DuplicateIdError when the new id is taken
   */
  rekey(oldId: string, node: TraceNode): void {
    const newId = node.id;
    if (!this.nodeIndex.has(oldId)) throw new UnknownNodeIdError(oldId);
    if (newId !== oldId && this.nodeIndex.has(newId)) throw new DuplicateIdError(newId);

    const rewrite = (edge: Edge): Edge => ({
      ...edge,
      source: edge.source === oldId ? newId : edge.source,
      target: edge.target === oldId ? newId : edge.target,
    });
    const rewriteIn = (list: Edge[] | undefined, edge: Edge) => {
      if (!list) return;
      const key = edgeKey(edge);
      const index = list.findIndex((existing) => edgeKey(existing) === key);
      if (index !== -1) list[index] = rewrite(edge);
    };

    const out = this.outEdges.get(oldId) ?? [];
    const inc = this.inEdges.get(oldId) ?? [];
    for (const edge of out) {
      if (edge.target !== oldId) rewriteIn(this.inEdges.get(edge.target), edge);
    }
    for (const edge of inc) {
      if (edge.source !== oldId) rewriteIn(this.outEdges.get(edge.source), edge);
    }

    const metrics = this.metricsTable.get(oldId);
    this.nodeIndex.delete(oldId);
    this.outEdges.delete(oldId);
    this.inEdges.delete(oldId);
    this.metricsTable.delete(oldId);

    this.nodeIndex.set(newId, node);
    this.outEdges.set(newId, out.map(rewrite));
    this.inEdges.set(newId, inc.map(rewrite));
    if (metrics) this.metricsTable.set(newId, metrics);
  }

  /**
   * @internal
   */
  addUnresolved(edge: Edge): void {
    this.unresolvedEdges.push(edge);
  }

  /**
   * Drop the unresolved references matching a predicate.
   * @internal
   */
  removeUnresolved(predicate: (edge: Edge) => boolean): Edge[] {
    const removed = this.unresolvedEdges.filter(predicate);
    this.unresolvedEdges = this.unresolvedEdges.filter((edge) => !predicate(edge));
    return removed;
  }

  /**
   * @internal
   */
  setMetrics(id: string, metrics: RollupMetrics): void {
    this.metricsTable.set(id, metrics);
  }

  /**
   * @internal
   */
  clearMetrics(): void {
    this.metricsTable.clear();
  }

  /**
   * The given ids plus every node one edge away from them.
   */
  neighborhood(ids: Iterable<string>): Set<string> {
    const region = new Set<string>();
    for (const id of ids) {
      region.add(id);
      for (const edge of this.outEdges.get(id) ?? []) region.add(edge.target);
      for (const edge of this.inEdges.get(id) ?? []) region.add(edge.source);
    }
    return region;
  }

  /**
   * Copy the node rows and edge lists of a region, plus the unresolved
   * list. Ids that do not exist yet are recorded as absent.
   * @internal
   */
  snapshot(ids: Iterable<string>): RegionSnapshot {
    const nodes = new Map<string, TraceNode | null>();
    const outgoing = new Map<string, Edge[]>();
    const incoming = new Map<string, Edge[]>();
    for (const id of this.neighborhood(ids)) {
      const node = this.nodeIndex.get(id);
      nodes.set(id, node ? structuredClone(node) : null);
      outgoing.set(id, [...(this.outEdges.get(id) ?? [])]);
      incoming.set(id, [...(this.inEdges.get(id) ?? [])]);
    }
    return { nodes, outgoing, incoming, unresolved: [...this.unresolvedEdges] };
  }

  /**
   * Put a region back exactly as {@link snapshot} saw it.
   * @internal
   */
  restore(snapshot: RegionSnapshot): void {
    for (const [id, node] of snapshot.nodes) {
      if (node === null) {
        this.nodeIndex.delete(id);
        this.outEdges.delete(id);
        this.inEdges.delete(id);
        this.metricsTable.delete(id);
        continue;
      }
      this.nodeIndex.set(id, structuredClone(node));
      this.outEdges.set(id, [...(snapshot.outgoing.get(id) ?? [])]);
      this.inEdges.set(id, [...(snapshot.incoming.get(id) ?? [])]);
    }
    this.unresolvedEdges = [...snapshot.unresolved];
  }
}
