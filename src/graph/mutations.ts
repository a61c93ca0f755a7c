/**
 * Structural mutations with an append-only audit log and exact undo.
 *
 * Every operation validates its arguments first, so a call that throws has
 * changed nothing. A successful call snapshots the region it touches (the
 * affected nodes plus their neighbours' edge lists) before changing it, and
 * records that snapshot in a frozen {@link MutationEntry}. Undo puts
 * snapshots back, newest first.
 *
 * Metrics are not patched here; rerun `annotateCoverage` after mutating.
 */

import {
  ConfirmationRequiredError,
  InvalidMutationError,
  InvalidMutationSequenceError,
  UnknownNodeIdError,
} from '../core/errors.js';
import { computeContentHash } from '../core/hash.js';
import { IdGrammar } from '../core/ids.js';
import { logDebug } from '../core/logger.js';
import type { AssertionNode, Edge, EdgeKind, RequirementNode, TraceNode } from '../core/types.js';
import type { LinkKind } from '../parsers/types.js';
import { TargetIndex } from './links.js';
import type { RegionSnapshot, TraceGraph } from './graph.js';

export type MutationKind =
  | 'rename-node'
  | 'update-field'
  | 'add-requirement'
  | 'delete-requirement'
  | 'add-edge'
  | 'change-edge-kind'
  | 'delete-edge'
  | 'add-assertion'
  | 'update-assertion'
  | 'delete-assertion'
  | 'rename-assertion';

/**
 * Audit record of one mutation.
 */
export interface MutationEntry {
  readonly seq: number;
  readonly kind: MutationKind;
  readonly affectedIds: readonly string[];
  /** State of the touched region before the mutation. */
  readonly before: RegionSnapshot;
  readonly timestamp: string;
}

export interface ConfirmOptions {
  confirm?: boolean;
}

export interface DeleteAssertionOptions extends ConfirmOptions {
  /** Relabel later assertions to close the gap (`C` becomes `B`, ...). */
  compact?: boolean;
}

export interface NewRequirement {
  id: string;
  title: string;
  level?: string;
  status?: string;
  body?: string;
}

function requireConfirmation(operation: string, options: ConfirmOptions): void {
  if (options.confirm !== true) throw new ConfirmationRequiredError(operation);
}

function requireString(field: string, value: string | null): string {
  if (value === null) throw new InvalidMutationError(`Field ${field} cannot be null`);
  return value;
}

export class GraphMutator {
  private readonly log: MutationEntry[] = [];
  private nextSeq = 1;
  private readonly grammar: IdGrammar;
  private readonly labelRe: RegExp;

  constructor(private readonly graph: TraceGraph) {
    this.grammar = new IdGrammar(graph.config);
    this.labelRe = new RegExp(`^(?:${graph.config.assertionLabelPattern})$`);
  }

  /**
   * The audit log, oldest first.
   */
  history(): readonly MutationEntry[] {
    return [...this.log];
  }

  // ---------------------------------------------------------------------------
  // Nodes
  // ---------------------------------------------------------------------------

  /**
   * Give a node a new id. A requirement's assertions move with it
   * (`OLD-A` → `NEW-A`); every edge naming a moved node is rewritten.
   */
  renameNode(oldId: string, newId: string): MutationEntry {
    const node = this.requireNode(oldId);
    if (newId === oldId) throw new InvalidMutationError(`${oldId} already has that id`);
    if (node.kind === 'assertion') {
      throw new InvalidMutationError(`Use renameAssertion to relabel assertion ${oldId}`);
    }
    if (node.kind === 'requirement' && !this.grammar.isRequirementId(newId)) {
      throw new InvalidMutationError(`${newId} is not a valid requirement id`);
    }

    const moves = new Map<string, string>([[oldId, newId]]);
    for (const assertion of this.assertionsOf(oldId)) {
      moves.set(assertion.id, `${newId}-${assertion.fields.label}`);
    }
    for (const target of moves.values()) {
      if (this.graph.has(target)) throw new InvalidMutationError(`Node already exists: ${target}`);
    }

    return this.apply('rename-node', [...moves.keys(), ...moves.values()], () => {
      for (const [from, to] of moves) {
        this.graph.rekey(from, { ...this.graph.getNode(from), id: to });
      }
      for (const edge of this.graph.removeUnresolved((e) => moves.has(e.source))) {
        this.graph.addUnresolved({ ...edge, source: moves.get(edge.source) ?? edge.source });
      }
    });
  }

  /**
   * Change one field of a requirement, journey, assertion or remainder.
   * Changing a requirement's body recomputes its content hash.
   */
  updateField(id: string, field: string, value: string | null): MutationEntry {
    const updated = this.withField(this.requireNode(id), field, value);
    return this.apply('update-field', [id], () => this.graph.replaceNode(updated));
  }

  private withField(node: TraceNode, field: string, value: string | null): TraceNode {
    switch (node.kind) {
      case 'requirement': {
        const fields = { ...node.fields };
        if (field === 'title' || field === 'level' || field === 'status') {
          fields[field] = requireString(field, value);
        } else if (field === 'body') {
          fields.body = requireString(field, value);
          fields.contentHash = computeContentHash(fields.body);
        } else if (field === 'hash') {
          fields.hash = value;
        } else {
          break;
        }
        return { ...node, label: fields.title, fields };
      }
      case 'journey': {
        const fields = { ...node.fields };
        if (field === 'title') fields.title = requireString(field, value);
        else if (field === 'actor' || field === 'goal') fields[field] = value;
        else break;
        return { ...node, label: fields.title, fields };
      }
      case 'assertion':
        if (field !== 'text') break;
        return { ...node, label: requireString(field, value), fields: { ...node.fields, text: requireString(field, value) } };
      case 'remainder': {
        if (field === 'text') {
          return { ...node, fields: { ...node.fields, text: requireString(field, value) } };
        }
        if (field === 'heading') return { ...node, fields: { ...node.fields, heading: value } };
        break;
      }
      default:
        break;
    }
    throw new InvalidMutationError(`Field ${field} of ${node.kind} ${node.id} cannot be changed`);
  }

  addRequirement(input: NewRequirement): MutationEntry {
    if (!this.grammar.isRequirementId(input.id)) {
      throw new InvalidMutationError(`${input.id} is not a valid requirement id`);
    }
    if (this.graph.has(input.id)) throw new InvalidMutationError(`Node already exists: ${input.id}`);

    const body = input.body ?? '';
    const node: RequirementNode = {
      id: input.id,
      kind: 'requirement',
      label: input.title,
      fields: {
        title: input.title,
        level: input.level ?? this.grammar.levelOf(input.id) ?? 'unknown',
        status: input.status ?? 'Active',
        body,
        hash: null,
        contentHash: computeContentHash(body),
      },
    };
    return this.apply('add-requirement', [input.id], () => this.graph.createNode(node));
  }

  /**
   * Remove a requirement with its assertions and sections. Claims on it from
   * other nodes become broken references.
   */
  deleteRequirement(id: string, options: ConfirmOptions = {}): MutationEntry {
    requireConfirmation('deleteRequirement', options);
    const node = this.requireNode(id);
    if (node.kind !== 'requirement') throw new InvalidMutationError(`${id} is a ${node.kind}, not a requirement`);

    const contained = [...this.graph.outgoing(id, 'contains')].map((edge) => edge.target);
    const removed = new Set([id, ...contained]);

    return this.apply('delete-requirement', [...removed], () => {
      const dangling: Edge[] = [];
      for (const edge of this.graph.incoming(id)) {
        if (edge.kind !== 'contains' && !removed.has(edge.source)) dangling.push(edge);
      }
      for (const removedId of removed) this.graph.removeNode(removedId);
      this.graph.removeUnresolved((edge) => removed.has(edge.source));
      for (const edge of dangling) this.graph.addUnresolved({ ...edge, state: 'broken' });
    });
  }

  // ---------------------------------------------------------------------------
  // Edges
  // ---------------------------------------------------------------------------

  /**
   * Add a claim from `sourceId` on `targetId`, one edge per assertion label.
   * A target that does not exist is recorded as a broken reference.
   */
  addEdge(sourceId: string, targetId: string, kind: LinkKind, assertionTargets: readonly string[] = []): MutationEntry {
    this.requireNode(sourceId);
    // A suffixed target such as REQ-p00001-A names its assertion itself.
    const reference = this.grammar.parseReference(targetId);
    const labels = [...new Set([...reference.assertionLabels, ...assertionTargets])];
    const resolvedId = new TargetIndex(this.graph).lookup(reference.base);

    if (resolvedId === undefined) {
      const broken: Edge = { source: sourceId, target: reference.base, kind, assertionTargets: labels, state: 'broken' };
      return this.apply('add-edge', [sourceId], () => this.graph.addUnresolved(broken));
    }

    for (const label of labels) {
      if (this.graph.findNode(`${resolvedId}-${label}`)?.kind !== 'assertion') {
        throw new InvalidMutationError(`${resolvedId} has no assertion ${label}`);
      }
    }
    const targetSets: string[][] = labels.length === 0 ? [[]] : labels.map((label) => [label]);
    const edges = targetSets.map((targets): Edge => ({
      source: sourceId,
      target: resolvedId,
      kind,
      assertionTargets: targets,
      state: 'resolved',
    }));
    const existing = new Set([...this.graph.outgoing(sourceId)].map((edge) => this.describe(edge)));
    for (const edge of edges) {
      if (existing.has(this.describe(edge))) throw new InvalidMutationError(`Edge already exists: ${this.describe(edge)}`);
    }

    return this.apply('add-edge', [sourceId, resolvedId], () => {
      for (const edge of edges) this.graph.addEdge(edge);
    });
  }

  /**
   * Turn every `from` edge between two nodes into a `to` edge, keeping
   * assertion targets and positions.
   */
  changeEdgeKind(sourceId: string, targetId: string, from: LinkKind, to: LinkKind): MutationEntry {
    const matches = this.findEdges(sourceId, targetId, from);
    if (from === to) throw new InvalidMutationError(`Edge is already ${to}`);

    return this.apply('change-edge-kind', [sourceId, targetId], () => {
      const current = new Set([...this.graph.outgoing(sourceId)].map((edge) => this.describe(edge)));
      for (const edge of matches) {
        const next: Edge = { ...edge, kind: to };
        if (current.has(this.describe(next))) {
          this.graph.removeEdge(edge);
        } else {
          this.graph.replaceEdge(edge, next);
        }
      }
    });
  }

  /**
   * Remove the `kind` edges between two nodes; with `assertionTargets`, only
   * the edges for those labels.
   */
  deleteEdge(
    sourceId: string,
    targetId: string,
    kind: LinkKind,
    options: ConfirmOptions & { assertionTargets?: readonly string[] } = {}
  ): MutationEntry {
    requireConfirmation('deleteEdge', options);
    const labels = options.assertionTargets;
    const matches = this.findEdges(sourceId, targetId, kind).filter(
      (edge) => labels === undefined || edge.assertionTargets.some((label) => labels.includes(label))
    );
    if (matches.length === 0) {
      throw new InvalidMutationError(`No ${kind} edge from ${sourceId} to ${targetId} for ${labels?.join(', ')}`);
    }

    return this.apply('delete-edge', [sourceId, targetId], () => {
      for (const edge of matches) this.graph.removeEdge(edge);
    });
  }

  // ---------------------------------------------------------------------------
  // Assertions
  // ---------------------------------------------------------------------------

  addAssertion(requirementId: string, label: string, text: string): MutationEntry {
    this.requireRequirement(requirementId);
    this.requireLabel(label);
    const id = `${requirementId}-${label}`;
    if (this.graph.has(id)) throw new InvalidMutationError(`Node already exists: ${id}`);

    const node: AssertionNode = { id, kind: 'assertion', label: text, fields: { label, text } };
    return this.apply('add-assertion', [requirementId, id], () => {
      this.graph.createNode(node);
      this.graph.addEdge({ source: requirementId, target: id, kind: 'contains', assertionTargets: [], state: 'resolved' });
    });
  }

  updateAssertion(assertionId: string, text: string): MutationEntry {
    const assertion = this.requireAssertion(assertionId);
    const updated: AssertionNode = { ...assertion, label: text, fields: { ...assertion.fields, text } };
    return this.apply('update-assertion', [assertionId], () => this.graph.replaceNode(updated));
  }

  /**
   * Remove an assertion. Claims that targeted its label become broken
   * references. With `compact`, later assertions shift down one label.
   */
  deleteAssertion(assertionId: string, options: DeleteAssertionOptions = {}): MutationEntry {
    requireConfirmation('deleteAssertion', options);
    const assertion = this.requireAssertion(assertionId);
    const requirementId = this.parentOf(assertionId);
    const siblings = this.assertionsOf(requirementId);
    const position = siblings.findIndex((sibling) => sibling.id === assertionId);
    const shifted = options.compact ? siblings.slice(position + 1) : [];
    const labels = siblings.map((sibling) => sibling.fields.label);

    return this.apply('delete-assertion', [requirementId, ...siblings.map((sibling) => sibling.id)], () => {
      const label = assertion.fields.label;
      for (const edge of [...this.graph.incoming(requirementId)]) {
        if (!edge.assertionTargets.includes(label)) continue;
        this.graph.removeEdge(edge);
        this.graph.addUnresolved({ ...edge, state: 'broken' });
      }
      this.graph.removeNode(assertionId);

      shifted.forEach((sibling, offset) => {
        const newLabel = labels[position + offset];
        if (newLabel !== undefined) this.relabel(requirementId, sibling, newLabel);
      });
    });
  }

  /**
   * Give an assertion a new label, rewriting claims that targeted the old one.
   */
  renameAssertion(assertionId: string, newLabel: string): MutationEntry {
    const assertion = this.requireAssertion(assertionId);
    this.requireLabel(newLabel);
    const requirementId = this.parentOf(assertionId);
    const newId = `${requirementId}-${newLabel}`;
    if (this.graph.has(newId)) throw new InvalidMutationError(`Node already exists: ${newId}`);

    return this.apply('rename-assertion', [requirementId, assertionId, newId], () =>
      this.relabel(requirementId, assertion, newLabel)
    );
  }

  private relabel(requirementId: string, assertion: AssertionNode, newLabel: string): void {
    const oldLabel = assertion.fields.label;
    this.graph.rekey(assertion.id, {
      ...assertion,
      id: `${requirementId}-${newLabel}`,
      fields: { ...assertion.fields, label: newLabel },
    });
    for (const edge of [...this.graph.incoming(requirementId)]) {
      if (!edge.assertionTargets.includes(oldLabel)) continue;
      this.graph.replaceEdge(edge, {
        ...edge,
        assertionTargets: edge.assertionTargets.map((label) => (label === oldLabel ? newLabel : label)),
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Undo
  // ---------------------------------------------------------------------------

  /**
   * Reverse the most recent mutation.
   * @throws InvalidMutationSequenceError when the log is empty
   */
  undoLast(): MutationEntry {
    const entry = this.log.pop();
    if (!entry) throw new InvalidMutationSequenceError(this.nextSeq - 1);
    this.graph.restore(entry.before);
    logDebug('Undid mutation', { seq: entry.seq, kind: entry.kind });
    return entry;
  }

  /**
   * Reverse every mutation back to and including `seq`, newest first.
   * Nothing is undone when `seq` is not in the log.
   */
  undoTo(seq: number): MutationEntry[] {
    const index = this.log.findIndex((entry) => entry.seq === seq);
    if (index === -1) throw new InvalidMutationSequenceError(seq);

    const undone: MutationEntry[] = [];
    while (this.log.length > index) {
      undone.push(this.undoLast());
    }
    return undone;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private apply(kind: MutationKind, affectedIds: readonly string[], change: () => void): MutationEntry {
    const before = this.graph.snapshot(affectedIds);
    try {
      change();
    } catch (error) {
      this.graph.restore(before);
      throw error;
    }

    const entry: MutationEntry = Object.freeze({
      seq: this.nextSeq++,
      kind,
      affectedIds: Object.freeze([...new Set(affectedIds)]),
      before,
      timestamp: new Date().toISOString(),
    });
    this.log.push(entry);
    logDebug('Applied mutation', { seq: entry.seq, kind, affectedIds: entry.affectedIds });
    return entry;
  }

  private describe(edge: Edge): string {
    const targets = edge.assertionTargets.length > 0 ? `[${edge.assertionTargets.join(',')}]` : '';
    return `${edge.source} ${edge.kind} ${edge.target}${targets}`;
  }

  private findEdges(sourceId: string, targetId: string, kind: EdgeKind): Edge[] {
    this.requireNode(sourceId);
    this.requireNode(targetId);
    const matches = [...this.graph.outgoing(sourceId, kind)].filter((edge) => edge.target === targetId);
    if (matches.length === 0) {
      throw new InvalidMutationError(`No ${kind} edge from ${sourceId} to ${targetId}`);
    }
    return matches;
  }

  private requireNode(id: string): TraceNode {
    const node = this.graph.findNode(id);
    if (!node) throw new UnknownNodeIdError(id);
    return node;
  }

  private requireRequirement(id: string): RequirementNode {
    const node = this.requireNode(id);
    if (node.kind !== 'requirement') throw new InvalidMutationError(`${id} is a ${node.kind}, not a requirement`);
    return node;
  }

  private requireAssertion(id: string): AssertionNode {
    const node = this.requireNode(id);
    if (node.kind !== 'assertion') throw new InvalidMutationError(`${id} is a ${node.kind}, not an assertion`);
    return node;
  }

  private requireLabel(label: string): void {
    if (!this.labelRe.test(label)) throw new InvalidMutationError(`Invalid assertion label: ${label}`);
  }

  private parentOf(assertionId: string): string {
    const containment = this.graph.incoming(assertionId, 'contains').next();
    if (containment.done) throw new InvalidMutationError(`Assertion ${assertionId} has no requirement`);
    return containment.value.source;
  }

  private assertionsOf(requirementId: string): AssertionNode[] {
    const assertions: AssertionNode[] = [];
    for (const edge of this.graph.outgoing(requirementId, 'contains')) {
      const child = this.graph.findNode(edge.target);
      if (child?.kind === 'assertion') assertions.push(child);
    }
    return assertions;
  }
}
