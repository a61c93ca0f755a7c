/**
 * Graph builder: parsed fragments in, a resolved graph plus diagnostics out.
 *
 * Steps:
 *   1. node pass (one node per fragment, contains edges for assertions and
 *      requirement sections, pending links collected per file),
 *   2. resolution pass (links.ts),
 *   3. test results attached to their tests,
 *   4. hash drift, cycle and orphan checks.
 *
 * Units can be parsed independently (see `parseSourceUnit`) and joined with
 * `addParsed` before `build` runs.
 */

import { DEFAULT_CONFIG, type GraphConfig } from '../core/config.js';
import { computeContentHash } from '../core/hash.js';
import { IdGrammar } from '../core/ids.js';
import { logDebug } from '../core/logger.js';
import type {
  Diagnostic,
  PendingLink,
  RequirementNode,
  SourceLocation,
  TestNode,
  TraceNode,
} from '../core/types.js';
import { parseSourceUnit } from '../parsers/index.js';
import type {
  CodeData,
  Fragment,
  JourneyData,
  LinkRef,
  ParsedUnit,
  ParseWarning,
  RequirementData,
  ResultData,
  SourceUnit,
  TestData,
} from '../parsers/types.js';
import { orphanDiagnostics } from './classify.js';
import { cycleDiagnostics } from './cycles.js';
import { TraceGraph } from './graph.js';
import { resolveLinks, type FileLinks } from './links.js';
import { findDrift } from './traverse.js';

export interface BuildResult {
  graph: TraceGraph;
  diagnostics: Diagnostic[];
}

const LABEL_PREVIEW_LENGTH = 50;

function preview(text: string): string {
  const firstLine = text.trim().split('\n')[0] ?? '';
  return firstLine.length > LABEL_PREVIEW_LENGTH ? `${firstLine.slice(0, LABEL_PREVIEW_LENGTH)}...` : firstLine;
}

function warningToDiagnostic(warning: ParseWarning): Diagnostic {
  return {
    code: 'parse-warning',
    severity: 'warning',
    message: `[${warning.parser}] ${warning.message}`,
    ids: [],
    location: { path: warning.path, line: warning.line ?? 1 },
  };
}

/**
 * Dotted module path of a test file, as JUnit reporters write classnames
 * (`tests/test_auth.py` → `tests.test_auth`).
 */
function modulePath(path: string): string {
  return path.replace(/\.[^./\\]+$/, '').replace(/[\\/]+/g, '.');
}

function classnameMatches(test: TestNode, classname: string): boolean {
  const module = modulePath(test.fields.path);
  return (
    classname === module ||
    classname.startsWith(`${module}.`) ||
    module.endsWith(`.${classname}`)
  );
}

/**
 * Link each result to the test that produced it, through a contains edge.
 * Results are matched by test name; a test whose file matches the result's
 * classname wins over other tests with the same name.
 */
export function attachResults(graph: TraceGraph): number {
  const testsByName = new Map<string, TestNode[]>();
  for (const test of graph.nodesOfKind('test')) {
    if (test.fields.name === null) continue;
    const list = testsByName.get(test.fields.name) ?? [];
    list.push(test);
    testsByName.set(test.fields.name, list);
  }

  let attached = 0;
  for (const result of [...graph.nodesOfKind('result')]) {
    if (graph.incoming(result.id, 'contains').next().done === false) continue;
    const candidates = testsByName.get(result.fields.name) ?? [];
    const test = candidates.find((candidate) => classnameMatches(candidate, result.fields.classname)) ?? candidates[0];
    if (!test) continue;
    if (graph.addEdge({ source: test.id, target: result.id, kind: 'contains', assertionTargets: [], state: 'resolved' })) {
      attached++;
    }
  }
  return attached;
}

export function staleHashDiagnostics(graph: TraceGraph): Diagnostic[] {
  return findDrift(graph).map((report): Diagnostic => ({
    code: 'stale-hash',
    severity: 'warning',
    message: `${report.nodeId} declares hash ${report.declaredHash} but its text hashes to ${report.currentHash}`,
    ids: [report.nodeId, ...report.dependents],
    location: graph.getNode(report.nodeId).source,
  }));
}

export class GraphBuilder {
  private readonly units: ParsedUnit[] = [];
  private readonly grammar: IdGrammar;

  constructor(private readonly config: GraphConfig = DEFAULT_CONFIG) {
    this.grammar = new IdGrammar(config);
  }

  /**
   * Parse a source unit and queue it for the next build.
   */
  ingest(unit: SourceUnit): ParsedUnit {
    const parsed = parseSourceUnit(unit, this.config);
    this.units.push(parsed);
    return parsed;
  }

  /**
   * Queue a unit that was parsed elsewhere.
   */
  addParsed(parsed: ParsedUnit): this {
    this.units.push(parsed);
    return this;
  }

  build(): BuildResult {
    const graph = new TraceGraph(this.config);
    const diagnostics: Diagnostic[] = [];
    const files: FileLinks[] = [];

    for (const parsed of this.units) {
      for (const warning of parsed.warnings) diagnostics.push(warningToDiagnostic(warning));
      const links: PendingLink[] = [];
      for (const fragment of parsed.fragments) {
        this.addFragment(graph, parsed.unit, fragment, links, diagnostics);
      }
      links.sort((a, b) => a.location.line - b.location.line);
      files.push({ path: parsed.unit.path, expectedBrokenLinks: parsed.expectedBrokenLinks, links });
    }
    logDebug('Node pass complete', { units: this.units.length, nodes: graph.size });

    const resolved = resolveLinks(graph, files, this.grammar);
    const attached = attachResults(graph);
    logDebug('Resolution pass complete', { attachedResults: attached });

    // concat rather than push(...list): the lists can be long.
    const all = diagnostics.concat(
      resolved,
      staleHashDiagnostics(graph),
      cycleDiagnostics(graph, this.config),
      orphanDiagnostics(graph, this.config)
    );

    logDebug('Build complete', {
      nodes: graph.size,
      errors: all.filter((d) => d.severity === 'error').length,
      warnings: all.filter((d) => d.severity === 'warning').length,
    });
    return { graph, diagnostics: all };
  }

  private addFragment(
    graph: TraceGraph,
    unit: SourceUnit,
    fragment: Fragment,
    links: PendingLink[],
    diagnostics: Diagnostic[]
  ): void {
    const location: SourceLocation = { path: unit.path, line: fragment.startLine, endLine: fragment.endLine };
    const data = fragment.data;

    switch (data.type) {
      case 'requirement':
        this.addRequirement(graph, data, location, links, diagnostics);
        return;
      case 'journey':
        this.addJourney(graph, data, location, diagnostics);
        return;
      case 'code':
        this.addCode(graph, data, location, links);
        return;
      case 'test':
        this.addTest(graph, data, location, links);
        return;
      case 'result':
        this.addResult(graph, data, location);
        return;
      case 'remainder':
        // Only document text is kept; unclaimed code is not part of the graph.
        if (unit.domain === 'spec' && fragment.text.trim() !== '') {
          const id = `rem:${unit.path}:${fragment.startLine}`;
          if (!graph.has(id)) {
            graph.createNode({
              id,
              kind: 'remainder',
              label: preview(fragment.text),
              source: location,
              fields: { text: fragment.text, heading: null },
            });
          }
        }
        return;
      case 'comment':
      case 'fixture':
        return;
    }
  }

  /**
   * Reserve an id for a named node. A taken id yields a conflict id
   * (`__conflict`, `__conflict2`, ...) and a duplicate-id warning.
   */
  private claimId(
    graph: TraceGraph,
    id: string,
    location: SourceLocation,
    diagnostics: Diagnostic[]
  ): Pick<TraceNode, 'id' | 'isConflict' | 'conflictWith'> {
    if (!graph.has(id)) return { id };

    let candidate = `${id}__conflict`;
    for (let n = 2; graph.has(candidate); n++) {
      candidate = `${id}__conflict${n}`;
    }
    diagnostics.push({
      code: 'duplicate-id',
      severity: 'warning',
      message: `Duplicate id ${id} at ${location.path}:${location.line}; kept as ${candidate}`,
      ids: [id, candidate],
      location,
    });
    return { id: candidate, isConflict: true, conflictWith: id };
  }

  private pendingLinks(sourceId: string, refs: readonly LinkRef[], path: string): PendingLink[] {
    return refs.map((ref) => ({
      sourceId,
      target: ref.target,
      kind: ref.kind,
      assertionLabels: this.grammar.parseReference(ref.target).assertionLabels,
      location: { path, line: ref.line },
    }));
  }

  private addRequirement(
    graph: TraceGraph,
    data: RequirementData,
    location: SourceLocation,
    links: PendingLink[],
    diagnostics: Diagnostic[]
  ): void {
    const identity = this.claimId(graph, data.id, location, diagnostics);
    const declaredLevel = data.level === null ? null : this.grammar.resolveLevel(data.level);

    const node: RequirementNode = {
      ...identity,
      kind: 'requirement',
      label: data.title,
      source: location,
      fields: {
        title: data.title,
        level: declaredLevel ?? this.grammar.levelOf(data.id) ?? 'unknown',
        status: data.status,
        body: data.body,
        hash: data.hash,
        contentHash: computeContentHash(data.body),
      },
    };
    graph.createNode(node);

    // Assertions and sections become contains-children in document order.
    const children: TraceNode[] = [
      ...data.assertions.map((assertion): TraceNode => ({
        id: `${node.id}-${assertion.label}`,
        kind: 'assertion',
        label: assertion.text,
        source: { path: location.path, line: assertion.line },
        fields: { label: assertion.label, text: assertion.text },
      })),
      ...data.sections.map((section): TraceNode => ({
        id: `rem:${location.path}:${section.line}`,
        kind: 'remainder',
        label: section.heading,
        source: { path: location.path, line: section.line },
        fields: { text: section.content, heading: section.heading },
      })),
    ];
    children.sort((a, b) => (a.source?.line ?? 0) - (b.source?.line ?? 0));

    for (const child of children) {
      if (graph.has(child.id)) continue;
      graph.createNode(child);
      graph.addEdge({ source: node.id, target: child.id, kind: 'contains', assertionTargets: [], state: 'resolved' });
    }

    // A conflict copy takes part in no hierarchy.
    if (!node.isConflict) {
      links.push(...this.pendingLinks(node.id, data.links, location.path));
    }
  }

  private addJourney(graph: TraceGraph, data: JourneyData, location: SourceLocation, diagnostics: Diagnostic[]): void {
    graph.createNode({
      ...this.claimId(graph, data.id, location, diagnostics),
      kind: 'journey',
      label: data.title,
      source: location,
      fields: { title: data.title, actor: data.actor, goal: data.goal },
    });
  }

  private addCode(graph: TraceGraph, data: CodeData, location: SourceLocation, links: PendingLink[]): void {
    const id = `code:${location.path}:${location.line}`;
    if (!graph.has(id)) {
      graph.createNode({
        id,
        kind: 'code',
        label: `${location.path}:${location.line}`,
        source: location,
        fields: { path: location.path, line: location.line },
      });
    }
    links.push(...this.pendingLinks(id, data.links, location.path));
  }

  private addTest(graph: TraceGraph, data: TestData, location: SourceLocation, links: PendingLink[]): void {
    const id = data.name === null ? `test:${location.path}:${location.line}` : `test:${location.path}::${data.name}`;
    if (!graph.has(id)) {
      graph.createNode({
        id,
        kind: 'test',
        label: data.name ?? `${location.path}:${location.line}`,
        source: location,
        fields: { name: data.name, path: location.path },
      });
    }
    links.push(...this.pendingLinks(id, data.links, location.path));
  }

  private addResult(graph: TraceGraph, data: ResultData, location: SourceLocation): void {
    const id = `result:${location.path}::${data.classname}::${data.name}`;
    if (graph.has(id)) return;
    graph.createNode({
      id,
      kind: 'result',
      label: `${data.status}: ${data.name}`,
      source: location,
      fields: {
        name: data.name,
        classname: data.classname,
        status: data.status,
        durationMs: data.durationMs,
        message: data.message,
      },
    });
  }
}

/**
 * Parse and build in one call.
 */
export function buildGraph(units: Iterable<SourceUnit>, config: GraphConfig = DEFAULT_CONFIG): BuildResult {
  const builder = new GraphBuilder(config);
  for (const unit of units) {
    builder.ingest(unit);
  }
  return builder.build();
}
