/**
 * Core type definitions for traceability nodes and edges.
 */

/**
 * The kinds of node in the trace graph.
 */
export type NodeKind =
  | 'requirement'
  | 'assertion'
  | 'code'
  | 'test'
  | 'result'
  | 'journey'
  | 'remainder';

export const NODE_KINDS: readonly NodeKind[] = [
  'requirement',
  'assertion',
  'code',
  'test',
  'result',
  'journey',
  'remainder',
];

/**
 * Typed edges with semantic meaning.
 */
export type EdgeKind =
  // Authority edges (child → parent)
  | 'implements' // claims satisfaction, rolls up coverage
  | 'refines' // adds detail, no rollup
  // Verification
  | 'validates' // Test → Requirement/Assertion
  // Informational
  | 'addresses' // Requirement → Journey
  // Structure (parent → lexical child), builder only
  | 'contains';

export const EDGE_KINDS: readonly EdgeKind[] = [
  'implements',
  'refines',
  'validates',
  'addresses',
  'contains',
];

/**
 * Resolution state of a reference.
 */
export type LinkState = 'resolved' | 'broken' | 'suppressed';

/**
 * Outcome recorded by a test result.
 */
export type ResultStatus = 'passed' | 'failed' | 'error' | 'skipped';

/**
 * Where a node (or reference) is written.
 */
export interface SourceLocation {
  path: string;
  line: number;
  endLine?: number;
}

/**
 * A directed edge between two node ids.
 *
 * For `contains` the source is the structural parent; for every other kind
 * the source is the child making the claim and the target is its parent.
 */
export interface Edge {
  readonly source: string;
  readonly target: string;
  readonly kind: EdgeKind;
  readonly assertionTargets: readonly string[];
  readonly state: LinkState;
}

/**
 * A non-normative section of a requirement body.
 */
export interface RequirementSection {
  heading: string;
  content: string;
  line: number;
}

/**
 * Base structure for all trace nodes.
 */
export interface TraceNodeBase {
  id: string;
  kind: NodeKind;
  label: string;
  source?: SourceLocation;
  isConflict?: boolean;
  conflictWith?: string;
}

/**
 * Requirement node - a normative, testable statement.
 */
export interface RequirementNode extends TraceNodeBase {
  kind: 'requirement';
  fields: {
    title: string;
    level: string;
    status: string;
    body: string;
    hash: string | null;
    contentHash: string;
  };
}

/**
 * Assertion node - one labeled clause of a requirement.
 */
export interface AssertionNode extends TraceNodeBase {
  kind: 'assertion';
  fields: {
    label: string;
    text: string;
  };
}

/**
 * Code node - source lines that claim to implement requirements.
 */
export interface CodeNode extends TraceNodeBase {
  kind: 'code';
  fields: {
    path: string;
    line: number;
  };
}

/**
 * Test node - a test that validates requirements.
 */
export interface TestNode extends TraceNodeBase {
  kind: 'test';
  fields: {
    name: string | null;
    path: string;
  };
}

/**
 * Test result node - one recorded run of a test.
 */
export interface TestResultNode extends TraceNodeBase {
  kind: 'result';
  fields: {
    name: string;
    classname: string;
    status: ResultStatus;
    durationMs: number | null;
    message: string | null;
  };
}

/**
 * User journey node - a narrative that requirements address.
 */
export interface JourneyNode extends TraceNodeBase {
  kind: 'journey';
  fields: {
    title: string;
    actor: string | null;
    goal: string | null;
  };
}

/**
 * Remainder node - text no other parser claimed, or a requirement section.
 */
export interface RemainderNode extends TraceNodeBase {
  kind: 'remainder';
  fields: {
    text: string;
    heading: string | null;
  };
}

/**
 * Union type for any trace node.
 */
export type TraceNode =
  | RequirementNode
  | AssertionNode
  | CodeNode
  | TestNode
  | TestResultNode
  | JourneyNode
  | RemainderNode;

/**
 * Narrow a node union member by kind.
 */
export type NodeOfKind<K extends NodeKind> = Extract<TraceNode, { kind: K }>;

/**
 * An unresolved reference captured during ingestion.
 */
export interface PendingLink {
  sourceId: string;
  target: string;
  kind: Exclude<EdgeKind, 'contains'>;
  assertionLabels: string[];
  location: SourceLocation;
}

export type Severity = 'error' | 'warning' | 'info';

export type DiagnosticCode =
  | 'parse-warning'
  | 'duplicate-id'
  | 'broken-reference'
  | 'suppressed-reference'
  | 'cycle'
  | 'orphan'
  | 'invalid-relationship-kind'
  | 'hierarchy-violation'
  | 'stale-hash';

/**
 * A build-time finding about the corpus.
 */
export interface Diagnostic {
  code: DiagnosticCode;
  severity: Severity;
  message: string;
  ids: string[];
  location?: SourceLocation;
}

/**
 * Confidence classification of a coverage contribution.
 */
export type CoverageTier = 'direct' | 'explicit' | 'inferred' | 'indirect';

/**
 * Aggregated coverage and test counters for one node.
 */
export interface RollupMetrics {
  totalAssertions: number;
  coveredAssertions: number;
  directCovered: number;
  explicitCovered: number;
  inferredCovered: number;
  indirectCovered: number;
  totalTests: number;
  passedTests: number;
  failedTests: number;
  skippedTests: number;
  coveragePct: number;
  indirectCoveragePct: number;
  passRatePct: number;
}
