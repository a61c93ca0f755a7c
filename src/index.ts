/**
 * tracegraph - requirements traceability graph engine.
 *
 * Parses requirement documents, source code, tests and JUnit results into one
 * typed graph, then reports coverage, drift and structural problems.
 *
 * @packageDocumentation
 */

export type {
  NodeKind,
  EdgeKind,
  LinkState,
  ResultStatus,
  SourceLocation,
  Edge,
  TraceNode,
  RequirementNode,
  AssertionNode,
  CodeNode,
  TestNode,
  TestResultNode,
  JourneyNode,
  RemainderNode,
  NodeOfKind,
  Severity,
  DiagnosticCode,
  Diagnostic,
  CoverageTier,
  RollupMetrics,
} from './core/types.js';
export { NODE_KINDS, EDGE_KINDS } from './core/types.js';
export {
  TraceGraphError,
  DuplicateIdError,
  NotFoundError,
  UnknownNodeIdError,
  ConfirmationRequiredError,
  InvalidMutationSequenceError,
  InvalidMutationError,
  ConfigError,
} from './core/errors.js';
export type { ErrorCode } from './core/errors.js';
export { resolveConfig, DEFAULT_CONFIG } from './core/config.js';
export type { GraphConfig, GraphConfigInput } from './core/config.js';
export { IdGrammar } from './core/ids.js';
export { computeContentHash } from './core/hash.js';
export { setLogLevel } from './core/logger.js';
export type { LogLevel } from './core/logger.js';

export { parseSourceUnit, createParsers } from './parsers/index.js';
export type { SourceDomain, SourceUnit, ParsedUnit, Fragment, LineClaimingParser } from './parsers/index.js';

export { TraceGraph } from './graph/graph.js';
export type { Classification } from './graph/graph.js';
export { GraphBuilder, buildGraph } from './graph/builder.js';
export type { BuildResult } from './graph/builder.js';
export { annotateCoverage } from './graph/metrics.js';
export { traverseGraph, findDrift } from './graph/traverse.js';
export type { TraversalDirection, TraversalStep, DriftReport } from './graph/traverse.js';
export { findCycles } from './graph/cycles.js';
export { GraphMutator } from './graph/mutations.js';
export type { MutationKind, MutationEntry, NewRequirement } from './graph/mutations.js';

export { serializeGraph, exportJson } from './export/json.js';
export type { SerializedGraph, SerializedNode, SerializeOptions } from './export/json.js';
export { formatCoverageReport, formatMetrics } from './export/report.js';

export { findProjectRoot, loadConfigFile, collectSourceUnits, CONFIG_FILE } from './storage/files.js';
