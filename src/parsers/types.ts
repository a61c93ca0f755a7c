/**
 * Shared types for the line-claiming parser pipeline.
 */

import type { GraphConfig } from '../core/config.js';
import type { IdGrammar } from '../core/ids.js';
import type { EdgeKind, RequirementSection, ResultStatus } from '../core/types.js';

/**
 * Which kind of text a source unit holds; selects the parser set.
 */
export type SourceDomain = 'spec' | 'code' | 'test' | 'result';

/**
 * One file's text plus where it came from.
 */
export interface SourceUnit {
  path: string;
  domain: SourceDomain;
  content: string;
}

/**
 * A 1-based line of a source unit.
 */
export interface SourceLine {
  number: number;
  text: string;
}

/**
 * A cross-reference found by a parser, before it is tied to a node.
 */
export interface LinkRef {
  target: string;
  kind: LinkKind;
  line: number;
}

export type LinkKind = Exclude<EdgeKind, 'contains'>;

export function isLinkKind(value: string): value is LinkKind {
  return value === 'implements' || value === 'refines' || value === 'validates' || value === 'addresses';
}

export interface AssertionRecord {
  label: string;
  text: string;
  line: number;
}

export interface RequirementData {
  type: 'requirement';
  id: string;
  title: string;
  level: string | null;
  status: string;
  body: string;
  hash: string | null;
  assertions: AssertionRecord[];
  sections: RequirementSection[];
  links: LinkRef[];
}

export interface JourneyData {
  type: 'journey';
  id: string;
  title: string;
  actor: string | null;
  goal: string | null;
}

export interface CodeData {
  type: 'code';
  links: LinkRef[];
}

export interface TestData {
  type: 'test';
  name: string | null;
  links: LinkRef[];
}

export interface ResultData {
  type: 'result';
  name: string;
  classname: string;
  status: ResultStatus;
  durationMs: number | null;
  message: string | null;
}

export interface CommentData {
  type: 'comment';
}

export interface FixtureData {
  type: 'fixture';
  style: 'heredoc' | 'triple-quote' | 'template';
}

export interface RemainderData {
  type: 'remainder';
}

export type FragmentData =
  | RequirementData
  | JourneyData
  | CodeData
  | TestData
  | ResultData
  | CommentData
  | FixtureData
  | RemainderData;

export type FragmentType = FragmentData['type'];

/**
 * A typed piece of content claimed by one parser.
 *
 * `lines` lists every claimed line number and need not be contiguous;
 * `startLine`/`endLine` bound them.
 */
export interface Fragment<D extends FragmentData = FragmentData> {
  lines: number[];
  startLine: number;
  endLine: number;
  text: string;
  data: D;
}

/**
 * A parser that could not make sense of part of its input.
 */
export interface ParseWarning {
  path: string;
  parser: string;
  message: string;
  line?: number;
}

export interface ParseContext {
  path: string;
  domain: SourceDomain;
  config: GraphConfig;
  grammar: IdGrammar;
  warn(message: string, line?: number): void;
}

/**
 * A pluggable extractor. Parsers run in descending priority and only see
 * lines no earlier parser claimed.
 */
export interface LineClaimingParser {
  readonly name: string;
  readonly priority: number;
  claim(lines: readonly SourceLine[], context: ParseContext): Iterable<Fragment>;
}

/**
 * Everything one source unit produced.
 */
export interface ParsedUnit {
  unit: SourceUnit;
  fragments: Fragment[];
  warnings: ParseWarning[];
  expectedBrokenLinks: number;
}

/**
 * Build a fragment from the lines it claims.
 */
export function makeFragment<D extends FragmentData>(
  lines: readonly SourceLine[],
  data: D
): Fragment<D> {
  const numbers = lines.map((line) => line.number);
  let startLine = numbers[0] ?? 0;
  let endLine = startLine;
  for (const number of numbers) {
    if (number < startLine) startLine = number;
    if (number > endLine) endLine = number;
  }
  return {
    lines: numbers,
    startLine,
    endLine,
    text: lines.map((line) => line.text).join('\n'),
    data,
  };
}
