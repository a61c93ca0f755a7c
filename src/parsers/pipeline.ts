/**
 * Priority-ordered line-claiming pipeline.
 *
 * Each parser sees only the lines no higher-priority parser claimed. Lines
 * nobody claims are folded into remainder fragments, one per run of
 * consecutive lines, so every line of a unit ends up in exactly one fragment.
 */

import type { GraphConfig } from '../core/config.js';
import { IdGrammar } from '../core/ids.js';
import { logWarning } from '../core/logger.js';
import { ClaimedLines } from './claims.js';
import {
  makeFragment,
  type Fragment,
  type LineClaimingParser,
  type ParseContext,
  type ParsedUnit,
  type ParseWarning,
  type SourceLine,
  type SourceUnit,
} from './types.js';

/**
 * `expected-broken-links N` in any common comment style, optionally
 * namespaced (`tracegraph: expected-broken-links 2`).
 */
export const EXPECTED_BROKEN_LINKS_PATTERN =
  /(?:#|\/\/|--|\/\*|<!--)\s*(?:[\w.-]+:\s*)?expected-broken-links\s+(\d+)/i;

/**
 * Split text into 1-based lines. A final newline does not start a new line.
 */
export function splitLines(content: string): SourceLine[] {
  const texts = content.split(/\r?\n/);
  if (texts.length > 1 && texts[texts.length - 1] === '') {
    texts.pop();
  }
  return texts.map((text, index) => ({ number: index + 1, text }));
}

/**
 * Read the expected-broken-links budget from a unit's header lines.
 */
export function detectExpectedBrokenLinks(lines: readonly SourceLine[], headerLines: number): number {
  for (const line of lines.slice(0, headerLines)) {
    const match = EXPECTED_BROKEN_LINKS_PATTERN.exec(line.text);
    if (match?.[1]) {
      return Number.parseInt(match[1], 10);
    }
  }
  return 0;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ParsePipeline {
  private readonly parsers: LineClaimingParser[];
  private readonly grammar: IdGrammar;

  constructor(
    parsers: readonly LineClaimingParser[],
    private readonly config: GraphConfig
  ) {
    // Array.prototype.sort is stable, so equal priorities keep registration order.
    this.parsers = [...parsers].sort((a, b) => b.priority - a.priority);
    this.grammar = new IdGrammar(config);
  }

  get parserNames(): string[] {
    return this.parsers.map((parser) => parser.name);
  }

  parse(unit: SourceUnit): ParsedUnit {
    const lines = splitLines(unit.content);
    const claimed = new ClaimedLines();
    const fragments: Fragment[] = [];
    const warnings: ParseWarning[] = [];

    for (const parser of this.parsers) {
      const unclaimed = lines.filter((line) => !claimed.has(line.number));
      if (unclaimed.length === 0) break;

      const context: ParseContext = {
        path: unit.path,
        domain: unit.domain,
        config: this.config,
        grammar: this.grammar,
        warn: (message, line) => {
          warnings.push({ path: unit.path, parser: parser.name, message, line });
        },
      };

      try {
        for (const fragment of parser.claim(unclaimed, context)) {
          const invalid = fragment.lines.find(
            (line) => line < 1 || line > lines.length || claimed.has(line)
          );
          if (fragment.lines.length === 0 || invalid !== undefined) {
            context.warn(
              `${parser.name} claimed line ${invalid ?? '(none)'} which is not available`,
              invalid
            );
            continue;
          }
          for (const line of fragment.lines) {
            claimed.add(line);
          }
          fragments.push(fragment);
        }
      } catch (error) {
        const message = `${parser.name} parser failed: ${errorMessage(error)}`;
        logWarning(message, { path: unit.path });
        warnings.push({ path: unit.path, parser: parser.name, message });
      }
    }

    for (const remainder of this.foldRemainder(lines, claimed)) {
      fragments.push(remainder);
    }
    fragments.sort((a, b) => a.startLine - b.startLine);

    return {
      unit,
      fragments,
      warnings,
      expectedBrokenLinks: detectExpectedBrokenLinks(lines, this.config.markerHeaderLines),
    };
  }

  private foldRemainder(lines: readonly SourceLine[], claimed: ClaimedLines): Fragment[] {
    const fragments: Fragment[] = [];
    let run: SourceLine[] = [];

    const flush = () => {
      if (run.length > 0) {
        fragments.push(makeFragment(run, { type: 'remainder' }));
        run = [];
      }
    };

    for (const line of lines) {
      if (claimed.has(line.number)) {
        flush();
      } else {
        run.push(line);
      }
    }
    flush();

    return fragments;
  }
}
