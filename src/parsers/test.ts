/**
 * Test declarations and the requirement references attached to them.
 *
 * A test picks up references from:
 *   - reference comments directly above its declaration (blank lines and
 *     decorators may sit in between),
 *   - reference comments inside its body,
 *   - `Validates:` lines in a docstring right after a `def`,
 *   - requirement ids embedded in its name (`test_login_REQ_d00001_A`).
 *
 * Reference comments before the first declaration form a file-level test.
 * Declarations with no reference at all are left unclaimed.
 */

import { makeFragment, type Fragment, type LineClaimingParser, type LinkRef, type ParseContext, type SourceLine } from './types.js';

const DECLARATION_PATTERNS: readonly RegExp[] = [
  /^\s*(?:async\s+)?def\s+(?<name>test\w*)\s*\(/,
  /^\s*(?:it|test)(?:\.\w+)?\s*\(\s*(?<quote>['"`])(?<name>.+?)\k<quote>/,
  /^\s*(?:export\s+)?(?:async\s+)?function\s+(?<name>test\w*)\s*\(/,
  /^\s*func\s+(?<name>Test\w*)\s*\(/,
];

const REFERENCE_COMMENT_PATTERN =
  /^\s*(?:#|\/\/|--|\/\*+|\*)\s*(?<keyword>Validates|Verifies|Tests?|Implements)\b\s*:?\s*(?<refs>.*)$/i;

const DECORATOR_PATTERN = /^\s*@/;

const DOCSTRING_OPEN = /^\s*("""|''')/;
const DOCSTRING_REFERENCE_PATTERN = /^\s*(?:"""|''')?\s*(?<keyword>Validates|Verifies|Tests?)\s*:\s*(?<refs>.*)$/i;

/**
 * Name of the test declared on a line, or null.
 */
export function declarationName(text: string): string | null {
  for (const pattern of DECLARATION_PATTERNS) {
    const name = pattern.exec(text)?.groups?.name;
    if (name) return name;
  }
  return null;
}

function tokenLinks(text: string, kind: LinkRef['kind'], line: number, context: ParseContext): LinkRef[] {
  return [...text.matchAll(context.grammar.tokenPattern())].map((match) => ({
    target: match[0],
    kind,
    line,
  }));
}

function commentLinks(line: SourceLine, context: ParseContext): LinkRef[] {
  const match = REFERENCE_COMMENT_PATTERN.exec(line.text);
  const keyword = match?.groups?.keyword;
  if (!keyword) return [];
  // Implements is kept as written so the builder can flag it.
  const kind = keyword.toLowerCase() === 'implements' ? 'implements' : 'validates';
  return tokenLinks(match?.groups?.refs ?? '', kind, line.number, context);
}

function docstringLinks(line: SourceLine, context: ParseContext): LinkRef[] {
  const refs = DOCSTRING_REFERENCE_PATTERN.exec(line.text)?.groups?.refs;
  return refs ? tokenLinks(refs, 'validates', line.number, context) : [];
}

/** Closing quote still awaited after a docstring's opening line, or null. */
function openDocstring(text: string): string | null {
  const quote = DOCSTRING_OPEN.exec(text)?.[1];
  if (!quote) return null;
  return text.split(quote).length - 1 >= 2 ? null : quote;
}

interface OpenTest {
  name: string | null;
  lines: SourceLine[];
  links: LinkRef[];
}

export class TestParser implements LineClaimingParser {
  readonly name = 'test';
  readonly priority = 20;

  *claim(lines: readonly SourceLine[], context: ParseContext): Iterable<Fragment> {
    let current: OpenTest | null = null;
    let pending: OpenTest = { name: null, lines: [], links: [] };
    // True while only blank and decorator lines follow the pending comments.
    let pendingAdjacent = true;
    let lastNumber = 0;
    // A docstring may open on the next non-blank line after a declaration.
    let expectDocstring = false;
    let docstringQuote: string | null = null;

    const emit = function* (test: OpenTest | null) {
      if (test && test.links.length > 0) {
        yield makeFragment(test.lines, { type: 'test', name: test.name, links: test.links });
      }
    };

    const flushPending = function* () {
      if (pending.lines.length === 0) return;
      if (current) {
        current.lines.push(...pending.lines);
        current.links.push(...pending.links);
      } else {
        yield* emit(pending);
      }
      pending = { name: null, lines: [], links: [] };
    };

    for (const line of lines) {
      if (line.number !== lastNumber + 1) pendingAdjacent = false;
      lastNumber = line.number;

      if (docstringQuote !== null || (expectDocstring && DOCSTRING_OPEN.test(line.text))) {
        if (docstringQuote === null) docstringQuote = openDocstring(line.text);
        else if (line.text.includes(docstringQuote)) docstringQuote = null;
        expectDocstring = false;
        pendingAdjacent = false;
        const refs = docstringLinks(line, context);
        if (current && refs.length > 0) {
          current.lines.push(line);
          current.links.push(...refs);
        }
        continue;
      }
      if (line.text.trim() !== '') expectDocstring = false;

      const links = commentLinks(line, context);
      if (links.length > 0) {
        if (!pendingAdjacent) yield* flushPending();
        pending.lines.push(line);
        pending.links.push(...links);
        pendingAdjacent = true;
        continue;
      }

      const name = declarationName(line.text);
      if (name !== null) {
        if (!pendingAdjacent) yield* flushPending();
        yield* emit(current);
        current = {
          name,
          lines: [...pending.lines, line],
          links: [...pending.links, ...tokenLinks(name, 'validates', line.number, context)],
        };
        pending = { name: null, lines: [], links: [] };
        pendingAdjacent = true;
        expectDocstring = true;
        continue;
      }

      if (line.text.trim() === '' || DECORATOR_PATTERN.test(line.text)) continue;
      pendingAdjacent = false;
    }

    yield* flushPending();
    yield* emit(current);
  }
}
