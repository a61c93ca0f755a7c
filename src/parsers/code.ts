/**
 * Reference comments in source code.
 *
 *   // Implements: REQ-d00001-A, REQ-d00002
 *   # Implements: d00003
 *
 * Consecutive reference comment lines form one code fragment.
 */

import {
  isLinkKind,
  makeFragment,
  type Fragment,
  type LineClaimingParser,
  type LinkRef,
  type ParseContext,
  type SourceLine,
} from './types.js';

export const CODE_REFERENCE_PATTERN =
  /^\s*(?:#|\/\/|--|\/\*+|\*|<!--)\s*(?<keyword>Implements|Refines|Validates)\s*:\s*(?<refs>.+)$/i;

/**
 * Parse the references of one keyword comment, keeping only tokens that
 * look like requirement ids (with or without the prefix).
 */
export function referencesIn(line: SourceLine, context: ParseContext): LinkRef[] {
  const match = CODE_REFERENCE_PATTERN.exec(line.text);
  const keyword = match?.groups?.keyword?.toLowerCase();
  const refs = match?.groups?.refs;
  if (!keyword || !refs || !isLinkKind(keyword)) return [];

  const cleaned = refs.replace(/\*\/\s*$|-->\s*$/, '');
  const links: LinkRef[] = [];
  for (const part of context.grammar.splitReferences(cleaned)) {
    const { base } = context.grammar.parseReference(part);
    if (!context.grammar.isRequirementId(base)) continue;
    links.push({ target: part, kind: keyword, line: line.number });
  }
  return links;
}

export class CodeParser implements LineClaimingParser {
  readonly name = 'code';
  readonly priority = 30;

  *claim(lines: readonly SourceLine[], context: ParseContext): Iterable<Fragment> {
    let run: SourceLine[] = [];
    let links: LinkRef[] = [];

    const flush = function* () {
      if (run.length > 0) {
        yield makeFragment(run, { type: 'code', links });
      }
      run = [];
      links = [];
    };

    for (const line of lines) {
      const found = referencesIn(line, context);
      if (found.length === 0) {
        yield* flush();
        continue;
      }
      const previous = run[run.length - 1];
      if (previous && previous.number + 1 !== line.number) {
        yield* flush();
      }
      run.push(line);
      links.push(...found);
    }
    yield* flush();
  }
}
