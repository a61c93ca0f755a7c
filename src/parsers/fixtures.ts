/**
 * Embedded text blocks in code and test files: heredocs, triple-quoted
 * strings and multi-line template literals.
 *
 * Test fixtures often contain sample requirement text. Blocks that mention a
 * reference-like token are claimed before the code and test parsers run, so
 * fixture data never turns into live links.
 */

import { makeFragment, type FixtureData, type Fragment, type LineClaimingParser, type ParseContext, type SourceLine } from './types.js';

const HEREDOC_START = /<<-?\s*(['"]?)([A-Za-z_]\w*)\1/;
const TEST_DEF = /^\s*(?:async\s+)?def\s+test\w*\s*\(/;

interface Opener {
  style: FixtureData['style'];
  isClose: (text: string) => boolean;
}

function countOccurrences(text: string, token: string): number {
  let count = 0;
  let index = text.indexOf(token);
  while (index !== -1) {
    count++;
    index = text.indexOf(token, index + token.length);
  }
  return count;
}

function findOpener(text: string): Opener | null {
  const heredoc = HEREDOC_START.exec(text);
  if (heredoc?.[2]) {
    const delimiter = heredoc[2];
    return { style: 'heredoc', isClose: (line) => line.trim() === delimiter };
  }

  for (const quote of ['"""', "'''"]) {
    if (countOccurrences(text, quote) % 2 === 1) {
      return { style: 'triple-quote', isClose: (line) => line.includes(quote) };
    }
  }

  if (countOccurrences(text, '`') % 2 === 1) {
    return { style: 'template', isClose: (line) => line.includes('`') };
  }

  return null;
}

/**
 * A docstring opening on the line right after a test `def` belongs to the
 * test, and the test parser reads its references.
 */
function isTestDocstring(lines: readonly SourceLine[], index: number): boolean {
  const line = lines[index];
  const previous = lines[index - 1];
  const trimmed = line.text.trim();
  if (!trimmed.startsWith('"""') && !trimmed.startsWith("'''")) return false;
  return previous !== undefined && previous.number === line.number - 1 && TEST_DEF.test(previous.text);
}

export class FixtureParser implements LineClaimingParser {
  readonly name = 'fixtures';
  readonly priority = 90;

  *claim(lines: readonly SourceLine[], context: ParseContext): Iterable<Fragment> {
    let i = 0;
    while (i < lines.length) {
      const line = lines[i];
      const opener = findOpener(line.text);
      if (!opener) {
        i++;
        continue;
      }

      const block: SourceLine[] = [line];
      let closed = false;
      for (let j = i + 1; j < lines.length; j++) {
        const next = lines[j];
        if (next.number !== block[block.length - 1].number + 1) break;
        block.push(next);
        if (opener.isClose(next.text)) {
          closed = true;
          break;
        }
      }

      if (!closed) {
        i++;
        continue;
      }

      const text = block.map((entry) => entry.text).join('\n');
      const docstring = opener.style === 'triple-quote' && isTestDocstring(lines, i);
      if (!docstring && context.grammar.tokenPattern().test(text)) {
        yield makeFragment(block, { type: 'fixture', style: opener.style });
      }
      // Skip the block either way: its closing line is not an opener.
      i += block.length;
    }
  }
}
