/**
 * HTML comment blocks in spec documents.
 *
 * Runs before every other spec parser so that commented-out requirements
 * and references are never read as live content.
 */

import { makeFragment, type Fragment, type LineClaimingParser, type ParseContext, type SourceLine } from './types.js';

const COMMENT_OPEN = '<!--';
const COMMENT_CLOSE = '-->';

export class CommentParser implements LineClaimingParser {
  readonly name = 'comments';
  readonly priority = 100;

  *claim(lines: readonly SourceLine[], context: ParseContext): Iterable<Fragment> {
    let i = 0;
    while (i < lines.length) {
      const line = lines[i];
      const open = line.text.indexOf(COMMENT_OPEN);
      if (open === -1) {
        i++;
        continue;
      }

      if (line.text.indexOf(COMMENT_CLOSE, open + COMMENT_OPEN.length) !== -1) {
        yield makeFragment([line], { type: 'comment' });
        i++;
        continue;
      }

      const block: SourceLine[] = [line];
      let closed = false;
      for (let j = i + 1; j < lines.length; j++) {
        const next = lines[j];
        // A comment cannot span lines another parser already owns.
        if (next.number !== block[block.length - 1].number + 1) break;
        block.push(next);
        if (next.text.includes(COMMENT_CLOSE)) {
          closed = true;
          break;
        }
      }

      if (closed) {
        yield makeFragment(block, { type: 'comment' });
        i += block.length;
      } else {
        context.warn('Unterminated HTML comment', line.number);
        i++;
      }
    }
  }
}
