/**
 * User journey blocks in spec documents.
 *
 *   # JNY-Onboarding-01: First login
 *
 *   **Actor**: New user
 *   **Goal**: Reach the dashboard
 *
 *   *End* *First login*
 */

import { makeFragment, type Fragment, type JourneyData, type LineClaimingParser, type ParseContext, type SourceLine } from './types.js';

const HEADER_PATTERN = /^#+\s*(?<id>[A-Za-z]+-[A-Za-z0-9_-]+):\s*(?<title>.+)$/;
const ACTOR_PATTERN = /^\s*\*{0,2}Actor\*{0,2}\s*:\s*(?<value>.+)$/i;
const GOAL_PATTERN = /^\s*\*{0,2}Goal\*{0,2}\s*:\s*(?<value>.+)$/i;
const END_MARKER_PATTERN = /^\*End\*/;
const SEPARATOR = /^---\s*$/;

export class JourneyParser implements LineClaimingParser {
  readonly name = 'journey';
  readonly priority = 40;

  *claim(lines: readonly SourceLine[], context: ParseContext): Iterable<Fragment> {
    const prefix = `${context.config.journeyPrefix}-`;
    const headerOf = (text: string) => {
      const match = HEADER_PATTERN.exec(text);
      const id = match?.groups?.id;
      const title = match?.groups?.title;
      if (!id || !title) return null;
      return { id, title: title.trim() };
    };

    let i = 0;
    while (i < lines.length) {
      const header = headerOf(lines[i].text);
      if (!header || !header.id.startsWith(prefix)) {
        i++;
        continue;
      }

      const block: SourceLine[] = [lines[i]];
      let j = i + 1;
      while (j < lines.length) {
        const next = lines[j];
        // Stop at any header, and at a gap left by an earlier parser.
        if (headerOf(next.text) || next.number !== block[block.length - 1].number + 1) break;
        block.push(next);
        j++;
        if (END_MARKER_PATTERN.test(next.text)) {
          if (j < lines.length && SEPARATOR.test(lines[j].text)) {
            block.push(lines[j]);
            j++;
          }
          break;
        }
      }

      const data: JourneyData = { type: 'journey', id: header.id, title: header.title, actor: null, goal: null };
      for (const line of block.slice(1)) {
        data.actor ??= ACTOR_PATTERN.exec(line.text)?.groups?.value?.trim() ?? null;
        data.goal ??= GOAL_PATTERN.exec(line.text)?.groups?.value?.trim() ?? null;
      }

      yield makeFragment(block, data);
      i = j;
    }
  }
}
