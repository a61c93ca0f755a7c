/**
 * Requirement blocks in spec documents.
 *
 * Format:
 *
 *   ## REQ-d00001: Title
 *
 *   **Level**: Dev | **Implements**: p00001-A | **Status**: Active
 *
 *   Body text...
 *
 *   ## Assertions
 *
 *   A. The system SHALL ...
 *
 *   *End* *Title* | **Hash**: 1a2b3c4d
 *   ---
 */

import type { RequirementSection } from '../core/types.js';
import {
  isLinkKind,
  makeFragment,
  type AssertionRecord,
  type Fragment,
  type LineClaimingParser,
  type LinkRef,
  type ParseContext,
  type RequirementData,
  type SourceLine,
} from './types.js';

const HEADER_PATTERN = /^#+\s*(?<id>[A-Za-z]+-[A-Za-z0-9_-]+):\s*(?<title>.+)$/;
const END_MARKER_PATTERN = /^\*End\*\s+\*[^*]+\*\s*(?:\|\s*\*\*Hash\*\*:\s*(?<hash>[A-Za-z0-9]+))?/;
const LEVEL_PATTERN = /\*\*Level\*\*:\s*(?<level>[\w-]+)/;
const STATUS_PATTERN = /\*\*Status\*\*:\s*(?<status>[\w-]+)/;
const LINK_PATTERN =
  /(?:\*\*(?<bold>Implements|Refines|Addresses)\*\*|^\s*(?<plain>Implements|Refines|Addresses))\s*:\s*(?<refs>[^|]+)/gi;
const ASSERTIONS_HEADER = /^##\s+Assertions\s*$/i;
const SECTION_HEADER = /^##\s+(?<heading>.+)$/;
const SEPARATOR = /^---\s*$/;

const PLACEHOLDER_HASHES = new Set(['tbd', 'none', 'pending']);

function isMetadataLine(text: string): boolean {
  LINK_PATTERN.lastIndex = 0;
  return LEVEL_PATTERN.test(text) || STATUS_PATTERN.test(text) || LINK_PATTERN.test(text);
}

export class RequirementParser implements LineClaimingParser {
  readonly name = 'requirement';
  readonly priority = 50;

  *claim(lines: readonly SourceLine[], context: ParseContext): Iterable<Fragment> {
    let i = 0;
    while (i < lines.length) {
      const header = this.matchHeader(lines[i], context);
      if (!header) {
        i++;
        continue;
      }

      const block: SourceLine[] = [lines[i]];
      let terminated = false;
      let j = i + 1;
      while (j < lines.length) {
        const next = lines[j];
        if (this.matchHeader(next, context) || this.isJourneyHeader(next.text, context)) {
          break;
        }
        block.push(next);
        j++;
        if (END_MARKER_PATTERN.test(next.text)) {
          terminated = true;
          if (j < lines.length && SEPARATOR.test(lines[j].text)) {
            block.push(lines[j]);
            j++;
          }
          break;
        }
      }

      if (!terminated) {
        context.warn(`Requirement ${header.id} has no *End* marker`, lines[i].number);
      }

      yield makeFragment(block, this.parseBlock(header.id, header.title, block, context));
      i = j;
    }
  }

  private matchHeader(line: SourceLine, context: ParseContext): { id: string; title: string } | null {
    const match = HEADER_PATTERN.exec(line.text);
    const id = match?.groups?.id;
    const title = match?.groups?.title;
    if (!id || !title) return null;

    if (!context.grammar.isRequirementId(id)) {
      if (id.toUpperCase().startsWith(`${context.config.prefix.toUpperCase()}-`)) {
        context.warn(`Malformed requirement id in header: ${id}`, line.number);
      }
      return null;
    }
    return { id, title: title.trim() };
  }

  private isJourneyHeader(text: string, context: ParseContext): boolean {
    const match = HEADER_PATTERN.exec(text);
    return match?.groups?.id?.startsWith(`${context.config.journeyPrefix}-`) ?? false;
  }

  private parseBlock(
    id: string,
    title: string,
    block: readonly SourceLine[],
    context: ParseContext
  ): RequirementData {
    const data: RequirementData = {
      type: 'requirement',
      id,
      title,
      level: null,
      status: 'Unknown',
      body: '',
      hash: null,
      assertions: [],
      sections: [],
      links: [],
    };

    const endIndex = block.findIndex((line) => END_MARKER_PATTERN.test(line.text));
    const bodyLines = block.slice(1, endIndex === -1 ? block.length : endIndex);

    for (const line of bodyLines) {
      const level = LEVEL_PATTERN.exec(line.text)?.groups?.level;
      if (level && data.level === null) data.level = level;

      const status = STATUS_PATTERN.exec(line.text)?.groups?.status;
      if (status && data.status === 'Unknown') data.status = status;

      data.links.push(...this.parseLinks(line, context));
    }

    if (endIndex !== -1) {
      const hash = END_MARKER_PATTERN.exec(block[endIndex].text)?.groups?.hash;
      if (hash && !PLACEHOLDER_HASHES.has(hash.toLowerCase())) {
        data.hash = hash;
      }
    }

    const trimmed = trimBlankLines(bodyLines);
    data.body = trimmed.map((line) => line.text).join('\n');
    data.assertions = this.parseAssertions(trimmed, id, context);
    data.sections = this.parseSections(trimmed);
    return data;
  }

  private parseLinks(line: SourceLine, context: ParseContext): LinkRef[] {
    const links: LinkRef[] = [];
    LINK_PATTERN.lastIndex = 0;
    for (const match of line.text.matchAll(LINK_PATTERN)) {
      const keyword = match.groups?.bold ?? match.groups?.plain;
      const refs = match.groups?.refs;
      if (!keyword || !refs) continue;

      const kind = keyword.toLowerCase();
      if (!isLinkKind(kind)) continue;

      for (const target of context.grammar.splitReferences(refs)) {
        links.push({ target, kind, line: line.number });
      }
    }
    return links;
  }

  private parseAssertions(
    lines: readonly SourceLine[],
    id: string,
    context: ParseContext
  ): AssertionRecord[] {
    const start = lines.findIndex((line) => ASSERTIONS_HEADER.test(line.text));
    if (start === -1) return [];

    const assertionLine = new RegExp(`^\\s*(${context.config.assertionLabelPattern})\\.\\s+(.+)$`);
    const assertions: AssertionRecord[] = [];
    const seen = new Set<string>();

    for (const line of lines.slice(start + 1)) {
      if (SECTION_HEADER.test(line.text) || SEPARATOR.test(line.text)) break;

      const match = assertionLine.exec(line.text);
      const label = match?.[1];
      const text = match?.[2];
      if (!label || !text) continue;

      if (seen.has(label)) {
        context.warn(`Duplicate assertion label ${label} in ${id}`, line.number);
        continue;
      }
      seen.add(label);
      assertions.push({ label, text: text.trim(), line: line.number });
    }

    return assertions;
  }

  /**
   * Named `##` sections of the body, plus a preamble for text before the
   * first heading. The Assertions section and metadata lines are left out.
   */
  private parseSections(lines: readonly SourceLine[]): RequirementSection[] {
    const sections: RequirementSection[] = [];
    let heading: string | null = null;
    let current: SourceLine[] = [];
    let startLine = lines[0]?.number ?? 0;

    const flush = () => {
      if (heading?.toLowerCase() === 'assertions') return;
      const kept = heading === null ? current.filter((line) => !isMetadataLine(line.text)) : current;
      const content = kept
        .map((line) => line.text)
        .join('\n')
        .trim();
      if (content) {
        sections.push({ heading: heading ?? 'preamble', content, line: startLine });
      }
    };

    for (const line of lines) {
      const match = SECTION_HEADER.exec(line.text);
      if (match?.groups?.heading) {
        flush();
        heading = match.groups.heading.trim();
        current = [];
        startLine = line.number;
      } else {
        current.push(line);
      }
    }
    flush();

    return sections;
  }
}

function trimBlankLines(lines: readonly SourceLine[]): SourceLine[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].text.trim() === '') start++;
  while (end > start && lines[end - 1].text.trim() === '') end--;
  return lines.slice(start, end);
}
