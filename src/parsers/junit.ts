/**
 * JUnit XML test results, one fragment per `<testcase>` element.
 *
 * The scan is line-based so that each result keeps its line span: a
 * testcase's opening tag must sit on one line.
 */

import type { ResultStatus } from '../core/types.js';
import { makeFragment, type Fragment, type LineClaimingParser, type ParseContext, type ResultData, type SourceLine } from './types.js';

const TESTCASE_OPEN = /<testcase\b(?<attrs>[^>]*?)(?<selfClosing>\/)?>/;
const TESTCASE_CLOSE = /<\/testcase\s*>/;
const ATTRIBUTE_PATTERN = /([\w:.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
const OUTCOME_PATTERN = /<(?<tag>failure|error|skipped)\b(?<attrs>[^>]*?)\/?>/;

export const MAX_MESSAGE_LENGTH = 200;

const ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  amp: '&',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return String.fromCodePoint(Number.parseInt(body.slice(2), 16));
    }
    if (body.startsWith('#')) {
      return String.fromCodePoint(Number.parseInt(body.slice(1), 10));
    }
    return ENTITIES[body.toLowerCase()] ?? entity;
  });
}

export function parseAttributes(text: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of text.matchAll(ATTRIBUTE_PATTERN)) {
    const name = match[1];
    if (name) attributes.set(name, decodeEntities(match[2] ?? match[3] ?? ''));
  }
  return attributes;
}

const OUTCOME_STATUS: Record<string, ResultStatus> = {
  failure: 'failed',
  error: 'error',
  skipped: 'skipped',
};

function parseDuration(time: string | undefined): number | null {
  if (time === undefined) return null;
  const seconds = Number.parseFloat(time);
  return Number.isFinite(seconds) ? Math.round(seconds * 1000) : null;
}

function outcomeOf(block: readonly SourceLine[]): Pick<ResultData, 'status' | 'message'> {
  for (const [index, line] of block.entries()) {
    // The opening tag line may carry an inline outcome: skip the testcase tag itself.
    const text = index === 0 ? line.text.replace(TESTCASE_OPEN, '') : line.text;
    const match = OUTCOME_PATTERN.exec(text);
    const tag = match?.groups?.tag;
    if (!tag) continue;

    const status = OUTCOME_STATUS[tag] ?? 'failed';
    const attributes = parseAttributes(match?.groups?.attrs ?? '');
    let message = attributes.get('message') ?? null;
    if (message === null) {
      const inline = text.slice(text.indexOf('>', text.indexOf(`<${tag}`)) + 1).replace(/<\/.*$/, '').trim();
      message = inline ? decodeEntities(inline) : null;
    }
    if (message !== null && message.length > MAX_MESSAGE_LENGTH) {
      message = message.slice(0, MAX_MESSAGE_LENGTH);
    }
    return { status, message };
  }
  return { status: 'passed', message: null };
}

export class JUnitParser implements LineClaimingParser {
  readonly name = 'junit';
  readonly priority = 10;

  *claim(lines: readonly SourceLine[], context: ParseContext): Iterable<Fragment> {
    let i = 0;
    while (i < lines.length) {
      const line = lines[i];
      const open = TESTCASE_OPEN.exec(line.text);
      if (!open) {
        i++;
        continue;
      }

      const block: SourceLine[] = [line];
      let closed = Boolean(open.groups?.selfClosing) || TESTCASE_CLOSE.test(line.text);
      let j = i + 1;
      while (!closed && j < lines.length) {
        const next = lines[j];
        if (TESTCASE_OPEN.test(next.text)) break;
        block.push(next);
        j++;
        closed = TESTCASE_CLOSE.test(next.text);
      }

      if (!closed) {
        context.warn('Unterminated <testcase> element', line.number);
        i = j;
        continue;
      }

      const attributes = parseAttributes(open.groups?.attrs ?? '');
      const name = attributes.get('name');
      if (!name) {
        context.warn('<testcase> element without a name', line.number);
        i = Math.max(j, i + 1);
        continue;
      }

      const data: ResultData = {
        type: 'result',
        name,
        classname: attributes.get('classname') ?? '',
        durationMs: parseDuration(attributes.get('time')),
        ...outcomeOf(block),
      };

      yield makeFragment(block, data);
      i = Math.max(j, i + 1);
    }
  }
}
