/**
 * Parser registry per source domain.
 */

import type { GraphConfig } from '../core/config.js';
import { CodeParser } from './code.js';
import { CommentParser } from './comments.js';
import { FixtureParser } from './fixtures.js';
import { JourneyParser } from './journey.js';
import { JUnitParser } from './junit.js';
import { ParsePipeline } from './pipeline.js';
import { RequirementParser } from './requirement.js';
import { TestParser } from './test.js';
import type { LineClaimingParser, ParsedUnit, SourceDomain, SourceUnit } from './types.js';

/**
 * Fresh parser instances for one domain.
 */
export function createParsers(domain: SourceDomain): LineClaimingParser[] {
  switch (domain) {
    case 'spec':
      return [new CommentParser(), new RequirementParser(), new JourneyParser()];
    case 'code':
      return [new FixtureParser(), new CodeParser()];
    case 'test':
      return [new FixtureParser(), new TestParser()];
    case 'result':
      return [new JUnitParser()];
  }
}

/**
 * Run the domain's pipeline over one source unit.
 */
export function parseSourceUnit(unit: SourceUnit, config: GraphConfig): ParsedUnit {
  return new ParsePipeline(createParsers(unit.domain), config).parse(unit);
}

export { ParsePipeline, splitLines, detectExpectedBrokenLinks } from './pipeline.js';
export { ClaimedLines } from './claims.js';
export * from './types.js';
