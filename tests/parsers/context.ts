/**
 * Parse context for driving one parser directly.
 */

import { resolveConfig, type GraphConfigInput } from '../../src/core/config.js';
import { IdGrammar } from '../../src/core/ids.js';
import type { ParseContext, ParseWarning, SourceDomain } from '../../src/parsers/types.js';

export function createContext(
  domain: SourceDomain,
  overrides: GraphConfigInput = {},
  path = `${domain}/sample`
): { context: ParseContext; warnings: ParseWarning[] } {
  const config = resolveConfig(overrides);
  const warnings: ParseWarning[] = [];
  const context: ParseContext = {
    path,
    domain,
    config,
    grammar: new IdGrammar(config),
    warn: (message, line) => {
      warnings.push({ path, parser: 'test-harness', message, line });
    },
  };
  return { context, warnings };
}
