/**
 * Graph configuration: id grammar, hierarchy rules and coverage policy.
 */

import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { ConfigError } from './errors.js';

const NodeKindSchema = z.enum([
  'requirement',
  'assertion',
  'code',
  'test',
  'result',
  'journey',
  'remainder',
]);

const RegexSourceSchema = z.string().refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'must be a valid regular expression' }
);

export const SourcesConfigSchema = z.object({
  spec: z.array(z.string()).default(['spec']),
  code: z.array(z.string()).default(['src']),
  test: z.array(z.string()).default(['tests']),
  result: z.array(z.string()).default([]),
  extensions: z
    .object({
      spec: z.array(z.string()).default(['.md']),
      code: z
        .array(z.string())
        .default(['.ts', '.tsx', '.js', '.py', '.go', '.rs', '.java', '.sql', '.sh']),
      test: z
        .array(z.string())
        .default(['.ts', '.tsx', '.js', '.py', '.go', '.rs', '.java', '.sql', '.sh']),
      result: z.array(z.string()).default(['.xml']),
    })
    .default({}),
  skipDirs: z.array(z.string()).default(['node_modules', '.git', 'dist']),
  skipFiles: z.array(z.string()).default(['README.md']),
});

export const GraphConfigSchema = z.object({
  /** Requirement id prefix, e.g. `REQ` in `REQ-d00001`. */
  prefix: z.string().min(1).default('REQ'),
  /** Pattern for the part after `PREFIX-`. */
  idPattern: RegexSourceSchema.default('[a-z]\\d{5}'),
  /** Pattern for one assertion label. */
  assertionLabelPattern: RegexSourceSchema.default('[A-Z]'),
  journeyPrefix: z.string().min(1).default('JNY'),
  /** Id type letter → hierarchy level. */
  levels: z.record(z.string()).default({ p: 'prd', o: 'ops', d: 'dev' }),
  /** Declared level names (matched case-insensitively) → hierarchy level. */
  levelAliases: z.record(z.string()).default({
    prd: 'prd',
    product: 'prd',
    ops: 'ops',
    operations: 'ops',
    dev: 'dev',
    development: 'dev',
  }),
  /** Level → levels it may implement. */
  allowedImplements: z
    .record(z.array(z.string()))
    .default({ dev: ['ops', 'prd'], ops: ['prd'], prd: ['prd'] }),
  statusExclusions: z.array(z.string()).default(['Deprecated', 'Superseded', 'Draft']),
  satelliteKinds: z.array(NodeKindSchema).default(['assertion', 'result']),
  /** Count whole-requirement implements as inferred coverage. */
  strictMode: z.boolean().default(false),
  /** Let refines edges produce inferred coverage as well (requires strictMode). */
  inferFromRefines: z.boolean().default(false),
  allowCycles: z.boolean().default(false),
  allowOrphans: z.boolean().default(false),
  markerHeaderLines: z.number().int().positive().default(20),
  sources: SourcesConfigSchema.default({}),
});

export type GraphConfig = z.infer<typeof GraphConfigSchema>;
export type GraphConfigInput = z.input<typeof GraphConfigSchema>;
export type SourcesConfig = z.infer<typeof SourcesConfigSchema>;

/**
 * Validate raw configuration and fill in defaults.
 */
export function resolveConfig(raw: unknown = {}, configPath: string | null = null): GraphConfig {
  const result = GraphConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const validationError = fromZodError(result.error, {
      prefix: 'Configuration error',
      prefixSeparator: ': ',
    });
    const where = configPath ? ` in ${configPath}` : '';
    throw new ConfigError(`Invalid config${where}: ${validationError.message}`, configPath);
  }
  return result.data;
}

export const DEFAULT_CONFIG: GraphConfig = resolveConfig();
