/**
 * Requirement id grammar and reference normalization.
 */

import type { GraphConfig } from './config.js';

/**
 * A reference split into its base id and assertion suffixes.
 */
export interface ParsedReference {
  base: string;
  assertionLabels: string[];
}

/** Values that mean "no reference" in a keyword line. */
export const NO_REFERENCE_VALUES = new Set(['-', 'null', 'none', 'x', 'n/a']);

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class IdGrammar {
  readonly prefix: string;
  private readonly idRe: RegExp;
  private readonly referenceRe: RegExp;
  private readonly shorthandRe: RegExp;
  private readonly prefixRe: RegExp;
  private readonly tokenSource: string;

  constructor(private readonly config: GraphConfig) {
    this.prefix = config.prefix;
    const prefix = escapeRegex(config.prefix);
    const id = `(?:${config.idPattern})`;
    const label = `(?:${config.assertionLabelPattern})`;

    this.idRe = new RegExp(`^${prefix}-${id}$`);
    this.referenceRe = new RegExp(`^(${prefix}-${id})((?:-${label})*)$`, 'i');
    this.shorthandRe = new RegExp(`^${id}(?:-${label})*$`, 'i');
    this.prefixRe = new RegExp(`^${prefix}-`, 'i');
    this.tokenSource = `(?<![A-Za-z0-9])${prefix}[-_]${id}(?![A-Za-z0-9])(?:[-_]${label}(?![A-Za-z0-9]))*`;
  }

  /**
   * Check whether a string is a well-formed requirement id.
   */
  isRequirementId(id: string): boolean {
    return this.idRe.test(id);
  }

  /**
   * A fresh global, case-insensitive regex matching reference-like tokens.
   */
  tokenPattern(): RegExp {
    return new RegExp(this.tokenSource, 'gi');
  }

  /**
   * Normalize a raw reference: trims decoration, turns `_` into `-`,
   * canonicalizes the prefix and expands shorthand (`d00001` → `REQ-d00001`).
   */
  normalize(raw: string): string {
    let ref = raw
      .trim()
      .replace(/^[`*[(]+/, '')
      .replace(/[`*\]).,;:]+$/, '')
      .trim();

    if (this.prefixRe.test(ref.replace(/_/g, '-'))) {
      ref = ref.replace(/_/g, '-');
      return `${this.prefix}-${ref.slice(this.prefix.length + 1)}`;
    }
    if (this.shorthandRe.test(ref)) {
      return `${this.prefix}-${ref}`;
    }
    return ref;
  }

  /**
   * Normalize a reference and split trailing assertion labels
   * (`REQ-d00001-A-B` → base `REQ-d00001`, labels `A`, `B`).
   */
  parseReference(raw: string): ParsedReference {
    const normalized = this.normalize(raw);
    const match = this.referenceRe.exec(normalized);
    if (!match) {
      return { base: normalized, assertionLabels: [] };
    }

    const base = match[1] ?? normalized;
    const suffix = match[2] ?? '';
    const labels = suffix.split('-').filter((label) => label.length > 0);
    return { base, assertionLabels: [...new Set(labels)] };
  }

  /**
   * Split a comma-separated reference list, dropping "no reference" values.
   */
  splitReferences(value: string): string[] {
    return value
      .split(/[,\s]+/)
      .map((part) => part.trim())
      .filter((part) => part.length > 0 && !NO_REFERENCE_VALUES.has(part.toLowerCase()));
  }

  /**
   * Hierarchy level implied by an id's type letter.
   */
  levelOf(id: string): string | null {
    if (!this.prefixRe.test(id)) return null;
    const letter = id.charAt(this.prefix.length + 1).toLowerCase();
    return this.config.levels[letter] ?? null;
  }

  /**
   * Map a declared level name (`PRD`, `Dev`, ...) to a hierarchy level.
   */
  resolveLevel(declared: string): string | null {
    return this.config.levelAliases[declared.trim().toLowerCase()] ?? null;
  }
}
