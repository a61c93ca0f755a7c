import { createHash } from 'crypto';

/** Length of the hex fingerprint written after `**Hash**:`. */
export const HASH_LENGTH = 8;

/**
 * Fingerprint requirement text for change detection.
 *
 * Line endings and trailing whitespace are normalized first.
 */
export function computeContentHash(text: string): string {
  const normalized = text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trim();
  return createHash('sha256').update(normalized, 'utf8').digest('hex').slice(0, HASH_LENGTH);
}
