/**
 * Hash Utilities
 *
 * Provides SHA256 hashing for configuration content and random suffixes
 * for generated names.
 */

import { createHash, randomBytes } from 'node:crypto';

const SUFFIX_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Compute a short hash of string content.
 *
 * @param content - String content to hash
 * @returns First 8 characters of SHA256 hash
 */
export function computeContentHash(content: string): string {
  const hash = createHash('sha256').update(content).digest('hex');
  return hash.slice(0, 8);
}

/**
 * Generate a random lowercase alphanumeric suffix.
 *
 * @param length - Number of characters
 */
export function randomSuffix(length: number): string {
  const bytes = randomBytes(length);
  let suffix = '';
  for (const byte of bytes) {
    suffix += SUFFIX_ALPHABET.charAt(byte % SUFFIX_ALPHABET.length);
  }
  return suffix;
}
