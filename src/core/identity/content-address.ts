/**
 * Content addressing for catalog snapshots
 *
 * A snapshot carries the content address of its payload so that a restore can
 * detect edits or truncation. Addresses are derived from a canonical encoding:
 * the same structure always hashes the same regardless of object key order.
 */

import { createHash } from 'crypto';

/**
 * Content address format: {algorithm}:{hash}
 * Example: sha256:abc123...
 */
export type ContentAddress = `${string}:${string}`;

export const HashAlgorithm = {
  SHA256: 'sha256',
  SHA512: 'sha512',
} as const;

export type HashAlgorithmValue = (typeof HashAlgorithm)[keyof typeof HashAlgorithm];

export const DEFAULT_HASH_ALGORITHM: HashAlgorithmValue = HashAlgorithm.SHA256;

const SUPPORTED_ALGORITHMS: readonly string[] = Object.values(HashAlgorithm);

function isHashAlgorithm(value: string): value is HashAlgorithmValue {
  return SUPPORTED_ALGORITHMS.includes(value);
}

/**
 * Canonical text for hashing. Non-finite numbers and undefined collapse to
 * null, matching what JSON would store.
 */
function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : 'null';
  }

  if (typeof value === 'boolean') {
    return String(value);
  }

  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return '{' + entries.map(([key, v]) => `${JSON.stringify(key)}:${canonicalize(v)}`).join(',') + '}';
  }

  return JSON.stringify(String(value));
}

/**
 * Compute a content address for any JSON-compatible value
 */
export function computeContentAddress(
  content: unknown,
  algorithm: HashAlgorithmValue = DEFAULT_HASH_ALGORITHM
): ContentAddress {
  const hash = createHash(algorithm).update(canonicalize(content), 'utf8').digest('hex');
  return `${algorithm}:${hash}`;
}

/**
 * Split a content address into its components
 */
export function parseContentAddress(
  address: string
): { algorithm: HashAlgorithmValue; hash: string } | null {
  const colonIndex = address.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }

  const algorithm = address.slice(0, colonIndex);
  const hash = address.slice(colonIndex + 1);

  if (!isHashAlgorithm(algorithm) || !/^[a-f0-9]+$/i.test(hash)) {
    return null;
  }

  return { algorithm, hash };
}

/**
 * Check that content hashes to the given address, using the address's own algorithm
 */
export function verifyContentAddress(content: unknown, address: string): boolean {
  const parsed = parseContentAddress(address);
  if (!parsed) {
    return false;
  }

  return computeContentAddress(content, parsed.algorithm) === address;
}
