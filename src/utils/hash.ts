/**
 * Hashing utilities for config fingerprints and record ids
 */

import { createHash, randomBytes } from 'crypto';

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function sha256Short(input: string, length: number = 12): string {
  return sha256(input).substring(0, length);
}

/**
 * JSON with object keys sorted at every depth, so equal values hash equally.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return '[' + value.map(stableStringify).join(',') + ']';
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return '{' + entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',') + '}';
}

export function hashObjectShort(obj: unknown, length: number = 12): string {
  return sha256Short(stableStringify(obj), length);
}

export function randomHex(length: number = 6): string {
  return randomBytes(Math.ceil(length / 2)).toString('hex').substring(0, length);
}
