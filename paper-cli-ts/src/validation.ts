/**
 * Input validation functions
 *
 * Command-line arguments arrive as strings; these turn them into the values
 * PaperClient takes, failing fast before any connection is made.
 */

import { parsePolicy } from '@paper-cache/client';
import type { PaperPolicy } from '@paper-cache/client';
import { ValidationError } from './errors.js';

const UNSIGNED_INTEGER = /^\d+$/;
const U32_MAX = 0xffffffff;
const U64_MAX = 0xffffffffffffffffn;

/**
 * @throws ValidationError if key is empty
 */
export function validateKey(key: string): void {
  if (key.length === 0) {
    throw new ValidationError('key', 'Key cannot be empty');
  }
}

/**
 * The server refuses zero-sized values
 * @throws ValidationError if value is empty
 */
export function validateValue(value: string): void {
  if (value.length === 0) {
    throw new ValidationError('value', 'Value cannot be empty');
  }
}

/**
 * Parse a TTL in whole seconds; 0 means no expiry
 * @throws ValidationError if not an integer in [0, 2^32 - 1]
 */
export function parseTtl(input: string): number {
  const trimmed = input.trim();
  if (!UNSIGNED_INTEGER.test(trimmed)) {
    throw new ValidationError('ttl', `TTL must be a whole number of seconds: ${input}`);
  }

  const ttl = Number(trimmed);
  if (ttl > U32_MAX) {
    throw new ValidationError('ttl', 'TTL exceeds maximum', ttl, U32_MAX);
  }

  return ttl;
}

/**
 * Parse a cache capacity in bytes
 * @throws ValidationError if not an integer in [1, 2^64 - 1]
 */
export function parseCapacity(input: string): bigint {
  const trimmed = input.trim();
  if (!UNSIGNED_INTEGER.test(trimmed)) {
    throw new ValidationError('capacity', `Capacity must be a whole number of bytes: ${input}`);
  }

  const capacity = BigInt(trimmed);
  if (capacity === 0n) {
    throw new ValidationError('capacity', 'Capacity must be greater than zero');
  }
  if (capacity > U64_MAX) {
    throw new ValidationError('capacity', 'Capacity exceeds maximum', trimmed, U64_MAX.toString());
  }

  return capacity;
}

/**
 * Parse a policy in the server's spelling: lfu, lru, 2q-0.25-0.5, s3-fifo-0.1, ...
 * @throws ValidationError for unknown policies
 */
export function parsePolicyArg(input: string): PaperPolicy {
  const policy = parsePolicy(input.trim().toLowerCase());
  if (policy === null) {
    throw new ValidationError('policy', `Unknown policy: ${input}`);
  }

  return policy;
}
