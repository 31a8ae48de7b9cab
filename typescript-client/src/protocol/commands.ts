// Validated command constructors
// Every argument is checked here so that a malformed call never reaches the wire

import { ArgumentError } from '../errors.js';
import type { PaperPolicy } from '../policy.js';
import type { CacheValue } from '../types.js';
import { U32_MAX, U64_MAX } from './constants.js';
import type {
  Auth,
  Del,
  Get,
  Has,
  KeyTtl,
  Peek,
  Ping,
  Policy,
  Resize,
  Set,
  Size,
  Status,
  Ttl,
  Version,
  Wipe,
} from './messages.js';

/**
 * @throws ArgumentError if key is empty or too long for a uint32 length prefix
 */
export function validateKey(key: string, argument = 'key'): void {
  if (typeof key !== 'string') {
    throw new ArgumentError(argument, `${argument} must be a string`);
  }

  if (key.length === 0) {
    throw new ArgumentError(argument, `${argument} cannot be empty`);
  }

  if (Buffer.byteLength(key, 'utf8') > U32_MAX) {
    throw new ArgumentError(argument, `${argument} exceeds the maximum length`);
  }
}

/**
 * @throws ArgumentError unless ttl is an integer in [0, 2^32 - 1]
 */
export function validateTtl(ttl: number): void {
  if (!Number.isInteger(ttl)) {
    throw new ArgumentError('ttl', `ttl must be an integer number of seconds, got ${ttl}`);
  }

  if (ttl < 0) {
    throw new ArgumentError('ttl', `ttl cannot be negative, got ${ttl}`);
  }

  if (ttl > U32_MAX) {
    throw new ArgumentError('ttl', `ttl cannot exceed ${U32_MAX} seconds`);
  }
}

function toValueBuffer(value: CacheValue): Buffer {
  if (typeof value === 'string') {
    return Buffer.from(value, 'utf8');
  }

  if (value instanceof Uint8Array) {
    return Buffer.from(value);
  }

  throw new ArgumentError('value', 'value must be a string or a byte array');
}

function toCapacity(capacity: number | bigint): bigint {
  if (typeof capacity === 'number' && !Number.isInteger(capacity)) {
    throw new ArgumentError('capacity', `capacity must be an integer, got ${capacity}`);
  }

  const value = BigInt(capacity);

  if (value < 0n) {
    throw new ArgumentError('capacity', `capacity cannot be negative, got ${capacity}`);
  }

  if (value > U64_MAX) {
    throw new ArgumentError('capacity', 'capacity exceeds the maximum of 2^64 - 1 bytes');
  }

  return value;
}

function validatePolicy(policy: PaperPolicy): void {
  switch (policy.type) {
    case '2q':
      if (!Number.isFinite(policy.kIn) || !Number.isFinite(policy.kOut)) {
        throw new ArgumentError('policy', '2q parameters must be finite numbers');
      }
      if (policy.kIn < 0 || policy.kOut < 0) {
        throw new ArgumentError('policy', `2q parameters cannot be negative, got ${policy.kIn} and ${policy.kOut}`);
      }
      return;

    case 's3-fifo':
      if (!Number.isFinite(policy.ratio)) {
        throw new ArgumentError('policy', 's3-fifo ratio must be a finite number');
      }
      if (policy.ratio < 0) {
        throw new ArgumentError('policy', `s3-fifo ratio cannot be negative, got ${policy.ratio}`);
      }
      return;

    default:
      return;
  }
}

/**
 * Command constructors, one per protocol operation
 */
export const Commands = {
  ping: (): Ping => ({ type: 'Ping' }),

  version: (): Version => ({ type: 'Version' }),

  auth: (token: string): Auth => {
    validateKey(token, 'token');
    return { type: 'Auth', token };
  },

  get: (key: string): Get => {
    validateKey(key);
    return { type: 'Get', key };
  },

  set: (key: string, value: CacheValue, ttl = 0): Set => {
    validateKey(key);
    validateTtl(ttl);
    return { type: 'Set', key, value: toValueBuffer(value), ttl };
  },

  del: (key: string): Del => {
    validateKey(key);
    return { type: 'Del', key };
  },

  has: (key: string): Has => {
    validateKey(key);
    return { type: 'Has', key };
  },

  peek: (key: string): Peek => {
    validateKey(key);
    return { type: 'Peek', key };
  },

  ttl: (key: string, ttl = 0): Ttl => {
    validateKey(key);
    validateTtl(ttl);
    return { type: 'Ttl', key, ttl };
  },

  keyTtl: (key: string): KeyTtl => {
    validateKey(key);
    return { type: 'KeyTtl', key };
  },

  size: (key: string): Size => {
    validateKey(key);
    return { type: 'Size', key };
  },

  wipe: (): Wipe => ({ type: 'Wipe' }),

  resize: (capacity: number | bigint): Resize => ({ type: 'Resize', capacity: toCapacity(capacity) }),

  policy: (policy: PaperPolicy): Policy => {
    validatePolicy(policy);
    return { type: 'Policy', policy };
  },

  status: (): Status => ({ type: 'Status' }),
};
