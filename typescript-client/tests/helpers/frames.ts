// Builders for raw server frames used across tests

import {
  encodeBool,
  encodeBuf,
  encodeF64,
  encodeString,
  encodeU32,
  encodeU64,
  encodeU8,
} from '../../src/protocol/codecs.js';
import { CACHE_ERROR_MARKER, CacheErrorCode, ServerErrorCode } from '../../src/protocol/constants.js';
import { formatPolicy } from '../../src/policy.js';
import type { CacheStatus } from '../../src/types.js';

export function okFrame(...payload: Buffer[]): Buffer {
  return Buffer.concat([encodeBool(true), ...payload]);
}

export function okBufFrame(value: string | Buffer): Buffer {
  return okFrame(encodeBuf(typeof value === 'string' ? Buffer.from(value, 'utf8') : value));
}

export function cacheErrorFrame(code: CacheErrorCode | number): Buffer {
  return Buffer.concat([encodeBool(false), encodeU8(CACHE_ERROR_MARKER), encodeU8(code)]);
}

export function serverErrorFrame(code: ServerErrorCode | number): Buffer {
  return Buffer.concat([encodeBool(false), encodeU8(code)]);
}

export function statusPayload(status: CacheStatus): Buffer {
  return Buffer.concat([
    encodeU32(status.pid),
    encodeU64(BigInt(status.maxSize)),
    encodeU64(BigInt(status.usedSize)),
    encodeU64(BigInt(status.numObjects)),
    encodeU64(BigInt(status.rss)),
    encodeU64(BigInt(status.hwm)),
    encodeU64(BigInt(status.totalGets)),
    encodeU64(BigInt(status.totalSets)),
    encodeU64(BigInt(status.totalDels)),
    encodeF64(status.missRatio),
    encodeU32(status.policies.length),
    ...status.policies.map((policy) => encodeString(formatPolicy(policy))),
    encodeString(formatPolicy(status.policy)),
    encodeBool(status.isAutoPolicy),
    encodeU64(BigInt(status.uptime)),
  ]);
}

export const SAMPLE_STATUS: CacheStatus = {
  pid: 4242,
  maxSize: 1048576,
  usedSize: 2048,
  numObjects: 3,
  rss: 8388608,
  hwm: 9437184,
  totalGets: 10,
  totalSets: 4,
  totalDels: 1,
  missRatio: 0.25,
  policies: [{ type: 'lfu' }, { type: 'lru' }, { type: '2q', kIn: 0.25, kOut: 0.5 }],
  policy: { type: 'lru' },
  isAutoPolicy: false,
  uptime: 3600,
};
