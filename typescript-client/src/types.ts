// Shared value types for the PaperCache client

import type { PaperPolicy } from './policy.js';

/**
 * Remote server endpoint, parsed once from a paper:// address
 */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

/**
 * Values accepted by set(); strings are stored as UTF-8
 */
export type CacheValue = string | Uint8Array;

/**
 * Snapshot of the server's STATUS payload
 */
export interface CacheStatus {
  readonly pid: number;

  readonly maxSize: number;
  readonly usedSize: number;
  readonly numObjects: number;

  readonly rss: number; // resident set size, bytes
  readonly hwm: number; // resident high-water mark, bytes

  readonly totalGets: number;
  readonly totalSets: number;
  readonly totalDels: number;

  readonly missRatio: number;

  readonly policies: readonly PaperPolicy[];
  readonly policy: PaperPolicy;
  readonly isAutoPolicy: boolean;

  readonly uptime: number;
}

/**
 * Eviction policy view returned by getPolicy()
 */
export interface PolicyInfo {
  readonly policy: PaperPolicy;
  readonly policies: readonly PaperPolicy[];
  readonly isAutoPolicy: boolean;
}
