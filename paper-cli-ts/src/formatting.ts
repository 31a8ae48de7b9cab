/**
 * Output formatting utilities
 */

import {
  AddressError,
  ArgumentError,
  CodecError,
  ConnectionError,
  ProtocolError,
  TimeoutError,
  formatPolicy,
} from '@paper-cache/client';
import type { CacheStatus, PolicyInfo } from '@paper-cache/client';
import { ValidationError } from './errors.js';

/**
 * Format an error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    if (error.actual !== undefined && error.expected !== undefined) {
      return `Error: ${error.message} (actual: ${error.actual}, expected: ${error.expected})`;
    }
    return `Error: ${error.message}`;
  }

  if (error instanceof TimeoutError) {
    return `Error: ${error.operation} timed out after ${error.timeoutMs / 1000}s`;
  }

  if (error instanceof ConnectionError) {
    if (error.cause !== undefined) {
      return `Error: ${error.message} (${error.cause.message})`;
    }
    return `Error: ${error.message}`;
  }

  if (error instanceof ProtocolError) {
    return `Error: Server rejected the request - ${error.message} (${error.reason})`;
  }

  if (error instanceof CodecError) {
    return `Error: Protocol error - ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Error: ${String(error)}`;
}

/**
 * Get appropriate exit code for error
 *
 * Exit codes follow Unix conventions:
 * - 0: Success (not handled here)
 * - 1: Validation error (bad arguments or address)
 * - 2: Connection/timeout error (network issues)
 * - 3: Operational error (server errors, malformed frames, unexpected failures)
 */
export function getExitCode(error: unknown): number {
  if (error instanceof ValidationError || error instanceof ArgumentError || error instanceof AddressError) {
    return 1;
  }

  if (error instanceof ConnectionError || error instanceof TimeoutError) {
    return 2;
  }

  return 3;
}

/**
 * Format a value read from the cache
 * Format: key = value, or key = <none> when absent
 */
export function formatValue(key: string, value: Buffer | null): string {
  if (value === null) {
    return `${key} = <none>`;
  }

  return `${key} = ${value.toString('utf8')}`;
}

/**
 * Format a remaining TTL; null covers both "never expires" and "absent"
 */
export function formatTtl(key: string, ttl: number | null): string {
  return ttl === null ? `${key} ttl = <none>` : `${key} ttl = ${ttl}s`;
}

function formatActivePolicy(info: PolicyInfo): string {
  const active = formatPolicy(info.policy);
  return info.isAutoPolicy ? `${active} (auto)` : active;
}

/**
 * Format the policy view, one field per line
 */
export function formatPolicyInfo(info: PolicyInfo): string {
  return [`policy: ${formatActivePolicy(info)}`, `policies: ${info.policies.map(formatPolicy).join(', ')}`].join(
    '\n'
  );
}

/**
 * Format a status snapshot, one field per line
 */
export function formatStatus(status: CacheStatus): string {
  return [
    `pid: ${status.pid}`,
    `maxSize: ${status.maxSize}`,
    `usedSize: ${status.usedSize}`,
    `numObjects: ${status.numObjects}`,
    `rss: ${status.rss}`,
    `hwm: ${status.hwm}`,
    `totalGets: ${status.totalGets}`,
    `totalSets: ${status.totalSets}`,
    `totalDels: ${status.totalDels}`,
    `missRatio: ${status.missRatio}`,
    `policy: ${formatActivePolicy(status)}`,
    `policies: ${status.policies.map(formatPolicy).join(', ')}`,
    `uptime: ${status.uptime}s`,
  ].join('\n');
}
