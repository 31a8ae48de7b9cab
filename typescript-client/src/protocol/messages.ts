// Protocol message type definitions for client-server communication

import type { ProtocolError } from '../errors.js';
import type { PaperPolicy } from '../policy.js';
import type { CacheStatus } from '../types.js';

// ============================================================================
// Commands (Client → Server)
// ============================================================================

/**
 * Base type for all commands (discriminated union)
 */
export type Command =
  | Ping
  | Version
  | Auth
  | Get
  | Set
  | Del
  | Has
  | Peek
  | Ttl
  | KeyTtl
  | Size
  | Wipe
  | Resize
  | Policy
  | Status;

export interface Ping {
  readonly type: 'Ping';
}

export interface Version {
  readonly type: 'Version';
}

export interface Auth {
  readonly type: 'Auth';
  readonly token: string;
}

export interface Get {
  readonly type: 'Get';
  readonly key: string;
}

/**
 * Store a value; ttl is in seconds, 0 means no expiry
 */
export interface Set {
  readonly type: 'Set';
  readonly key: string;
  readonly value: Buffer;
  readonly ttl: number;
}

export interface Del {
  readonly type: 'Del';
  readonly key: string;
}

export interface Has {
  readonly type: 'Has';
  readonly key: string;
}

/**
 * Read a value without updating the eviction policy's bookkeeping
 */
export interface Peek {
  readonly type: 'Peek';
  readonly key: string;
}

/**
 * Update the ttl of an existing key (0 removes the expiry)
 */
export interface Ttl {
  readonly type: 'Ttl';
  readonly key: string;
  readonly ttl: number;
}

/**
 * Query the remaining ttl of a key
 */
export interface KeyTtl {
  readonly type: 'KeyTtl';
  readonly key: string;
}

/**
 * Size in bytes of the object stored under key
 */
export interface Size {
  readonly type: 'Size';
  readonly key: string;
}

export interface Wipe {
  readonly type: 'Wipe';
}

export interface Resize {
  readonly type: 'Resize';
  readonly capacity: bigint;
}

export interface Policy {
  readonly type: 'Policy';
  readonly policy: PaperPolicy;
}

export interface Status {
  readonly type: 'Status';
}

/**
 * Success payload type of each command
 */
export interface CommandResultMap {
  Ping: Buffer;
  Version: Buffer;
  Auth: void;
  Get: Buffer;
  Set: void;
  Del: void;
  Has: boolean;
  Peek: Buffer;
  Ttl: void;
  KeyTtl: number;
  Size: number;
  Wipe: void;
  Resize: void;
  Policy: void;
  Status: CacheStatus;
}

export type CommandResult<C extends Command> = CommandResultMap[C['type']];

// ============================================================================
// Responses (Server → Client)
// ============================================================================

/**
 * Decoded outcome of one response frame
 */
export type Response<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ProtocolError };

/**
 * Result of feeding bytes to a decoder
 */
export type DecodeOutcome<T> =
  | { readonly type: 'Complete'; readonly response: Response<T>; readonly bytesConsumed: number }
  | { readonly type: 'NeedMoreData' };
