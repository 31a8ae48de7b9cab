// Binary protocol codecs for PaperCache client-server communication
// Field order and widths must match the server byte for byte

import { CodecError, ProtocolError, type ProtocolErrorKind } from '../errors.js';
import { formatPolicy, parsePolicy, type PaperPolicy } from '../policy.js';
import type { CacheStatus } from '../types.js';
import type { Command, CommandResult, CommandResultMap, DecodeOutcome, Response } from './messages.js';
import {
  CACHE_ERROR_MARKER,
  CacheErrorCode,
  CommandByte,
  FALSE_INDICATOR,
  ServerErrorCode,
  TRUE_INDICATOR,
} from './constants.js';

/**
 * Thrown by the decoding primitives when the buffer ends mid-field.
 * Never escapes this module: decoders turn it into NeedMoreData.
 */
class IncompleteFrameError extends Error {
  constructor() {
    super('Incomplete frame');
  }
}

const NEED_MORE_DATA = { type: 'NeedMoreData' } as const;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

// ============================================================================
// Encoding Primitives
// ============================================================================

export function encodeU8(value: number): Buffer {
  const buffer = Buffer.allocUnsafe(1);
  buffer.writeUInt8(value, 0);
  return buffer;
}

export function encodeU32(value: number): Buffer {
  const buffer = Buffer.allocUnsafe(4);
  buffer.writeUInt32LE(value, 0);
  return buffer;
}

export function encodeU64(value: bigint): Buffer {
  const buffer = Buffer.allocUnsafe(8);
  buffer.writeBigUInt64LE(value, 0);
  return buffer;
}

export function encodeF64(value: number): Buffer {
  const buffer = Buffer.allocUnsafe(8);
  buffer.writeDoubleLE(value, 0);
  return buffer;
}

export function encodeBool(value: boolean): Buffer {
  return encodeU8(value ? TRUE_INDICATOR : FALSE_INDICATOR);
}

/**
 * Encode a byte buffer with uint32 length prefix
 */
export function encodeBuf(value: Uint8Array): Buffer {
  return Buffer.concat([encodeU32(value.length), value]);
}

/**
 * Encode a string as UTF-8 with uint32 length prefix
 */
export function encodeString(value: string): Buffer {
  return encodeBuf(Buffer.from(value, 'utf8'));
}

// ============================================================================
// Decoding Primitives
// ============================================================================

export interface DecodeResult<T> {
  value: T;
  newOffset: number;
}

function ensureAvailable(buffer: Buffer, offset: number, length: number): void {
  if (offset + length > buffer.length) {
    throw new IncompleteFrameError();
  }
}

export function decodeU8(buffer: Buffer, offset: number): DecodeResult<number> {
  ensureAvailable(buffer, offset, 1);
  return { value: buffer.readUInt8(offset), newOffset: offset + 1 };
}

export function decodeU32(buffer: Buffer, offset: number): DecodeResult<number> {
  ensureAvailable(buffer, offset, 4);
  return { value: buffer.readUInt32LE(offset), newOffset: offset + 4 };
}

export function decodeU64(buffer: Buffer, offset: number): DecodeResult<bigint> {
  ensureAvailable(buffer, offset, 8);
  return { value: buffer.readBigUInt64LE(offset), newOffset: offset + 8 };
}

export function decodeF64(buffer: Buffer, offset: number): DecodeResult<number> {
  ensureAvailable(buffer, offset, 8);
  return { value: buffer.readDoubleLE(offset), newOffset: offset + 8 };
}

/**
 * Decode a boolean indicator byte
 * @throws CodecError for any byte other than '!' or '?'
 */
export function decodeBool(buffer: Buffer, offset: number): DecodeResult<boolean> {
  const byte = decodeU8(buffer, offset);

  switch (byte.value) {
    case TRUE_INDICATOR:
      return { value: true, newOffset: byte.newOffset };
    case FALSE_INDICATOR:
      return { value: false, newOffset: byte.newOffset };
    default:
      throw new CodecError(`invalid boolean indicator 0x${byte.value.toString(16)} at offset ${offset}`);
  }
}

/**
 * Decode a byte buffer with uint32 length prefix
 * The result is a copy, independent of the read buffer
 */
export function decodeBuf(buffer: Buffer, offset: number): DecodeResult<Buffer> {
  const length = decodeU32(buffer, offset);
  ensureAvailable(buffer, length.newOffset, length.value);

  const end = length.newOffset + length.value;
  return { value: Buffer.from(buffer.subarray(length.newOffset, end)), newOffset: end };
}

/**
 * Decode a UTF-8 string with uint32 length prefix
 * @throws CodecError if the bytes are not valid UTF-8
 */
export function decodeString(buffer: Buffer, offset: number): DecodeResult<string> {
  const bytes = decodeBuf(buffer, offset);

  try {
    return { value: utf8Decoder.decode(bytes.value), newOffset: bytes.newOffset };
  } catch {
    throw new CodecError(`invalid UTF-8 string at offset ${offset}`);
  }
}

function decodeSafeNumber(buffer: Buffer, offset: number, field: string): DecodeResult<number> {
  const result = decodeU64(buffer, offset);
  if (result.value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new CodecError(`${field} value ${result.value} exceeds the safe integer range`);
  }
  return { value: Number(result.value), newOffset: result.newOffset };
}

function decodePolicy(buffer: Buffer, offset: number): DecodeResult<PaperPolicy> {
  const result = decodeString(buffer, offset);
  const policy = parsePolicy(result.value);
  if (policy === null) {
    throw new CodecError(`unknown policy "${result.value}"`);
  }
  return { value: policy, newOffset: result.newOffset };
}

// ============================================================================
// Command Encoding
// ============================================================================

/**
 * Encode a command into one request frame
 * Pure: the same command always yields the same bytes
 */
export function encodeCommand(command: Command): Buffer {
  switch (command.type) {
    case 'Ping':
      return encodeU8(CommandByte.Ping);

    case 'Version':
      return encodeU8(CommandByte.Version);

    case 'Auth':
      return Buffer.concat([encodeU8(CommandByte.Auth), encodeString(command.token)]);

    case 'Get':
      return Buffer.concat([encodeU8(CommandByte.Get), encodeString(command.key)]);

    case 'Set':
      return Buffer.concat([
        encodeU8(CommandByte.Set),
        encodeString(command.key),
        encodeBuf(command.value),
        encodeU32(command.ttl),
      ]);

    case 'Del':
      return Buffer.concat([encodeU8(CommandByte.Del), encodeString(command.key)]);

    case 'Has':
      return Buffer.concat([encodeU8(CommandByte.Has), encodeString(command.key)]);

    case 'Peek':
      return Buffer.concat([encodeU8(CommandByte.Peek), encodeString(command.key)]);

    case 'Ttl':
      return Buffer.concat([encodeU8(CommandByte.Ttl), encodeString(command.key), encodeU32(command.ttl)]);

    case 'KeyTtl':
      return Buffer.concat([encodeU8(CommandByte.KeyTtl), encodeString(command.key)]);

    case 'Size':
      return Buffer.concat([encodeU8(CommandByte.Size), encodeString(command.key)]);

    case 'Wipe':
      return encodeU8(CommandByte.Wipe);

    case 'Resize':
      return Buffer.concat([encodeU8(CommandByte.Resize), encodeU64(command.capacity)]);

    case 'Policy':
      return Buffer.concat([encodeU8(CommandByte.Policy), encodeString(formatPolicy(command.policy))]);

    case 'Status':
      return encodeU8(CommandByte.Status);
  }
}

// ============================================================================
// Command Decoding (server side of the wire; used for round trips and fakes)
// ============================================================================

export type CommandDecodeOutcome =
  | { readonly type: 'Complete'; readonly command: Command; readonly bytesConsumed: number }
  | { readonly type: 'NeedMoreData' };

/**
 * Decode one request frame from the start of buffer
 * @throws CodecError for an unknown command byte or malformed field
 */
export function decodeCommand(buffer: Buffer): CommandDecodeOutcome {
  try {
    const { command, newOffset } = decodeCommandAt(buffer, 0);
    return { type: 'Complete', command, bytesConsumed: newOffset };
  } catch (error) {
    if (error instanceof IncompleteFrameError) {
      return NEED_MORE_DATA;
    }
    throw error;
  }
}

function decodeCommandAt(buffer: Buffer, offset: number): { command: Command; newOffset: number } {
  const commandByte = decodeU8(buffer, offset);
  offset = commandByte.newOffset;

  switch (commandByte.value) {
    case CommandByte.Ping:
      return { command: { type: 'Ping' }, newOffset: offset };

    case CommandByte.Version:
      return { command: { type: 'Version' }, newOffset: offset };

    case CommandByte.Auth: {
      const token = decodeString(buffer, offset);
      return { command: { type: 'Auth', token: token.value }, newOffset: token.newOffset };
    }

    case CommandByte.Get:
    case CommandByte.Del:
    case CommandByte.Has:
    case CommandByte.Peek:
    case CommandByte.KeyTtl:
    case CommandByte.Size: {
      const key = decodeString(buffer, offset);
      return { command: { type: keyCommandType(commandByte.value), key: key.value }, newOffset: key.newOffset };
    }

    case CommandByte.Set: {
      const key = decodeString(buffer, offset);
      const value = decodeBuf(buffer, key.newOffset);
      const ttl = decodeU32(buffer, value.newOffset);
      return {
        command: { type: 'Set', key: key.value, value: value.value, ttl: ttl.value },
        newOffset: ttl.newOffset,
      };
    }

    case CommandByte.Ttl: {
      const key = decodeString(buffer, offset);
      const ttl = decodeU32(buffer, key.newOffset);
      return { command: { type: 'Ttl', key: key.value, ttl: ttl.value }, newOffset: ttl.newOffset };
    }

    case CommandByte.Wipe:
      return { command: { type: 'Wipe' }, newOffset: offset };

    case CommandByte.Resize: {
      const capacity = decodeU64(buffer, offset);
      return { command: { type: 'Resize', capacity: capacity.value }, newOffset: capacity.newOffset };
    }

    case CommandByte.Policy: {
      const policy = decodePolicy(buffer, offset);
      return { command: { type: 'Policy', policy: policy.value }, newOffset: policy.newOffset };
    }

    case CommandByte.Status:
      return { command: { type: 'Status' }, newOffset: offset };

    default:
      throw new CodecError(`unknown command byte ${commandByte.value}`);
  }
}

type KeyCommandType = 'Get' | 'Del' | 'Has' | 'Peek' | 'KeyTtl' | 'Size';

function keyCommandType(byte: number): KeyCommandType {
  switch (byte) {
    case CommandByte.Get:
      return 'Get';
    case CommandByte.Del:
      return 'Del';
    case CommandByte.Has:
      return 'Has';
    case CommandByte.Peek:
      return 'Peek';
    case CommandByte.KeyTtl:
      return 'KeyTtl';
    case CommandByte.Size:
      return 'Size';
    default:
      throw new CodecError(`command byte ${byte} does not take a key`);
  }
}

// ============================================================================
// Response Decoding
// ============================================================================

type PayloadDecoder<T> = (buffer: Buffer, offset: number) => DecodeResult<T>;

const decodeNothing: PayloadDecoder<void> = (_buffer, offset) => ({ value: undefined, newOffset: offset });

const decodeStatus: PayloadDecoder<CacheStatus> = (buffer, offset) => {
  const pid = decodeU32(buffer, offset);

  const maxSize = decodeSafeNumber(buffer, pid.newOffset, 'maxSize');
  const usedSize = decodeSafeNumber(buffer, maxSize.newOffset, 'usedSize');
  const numObjects = decodeSafeNumber(buffer, usedSize.newOffset, 'numObjects');

  const rss = decodeSafeNumber(buffer, numObjects.newOffset, 'rss');
  const hwm = decodeSafeNumber(buffer, rss.newOffset, 'hwm');

  const totalGets = decodeSafeNumber(buffer, hwm.newOffset, 'totalGets');
  const totalSets = decodeSafeNumber(buffer, totalGets.newOffset, 'totalSets');
  const totalDels = decodeSafeNumber(buffer, totalSets.newOffset, 'totalDels');

  const missRatio = decodeF64(buffer, totalDels.newOffset);

  const policyCount = decodeU32(buffer, missRatio.newOffset);
  let currentOffset = policyCount.newOffset;
  const policies: PaperPolicy[] = [];
  for (let i = 0; i < policyCount.value; i++) {
    const policy = decodePolicy(buffer, currentOffset);
    policies.push(policy.value);
    currentOffset = policy.newOffset;
  }

  const policy = decodePolicy(buffer, currentOffset);
  const isAutoPolicy = decodeBool(buffer, policy.newOffset);
  const uptime = decodeSafeNumber(buffer, isAutoPolicy.newOffset, 'uptime');

  return {
    value: {
      pid: pid.value,
      maxSize: maxSize.value,
      usedSize: usedSize.value,
      numObjects: numObjects.value,
      rss: rss.value,
      hwm: hwm.value,
      totalGets: totalGets.value,
      totalSets: totalSets.value,
      totalDels: totalDels.value,
      missRatio: missRatio.value,
      policies,
      policy: policy.value,
      isAutoPolicy: isAutoPolicy.value,
      uptime: uptime.value,
    },
    newOffset: uptime.newOffset,
  };
};

/**
 * Success payload decoder per command
 */
const PAYLOAD_DECODERS: { readonly [K in keyof CommandResultMap]: PayloadDecoder<CommandResultMap[K]> } = {
  Ping: decodeBuf,
  Version: decodeBuf,
  Auth: decodeNothing,
  Get: decodeBuf,
  Set: decodeNothing,
  Del: decodeNothing,
  Has: decodeBool,
  Peek: decodeBuf,
  Ttl: decodeNothing,
  KeyTtl: decodeU32,
  Size: decodeU32,
  Wipe: decodeNothing,
  Resize: decodeNothing,
  Policy: decodeNothing,
  Status: decodeStatus,
};

const CACHE_ERROR_MESSAGES: Readonly<Record<CacheErrorCode, string>> = {
  [CacheErrorCode.Internal]: 'an internal error occurred',
  [CacheErrorCode.KeyNotFound]: 'the key was not found in the cache',
  [CacheErrorCode.ZeroValueSize]: 'the value size cannot be zero',
  [CacheErrorCode.ExceedingValueSize]: 'the value size cannot exceed the cache size',
  [CacheErrorCode.ZeroCacheSize]: 'the cache size cannot be zero',
  [CacheErrorCode.UnconfiguredPolicy]: 'unconfigured policy',
  [CacheErrorCode.InvalidPolicy]: 'invalid policy',
};

const SERVER_ERROR_MESSAGES: Readonly<Record<ServerErrorCode, string>> = {
  [ServerErrorCode.Internal]: 'an internal error occurred',
  [ServerErrorCode.MaxConnectionsExceeded]: 'the maximum number of connections was exceeded',
  [ServerErrorCode.Unauthorized]: 'unauthorized',
};

function isCacheErrorCode(code: number): code is CacheErrorCode {
  return code in CACHE_ERROR_MESSAGES;
}

function isServerErrorCode(code: number): code is ServerErrorCode {
  return code in SERVER_ERROR_MESSAGES;
}

/**
 * Map a server-reported code to a ProtocolError
 * Unknown codes are reported as Internal, keeping the raw code
 */
export function toProtocolError(kind: ProtocolErrorKind, code: number): ProtocolError {
  if (kind === 'cache') {
    const known = isCacheErrorCode(code) ? code : CacheErrorCode.Internal;
    return new ProtocolError(kind, code, CacheErrorCode[known], CACHE_ERROR_MESSAGES[known]);
  }

  const known = isServerErrorCode(code) ? code : ServerErrorCode.Internal;
  return new ProtocolError(kind, code, ServerErrorCode[known], SERVER_ERROR_MESSAGES[known]);
}

function decodeErrorPayload(buffer: Buffer, offset: number): DecodeResult<ProtocolError> {
  const code = decodeU8(buffer, offset);

  if (code.value === CACHE_ERROR_MARKER) {
    const cacheCode = decodeU8(buffer, code.newOffset);
    return { value: toProtocolError('cache', cacheCode.value), newOffset: cacheCode.newOffset };
  }

  return { value: toProtocolError('server', code.value), newOffset: code.newOffset };
}

function decodeFrame<T>(buffer: Buffer, decodePayload: PayloadDecoder<T>): DecodeOutcome<T> {
  try {
    const flag = decodeBool(buffer, 0);

    if (!flag.value) {
      const error = decodeErrorPayload(buffer, flag.newOffset);
      const response: Response<T> = { ok: false, error: error.value };
      return { type: 'Complete', response, bytesConsumed: error.newOffset };
    }

    const payload = decodePayload(buffer, flag.newOffset);
    const response: Response<T> = { ok: true, value: payload.value };
    return { type: 'Complete', response, bytesConsumed: payload.newOffset };
  } catch (error) {
    if (error instanceof IncompleteFrameError) {
      return NEED_MORE_DATA;
    }
    throw error;
  }
}

/**
 * Decode the response frame for command from the start of buffer
 *
 * - NeedMoreData: the frame is truncated, read more bytes and retry
 * - Complete with ok=false: the server reported an error (ProtocolError)
 *
 * @throws CodecError if the bytes cannot be a valid frame
 */
export function decodeResponse<C extends Command>(command: C, buffer: Buffer): DecodeOutcome<CommandResult<C>> {
  const type: C['type'] = command.type;
  const decodePayload: PayloadDecoder<CommandResult<C>> = PAYLOAD_DECODERS[type];
  return decodeFrame(buffer, decodePayload);
}

/**
 * Decode the frame the server sends right after accepting a connection
 */
export function decodeHandshake(buffer: Buffer): DecodeOutcome<void> {
  return decodeFrame(buffer, decodeNothing);
}
