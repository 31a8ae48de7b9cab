// Protocol constants and enums for PaperCache client-server communication

/**
 * Boolean indicators: '!' for true, '?' for false
 */
export const TRUE_INDICATOR = 0x21;
export const FALSE_INDICATOR = 0x3f;

/**
 * Request command discriminators (1 byte)
 */
export enum CommandByte {
  Ping = 0,
  Version = 1,
  Auth = 2,
  Get = 3,
  Set = 4,
  Del = 5,
  Has = 6,
  Peek = 7,
  Ttl = 8,
  Size = 9,
  Wipe = 10,
  Resize = 11,
  Policy = 12,
  Status = 13,
  KeyTtl = 14,
}

/**
 * Error frame: a leading 0 means a cache error code follows
 */
export const CACHE_ERROR_MARKER = 0;

/**
 * Server error codes (first error byte, non-zero)
 */
export enum ServerErrorCode {
  Internal = 1,
  MaxConnectionsExceeded = 2,
  Unauthorized = 3,
}

/**
 * Cache error codes (second error byte)
 */
export enum CacheErrorCode {
  Internal = 0,
  KeyNotFound = 1,
  ZeroValueSize = 2,
  ExceedingValueSize = 3,
  ZeroCacheSize = 4,
  UnconfiguredPolicy = 5,
  InvalidPolicy = 6,
}

export const U32_MAX = 0xffffffff;
export const U64_MAX = 0xffffffffffffffffn;
