// Custom error classes for the PaperCache client
// Extends Error with type-safe error hierarchy

/**
 * Base error class for all PaperCache client errors
 */
export class PaperClientError extends Error {
  public readonly name: string = 'PaperClientError';

  constructor(message: string) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Address error - malformed paper:// address at construction time
 */
export class AddressError extends PaperClientError {
  public readonly name = 'AddressError';
  public readonly address: string;

  constructor(address: string, message: string) {
    super(`Invalid address "${address}": ${message}`);
    this.address = address;
  }
}

/**
 * Argument error - thrown before any bytes are written
 */
export class ArgumentError extends PaperClientError {
  public readonly name = 'ArgumentError';
  public readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.argument = argument;
  }
}

/**
 * Connection error - transport-level failure
 */
export class ConnectionError extends PaperClientError {
  public readonly name = 'ConnectionError';
  public readonly endpoint?: string;
  public readonly cause?: Error;

  constructor(message: string, endpoint?: string, cause?: Error) {
    super(message);
    this.endpoint = endpoint;
    this.cause = cause;
  }
}

/**
 * Codec error - bytes on the wire do not form a valid frame
 */
export class CodecError extends PaperClientError {
  public readonly name = 'CodecError';

  constructor(message: string) {
    super(`Codec error: ${message}`);
  }
}

/**
 * Which side of the server reported the failure
 */
export type ProtocolErrorKind = 'cache' | 'server';

/**
 * Protocol error - the server answered with a well-formed error frame.
 * The connection stays usable.
 */
export class ProtocolError extends PaperClientError {
  public readonly name = 'ProtocolError';
  public readonly kind: ProtocolErrorKind;
  public readonly code: number;
  public readonly reason: string;

  constructor(kind: ProtocolErrorKind, code: number, reason: string, message: string) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.reason = reason;
  }
}

/**
 * Timeout error - a configured deadline expired
 */
export class TimeoutError extends PaperClientError {
  public readonly name = 'TimeoutError';
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}
