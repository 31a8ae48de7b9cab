// Public API exports for @paper-cache/client
// Main entry point for the library

// Main client class
export { PaperClient } from './client.js';
export type { ConnectedEvent, DisconnectedEvent, FaultedEvent, ReconnectingEvent } from './client.js';

// Configuration
export type { ClientConfig, ClientConfigInput } from './config.js';
export {
  createConfig,
  validateConfig,
  DEFAULT_ADDRESS,
  DEFAULT_PORT,
  DEFAULT_RECONNECT_ATTEMPTS,
  DEFAULT_NO_DELAY,
} from './config.js';

// Addresses
export { parseAddress, formatEndpoint, PAPER_SCHEME } from './address.js';

// Error types
export {
  PaperClientError,
  AddressError,
  ArgumentError,
  ConnectionError,
  CodecError,
  ProtocolError,
  TimeoutError,
} from './errors.js';
export type { ProtocolErrorKind } from './errors.js';

// Core types
export type { Endpoint, CacheValue, CacheStatus, PolicyInfo } from './types.js';
export { PaperPolicy, formatPolicy, parsePolicy } from './policy.js';

// Connection (for advanced usage)
export { Connection } from './connection/connection.js';
export type { ConnectionOptions } from './connection/connection.js';
export type { ConnectionState, ConnectionStateName } from './connection/connectionState.js';

// Transport
export type { ClientTransport, TransportConnectOptions } from './transport/transport.js';
export { TcpTransport } from './transport/tcpTransport.js';

// Protocol (for advanced usage / testing)
export { Commands } from './protocol/commands.js';
export { CommandByte, CacheErrorCode, ServerErrorCode } from './protocol/constants.js';
export {
  encodeCommand,
  decodeCommand,
  decodeResponse,
  decodeHandshake,
  toProtocolError,
} from './protocol/codecs.js';
export type { Command, CommandResult, Response, DecodeOutcome } from './protocol/messages.js';

// Event names
export { ClientEvents, isClientEventName } from './events/eventNames.js';
export type { ClientEventName } from './events/eventNames.js';
