// Transport layer interface for client-server communication

import type { Endpoint } from '../types.js';

/**
 * Socket options applied when the transport connects
 */
export interface TransportConnectOptions {
  readonly noDelay: boolean;
}

/**
 * Byte-stream transport the connection reads frames from
 */
export interface ClientTransport {
  /**
   * Open a stream to the endpoint
   * Rejects if the remote side cannot be reached
   */
  connect(endpoint: Endpoint, options: TransportConnectOptions): Promise<void>;

  /**
   * Close the stream; pending read() calls resolve null
   */
  disconnect(): Promise<void>;

  /**
   * Write the whole buffer, resolving once it has been handed to the OS
   */
  write(data: Buffer): Promise<void>;

  /**
   * Next chunk of bytes from the server, or null once the stream has ended
   * Chunk boundaries carry no meaning
   */
  read(): Promise<Buffer | null>;
}
