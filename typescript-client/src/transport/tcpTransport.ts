// TCP transport implementation for client-server communication

import * as net from 'node:net';
import type { ClientTransport, TransportConnectOptions } from './transport.js';
import type { Endpoint } from '../types.js';
import { ChunkQueue } from '../utils/chunkQueue.js';
import { debugLog } from '../utils/debug.js';

/**
 * Plain TCP socket transport
 * Incoming chunks are buffered in a queue until the connection reads them
 */
export class TcpTransport implements ClientTransport {
  private socket: net.Socket | null = null;
  private incoming: ChunkQueue = new ChunkQueue();
  // Set while a connect is waiting on the socket; disconnect() aborts it
  private abortConnect: (() => void) | null = null;

  /**
   * Connect to host:port
   * A disconnect() before the socket connects rejects with an Error
   */
  async connect(endpoint: Endpoint, options: TransportConnectOptions): Promise<void> {
    if (this.socket !== null || this.abortConnect !== null) {
      throw new Error('Already connected. Call disconnect() first.');
    }

    const incoming = new ChunkQueue();
    this.incoming = incoming;

    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const pending = net.createConnection({ host: endpoint.host, port: endpoint.port });

      const fail = (error: Error): void => {
        this.abortConnect = null;
        pending.off('error', onError);
        pending.destroy();
        reject(error);
      };

      const onError = (error: Error): void => {
        fail(new Error(`Failed to connect to ${endpoint.host}:${endpoint.port}: ${error.message}`));
      };

      this.abortConnect = () => {
        fail(new Error(`Connection to ${endpoint.host}:${endpoint.port} was closed while connecting`));
      };

      pending.once('error', onError);
      pending.once('connect', () => {
        this.abortConnect = null;
        pending.off('error', onError);
        resolve(pending);
      });
    });

    socket.setNoDelay(options.noDelay);

    // 'error' always fires before 'close'
    let socketError: Error | null = null;

    socket.on('data', (chunk: Buffer) => {
      incoming.push(chunk);
    });

    socket.on('error', (error: Error) => {
      debugLog('Socket error:', error.message);
      socketError = error;
    });

    socket.on('close', () => {
      incoming.end(socketError === null ? null : new Error(`Failed to read: ${socketError.message}`));
    });

    this.socket = socket;
  }

  /**
   * Close the socket without waiting for buffered writes
   */
  async disconnect(): Promise<void> {
    this.abortConnect?.();

    const socket = this.socket;
    if (socket === null) {
      return; // Already disconnected
    }

    this.socket = null;
    socket.destroy();
    this.incoming.end();
  }

  /**
   * Write the full frame; Node keeps writing partial sends until done
   */
  async write(data: Buffer): Promise<void> {
    const socket = this.socket;
    if (socket === null) {
      throw new Error('Not connected. Call connect() first.');
    }

    await new Promise<void>((resolve, reject) => {
      socket.write(data, (error) => {
        if (error) {
          reject(new Error(`Failed to write: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Next chunk, or null once the socket has closed
   * A socket that closed on an error rejects instead
   */
  async read(): Promise<Buffer | null> {
    return this.incoming.next();
  }
}
