// Single-stream connection: one request frame out, one response frame in

import { formatEndpoint } from '../address.js';
import { CodecError, ConnectionError, PaperClientError, ProtocolError } from '../errors.js';
import { decodeHandshake, decodeResponse, encodeCommand } from '../protocol/codecs.js';
import type { Command, CommandResult, DecodeOutcome, Response } from '../protocol/messages.js';
import type { ClientTransport } from '../transport/transport.js';
import type { Endpoint } from '../types.js';
import { debugLog } from '../utils/debug.js';
import { withDeadline } from '../utils/deadline.js';
import type { ConnectionState } from './connectionState.js';

const EMPTY = Buffer.alloc(0);

export interface ConnectionOptions {
  readonly connectionTimeout?: number;
  readonly requestTimeout?: number;
  readonly noDelay: boolean;
  readonly onStateChange?: (oldState: ConnectionState, newState: ConnectionState) => void;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Owns one transport and the bytes read from it
 *
 * State transitions:
 * - Disconnected/Faulted → Connected on a successful connect + handshake
 * - Disconnected/Faulted → Faulted when connect fails
 * - Connected → Faulted on any transport, codec, timeout or abort failure
 * - any → Disconnected on disconnect(), including one that races a pending connect
 *
 * A handshake the server refuses leaves a Disconnected connection Disconnected.
 * A ProtocolError reply leaves the connection Connected.
 */
export class Connection {
  private current: ConnectionState = { state: 'Disconnected' };
  private pending: Buffer = EMPTY;
  private busy = false;
  // Bumped by disconnect() so that a failure it causes does not fault the connection
  private epoch = 0;
  private readonly address: string;

  constructor(
    private readonly endpoint: Endpoint,
    private readonly transport: ClientTransport,
    private readonly options: ConnectionOptions
  ) {
    this.address = formatEndpoint(endpoint);
  }

  get state(): ConnectionState {
    return this.current;
  }

  /**
   * Open the stream and wait for the server's handshake
   * No-op when already Connected
   *
   * @throws ConnectionError if the server cannot be reached
   * @throws ProtocolError if the server refuses the connection
   * @throws TimeoutError if connectionTimeout elapses
   */
  async connect(signal?: AbortSignal): Promise<void> {
    if (this.current.state === 'Connected') {
      return;
    }

    this.ensureIdle();

    const wasFaulted = this.current.state === 'Faulted';
    if (wasFaulted) {
      await this.closeTransport();
    }

    const epoch = this.epoch;
    this.pending = EMPTY;
    this.busy = true;

    try {
      await withDeadline(this.openAndHandshake(), {
        operation: 'connect',
        timeoutMs: this.options.connectionTimeout,
        signal,
        endpoint: this.address,
      });

      if (epoch !== this.epoch) {
        throw new ConnectionError(`Connection to ${this.address} was closed while connecting`, this.address);
      }
    } catch (error) {
      const failure = this.toFailure(error, `Failed to connect to ${this.address}`);
      if (epoch !== this.epoch) {
        await this.closeTransport();
      } else if (failure instanceof ProtocolError && !wasFaulted) {
        await this.closeTransport();
      } else {
        await this.fault(failure);
      }
      throw failure;
    } finally {
      this.busy = false;
    }

    debugLog(`Connected to ${this.address}`);
    this.transition({ state: 'Connected', connectedAt: new Date() });
  }

  /**
   * Close the stream; any in-flight round trip fails with ConnectionError
   */
  async disconnect(): Promise<void> {
    this.epoch++;
    await this.closeTransport();
    this.pending = EMPTY;

    if (this.current.state !== 'Disconnected') {
      this.transition({ state: 'Disconnected' });
    }
  }

  /**
   * Write one command frame and read exactly one response frame
   *
   * @returns the decoded response; server-reported errors come back as ok=false
   * @throws ConnectionError if not Connected, busy, or the stream breaks
   * @throws CodecError if the response is malformed
   * @throws TimeoutError if requestTimeout elapses
   */
  async roundTrip<C extends Command>(command: C, signal?: AbortSignal): Promise<Response<CommandResult<C>>> {
    this.ensureIdle();

    const current = this.current;
    if (current.state === 'Faulted') {
      throw new ConnectionError(
        `Connection to ${this.address} is faulted, reconnect before retrying: ${current.error.message}`,
        this.address,
        current.error
      );
    }
    if (current.state === 'Disconnected') {
      throw new ConnectionError(`Not connected to ${this.address}`, this.address);
    }

    const frame = encodeCommand(command);
    const epoch = this.epoch;
    this.busy = true;

    try {
      return await withDeadline(this.exchange(command, frame), {
        operation: command.type,
        timeoutMs: this.options.requestTimeout,
        signal,
        endpoint: this.address,
      });
    } catch (error) {
      const failure = this.toFailure(error, `${command.type} failed`);
      if (epoch === this.epoch) {
        await this.fault(failure);
      }
      throw failure;
    } finally {
      this.busy = false;
    }
  }

  // ==========================================================================
  // Private
  // ==========================================================================

  private ensureIdle(): void {
    if (this.busy) {
      throw new ConnectionError(`Another request is already in flight on ${this.address}`, this.address);
    }
  }

  private async openAndHandshake(): Promise<void> {
    try {
      await this.transport.connect(this.endpoint, { noDelay: this.options.noDelay });
    } catch (error) {
      throw new ConnectionError(`Failed to connect to ${this.address}`, this.address, toError(error));
    }

    const handshake = await this.readFrame(decodeHandshake);
    if (!handshake.ok) {
      throw handshake.error;
    }
  }

  private async exchange<C extends Command>(command: C, frame: Buffer): Promise<Response<CommandResult<C>>> {
    debugLog(`Sending ${command.type} (${frame.length} bytes) to ${this.address}`);

    try {
      await this.transport.write(frame);
    } catch (error) {
      throw new ConnectionError(`Failed to send ${command.type}`, this.address, toError(error));
    }

    return this.readFrame((buffer) => decodeResponse(command, buffer));
  }

  /**
   * Read until decode reports a complete frame
   * Bytes left over after the frame mean the stream is out of sync
   */
  private async readFrame<T>(decode: (buffer: Buffer) => DecodeOutcome<T>): Promise<Response<T>> {
    for (;;) {
      const outcome = decode(this.pending);

      if (outcome.type === 'Complete') {
        const leftover = this.pending.length - outcome.bytesConsumed;
        this.pending = EMPTY;
        if (leftover > 0) {
          throw new CodecError(`${leftover} unexpected byte(s) after the response frame`);
        }
        return outcome.response;
      }

      let chunk: Buffer | null;
      try {
        chunk = await this.transport.read();
      } catch (error) {
        throw new ConnectionError(`Failed to read from ${this.address}`, this.address, toError(error));
      }

      if (chunk === null) {
        throw new ConnectionError(`Connection closed by ${this.address} before the response was complete`, this.address);
      }

      this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    }
  }

  private toFailure(error: unknown, context: string): PaperClientError {
    if (error instanceof PaperClientError) {
      return error;
    }
    const cause = toError(error);
    return new ConnectionError(`${context}: ${cause.message}`, this.address, cause);
  }

  private async fault(error: PaperClientError): Promise<void> {
    debugLog(`Connection to ${this.address} faulted:`, error.message);
    this.transition({ state: 'Faulted', error, faultedAt: new Date() });
    this.pending = EMPTY;
    await this.closeTransport();
  }

  private async closeTransport(): Promise<void> {
    try {
      await this.transport.disconnect();
    } catch (error) {
      debugLog(`Closing the transport to ${this.address} failed:`, error);
    }
  }

  private transition(next: ConnectionState): void {
    const previous = this.current;
    this.current = next;
    this.options.onStateChange?.(previous, next);
  }
}
