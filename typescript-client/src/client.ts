// Main PaperClient class - public API for PaperCache
// Serializes calls over one connection, connecting lazily on first use

import { EventEmitter } from 'events';
import { createConfig } from './config.js';
import type { ClientConfig, ClientConfigInput } from './config.js';
import { Connection } from './connection/connection.js';
import type { ConnectionState } from './connection/connectionState.js';
import { formatEndpoint } from './address.js';
import { CodecError, ConnectionError, PaperClientError, ProtocolError, TimeoutError } from './errors.js';
import { ClientEvents } from './events/eventNames.js';
import type { PaperPolicy } from './policy.js';
import { Commands } from './protocol/commands.js';
import { CacheErrorCode } from './protocol/constants.js';
import type { Command, CommandResult, Response } from './protocol/messages.js';
import { TcpTransport } from './transport/tcpTransport.js';
import type { ClientTransport } from './transport/transport.js';
import type { CacheStatus, CacheValue, Endpoint, PolicyInfo } from './types.js';
import { debugLog } from './utils/debug.js';
import { Mutex } from './utils/mutex.js';

// ============================================================================
// Event Types (Public API)
// ============================================================================

export interface ConnectedEvent {
  readonly endpoint: string;
  readonly timestamp: Date;
}

export interface DisconnectedEvent {
  readonly endpoint: string;
  readonly timestamp: Date;
}

export interface FaultedEvent {
  readonly endpoint: string;
  readonly error: PaperClientError;
  readonly timestamp: Date;
}

export interface ReconnectingEvent {
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly endpoint: string;
  readonly timestamp: Date;
}

// ============================================================================
// Event Listener Types (for type-safe EventEmitter overloads)
// ============================================================================

type EventListener =
  | { event: typeof ClientEvents.CONNECTED; listener: (evt: ConnectedEvent) => void }
  | { event: typeof ClientEvents.DISCONNECTED; listener: (evt: DisconnectedEvent) => void }
  | { event: typeof ClientEvents.FAULTED; listener: (evt: FaultedEvent) => void }
  | { event: typeof ClientEvents.RECONNECTING; listener: (evt: ReconnectingEvent) => void };

type EventListenerFunction = EventListener['listener'];

// Union of all possible event argument types
type EventArgs = ConnectedEvent | DisconnectedEvent | FaultedEvent | ReconnectingEvent;

function isKeyNotFound(error: ProtocolError): boolean {
  return error.kind === 'cache' && error.code === CacheErrorCode.KeyNotFound;
}

// Failures after which the stream is discarded; a reconnect may help
function isConnectionFailure(error: unknown): boolean {
  return error instanceof ConnectionError || error instanceof CodecError || error instanceof TimeoutError;
}

// ============================================================================
// PaperClient - Main Public API
// ============================================================================

/**
 * PaperCache client
 *
 * Promise-based API over a single connection. Calls are queued and sent one
 * at a time, in call order.
 *
 * Usage:
 * ```typescript
 * import { PaperClient } from '@paper-cache/client';
 *
 * const client = new PaperClient('paper://127.0.0.1:3145');
 *
 * await client.set('key', 'value', 60);
 * const value = await client.get('key'); // Buffer | null
 * await client.disconnect();
 * ```
 */
export class PaperClient extends EventEmitter {
  private readonly config: ClientConfig;
  private readonly connection: Connection;
  private readonly mutex = new Mutex();
  private readonly address: string;

  // Replayed after every (re)connect once a token has been accepted
  private authToken: string | null;

  /**
   * Constructor - parses the address and validates config
   * Does NOT initiate connection (lazy initialization)
   *
   * @param configInput - paper://host:port address, or a full configuration
   * @param transport - Transport implementation (TcpTransport by default, MockTransport for testing)
   */
  constructor(configInput: string | ClientConfigInput, transport: ClientTransport = new TcpTransport()) {
    super();

    // Validate and apply defaults
    this.config = createConfig(typeof configInput === 'string' ? { address: configInput } : configInput);
    this.address = formatEndpoint(this.config.endpoint);
    this.authToken = this.config.authToken ?? null;

    this.connection = new Connection(this.config.endpoint, transport, {
      connectionTimeout: this.config.connectionTimeout,
      requestTimeout: this.config.requestTimeout,
      noDelay: this.config.noDelay,
      onStateChange: (oldState, newState) => this.handleStateChange(oldState, newState),
    });
  }

  get endpoint(): Endpoint {
    return this.config.endpoint;
  }

  /**
   * Current connection state: Disconnected, Connected or Faulted
   */
  get state(): ConnectionState['state'] {
    return this.connection.state.state;
  }

  /**
   * The error that faulted the connection, if it is Faulted
   */
  get lastError(): PaperClientError | null {
    const current = this.connection.state;
    return current.state === 'Faulted' ? current.error : null;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Explicitly connect (and authenticate, if a token is known)
   * Also re-establishes a Faulted connection
   */
  async connect(): Promise<void> {
    await this.mutex.runExclusive(() => this.establish());
  }

  /**
   * Drop the current connection, faulted or not, and open a fresh one
   */
  async reconnect(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.connection.disconnect();
      await this.establish();
    });
  }

  /**
   * Close the connection
   * Does not wait for queued calls; an in-flight call fails with ConnectionError
   */
  async disconnect(): Promise<void> {
    await this.connection.disconnect();
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  /**
   * @returns "pong"
   */
  async ping(): Promise<string> {
    const reply = await this.execute(Commands.ping());
    return reply.toString('utf8');
  }

  async version(): Promise<string> {
    const reply = await this.execute(Commands.version());
    return reply.toString('utf8');
  }

  /**
   * Authenticate this connection; the token is replayed after reconnects
   */
  async auth(token: string): Promise<void> {
    await this.execute(Commands.auth(token));
    this.authToken = token;
  }

  /**
   * @returns the value, or null if the key is not in the cache
   */
  async get(key: string): Promise<Buffer | null> {
    return this.valueOrNull(await this.request(Commands.get(key)));
  }

  /**
   * Store value under key; ttl is in seconds, 0 (default) never expires
   */
  async set(key: string, value: CacheValue, ttl = 0): Promise<void> {
    await this.execute(Commands.set(key, value, ttl));
  }

  /**
   * @returns false if the key was not in the cache
   */
  async delete(key: string): Promise<boolean> {
    const response = await this.request(Commands.del(key));
    if (response.ok) {
      return true;
    }
    if (isKeyNotFound(response.error)) {
      return false;
    }
    throw response.error;
  }

  async has(key: string): Promise<boolean> {
    return this.execute(Commands.has(key));
  }

  /**
   * Like get(), without counting as an access for the eviction policy
   */
  async peek(key: string): Promise<Buffer | null> {
    return this.valueOrNull(await this.request(Commands.peek(key)));
  }

  /**
   * @returns remaining seconds, or null if the key is missing or never expires
   */
  async ttl(key: string): Promise<number | null> {
    const remaining = this.valueOrNull(await this.request(Commands.keyTtl(key)));
    return remaining === 0 ? null : remaining;
  }

  /**
   * Replace the ttl of an existing key; 0 (default) removes the expiry
   */
  async setTtl(key: string, ttl = 0): Promise<void> {
    await this.execute(Commands.ttl(key, ttl));
  }

  /**
   * @returns size in bytes of the object stored under key
   */
  async size(key: string): Promise<number> {
    return this.execute(Commands.size(key));
  }

  async status(): Promise<CacheStatus> {
    return this.execute(Commands.status());
  }

  async getPolicy(): Promise<PolicyInfo> {
    const { policy, policies, isAutoPolicy } = await this.status();
    return { policy, policies, isAutoPolicy };
  }

  async setPolicy(policy: PaperPolicy): Promise<void> {
    await this.execute(Commands.policy(policy));
  }

  /**
   * Change the cache capacity, in bytes
   */
  async resize(capacity: number | bigint): Promise<void> {
    await this.execute(Commands.resize(capacity));
  }

  /**
   * Remove every object from the cache
   */
  async wipe(): Promise<void> {
    await this.execute(Commands.wipe());
  }

  /**
   * Alias of wipe()
   */
  async clear(): Promise<void> {
    await this.wipe();
  }

  // ==========================================================================
  // Request Pipeline (Private)
  // ==========================================================================

  /**
   * Send command and unwrap the response, throwing server errors
   */
  private async execute<C extends Command>(command: C): Promise<CommandResult<C>> {
    const response = await this.request(command);
    if (!response.ok) {
      throw response.error;
    }
    return response.value;
  }

  /**
   * Send command under the lock, connecting first if never connected
   */
  private request<C extends Command>(command: C): Promise<Response<CommandResult<C>>> {
    return this.mutex.runExclusive(async () => {
      if (this.connection.state.state === 'Disconnected') {
        await this.establish();
      }
      return this.sendWithReconnect(command);
    });
  }

  private valueOrNull<T>(response: Response<T>): T | null {
    if (response.ok) {
      return response.value;
    }
    if (isKeyNotFound(response.error)) {
      return null;
    }
    throw response.error;
  }

  /**
   * Round trip, reconnecting up to reconnectAttempts times on connection failures
   */
  private async sendWithReconnect<C extends Command>(command: C): Promise<Response<CommandResult<C>>> {
    const maxAttempts = this.config.reconnectAttempts;
    let attempt = 0;

    for (;;) {
      try {
        if (attempt > 0) {
          this.emit(ClientEvents.RECONNECTING, {
            attempt,
            maxAttempts,
            endpoint: this.address,
            timestamp: new Date(),
          });
          await this.establish();
        }
        return await this.connection.roundTrip(command);
      } catch (error) {
        if (!isConnectionFailure(error) || attempt >= maxAttempts) {
          throw error;
        }
        attempt++;
        debugLog(`${command.type} failed, reconnect attempt ${attempt}/${maxAttempts}:`, error);
      }
    }
  }

  /**
   * Connect and replay the auth token; caller holds the lock
   */
  private async establish(): Promise<void> {
    if (this.connection.state.state === 'Connected') {
      return;
    }

    await this.connection.connect();

    const token = this.authToken;
    if (token !== null) {
      const response = await this.connection.roundTrip(Commands.auth(token));
      if (!response.ok) {
        throw response.error;
      }
    }
  }

  private handleStateChange(oldState: ConnectionState, newState: ConnectionState): void {
    const timestamp = new Date();

    switch (newState.state) {
      case 'Connected':
        this.emit(ClientEvents.CONNECTED, { endpoint: this.address, timestamp });
        break;

      case 'Faulted':
        this.emit(ClientEvents.FAULTED, { endpoint: this.address, error: newState.error, timestamp });
        break;

      case 'Disconnected':
        if (oldState.state !== 'Disconnected') {
          this.emit(ClientEvents.DISCONNECTED, { endpoint: this.address, timestamp });
        }
        break;
    }
  }

  // ==========================================================================
  // TypeScript Event Emitter Type Overrides
  // ==========================================================================

  on(event: typeof ClientEvents.CONNECTED, listener: (evt: ConnectedEvent) => void): this;
  on(event: typeof ClientEvents.DISCONNECTED, listener: (evt: DisconnectedEvent) => void): this;
  on(event: typeof ClientEvents.FAULTED, listener: (evt: FaultedEvent) => void): this;
  on(event: typeof ClientEvents.RECONNECTING, listener: (evt: ReconnectingEvent) => void): this;
  on(event: string | symbol, listener: EventListenerFunction): this {
    return super.on(event, listener);
  }

  once(event: typeof ClientEvents.CONNECTED, listener: (evt: ConnectedEvent) => void): this;
  once(event: typeof ClientEvents.DISCONNECTED, listener: (evt: DisconnectedEvent) => void): this;
  once(event: typeof ClientEvents.FAULTED, listener: (evt: FaultedEvent) => void): this;
  once(event: typeof ClientEvents.RECONNECTING, listener: (evt: ReconnectingEvent) => void): this;
  once(event: string | symbol, listener: EventListenerFunction): this {
    return super.once(event, listener);
  }

  emit(event: typeof ClientEvents.CONNECTED, evt: ConnectedEvent): boolean;
  emit(event: typeof ClientEvents.DISCONNECTED, evt: DisconnectedEvent): boolean;
  emit(event: typeof ClientEvents.FAULTED, evt: FaultedEvent): boolean;
  emit(event: typeof ClientEvents.RECONNECTING, evt: ReconnectingEvent): boolean;
  emit(event: string | symbol, ...args: EventArgs[]): boolean {
    return super.emit(event, ...args);
  }
}
