// In-memory PaperCache server speaking the wire protocol
// Plug `responder` into a MockTransport, or `handleFrame` into a net server

import { decodeCommand, encodeBool, encodeBuf, encodeU32 } from '../../src/protocol/codecs.js';
import { CacheErrorCode, ServerErrorCode } from '../../src/protocol/constants.js';
import type { Command } from '../../src/protocol/messages.js';
import { formatPolicy, type PaperPolicy } from '../../src/policy.js';
import type { MockResponder } from '../../src/testing/MockTransport.js';
import { cacheErrorFrame, okFrame, serverErrorFrame, statusPayload } from './frames.js';

interface Entry {
  readonly value: Buffer;
  expiresAt: number | null; // seconds on the fake clock
}

export interface FakePaperServerOptions {
  readonly maxSize?: number;
  readonly authToken?: string;
  readonly policies?: readonly PaperPolicy[];
  readonly version?: string;
}

export class FakePaperServer {
  private readonly entries = new Map<string, Entry>();
  private readonly policies: readonly PaperPolicy[];
  private readonly authToken: string | null;
  private readonly version: string;
  private maxSize: number;
  private policy: PaperPolicy;
  private authorized: boolean;
  private pending: Buffer = Buffer.alloc(0);

  private gets = 0;
  private misses = 0;
  private sets = 0;
  private dels = 0;

  // Seconds; advance() moves it forward
  private now = 0;

  public readonly received: Command[] = [];

  constructor(options: FakePaperServerOptions = {}) {
    this.maxSize = options.maxSize ?? 1024;
    this.policies = options.policies ?? [{ type: 'lfu' }, { type: 'lru' }, { type: 'fifo' }];
    this.policy = { type: 'auto' };
    this.authToken = options.authToken ?? null;
    this.authorized = this.authToken === null;
    this.version = options.version ?? '1.0.0';
  }

  /**
   * MockTransport responder: decode each written frame and inject the reply
   */
  readonly responder: MockResponder = (frame, transport) => {
    for (const reply of this.handleFrame(frame)) {
      transport.injectBytes(reply);
    }
  };

  /**
   * Feed raw request bytes; returns one reply per complete command
   */
  handleFrame(bytes: Buffer): Buffer[] {
    this.pending = Buffer.concat([this.pending, bytes]);
    const replies: Buffer[] = [];

    for (;;) {
      const outcome = decodeCommand(this.pending);
      if (outcome.type === 'NeedMoreData') {
        return replies;
      }
      this.pending = this.pending.subarray(outcome.bytesConsumed);
      this.received.push(outcome.command);
      replies.push(this.handle(outcome.command));
    }
  }

  advance(seconds: number): void {
    this.now += seconds;
  }

  /**
   * Forget the authorization of the previous connection
   */
  resetSession(): void {
    this.authorized = this.authToken === null;
    this.pending = Buffer.alloc(0);
  }

  private handle(command: Command): Buffer {
    if (!this.authorized && command.type !== 'Auth' && command.type !== 'Ping' && command.type !== 'Version') {
      return serverErrorFrame(ServerErrorCode.Unauthorized);
    }

    switch (command.type) {
      case 'Ping':
        return okFrame(encodeBuf(Buffer.from('pong')));

      case 'Version':
        return okFrame(encodeBuf(Buffer.from(this.version)));

      case 'Auth':
        if (this.authToken !== null && command.token !== this.authToken) {
          return serverErrorFrame(ServerErrorCode.Unauthorized);
        }
        this.authorized = true;
        return okFrame();

      case 'Get': {
        this.gets++;
        const entry = this.lookup(command.key);
        if (entry === null) {
          this.misses++;
          return cacheErrorFrame(CacheErrorCode.KeyNotFound);
        }
        return okFrame(encodeBuf(entry.value));
      }

      case 'Peek': {
        const entry = this.lookup(command.key);
        return entry === null ? cacheErrorFrame(CacheErrorCode.KeyNotFound) : okFrame(encodeBuf(entry.value));
      }

      case 'Set':
        if (command.value.length === 0) {
          return cacheErrorFrame(CacheErrorCode.ZeroValueSize);
        }
        if (command.value.length > this.maxSize) {
          return cacheErrorFrame(CacheErrorCode.ExceedingValueSize);
        }
        this.entries.delete(command.key);
        this.entries.set(command.key, {
          value: command.value,
          expiresAt: command.ttl === 0 ? null : this.now + command.ttl,
        });
        this.sets++;
        this.evict();
        return okFrame();

      case 'Del':
        if (this.lookup(command.key) === null) {
          return cacheErrorFrame(CacheErrorCode.KeyNotFound);
        }
        this.entries.delete(command.key);
        this.dels++;
        return okFrame();

      case 'Has':
        return okFrame(encodeBool(this.lookup(command.key) !== null));

      case 'Ttl': {
        const entry = this.lookup(command.key);
        if (entry === null) {
          return cacheErrorFrame(CacheErrorCode.KeyNotFound);
        }
        entry.expiresAt = command.ttl === 0 ? null : this.now + command.ttl;
        return okFrame();
      }

      case 'KeyTtl': {
        const entry = this.lookup(command.key);
        if (entry === null) {
          return cacheErrorFrame(CacheErrorCode.KeyNotFound);
        }
        return okFrame(encodeU32(entry.expiresAt === null ? 0 : entry.expiresAt - this.now));
      }

      case 'Size': {
        const entry = this.lookup(command.key);
        return entry === null ? cacheErrorFrame(CacheErrorCode.KeyNotFound) : okFrame(encodeU32(entry.value.length));
      }

      case 'Wipe':
        this.entries.clear();
        return okFrame();

      case 'Resize':
        if (command.capacity === 0n) {
          return cacheErrorFrame(CacheErrorCode.ZeroCacheSize);
        }
        this.maxSize = Number(command.capacity);
        this.evict();
        return okFrame();

      case 'Policy': {
        const wanted = formatPolicy(command.policy);
        if (command.policy.type !== 'auto' && !this.policies.some((policy) => formatPolicy(policy) === wanted)) {
          return cacheErrorFrame(CacheErrorCode.UnconfiguredPolicy);
        }
        this.policy = command.policy;
        return okFrame();
      }

      case 'Status':
        return okFrame(
          statusPayload({
            pid: 1234,
            maxSize: this.maxSize,
            usedSize: this.usedSize(),
            numObjects: this.entries.size,
            rss: 4096,
            hwm: 8192,
            totalGets: this.gets,
            totalSets: this.sets,
            totalDels: this.dels,
            missRatio: this.gets === 0 ? 0 : this.misses / this.gets,
            policies: this.policies,
            policy: this.policy.type === 'auto' ? (this.policies[0] ?? this.policy) : this.policy,
            isAutoPolicy: this.policy.type === 'auto',
            uptime: this.now,
          })
        );
    }
  }

  private lookup(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return null;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= this.now) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private usedSize(): number {
    let total = 0;
    for (const entry of this.entries.values()) {
      total += entry.value.length;
    }
    return total;
  }

  // Oldest insertion first
  private evict(): void {
    for (const key of this.entries.keys()) {
      if (this.usedSize() <= this.maxSize) {
        return;
      }
      this.entries.delete(key);
    }
  }
}
