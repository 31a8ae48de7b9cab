// Wire compatibility tests
// Exact request bytes per command, and encode/decode determinism

import { describe, it, expect } from 'vitest';
import { decodeCommand, encodeCommand } from '../../../src/protocol/codecs.js';
import { Commands } from '../../../src/protocol/commands.js';
import type { Command } from '../../../src/protocol/messages.js';
import { PaperPolicy } from '../../../src/policy.js';
import { CodecError } from '../../../src/errors.js';

const KEY = [1, 0, 0, 0, 0x6b]; // "k"

describe('Wire Compatibility', () => {
  describe('Request frames', () => {
    it('TC-COMPAT-001: commands without arguments are a single byte', () => {
      expect(encodeCommand(Commands.ping())).toEqual(Buffer.from([0]));
      expect(encodeCommand(Commands.version())).toEqual(Buffer.from([1]));
      expect(encodeCommand(Commands.wipe())).toEqual(Buffer.from([10]));
      expect(encodeCommand(Commands.status())).toEqual(Buffer.from([13]));
    });

    it('TC-COMPAT-002: key commands carry a length-prefixed key', () => {
      expect(encodeCommand(Commands.get('k'))).toEqual(Buffer.from([3, ...KEY]));
      expect(encodeCommand(Commands.del('k'))).toEqual(Buffer.from([5, ...KEY]));
      expect(encodeCommand(Commands.has('k'))).toEqual(Buffer.from([6, ...KEY]));
      expect(encodeCommand(Commands.peek('k'))).toEqual(Buffer.from([7, ...KEY]));
      expect(encodeCommand(Commands.size('k'))).toEqual(Buffer.from([9, ...KEY]));
      expect(encodeCommand(Commands.keyTtl('k'))).toEqual(Buffer.from([14, ...KEY]));
    });

    it('TC-COMPAT-003: set carries key, value and ttl', () => {
      expect(encodeCommand(Commands.set('k', 'v', 10))).toEqual(
        Buffer.from([4, ...KEY, 1, 0, 0, 0, 0x76, 10, 0, 0, 0])
      );
    });

    it('TC-COMPAT-004: ttl carries key and seconds', () => {
      expect(encodeCommand(Commands.ttl('k', 5))).toEqual(Buffer.from([8, ...KEY, 5, 0, 0, 0]));
    });

    it('TC-COMPAT-005: auth carries the token', () => {
      expect(encodeCommand(Commands.auth('test-secret'))).toEqual(
        Buffer.concat([Buffer.from([2, 11, 0, 0, 0]), Buffer.from('test-secret')])
      );
    });

    it('TC-COMPAT-006: resize carries a uint64 capacity', () => {
      expect(encodeCommand(Commands.resize(1024))).toEqual(Buffer.from([11, 0, 4, 0, 0, 0, 0, 0, 0]));
    });

    it('TC-COMPAT-007: policy carries the policy spelling', () => {
      expect(encodeCommand(Commands.policy(PaperPolicy.lru()))).toEqual(
        Buffer.from([12, 3, 0, 0, 0, 0x6c, 0x72, 0x75])
      );
    });
  });

  describe('Determinism', () => {
    const commands: Command[] = [
      Commands.ping(),
      Commands.auth('test-secret'),
      Commands.get('hello'),
      Commands.set('hello', Buffer.from([0, 1, 2]), 60),
      Commands.ttl('hello', 0),
      Commands.keyTtl('hello'),
      Commands.resize(2n ** 40n),
      Commands.policy(PaperPolicy.twoQ(0.25, 0.5)),
      Commands.policy(PaperPolicy.s3Fifo(0.1)),
    ];

    it.each(commands.map((command): [string, Command] => [command.type, command]))(
      'TC-COMPAT-008: %s re-encodes to identical bytes',
      (_type, command) => {
        const encoded = encodeCommand(command);
        const decoded = decodeCommand(encoded);

        expect(decoded.type).toBe('Complete');
        if (decoded.type === 'Complete') {
          expect(decoded.command).toEqual(command);
          expect(decoded.bytesConsumed).toBe(encoded.length);
          expect(encodeCommand(decoded.command)).toEqual(encoded);
        }
      }
    );

    it('TC-COMPAT-009: should request more data for a truncated request', () => {
      const encoded = encodeCommand(Commands.set('hello', 'world', 0));

      expect(decodeCommand(encoded.subarray(0, encoded.length - 1))).toEqual({ type: 'NeedMoreData' });
    });

    it('TC-COMPAT-010: should reject an unknown command byte', () => {
      expect(() => decodeCommand(Buffer.from([99]))).toThrow(CodecError);
      expect(() => decodeCommand(Buffer.from([99]))).toThrow('Codec error: unknown command byte 99');
    });
  });
});
