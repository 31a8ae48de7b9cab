// Response frame decoding: partial frames, error frames, typed payloads

import { describe, it, expect } from 'vitest';
import {
  decodeHandshake,
  decodeResponse,
  encodeBool,
  encodeString,
  encodeU32,
  encodeU64,
} from '../../../src/protocol/codecs.js';
import { Commands } from '../../../src/protocol/commands.js';
import { CodecError, ProtocolError } from '../../../src/errors.js';
import { SAMPLE_STATUS, cacheErrorFrame, okBufFrame, okFrame, serverErrorFrame, statusPayload } from '../../helpers/frames.js';

describe('Response Decoding', () => {
  describe('Successful frames', () => {
    it('TC-RESP-001: should decode a buffer payload', () => {
      const outcome = decodeResponse(Commands.get('hello'), okBufFrame('world'));

      expect(outcome).toEqual({
        type: 'Complete',
        response: { ok: true, value: Buffer.from('world') },
        bytesConsumed: 10,
      });
    });

    it('TC-RESP-002: should decode an empty acknowledgement', () => {
      const outcome = decodeResponse(Commands.set('k', 'v'), okFrame());

      expect(outcome).toEqual({ type: 'Complete', response: { ok: true, value: undefined }, bytesConsumed: 1 });
    });

    it('TC-RESP-003: should decode typed payloads per command', () => {
      expect(decodeResponse(Commands.has('k'), okFrame(encodeBool(false)))).toEqual({
        type: 'Complete',
        response: { ok: true, value: false },
        bytesConsumed: 2,
      });
      expect(decodeResponse(Commands.size('k'), okFrame(encodeU32(5)))).toEqual({
        type: 'Complete',
        response: { ok: true, value: 5 },
        bytesConsumed: 5,
      });
    });

    it('TC-RESP-004: should decode a status payload', () => {
      const outcome = decodeResponse(Commands.status(), okFrame(statusPayload(SAMPLE_STATUS)));

      expect(outcome.type).toBe('Complete');
      if (outcome.type === 'Complete') {
        expect(outcome.response).toEqual({ ok: true, value: SAMPLE_STATUS });
      }
    });

    it('TC-RESP-005: should only consume one frame', () => {
      const outcome = decodeResponse(Commands.wipe(), Buffer.concat([okFrame(), okFrame()]));

      expect(outcome.type).toBe('Complete');
      if (outcome.type === 'Complete') {
        expect(outcome.bytesConsumed).toBe(1);
      }
    });
  });

  describe('Partial frames', () => {
    it('TC-RESP-006: should request more data for an empty buffer', () => {
      expect(decodeResponse(Commands.ping(), Buffer.alloc(0))).toEqual({ type: 'NeedMoreData' });
    });

    it('TC-RESP-007: should request more data at every truncation point', () => {
      const frame = okBufFrame('world');

      for (let length = 0; length < frame.length; length++) {
        expect(decodeResponse(Commands.get('hello'), frame.subarray(0, length))).toEqual({ type: 'NeedMoreData' });
      }
    });

    it('TC-RESP-008: should request more data for a truncated error frame', () => {
      expect(decodeResponse(Commands.get('k'), cacheErrorFrame(1).subarray(0, 2))).toEqual({ type: 'NeedMoreData' });
    });
  });

  describe('Error frames', () => {
    it('TC-RESP-009: should surface cache errors verbatim', () => {
      const outcome = decodeResponse(Commands.get('missing'), cacheErrorFrame(1));

      expect(outcome.type).toBe('Complete');
      if (outcome.type === 'Complete' && !outcome.response.ok) {
        const error = outcome.response.error;
        expect(error).toBeInstanceOf(ProtocolError);
        expect(error.kind).toBe('cache');
        expect(error.code).toBe(1);
        expect(error.reason).toBe('KeyNotFound');
        expect(error.message).toBe('the key was not found in the cache');
        expect(outcome.bytesConsumed).toBe(3);
      } else {
        expect.unreachable('expected an error response');
      }
    });

    it('TC-RESP-010: should surface server errors verbatim', () => {
      const outcome = decodeResponse(Commands.get('k'), serverErrorFrame(3));

      if (outcome.type === 'Complete' && !outcome.response.ok) {
        expect(outcome.response.error.kind).toBe('server');
        expect(outcome.response.error.reason).toBe('Unauthorized');
        expect(outcome.response.error.message).toBe('unauthorized');
        expect(outcome.bytesConsumed).toBe(2);
      } else {
        expect.unreachable('expected an error response');
      }
    });

    it('TC-RESP-011: should keep unknown codes as Internal with the raw code', () => {
      const cache = decodeResponse(Commands.get('k'), cacheErrorFrame(42));
      const server = decodeResponse(Commands.get('k'), serverErrorFrame(9));

      if (cache.type === 'Complete' && !cache.response.ok && server.type === 'Complete' && !server.response.ok) {
        expect(cache.response.error.reason).toBe('Internal');
        expect(cache.response.error.code).toBe(42);
        expect(server.response.error.reason).toBe('Internal');
        expect(server.response.error.code).toBe(9);
        expect(server.response.error.message).toBe('an internal error occurred');
      } else {
        expect.unreachable('expected error responses');
      }
    });
  });

  describe('Malformed frames', () => {
    it('TC-RESP-012: should reject an invalid status flag', () => {
      expect(() => decodeResponse(Commands.ping(), Buffer.from([0x00]))).toThrow(CodecError);
    });

    it('TC-RESP-013: should reject an unknown policy in status', () => {
      const payload = Buffer.concat([
        encodeU32(1),
        ...Array.from({ length: 8 }, () => encodeU64(0n)),
        Buffer.alloc(8), // missRatio
        encodeU32(0),
        encodeString('random'),
      ]);

      expect(() => decodeResponse(Commands.status(), okFrame(payload))).toThrow('Codec error: unknown policy "random"');
    });

    it('TC-RESP-014: should reject status counters beyond the safe integer range', () => {
      const payload = Buffer.concat([encodeU32(1), encodeU64(2n ** 60n)]);

      expect(() => decodeResponse(Commands.status(), okFrame(payload))).toThrow(
        'Codec error: maxSize value 1152921504606846976 exceeds the safe integer range'
      );
    });
  });

  describe('Handshake', () => {
    it('TC-RESP-015: should accept an ok handshake', () => {
      expect(decodeHandshake(Buffer.from('!'))).toEqual({
        type: 'Complete',
        response: { ok: true, value: undefined },
        bytesConsumed: 1,
      });
    });

    it('TC-RESP-016: should surface a refused handshake', () => {
      const outcome = decodeHandshake(serverErrorFrame(2));

      if (outcome.type === 'Complete' && !outcome.response.ok) {
        expect(outcome.response.error.reason).toBe('MaxConnectionsExceeded');
        expect(outcome.response.error.message).toBe('the maximum number of connections was exceeded');
      } else {
        expect.unreachable('expected a refused handshake');
      }
    });
  });
});
