// Unit tests for paper:// address parsing

import { describe, it, expect } from 'vitest';
import { formatEndpoint, parseAddress } from '../../src/address.js';
import { AddressError } from '../../src/errors.js';

describe('Address Parsing', () => {
  it('should parse host and port', () => {
    expect(parseAddress('paper://127.0.0.1:3145')).toEqual({ host: '127.0.0.1', port: 3145 });
  });

  it('should accept hostnames and trim surrounding whitespace', () => {
    expect(parseAddress('  paper://cache.internal:8080 ')).toEqual({ host: 'cache.internal', port: 8080 });
  });

  it('should strip brackets from IPv6 literals', () => {
    expect(parseAddress('paper://[::1]:3145')).toEqual({ host: '::1', port: 3145 });
  });

  it('should reject other schemes', () => {
    expect(() => parseAddress('http://localhost:3145')).toThrow(
      'Invalid address "http://localhost:3145": unsupported scheme "http", expected "paper"'
    );
  });

  it('should reject an address without a port', () => {
    expect(() => parseAddress('paper://localhost')).toThrow(
      'Invalid address "paper://localhost": expected paper://<host>:<port>'
    );
  });

  it('should reject an address without a scheme', () => {
    expect(() => parseAddress('localhost:3145')).toThrow(AddressError);
  });

  it('should reject an empty host', () => {
    expect(() => parseAddress('paper://:3145')).toThrow('host cannot be empty');
  });

  it('should reject a non-numeric port', () => {
    expect(() => parseAddress('paper://localhost:abc')).toThrow('port "abc" is not a number');
    expect(() => parseAddress('paper://localhost:')).toThrow('port "" is not a number');
  });

  it('should reject ports outside 1-65535', () => {
    expect(() => parseAddress('paper://localhost:0')).toThrow('port 0 is out of range 1-65535');
    expect(() => parseAddress('paper://localhost:70000')).toThrow('port 70000 is out of range 1-65535');
  });

  it('should keep the offending address on the error', () => {
    try {
      parseAddress('paper://localhost');
      expect.unreachable('parseAddress should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(AddressError);
      if (error instanceof AddressError) {
        expect(error.address).toBe('paper://localhost');
      }
    }
  });

  describe('formatEndpoint', () => {
    it('should render the paper:// form', () => {
      expect(formatEndpoint({ host: '127.0.0.1', port: 3145 })).toBe('paper://127.0.0.1:3145');
    });

    it('should bracket IPv6 hosts', () => {
      expect(formatEndpoint({ host: '::1', port: 3145 })).toBe('paper://[::1]:3145');
    });
  });
});
