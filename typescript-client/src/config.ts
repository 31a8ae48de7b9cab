// Client configuration with validation and defaults
// Plain object configuration, NOT builder pattern

import { parseAddress } from './address.js';
import { ArgumentError } from './errors.js';
import type { Endpoint } from './types.js';

/**
 * Client configuration
 */
export interface ClientConfig {
  readonly address: string;
  readonly endpoint: Endpoint;
  readonly connectionTimeout?: number; // milliseconds, unset means no deadline
  readonly requestTimeout?: number; // milliseconds, unset means no deadline
  readonly reconnectAttempts: number; // default 0
  readonly authToken?: string;
  readonly noDelay: boolean; // default true
}

/**
 * Default configuration values
 */
export const DEFAULT_PORT = 3145;
export const DEFAULT_ADDRESS = `paper://127.0.0.1:${DEFAULT_PORT}`;
export const DEFAULT_RECONNECT_ATTEMPTS = 0;
export const DEFAULT_NO_DELAY = true;

/**
 * Partial client configuration (user-provided)
 * All fields are optional except address
 */
export interface ClientConfigInput {
  readonly address: string;
  readonly connectionTimeout?: number;
  readonly requestTimeout?: number;
  readonly reconnectAttempts?: number;
  readonly authToken?: string;
  readonly noDelay?: boolean;
}

function validateTimeout(name: string, value: number | undefined): void {
  if (value === undefined) {
    return;
  }

  if (!Number.isFinite(value) || value <= 0) {
    throw new ArgumentError(name, `${name} must be positive`);
  }
}

/**
 * Validate client configuration
 * Throws synchronous error if invalid
 */
export function validateConfig(config: ClientConfig): void {
  validateTimeout('connectionTimeout', config.connectionTimeout);
  validateTimeout('requestTimeout', config.requestTimeout);

  if (!Number.isInteger(config.reconnectAttempts) || config.reconnectAttempts < 0) {
    throw new ArgumentError('reconnectAttempts', 'reconnectAttempts must be a non-negative integer');
  }

  if (config.authToken !== undefined && config.authToken.length === 0) {
    throw new ArgumentError('authToken', 'authToken cannot be empty');
  }
}

/**
 * Create a complete ClientConfig from partial input
 * Applies defaults for missing values
 *
 * @throws AddressError if the address is not paper://host:port
 * @throws ArgumentError if any other field is out of range
 */
export function createConfig(input: ClientConfigInput): ClientConfig {
  const config: ClientConfig = {
    address: input.address,
    endpoint: parseAddress(input.address),
    connectionTimeout: input.connectionTimeout,
    requestTimeout: input.requestTimeout,
    reconnectAttempts: input.reconnectAttempts ?? DEFAULT_RECONNECT_ATTEMPTS,
    authToken: input.authToken,
    noDelay: input.noDelay ?? DEFAULT_NO_DELAY,
  };

  // Validate before returning
  validateConfig(config);

  return config;
}
