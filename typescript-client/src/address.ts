// paper:// address parsing

import { AddressError } from './errors.js';
import type { Endpoint } from './types.js';

export const PAPER_SCHEME = 'paper';

const ADDRESS_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\/(\[[^\]]*\]|[^:/\[\]]*):([^:/]*)$/;

/**
 * Parse `paper://<host>:<port>` into an Endpoint
 * @throws AddressError on wrong scheme, empty host, or bad port
 */
export function parseAddress(address: string): Endpoint {
  const match = ADDRESS_PATTERN.exec(address.trim());
  if (!match) {
    throw new AddressError(address, `expected ${PAPER_SCHEME}://<host>:<port>`);
  }

  const [, scheme = '', rawHost = '', rawPort = ''] = match;

  if (scheme !== PAPER_SCHEME) {
    throw new AddressError(address, `unsupported scheme "${scheme}", expected "${PAPER_SCHEME}"`);
  }

  // IPv6 literals are written in brackets
  const host = rawHost.startsWith('[') ? rawHost.slice(1, -1) : rawHost;
  if (host.length === 0) {
    throw new AddressError(address, 'host cannot be empty');
  }

  if (!/^\d+$/.test(rawPort)) {
    throw new AddressError(address, `port "${rawPort}" is not a number`);
  }

  const port = parseInt(rawPort, 10);
  if (port < 1 || port > 65535) {
    throw new AddressError(address, `port ${port} is out of range 1-65535`);
  }

  return { host, port };
}

/**
 * Render an Endpoint back into its paper:// form
 */
export function formatEndpoint(endpoint: Endpoint): string {
  const host = endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host;
  return `${PAPER_SCHEME}://${host}:${endpoint.port}`;
}
