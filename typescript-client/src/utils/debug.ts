/**
 * Debug logging utility
 *
 * Centralized debug logging that can be switched on without a rebuild.
 * Set PAPER_CLIENT_DEBUG=1 in the environment to enable debug logs.
 */

function isDebugEnabled(): boolean {
  const flag = process.env['PAPER_CLIENT_DEBUG'];
  return flag !== undefined && flag !== '' && flag !== '0' && flag !== 'false';
}

/**
 * Log a debug message if debug mode is enabled
 */
export function debugLog(message: string, ...args: unknown[]): void {
  if (isDebugEnabled()) {
    console.log(`[DEBUG] ${message}`, ...args);
  }
}
