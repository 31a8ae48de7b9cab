/**
 * Error classes for the PaperCache CLI
 */

/**
 * Validation error - for command-line arguments rejected before connecting
 */
export class ValidationError extends Error {
  public readonly name = 'ValidationError';

  constructor(
    public readonly field: 'key' | 'value' | 'ttl' | 'capacity' | 'policy',
    message: string,
    public readonly actual?: string | number,
    public readonly expected?: string | number
  ) {
    super(message);
  }
}
