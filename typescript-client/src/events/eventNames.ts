// Event name constants for type-safe event handling
// Provides compile-time and runtime safety for event names

/**
 * Event name constants for PaperClient events
 *
 * Usage:
 * ```typescript
 * client.on(ClientEvents.FAULTED, (evt) => {
 *   console.log(evt.error.message);
 * });
 * ```
 */
export const ClientEvents = {
  /** Emitted when the handshake succeeds */
  CONNECTED: 'connected',

  /** Emitted after an explicit disconnect() */
  DISCONNECTED: 'disconnected',

  /** Emitted when the connection breaks and stops accepting requests */
  FAULTED: 'faulted',

  /** Emitted before each automatic reconnect attempt */
  RECONNECTING: 'reconnecting',
} as const;

/**
 * Type representing all valid client event names
 */
export type ClientEventName = (typeof ClientEvents)[keyof typeof ClientEvents];

/**
 * Type guard to check if a string is a valid client event name
 */
export function isClientEventName(name: string): name is ClientEventName {
  return Object.values(ClientEvents).some((eventName) => eventName === name);
}
