// Connection state machine types
// Discriminated union keyed on `state`

import type { PaperClientError } from '../errors.js';

export type ConnectionState = DisconnectedState | ConnectedState | FaultedState;

/**
 * Disconnected: initial state, and the state after an explicit disconnect()
 */
export interface DisconnectedState {
  readonly state: 'Disconnected';
}

/**
 * Connected: handshake accepted, ready for one round trip at a time
 */
export interface ConnectedState {
  readonly state: 'Connected';
  readonly connectedAt: Date;
}

/**
 * Faulted: the stream can no longer be trusted
 * Nothing is sent until the connection is re-established
 */
export interface FaultedState {
  readonly state: 'Faulted';
  readonly error: PaperClientError;
  readonly faultedAt: Date;
}

export type ConnectionStateName = ConnectionState['state'];
