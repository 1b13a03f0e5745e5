/**
 * Shared Transport Types and Errors
 *
 * Types, branded identifiers and tagged errors used by every endpoint role
 * (acceptor and connector) and every transport implementation.
 */

import { Brand, Data, type Effect } from 'effect';

// ============================================================================
// Branded Types
// ============================================================================

/**
 * Opaque handle of one active bidirectional link owned by an endpoint.
 */
export type PeerId = string & Brand.Brand<'PeerId'>;
export const PeerId = Brand.nominal<PeerId>();

// ============================================================================
// Transport Error Types
// ============================================================================

export class TransportError extends Data.TaggedError('TransportError')<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConnectionError extends Data.TaggedError('ConnectionError')<{
  readonly message: string;
  readonly url?: string;
  readonly cause?: unknown;
}> {}

export class ServerStartError extends Data.TaggedError('ServerStartError')<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

// ============================================================================
// Core Transport Types
// ============================================================================

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * A callback invoked on the dispatch fiber with every inbound text message.
 * Failures and thrown exceptions are caught and logged per callback.
 */
export type MessageCallback = (message: string) => Effect.Effect<void, unknown, never>;

/**
 * Where an acceptor listens. Port 0 selects an ephemeral port.
 */
export interface ServeTarget {
  readonly host?: string;
  readonly port: number;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Text carried by a thrown value or a typed failure, for log lines and
 * wire-level error messages.
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return String(error);
};
