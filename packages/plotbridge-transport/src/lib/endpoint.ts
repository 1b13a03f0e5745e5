/**
 * Endpoint Contracts
 *
 * One side of a persistent bidirectional connection. Both roles expose the
 * same send/receive, connection-state and callback-registry operations; the
 * acceptor adds serving and the connector adds connecting.
 *
 * Operations never fail: transport problems are logged and reported through
 * the boolean results and the connection state.
 */

import type { Duration, Effect, Option, Stream } from 'effect';
import type { ConnectionState, MessageCallback, ServeTarget } from './shared';

// ============================================================================
// Endpoint Contract
// ============================================================================

export interface Endpoint {
  readonly name: string;

  // Connection state
  readonly isConnected: Effect.Effect<boolean>;
  readonly waitConnection: (timeout: Duration.DurationInput) => Effect.Effect<boolean>;
  readonly connectionState: Stream.Stream<ConnectionState>;

  // Messaging
  readonly send: (message: string) => Effect.Effect<boolean>;

  // Named callbacks, one per name
  readonly registerCallback: (name: string, callback: MessageCallback) => Effect.Effect<void>;
  readonly unregisterCallback: (name: string) => Effect.Effect<void>;

  /**
   * Halts I/O first, then the dispatch fiber. Idempotent and terminal.
   */
  readonly stop: Effect.Effect<void>;
}

/**
 * Accepting side. `send` broadcasts to every connected peer and succeeds when
 * at least one peer existed, even if delivery to some of them failed.
 */
export interface AcceptorEndpoint extends Endpoint {
  readonly serve: (target: ServeTarget) => Effect.Effect<boolean>;
  readonly port: Effect.Effect<Option.Option<number>>;
  readonly peerCount: Effect.Effect<number>;
  readonly waitUntilNoPeers: (timeout?: Duration.DurationInput) => Effect.Effect<boolean>;
}

/**
 * Connecting side. Owns at most one connection.
 */
export interface ConnectorEndpoint extends Endpoint {
  readonly connect: (target: string) => Effect.Effect<boolean>;
}

/**
 * The subset of an endpoint a message protocol needs.
 */
export type RpcTransport = Pick<
  Endpoint,
  'send' | 'registerCallback' | 'unregisterCallback' | 'stop' | 'isConnected' | 'waitConnection'
>;
