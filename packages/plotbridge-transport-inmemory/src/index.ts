/**
 * @plotbridge/transport-inmemory
 *
 * Acceptor and connector endpoints that talk inside one process, addressed by
 * `memory://host:port` targets. Each network is isolated; tests make their
 * own.
 */

export {
  makeInMemoryNetwork,
  memoryUrl,
  type InMemoryNetwork,
  type InMemoryConnectorConfigInput,
} from './lib/inmemory-network';

// Re-export the endpoint contracts for convenience
export type {
  AcceptorEndpoint,
  ConnectorEndpoint,
  Endpoint,
  ConnectionState,
  MessageCallback,
  ServeTarget,
} from '@plotbridge/transport';
