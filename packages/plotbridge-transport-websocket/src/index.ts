/**
 * @plotbridge/transport-websocket
 *
 * Acceptor and connector endpoints over WebSocket text frames, built on the
 * `ws` package.
 */

export { makeWebSocketAcceptor } from './lib/websocket-acceptor';
export { makeWebSocketConnector } from './lib/websocket-connector';
export { rawDataToText } from './lib/raw-data';

// Re-export the endpoint contracts for convenience
export type {
  AcceptorEndpoint,
  ConnectorEndpoint,
  Endpoint,
  ConnectionState,
  MessageCallback,
  ServeTarget,
} from '@plotbridge/transport';
