/**
 * @plotbridge/transport
 *
 * Endpoint contracts shared by every transport: the acceptor and connector
 * roles, the named callback registry and the dispatch engine that runs
 * callbacks off the I/O path. Implementations live in the
 * transport-websocket and transport-inmemory packages.
 */

// ============================================================================
// Shared Types and Errors
// ============================================================================

export type { ConnectionState, MessageCallback, ServeTarget } from './lib/shared';
export {
  PeerId,
  TransportError,
  ConnectionError,
  ServerStartError,
  describeError,
} from './lib/shared';

// ============================================================================
// Endpoint Contracts
// ============================================================================

export type { Endpoint, AcceptorEndpoint, ConnectorEndpoint, RpcTransport } from './lib/endpoint';

// ============================================================================
// Dispatch
// ============================================================================

export type { CallbackRegistry, CallbackSnapshot } from './lib/callback-registry';
export { makeCallbackRegistry } from './lib/callback-registry';
export type { Dispatcher, DispatcherConfig } from './lib/dispatcher';
export { makeDispatcher } from './lib/dispatcher';
export type { EndpointCore, EndpointCoreConfig } from './lib/endpoint-core';
export { makeEndpointCore, DEFAULT_DISPATCH_SHUTDOWN_TIMEOUT } from './lib/endpoint-core';
export { awaitCondition } from './lib/connection-watch';
export { broadcastToPeers } from './lib/broadcast';

// ============================================================================
// Configuration and Logging
// ============================================================================

export type {
  AcceptorConfig,
  AcceptorConfigInput,
  ConnectorConfig,
  ConnectorConfigInput,
} from './lib/config';
export {
  AcceptorConfigSchema,
  ConnectorConfigSchema,
  decodeAcceptorConfig,
  decodeConnectorConfig,
  serveTargetFromEnv,
  DEFAULT_HOST,
  DEFAULT_OPEN_TIMEOUT_MS,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
} from './lib/config';
export type { LogLevelName } from './lib/logging';
export {
  LogLevelConfig,
  logLevelLayer,
  logLevelFromEnv,
  silentLogger,
  toLogLevel,
} from './lib/logging';
