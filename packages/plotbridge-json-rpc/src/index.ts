/**
 * @plotbridge/json-rpc
 *
 * JSON-RPC 2.0 over any endpoint: correlated calls with cancellation and
 * timeouts, notifications, and method handlers run on the endpoint's dispatch
 * fiber.
 */

export type {
  JsonRpc,
  JsonRpcOptions,
  MethodHandler,
  NotificationHandler,
  PendingCall,
} from './lib/json-rpc';
export { makeJsonRpc, withParams } from './lib/json-rpc';

export type { RpcCallError } from './lib/errors';
export { RpcHandlerError, RpcResponseError, RpcSendError } from './lib/errors';

export {
  ErrorCode,
  ErrorObject,
  ErrorResponse,
  Inbound,
  JSONRPC_VERSION,
  RequestId,
  RequestMessage,
  SuccessResponse,
  classify,
  encodeError,
  encodeNotification,
  encodeRequest,
  encodeSuccess,
} from './lib/protocol';
