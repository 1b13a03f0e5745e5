/**
 * @plotbridge/testing-contracts
 *
 * Contract tests every endpoint implementation runs, plus the helpers they
 * use.
 */

export type {
  EndpointPair,
  EndpointTestContext,
  EndpointTestRunner,
} from './lib/endpoint-contract-tests';
export { runEndpointContractTests } from './lib/endpoint-contract-tests';

export type { MessageRecorder } from './lib/endpoint-test-utilities';
export {
  DEFAULT_WAIT,
  expectTrue,
  recordMessages,
  serveEphemeral,
} from './lib/endpoint-test-utilities';
