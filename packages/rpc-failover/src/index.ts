/**
 * @custodian/rpc-failover: Keeps chain calls available over unreliable
 * third-party RPC endpoints.
 */

export type { FailoverConfig } from "./config.js";
export { DEFAULT_FAILOVER_CONFIG, resolveFailoverConfig, computeBackoff } from "./config.js";

export {
  AttemptTimeoutError,
  SubmissionOutcomeUnknownError,
  isSubmissionOutcomeUnknown,
} from "./errors.js";

export type { FailureClass, ErrorClassifier } from "./classify.js";
export { classifyRpcError } from "./classify.js";

export type { EndpointHealth, EndpointState, EndpointSnapshot, HealthChange } from "./endpoint.js";
export {
  redactUrl,
  createEndpointState,
  recordSuccess,
  recordFailure,
  selectCandidates,
} from "./endpoint.js";

export type {
  PoolEndpoint,
  RpcCall,
  ProbeFn,
  RpcPoolOptions,
  CallOptions,
  CallResult,
} from "./pool.js";
export { RpcPool } from "./pool.js";

export type {
  PoolHandle,
  ChainStatus,
  CreatePoolOptions,
  RpcFailoverManagerOptions,
} from "./manager.js";
export { RpcFailoverManager, toChainStatus } from "./manager.js";
