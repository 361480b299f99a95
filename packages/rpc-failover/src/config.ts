/**
 * Failover configuration and the backoff curve.
 *
 * Backoff formula: min(backoffBaseMs * 2^(failures - 1), backoffMaxMs)
 */

export interface FailoverConfig {
  /** Upper bound for a single attempt against one endpoint. Default: 10000 */
  readonly attemptTimeoutMs: number;
  /** Distinct endpoints tried per call. Default: 3 */
  readonly maxEndpointsPerCall: number;
  /** Consecutive failures before an endpoint is unhealthy. Default: 3 */
  readonly failureThreshold: number;
  /** Backoff after the first failure. Default: 500 */
  readonly backoffBaseMs: number;
  /** Backoff ceiling. Default: 60000 */
  readonly backoffMaxMs: number;
}

export const DEFAULT_FAILOVER_CONFIG: FailoverConfig = {
  attemptTimeoutMs: 10_000,
  maxEndpointsPerCall: 3,
  failureThreshold: 3,
  backoffBaseMs: 500,
  backoffMaxMs: 60_000,
};

export function resolveFailoverConfig(overrides: Partial<FailoverConfig> = {}): FailoverConfig {
  const config = { ...DEFAULT_FAILOVER_CONFIG, ...overrides };
  if (config.attemptTimeoutMs <= 0) {
    throw new RangeError("attemptTimeoutMs must be positive");
  }
  if (!Number.isInteger(config.maxEndpointsPerCall) || config.maxEndpointsPerCall < 1) {
    throw new RangeError("maxEndpointsPerCall must be a positive integer");
  }
  if (!Number.isInteger(config.failureThreshold) || config.failureThreshold < 1) {
    throw new RangeError("failureThreshold must be a positive integer");
  }
  if (config.backoffBaseMs < 0 || config.backoffMaxMs < config.backoffBaseMs) {
    throw new RangeError("backoff must satisfy 0 <= backoffBaseMs <= backoffMaxMs");
  }
  return config;
}

/**
 * Backoff after `failures` consecutive failures (failures >= 1).
 */
export function computeBackoff(failures: number, config: FailoverConfig): number {
  if (failures <= 0) return 0;
  const exponential = config.backoffBaseMs * Math.pow(2, failures - 1);
  return Math.min(exponential, config.backoffMaxMs);
}
