/**
 * Engine polling budgets.
 */

export interface EngineConfig {
  /** Status queries after an uncertain submission. Default: 5 */
  readonly statusPollAttempts: number;
  /** Gap between those queries. Default: 2000 */
  readonly statusPollIntervalMs: number;
  /** Status queries when waiting for confirmation. Default: 30 */
  readonly confirmationPollAttempts: number;
  /** Gap between those queries. Default: 2000 */
  readonly confirmationPollIntervalMs: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  statusPollAttempts: 5,
  statusPollIntervalMs: 2000,
  confirmationPollAttempts: 30,
  confirmationPollIntervalMs: 2000,
};

export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
  if (!Number.isInteger(config.statusPollAttempts) || config.statusPollAttempts < 1) {
    throw new RangeError("statusPollAttempts must be a positive integer");
  }
  if (!Number.isInteger(config.confirmationPollAttempts) || config.confirmationPollAttempts < 1) {
    throw new RangeError("confirmationPollAttempts must be a positive integer");
  }
  if (config.statusPollIntervalMs < 0 || config.confirmationPollIntervalMs < 0) {
    throw new RangeError("poll intervals must be non-negative");
  }
  return config;
}
