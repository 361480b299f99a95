/**
 * @custodian/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { CHAIN_TAGS, type ChainTag, type NetworkMode } from "@custodian/types";
import type { FailoverConfig } from "@custodian/rpc-failover";
import type { EngineConfig } from "@custodian/tx-engine";

// =============================================================================
// Schema
// =============================================================================

/** Comma-separated URLs; order is priority */
const UrlList = z
  .string()
  .default("")
  .transform((raw) =>
    raw
      .split(",")
      .map((url) => url.trim())
      .filter((url) => url !== ""),
  )
  .pipe(z.array(z.string().url()));

const BaseSchema = z.object({
  NETWORK_MODE: z.enum(["mainnet", "testnet"]).default("testnet"),
  ENCRYPTION_KEY: z
    .string({ required_error: "ENCRYPTION_KEY is required" })
    .regex(/^[0-9a-fA-F]{64}$/, "ENCRYPTION_KEY must be 64 hex characters"),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Endpoints
  ETH_MAINNET_RPC_URLS: UrlList,
  ETH_TESTNET_RPC_URLS: UrlList,
  BSC_MAINNET_RPC_URLS: UrlList,
  BSC_TESTNET_RPC_URLS: UrlList,
  SOLANA_MAINNET_RPC_URLS: UrlList,
  SOLANA_TESTNET_RPC_URLS: UrlList,

  // Explorers (default per chain and mode)
  ETH_EXPLORER_URL: z.string().url().optional(),
  BSC_EXPLORER_URL: z.string().url().optional(),
  SOLANA_EXPLORER_URL: z.string().url().optional(),

  // Failover
  RPC_ATTEMPT_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  RPC_MAX_ENDPOINTS_PER_CALL: z.coerce.number().int().min(1).default(3),
  RPC_FAILURE_THRESHOLD: z.coerce.number().int().min(1).default(3),
  RPC_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(500),
  RPC_BACKOFF_MAX_MS: z.coerce.number().int().min(0).default(60_000),

  // Ambiguity polling
  TX_STATUS_POLL_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  TX_STATUS_POLL_INTERVAL_MS: z.coerce.number().int().min(0).default(2000),
});

export const ConfigSchema = BaseSchema.superRefine((config, ctx) => {
  if (CHAIN_TAGS.every((chain) => rpcUrlsOf(config, chain).length === 0)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `No RPC endpoints configured for ${config.NETWORK_MODE}`,
      path: [rpcVariable("ETH", config.NETWORK_MODE)],
    });
  }
  if (config.RPC_BACKOFF_MAX_MS < config.RPC_BACKOFF_BASE_MS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "RPC_BACKOFF_MAX_MS must not be below RPC_BACKOFF_BASE_MS",
      path: ["RPC_BACKOFF_MAX_MS"],
    });
  }
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Views
// =============================================================================

type RpcVariable = `${ChainTag}_${"MAINNET" | "TESTNET"}_RPC_URLS`;

function rpcVariable(chain: ChainTag, mode: NetworkMode): RpcVariable {
  return mode === "mainnet" ? `${chain}_MAINNET_RPC_URLS` : `${chain}_TESTNET_RPC_URLS`;
}

function rpcUrlsOf(config: z.infer<typeof BaseSchema>, chain: ChainTag): readonly string[] {
  return config[rpcVariable(chain, config.NETWORK_MODE)];
}

/**
 * Endpoint lists of the selected mode; chains without endpoints are left out.
 */
export function endpointsOf(config: AppConfig): Partial<Record<ChainTag, readonly string[]>> {
  const endpoints: Partial<Record<ChainTag, readonly string[]>> = {};
  for (const chain of CHAIN_TAGS) {
    const urls = rpcUrlsOf(config, chain);
    if (urls.length > 0) endpoints[chain] = urls;
  }
  return endpoints;
}

const DEFAULT_EXPLORERS: Readonly<Record<ChainTag, Readonly<Record<NetworkMode, string>>>> = {
  ETH: { mainnet: "https://etherscan.io", testnet: "https://sepolia.etherscan.io" },
  BSC: { mainnet: "https://bscscan.com", testnet: "https://testnet.bscscan.com" },
  SOLANA: {
    mainnet: "https://explorer.solana.com",
    testnet: "https://explorer.solana.com/?cluster=devnet",
  },
};

export function explorersOf(config: AppConfig): Readonly<Record<ChainTag, string>> {
  const mode = config.NETWORK_MODE;
  return {
    ETH: config.ETH_EXPLORER_URL ?? DEFAULT_EXPLORERS.ETH[mode],
    BSC: config.BSC_EXPLORER_URL ?? DEFAULT_EXPLORERS.BSC[mode],
    SOLANA: config.SOLANA_EXPLORER_URL ?? DEFAULT_EXPLORERS.SOLANA[mode],
  };
}

export function failoverConfigOf(config: AppConfig): FailoverConfig {
  return {
    attemptTimeoutMs: config.RPC_ATTEMPT_TIMEOUT_MS,
    maxEndpointsPerCall: config.RPC_MAX_ENDPOINTS_PER_CALL,
    failureThreshold: config.RPC_FAILURE_THRESHOLD,
    backoffBaseMs: config.RPC_BACKOFF_BASE_MS,
    backoffMaxMs: config.RPC_BACKOFF_MAX_MS,
  };
}

export function engineConfigOf(config: AppConfig): Partial<EngineConfig> {
  return {
    statusPollAttempts: config.TX_STATUS_POLL_ATTEMPTS,
    statusPollIntervalMs: config.TX_STATUS_POLL_INTERVAL_MS,
  };
}
