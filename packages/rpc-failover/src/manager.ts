/**
 * RpcFailoverManager: owns one RpcPool per chain.
 *
 * Pools are typed by their client (viem client, Solana connection); the
 * manager only needs their chain, status and probe surface, so it stores
 * them behind PoolHandle and hands the typed pool back to its creator.
 */

import pino, { type Logger } from "pino";
import { WalletError, type ChainTag } from "@custodian/types";
import { resolveFailoverConfig, type FailoverConfig } from "./config.js";
import type { ErrorClassifier } from "./classify.js";
import type { EndpointSnapshot } from "./endpoint.js";
import { RpcPool, type PoolEndpoint, type ProbeFn } from "./pool.js";

export interface PoolHandle {
  readonly chain: ChainTag;
  status(): readonly EndpointSnapshot[];
  probeAll(): Promise<readonly EndpointSnapshot[]>;
}

export interface ChainStatus {
  readonly chain: ChainTag;
  readonly endpoints: readonly EndpointSnapshot[];
  /** At least one endpoint is not unhealthy */
  readonly available: boolean;
}

export interface CreatePoolOptions<TClient> {
  readonly chain: ChainTag;
  readonly endpoints: readonly PoolEndpoint<TClient>[];
  readonly probe: ProbeFn<TClient>;
  readonly classify?: ErrorClassifier;
}

export interface RpcFailoverManagerOptions {
  readonly config?: Partial<FailoverConfig>;
  readonly logger?: Logger;
  readonly now?: () => number;
}

export class RpcFailoverManager {
  readonly config: FailoverConfig;
  private readonly pools = new Map<ChainTag, PoolHandle>();
  private readonly logger: Logger;
  private readonly now: (() => number) | undefined;

  constructor(options: RpcFailoverManagerOptions = {}) {
    this.config = resolveFailoverConfig(options.config);
    this.logger = options.logger ?? pino({ level: "silent" });
    this.now = options.now;
  }

  /**
   * Create and register the pool of a chain.
   *
   * @throws Error if the chain already has a pool
   */
  createPool<TClient>(options: CreatePoolOptions<TClient>): RpcPool<TClient> {
    if (this.pools.has(options.chain)) {
      throw new Error(`RpcFailoverManager: pool for ${options.chain} already exists`);
    }
    const pool = new RpcPool<TClient>({
      ...options,
      config: this.config,
      logger: this.logger,
      ...(this.now !== undefined ? { now: this.now } : {}),
    });
    this.pools.set(options.chain, pool);
    this.logger.info(
      { chain: options.chain, endpoints: pool.status().map((s) => s.endpoint) },
      "RPC pool registered",
    );
    return pool;
  }

  chains(): readonly ChainTag[] {
    return [...this.pools.keys()];
  }

  /**
   * @throws WalletError UNSUPPORTED_CHAIN when no pool is registered
   */
  statusOf(chain: ChainTag): ChainStatus {
    const pool = this.pools.get(chain);
    if (pool === undefined) {
      throw new WalletError("UNSUPPORTED_CHAIN", `No RPC pool for ${chain}`, { chain });
    }
    return toChainStatus(chain, pool.status());
  }

  status(): readonly ChainStatus[] {
    return [...this.pools.entries()].map(([chain, pool]) => toChainStatus(chain, pool.status()));
  }

  /**
   * Probe every endpoint of every chain.
   */
  async probeAll(): Promise<readonly ChainStatus[]> {
    const entries = [...this.pools.entries()];
    const results = await Promise.all(entries.map(([, pool]) => pool.probeAll()));
    return entries.map(([chain], i) => toChainStatus(chain, results[i] ?? []));
  }
}

export function toChainStatus(chain: ChainTag, endpoints: readonly EndpointSnapshot[]): ChainStatus {
  return {
    chain,
    endpoints,
    available: endpoints.some((e) => e.health !== "unhealthy"),
  };
}
