/**
 * ChainProviderRegistry: chain tag → provider.
 */

import type { Logger } from "pino";
import { WalletError, chainFamily, type ChainTag, type NetworkMode } from "@custodian/types";
import type { RpcFailoverManager } from "@custodian/rpc-failover";
import type { ChainProvider } from "./provider.js";
import type { TokenRegistry } from "./token-registry.js";
import { getEvmNetwork } from "./evm/networks.js";
import { createEvmPool } from "./evm/rpc.js";
import { EvmChainProvider } from "./evm/evm-provider.js";
import { createSolanaPool } from "./solana/rpc.js";
import { SolanaChainProvider } from "./solana/solana-provider.js";

export interface ChainProviderSetup {
  readonly mode: NetworkMode;
  /** Endpoint URLs per chain, in priority order; chains left out are not served */
  readonly endpoints: Readonly<Partial<Record<ChainTag, readonly string[]>>>;
  readonly manager: RpcFailoverManager;
  readonly tokens: TokenRegistry;
  readonly logger?: Logger;
}

export class ChainProviderRegistry {
  private readonly providers = new Map<ChainTag, ChainProvider>();

  constructor(providers: readonly ChainProvider[] = []) {
    for (const provider of providers) this.register(provider);
  }

  /**
   * One provider per configured chain, each over a fresh failover pool
   * registered with `manager`.
   */
  static create(setup: ChainProviderSetup): ChainProviderRegistry {
    const registry = new ChainProviderRegistry();
    for (const [chain, urls] of Object.entries(setup.endpoints)) {
      if (urls === undefined || urls.length === 0) continue;
      registry.register(buildProvider(chainTagOf(chain), urls, setup));
    }
    return registry;
  }

  /**
   * @throws Error if the chain already has a provider
   */
  register(provider: ChainProvider): void {
    if (this.providers.has(provider.chain)) {
      throw new Error(`ChainProviderRegistry: ${provider.chain} already registered`);
    }
    this.providers.set(provider.chain, provider);
  }

  /**
   * @throws WalletError UNSUPPORTED_CHAIN
   */
  get(chain: ChainTag): ChainProvider {
    const provider = this.providers.get(chain);
    if (provider === undefined) {
      throw new WalletError("UNSUPPORTED_CHAIN", `Chain ${chain} is not configured`, { chain });
    }
    return provider;
  }

  has(chain: ChainTag): boolean {
    return this.providers.has(chain);
  }

  chains(): readonly ChainTag[] {
    return [...this.providers.keys()];
  }

  list(): readonly ChainProvider[] {
    return [...this.providers.values()];
  }
}

function buildProvider(chain: ChainTag, urls: readonly string[], setup: ChainProviderSetup): ChainProvider {
  const { manager, tokens, logger } = setup;
  if (chainFamily(chain) === "evm") {
    const network = getEvmNetwork(chain, setup.mode);
    const pool = createEvmPool(manager, network, urls, logger);
    return new EvmChainProvider({ network, pool, tokens, ...(logger !== undefined ? { logger } : {}) });
  }
  const pool = createSolanaPool(manager, urls, logger);
  return new SolanaChainProvider({ pool, tokens, ...(logger !== undefined ? { logger } : {}) });
}

function chainTagOf(key: string): ChainTag {
  switch (key) {
    case "ETH":
    case "BSC":
    case "SOLANA":
      return key;
    default:
      throw new WalletError("UNSUPPORTED_CHAIN", `Unknown chain ${key}`, { chain: key });
  }
}
