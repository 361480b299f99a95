/**
 * Wires the packages into a CustodyService from a loaded configuration.
 */

import type { Logger } from "pino";
import { KeyVault, MasterKey } from "@custodian/key-vault";
import { RpcFailoverManager } from "@custodian/rpc-failover";
import { ChainProviderRegistry, TokenRegistry } from "@custodian/chain-provider";
import { TransactionEngine, type TransactionStore } from "@custodian/tx-engine";
import {
  endpointsOf,
  engineConfigOf,
  explorersOf,
  failoverConfigOf,
  type AppConfig,
} from "./config.js";
import { CustodyService } from "./custody-service.js";
import { InMemoryWalletRepository, type WalletRepository } from "./wallet-repository.js";

export interface CustodyOptions {
  readonly logger: Logger;
  readonly wallets?: WalletRepository;
  readonly transactions?: TransactionStore;
}

export interface Custody {
  readonly service: CustodyService;
  readonly failover: RpcFailoverManager;
  readonly providers: ChainProviderRegistry;
}

export function createCustody(config: AppConfig, options: CustodyOptions): Custody {
  const { logger } = options;
  const vault = new KeyVault(MasterKey.fromHex(config.ENCRYPTION_KEY));
  const failover = new RpcFailoverManager({ config: failoverConfigOf(config), logger });
  const providers = ChainProviderRegistry.create({
    mode: config.NETWORK_MODE,
    endpoints: endpointsOf(config),
    manager: failover,
    tokens: TokenRegistry.load(config.NETWORK_MODE),
    logger,
  });
  const engine = new TransactionEngine({
    providers,
    vault,
    config: engineConfigOf(config),
    logger,
    ...(options.transactions !== undefined ? { store: options.transactions } : {}),
  });
  const service = new CustodyService({
    vault,
    providers,
    engine,
    wallets: options.wallets ?? new InMemoryWalletRepository(),
    failover,
    explorers: explorersOf(config),
    logger,
  });
  return { service, failover, providers };
}
