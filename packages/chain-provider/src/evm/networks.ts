/**
 * EVM network table: viem chain objects and fee model per (chain, mode).
 */

import type { Chain } from "viem";
import { bsc, bscTestnet, mainnet, sepolia } from "viem/chains";
import type { ChainTag, NetworkMode } from "@custodian/types";

export interface EvmNetwork {
  readonly chain: ChainTag;
  readonly mode: NetworkMode;
  readonly viemChain: Chain;
  readonly chainId: number;
  /** Price with EIP-1559 fields unless the caller sets gasPrice */
  readonly eip1559: boolean;
}

const NETWORKS: Readonly<Record<string, EvmNetwork>> = {
  "ETH:mainnet": { chain: "ETH", mode: "mainnet", viemChain: mainnet, chainId: 1, eip1559: true },
  "ETH:testnet": { chain: "ETH", mode: "testnet", viemChain: sepolia, chainId: 11155111, eip1559: true },
  "BSC:mainnet": { chain: "BSC", mode: "mainnet", viemChain: bsc, chainId: 56, eip1559: false },
  "BSC:testnet": { chain: "BSC", mode: "testnet", viemChain: bscTestnet, chainId: 97, eip1559: false },
};

/**
 * @throws Error for a non-EVM chain
 */
export function getEvmNetwork(chain: ChainTag, mode: NetworkMode): EvmNetwork {
  const network = NETWORKS[`${chain}:${mode}`];
  if (network === undefined) {
    throw new Error(`No EVM network for ${chain} (${mode})`);
  }
  return network;
}
