/**
 * Chain Types
 *
 * The chains a custodial wallet can live on, and the static facts about
 * each one that every other package needs.
 *
 * Rules:
 * - The chain tag is the persisted form ("ETH", "BSC", "SOLANA")
 * - Chain IDs follow CAIP-2 where a network is meant
 * - All tables are frozen
 */

/**
 * Persisted chain tag.
 */
export type ChainTag = "ETH" | "BSC" | "SOLANA";

/**
 * Signing/transaction model family.
 */
export type ChainFamily = "evm" | "solana";

/**
 * Endpoint set selector.
 */
export type NetworkMode = "mainnet" | "testnet";

/**
 * CAIP-2 chain identifier (e.g. "eip155:1", "solana:devnet").
 */
export type ChainId = string;

/**
 * Transaction hash (EVM) or signature (Solana).
 */
export type TxHash = string;

/**
 * Static description of a supported chain.
 */
export interface ChainInfo {
  readonly tag: ChainTag;
  readonly name: string;
  readonly family: ChainFamily;

  /** Native asset symbol (ETH, BNB, SOL) */
  readonly nativeSymbol: string;

  /** Decimals of the native asset's smallest unit (wei, lamports) */
  readonly nativeDecimals: number;

  /** CAIP-2 identifier per network mode */
  readonly chainIds: Readonly<Record<NetworkMode, ChainId>>;

  /** Numeric EVM chain id per network mode (EVM only) */
  readonly evmChainIds?: Readonly<Record<NetworkMode, number>>;

  /** BIP-44 coin type used for derivation */
  readonly coinType: number;
}

export const CHAIN_TAGS: readonly ChainTag[] = ["ETH", "BSC", "SOLANA"];

export const CHAINS: Readonly<Record<ChainTag, ChainInfo>> = {
  ETH: {
    tag: "ETH",
    name: "Ethereum",
    family: "evm",
    nativeSymbol: "ETH",
    nativeDecimals: 18,
    chainIds: { mainnet: "eip155:1", testnet: "eip155:11155111" },
    evmChainIds: { mainnet: 1, testnet: 11155111 },
    coinType: 60,
  },
  BSC: {
    tag: "BSC",
    name: "BNB Smart Chain",
    family: "evm",
    nativeSymbol: "BNB",
    nativeDecimals: 18,
    chainIds: { mainnet: "eip155:56", testnet: "eip155:97" },
    evmChainIds: { mainnet: 56, testnet: 97 },
    coinType: 60,
  },
  SOLANA: {
    tag: "SOLANA",
    name: "Solana",
    family: "solana",
    nativeSymbol: "SOL",
    nativeDecimals: 9,
    chainIds: { mainnet: "solana:mainnet-beta", testnet: "solana:devnet" },
    coinType: 501,
  },
};

/**
 * Look up the static description of a chain.
 */
export function getChainInfo(tag: ChainTag): ChainInfo {
  return CHAINS[tag];
}

/**
 * Family of a chain tag.
 */
export function chainFamily(tag: ChainTag): ChainFamily {
  return CHAINS[tag].family;
}

export function isEvmChain(tag: ChainTag): boolean {
  return CHAINS[tag].family === "evm";
}

export function isSolanaChain(tag: ChainTag): boolean {
  return CHAINS[tag].family === "solana";
}
