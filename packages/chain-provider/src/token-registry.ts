/**
 * TokenRegistry: known tokens per chain for one network mode.
 *
 * Seeded from data/tokens.json; register() adds more at runtime.
 * Lookups accept a symbol (case-insensitive) or a contract / mint
 * (case-insensitive for EVM hex, exact for Solana base58).
 */

import { readFileSync } from "node:fs";
import { getAddress, isAddress } from "viem";
import { z } from "zod";
import {
  CHAINS,
  CHAIN_TAGS,
  WalletError,
  chainFamily,
  type ChainTag,
  type NetworkMode,
  type TokenRef,
} from "@custodian/types";

// =============================================================================
// Types
// =============================================================================

export interface TokenInfo extends TokenRef {
  readonly chain: ChainTag;
}

export interface NativeAsset {
  readonly symbol: string;
  readonly decimals: number;
}

const BASE58 = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

const TokenEntrySchema = z.object({
  symbol: z.string().min(1).max(16),
  decimals: z.number().int().min(0).max(36),
  address: z.string().min(1),
});

const TokenListSchema = z.object({
  ETH: z.array(TokenEntrySchema).default([]),
  BSC: z.array(TokenEntrySchema).default([]),
  SOLANA: z.array(TokenEntrySchema).default([]),
});

export const TokenFileSchema = z.object({
  mainnet: TokenListSchema,
  testnet: TokenListSchema,
});

export type TokenFile = z.infer<typeof TokenFileSchema>;

export const DEFAULT_TOKEN_FILE = new URL("../data/tokens.json", import.meta.url);

// =============================================================================
// Registry
// =============================================================================

export class TokenRegistry {
  readonly mode: NetworkMode;
  private readonly bySymbol = new Map<string, TokenInfo>();
  private readonly byAddress = new Map<string, TokenInfo>();

  constructor(mode: NetworkMode, tokens: readonly TokenInfo[] = []) {
    this.mode = mode;
    for (const token of tokens) this.register(token);
  }

  /**
   * Load the bundled token file (or another file of the same shape).
   *
   * @throws z.ZodError if the file does not match the schema
   */
  static load(mode: NetworkMode, file: URL | string = DEFAULT_TOKEN_FILE): TokenRegistry {
    const parsed = TokenFileSchema.parse(JSON.parse(readFileSync(file, "utf8")));
    return TokenRegistry.fromFile(mode, parsed);
  }

  static fromFile(mode: NetworkMode, data: TokenFile): TokenRegistry {
    const registry = new TokenRegistry(mode);
    const lists = data[mode];
    for (const chain of CHAIN_TAGS) {
      for (const entry of lists[chain]) {
        registry.register({ chain, ...entry });
      }
    }
    return registry;
  }

  /**
   * Add a token. A later registration of the same symbol or address
   * replaces the earlier one.
   *
   * @throws WalletError INVALID_ADDRESS if the address is not valid for the chain
   */
  register(token: TokenInfo): TokenInfo {
    const address = normalizeTokenAddress(token.chain, token.address);
    const info: TokenInfo = {
      chain: token.chain,
      symbol: token.symbol.toUpperCase(),
      decimals: token.decimals,
      address,
    };
    const key = symbolKey(info.chain, info.symbol);
    const previous = this.bySymbol.get(key);
    if (previous !== undefined) {
      this.byAddress.delete(addressKey(previous.chain, previous.address));
    }
    this.bySymbol.set(key, info);
    this.byAddress.set(addressKey(info.chain, address), info);
    return info;
  }

  /**
   * Look up by symbol or by contract / mint.
   */
  resolve(chain: ChainTag, symbolOrAddress: string): TokenInfo | undefined {
    const query = symbolOrAddress.trim();
    return (
      this.byAddress.get(addressKey(chain, query)) ??
      this.bySymbol.get(symbolKey(chain, query.toUpperCase()))
    );
  }

  /**
   * @throws WalletError UNSUPPORTED_TOKEN
   */
  require(chain: ChainTag, symbolOrAddress: string): TokenInfo {
    const token = this.resolve(chain, symbolOrAddress);
    if (token === undefined) {
      throw new WalletError("UNSUPPORTED_TOKEN", `Token ${symbolOrAddress} is not supported on ${chain}`, {
        chain,
        token: symbolOrAddress,
      });
    }
    return token;
  }

  list(chain: ChainTag): readonly TokenInfo[] {
    return [...this.byAddress.values()].filter((t) => t.chain === chain);
  }

  nativeAsset(chain: ChainTag): NativeAsset {
    const info = CHAINS[chain];
    return { symbol: info.nativeSymbol, decimals: info.nativeDecimals };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function symbolKey(chain: ChainTag, symbol: string): string {
  return `${chain}:${symbol}`;
}

function addressKey(chain: ChainTag, address: string): string {
  return chainFamily(chain) === "evm" ? `${chain}:${address.toLowerCase()}` : `${chain}:${address}`;
}

function normalizeTokenAddress(chain: ChainTag, address: string): string {
  if (chainFamily(chain) === "evm") {
    if (!isAddress(address, { strict: false })) {
      throw new WalletError("INVALID_ADDRESS", `Invalid token contract ${address}`, { chain });
    }
    return getAddress(address);
  }
  if (!BASE58.test(address)) {
    throw new WalletError("INVALID_ADDRESS", `Invalid token mint ${address}`, { chain });
  }
  return address;
}
