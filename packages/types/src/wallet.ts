/**
 * Wallet Types
 *
 * The persisted wallet record and the one-time responses of wallet
 * creation. The record carries only ciphertext; plaintext key material has
 * no type here; it lives as a Uint8Array inside the signing
 * scope and nowhere else.
 */

import type { ChainTag } from "./chain.js";

/**
 * How the key material of a wallet came to be.
 */
export type WalletOrigin = "generated" | "mnemonic" | "private-key";

/**
 * A persisted wallet.
 *
 * Invariant: `address` is reproducible from the key material, the chain
 * and `derivationIndex`. Records are never mutated after creation.
 */
export interface WalletRecord {
  /** Opaque identifier (UUID) */
  readonly id: string;

  /** Owning user */
  readonly userId: string;

  readonly chain: ChainTag;

  /** Chain-native address (EIP-55 hex or base58) */
  readonly address: string;

  /** Non-negative derivation index (0 for imported raw keys) */
  readonly derivationIndex: number;

  /** Hex blob: nonce ‖ ciphertext ‖ tag */
  readonly encryptedKey: string;

  readonly origin: WalletOrigin;

  /** ISO 8601 */
  readonly createdAt: string;
}

/**
 * Returned exactly once by wallet generation. The mnemonic is not stored.
 */
export interface GeneratedWallet {
  readonly id: string;
  readonly chain: ChainTag;
  readonly address: string;
  readonly derivationIndex: number;
  readonly mnemonic: string;
}

/**
 * Returned by wallet import.
 */
export interface ImportedWallet {
  readonly id: string;
  readonly chain: ChainTag;
  readonly address: string;
  readonly derivationIndex: number;
}

/**
 * Balance of a wallet in one asset.
 */
export interface WalletBalance {
  readonly walletId: string;
  readonly chain: ChainTag;
  readonly address: string;

  /** Smallest-unit amount as a decimal string */
  readonly amount: string;
  readonly symbol: string;
  readonly decimals: number;

  /** Human-readable amount, e.g. "1.5" */
  readonly formatted: string;

  /** Token contract / mint; absent for the native asset */
  readonly token?: string;
}

/**
 * Native balance plus every listed token of a wallet's chain. A token
 * whose balance could not be read is left out.
 */
export interface WalletBalances {
  readonly walletId: string;
  readonly chain: ChainTag;
  readonly address: string;
  readonly native: WalletBalance;
  readonly tokens: readonly WalletBalance[];
}
