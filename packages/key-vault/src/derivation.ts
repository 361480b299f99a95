/**
 * Key derivation.
 *
 * EVM:    BIP-32 secp256k1, m/44'/60'/0'/0/{index} → 32-byte private key
 * Solana: SLIP-0010 ed25519, m/44'/501'/{index}'/0' → 64-byte secret key
 *         (32-byte seed ‖ 32-byte public key)
 *
 * A raw private key bypasses derivation and is always index 0. The input
 * shape decides which path is taken: 12 or 24 words is a mnemonic,
 * anything else a private key.
 */

import { createHmac } from "node:crypto";
import { Keypair } from "@solana/web3.js";
import bs58 from "bs58";
import { hexToBytes } from "viem";
import { HDKey } from "viem/accounts";
import { WalletError, chainFamily, type ChainFamily, type ChainTag } from "@custodian/types";
import { looksLikeMnemonic, mnemonicToSeed, validateMnemonic } from "./mnemonic.js";

// =============================================================================
// Types
// =============================================================================

export type SecretKind = "mnemonic" | "private-key";

export interface DerivedKey {
  /** 32 bytes (EVM) or 64 bytes (Solana). Caller zeroes after use. */
  readonly keyMaterial: Uint8Array;
  readonly derivationIndex: number;
  readonly kind: SecretKind;
}

/** Largest index usable in a hardened or normal BIP-32 path segment */
export const MAX_DERIVATION_INDEX = 0x7fffffff;

const HARDENED_OFFSET = 0x80000000;

const SECP256K1_ORDER = BigInt(
  "0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141",
);

const EVM_PRIVATE_KEY = /^(?:0x)?[0-9a-fA-F]{64}$/;

// =============================================================================
// Paths
// =============================================================================

export function evmDerivationPath(index: number): string {
  return `m/44'/60'/0'/0/${index}`;
}

export function solanaDerivationPath(index: number): string {
  return `m/44'/501'/${index}'/0'`;
}

function assertIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index > MAX_DERIVATION_INDEX) {
    throw new RangeError(`Derivation index must be an integer in [0, ${MAX_DERIVATION_INDEX}]`);
  }
}

// =============================================================================
// From seed
// =============================================================================

/**
 * Derive the EVM private key at `index` from a BIP-39 seed.
 */
export function deriveEvmKey(seed: Uint8Array, index: number): Uint8Array {
  assertIndex(index);
  const master = HDKey.fromMasterSeed(seed);
  const node = master.derive(evmDerivationPath(index));
  try {
    if (node.privateKey === null) {
      throw new Error("BIP-32 derivation produced no private key");
    }
    return Uint8Array.from(node.privateKey);
  } finally {
    node.wipePrivateData();
    master.wipePrivateData();
  }
}

/**
 * Derive the Solana secret key at `index` from a BIP-39 seed (SLIP-0010,
 * every segment hardened).
 */
export function deriveSolanaKey(seed: Uint8Array, index: number): Uint8Array {
  assertIndex(index);

  let digest = createHmac("sha512", "ed25519 seed").update(seed).digest();
  let key = digest.subarray(0, 32);
  let chainCode = digest.subarray(32);

  for (const segment of [44, 501, index, 0]) {
    const data = Buffer.alloc(37);
    data[0] = 0x00;
    data.set(key, 1);
    data.writeUInt32BE((segment + HARDENED_OFFSET) >>> 0, 33);
    const next = createHmac("sha512", chainCode).update(data).digest();
    digest.fill(0);
    data.fill(0);
    digest = next;
    key = digest.subarray(0, 32);
    chainCode = digest.subarray(32);
  }

  const keypair = Keypair.fromSeed(key);
  digest.fill(0);
  return Uint8Array.from(keypair.secretKey);
}

export function deriveFromSeed(seed: Uint8Array, family: ChainFamily, index: number): Uint8Array {
  return family === "evm" ? deriveEvmKey(seed, index) : deriveSolanaKey(seed, index);
}

// =============================================================================
// Raw private keys
// =============================================================================

/**
 * Parse an EVM private key (hex, with or without 0x).
 *
 * @throws WalletError INVALID_PRIVATE_KEY
 */
export function parseEvmPrivateKey(input: string): Uint8Array {
  const trimmed = input.trim();
  if (!EVM_PRIVATE_KEY.test(trimmed)) {
    throw new WalletError("INVALID_PRIVATE_KEY", "EVM private key must be 32 bytes of hex");
  }
  const hex = trimmed.startsWith("0x") ? trimmed.slice(2) : trimmed;
  const scalar = BigInt(`0x${hex}`);
  if (scalar === 0n || scalar >= SECP256K1_ORDER) {
    throw new WalletError("INVALID_PRIVATE_KEY", "EVM private key is out of range");
  }
  return hexToBytes(`0x${hex}`);
}

/**
 * Parse a Solana secret key (base58, 64 bytes). The public half must match
 * the private half.
 *
 * @throws WalletError INVALID_PRIVATE_KEY
 */
export function parseSolanaSecretKey(input: string): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = bs58.decode(input.trim());
  } catch (err: unknown) {
    throw new WalletError("INVALID_PRIVATE_KEY", "Solana secret key is not base58", undefined, {
      cause: err,
    });
  }
  if (bytes.length !== 64) {
    bytes.fill(0);
    throw new WalletError("INVALID_PRIVATE_KEY", "Solana secret key must be 64 bytes");
  }
  try {
    Keypair.fromSecretKey(bytes);
  } catch (err: unknown) {
    bytes.fill(0);
    throw new WalletError("INVALID_PRIVATE_KEY", "Solana secret key is inconsistent", undefined, {
      cause: err,
    });
  }
  return bytes;
}

// =============================================================================
// Entry point
// =============================================================================

/**
 * Derive key material from a mnemonic or a raw private key.
 *
 * @throws WalletError INVALID_MNEMONIC when a 12/24-word input fails its checksum
 * @throws WalletError INVALID_PRIVATE_KEY when any other input is malformed
 */
export function deriveKey(secret: string, chain: ChainTag, derivationIndex = 0): DerivedKey {
  const family = chainFamily(chain);

  if (looksLikeMnemonic(secret)) {
    if (!validateMnemonic(secret)) {
      throw new WalletError("INVALID_MNEMONIC", "Mnemonic failed BIP-39 validation");
    }
    const seed = mnemonicToSeed(secret);
    try {
      return {
        keyMaterial: deriveFromSeed(seed, family, derivationIndex),
        derivationIndex,
        kind: "mnemonic",
      };
    } finally {
      seed.fill(0);
    }
  }

  const keyMaterial =
    family === "evm" ? parseEvmPrivateKey(secret) : parseSolanaSecretKey(secret);
  return { keyMaterial, derivationIndex: 0, kind: "private-key" };
}
