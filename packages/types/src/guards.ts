/**
 * Runtime Type Guards
 *
 * Narrowing functions for values crossing the core's boundary
 * (API inputs, rows read back from storage).
 */

import { CHAIN_TAGS, type ChainTag } from "./chain.js";
import type { TransactionState } from "./transfer.js";
import type { WalletOrigin, WalletRecord } from "./wallet.js";

const CHAIN_TAG_SET = new Set<string>(CHAIN_TAGS);
const TX_STATES = new Set<string>([
  "built",
  "signed",
  "submitted",
  "confirmed",
  "failed",
  "ambiguous",
]);
const ORIGINS = new Set<string>(["generated", "mnemonic", "private-key"]);
const HEX_BLOB = /^[0-9a-f]+$/;

export function isChainTag(value: unknown): value is ChainTag {
  return typeof value === "string" && CHAIN_TAG_SET.has(value);
}

/**
 * Parse a loosely written chain name into its tag.
 * Accepts the tag itself and the common aliases used by front-ends.
 */
export function parseChainTag(value: string): ChainTag | undefined {
  switch (value.trim().toUpperCase()) {
    case "ETH":
    case "ETHEREUM":
      return "ETH";
    case "BSC":
    case "BNB":
      return "BSC";
    case "SOL":
    case "SOLANA":
      return "SOLANA";
    default:
      return undefined;
  }
}

export function isTransactionState(value: unknown): value is TransactionState {
  return typeof value === "string" && TX_STATES.has(value);
}

export function isWalletOrigin(value: unknown): value is WalletOrigin {
  return typeof value === "string" && ORIGINS.has(value);
}

export function isWalletRecord(value: unknown): value is WalletRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.userId === "string" &&
    isChainTag(v.chain) &&
    typeof v.address === "string" &&
    v.address.length > 0 &&
    typeof v.derivationIndex === "number" &&
    Number.isInteger(v.derivationIndex) &&
    v.derivationIndex >= 0 &&
    typeof v.encryptedKey === "string" &&
    HEX_BLOB.test(v.encryptedKey) &&
    isWalletOrigin(v.origin) &&
    typeof v.createdAt === "string"
  );
}
