/**
 * Smallest-unit ↔ display conversion. bigint only.
 */

import { formatUnits, parseUnits } from "viem";
import { WalletError } from "@custodian/types";

const DECIMAL_TEXT = /^(\d+)(?:\.(\d+))?$/;

/**
 * Render a smallest-unit amount, e.g. formatAmount(1500000n, 6) → "1.5".
 */
export function formatAmount(amount: bigint, decimals: number): string {
  return formatUnits(amount, decimals);
}

/**
 * Parse a decimal string into smallest units.
 *
 * @throws WalletError INVALID_AMOUNT on malformed text or more fractional
 *         digits than the asset has
 */
export function parseAmount(text: string, decimals: number): bigint {
  const trimmed = text.trim();
  const match = DECIMAL_TEXT.exec(trimmed);
  if (match === null) {
    throw new WalletError("INVALID_AMOUNT", `Not a decimal amount: "${text}"`);
  }
  const fraction = match[2] ?? "";
  if (fraction.length > decimals) {
    throw new WalletError(
      "INVALID_AMOUNT",
      `Amount has ${fraction.length} fractional digits, asset allows ${decimals}`,
    );
  }
  return parseUnits(trimmed, decimals);
}

/**
 * @throws WalletError INVALID_AMOUNT unless 0 < amount <= max
 */
export function assertPositiveAmount(amount: bigint, max: bigint): void {
  if (amount <= 0n) {
    throw new WalletError("INVALID_AMOUNT", "Amount must be positive", {
      amount: amount.toString(),
    });
  }
  if (amount > max) {
    throw new WalletError("INVALID_AMOUNT", "Amount exceeds the chain's maximum", {
      amount: amount.toString(),
    });
  }
}

export const MAX_UINT256 = (1n << 256n) - 1n;
export const MAX_UINT64 = (1n << 64n) - 1n;
