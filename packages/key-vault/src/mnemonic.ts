/**
 * BIP-39 mnemonics (English word list).
 */

import * as bip39 from "bip39";

/** 256 bits of entropy → 24 words */
export const MNEMONIC_STRENGTH = 256;

const ACCEPTED_WORD_COUNTS = new Set([12, 24]);

/**
 * Collapse whitespace and lower-case a phrase so that the checksum and the
 * seed do not depend on how the user typed it.
 */
export function normalizeMnemonic(phrase: string): string {
  return phrase.trim().split(/\s+/).join(" ").toLowerCase();
}

export function wordCount(phrase: string): number {
  const trimmed = phrase.trim();
  return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
}

/**
 * True when the input has the shape of a mnemonic (12 or 24 words),
 * regardless of checksum.
 */
export function looksLikeMnemonic(secret: string): boolean {
  return ACCEPTED_WORD_COUNTS.has(wordCount(secret));
}

/**
 * Fresh 24-word mnemonic from the CSPRNG.
 */
export function generateMnemonic(): string {
  return bip39.generateMnemonic(MNEMONIC_STRENGTH);
}

/**
 * Word count (12 or 24) and BIP-39 checksum.
 */
export function validateMnemonic(phrase: string): boolean {
  const normalized = normalizeMnemonic(phrase);
  if (!looksLikeMnemonic(normalized)) return false;
  return bip39.validateMnemonic(normalized);
}

/**
 * 64-byte BIP-39 seed (empty passphrase). Callers zero it after use.
 */
export function mnemonicToSeed(phrase: string): Uint8Array {
  return bip39.mnemonicToSeedSync(normalizeMnemonic(phrase));
}
