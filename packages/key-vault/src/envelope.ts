/**
 * AES-256-GCM key envelope.
 *
 * Wire form: hex(nonce(12) ‖ ciphertext ‖ tag(16)). A fresh random nonce is
 * drawn for every encryption. Associated data binds a ciphertext to the
 * wallet it belongs to, so a blob copied onto another record fails to open.
 *
 * Every failure to open (wrong key, wrong associated data, tampered or
 * malformed blob) is reported as DECRYPTION_FAILED and no plaintext bytes
 * escape.
 */

import { randomBytes } from "node:crypto";
import { WalletError, type ChainTag } from "@custodian/types";
import type { MasterKey } from "./master-key.js";

// =============================================================================
// Types
// =============================================================================

export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;

export interface Envelope {
  readonly nonce: Uint8Array;
  readonly ciphertext: Uint8Array;
  readonly tag: Uint8Array;
}

const HEX = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * Associated data for a wallet's key envelope.
 */
export function walletAssociatedData(chain: ChainTag, address: string): string {
  return `${chain}:${address}`;
}

// =============================================================================
// Encrypt / Decrypt
// =============================================================================

export function encrypt(
  masterKey: MasterKey,
  plaintext: Uint8Array,
  associatedData: string,
): Envelope {
  const nonce = randomBytes(NONCE_LENGTH);
  const cipher = masterKey.createCipher(nonce);
  cipher.setAAD(Buffer.from(associatedData, "utf8"));
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return { nonce, ciphertext, tag: cipher.getAuthTag() };
}

export function decrypt(
  masterKey: MasterKey,
  envelope: Envelope,
  associatedData: string,
): Uint8Array {
  if (envelope.nonce.length !== NONCE_LENGTH || envelope.tag.length !== TAG_LENGTH) {
    throw new WalletError("DECRYPTION_FAILED", "Malformed key envelope");
  }

  const decipher = masterKey.createDecipher(envelope.nonce);
  decipher.setAAD(Buffer.from(associatedData, "utf8"));
  decipher.setAuthTag(envelope.tag);

  const head = decipher.update(envelope.ciphertext);
  try {
    const tail = decipher.final();
    const plaintext = new Uint8Array(head.length + tail.length);
    plaintext.set(head, 0);
    plaintext.set(tail, head.length);
    tail.fill(0);
    return plaintext;
  } catch (err: unknown) {
    throw new WalletError("DECRYPTION_FAILED", "Key envelope failed authentication", undefined, {
      cause: err,
    });
  } finally {
    head.fill(0);
  }
}

// =============================================================================
// Serialisation
// =============================================================================

export function serializeEnvelope(envelope: Envelope): string {
  return Buffer.concat([envelope.nonce, envelope.ciphertext, envelope.tag]).toString("hex");
}

/**
 * Split a stored hex blob into its parts.
 *
 * @throws WalletError DECRYPTION_FAILED when the blob is not hex or too short
 */
export function parseEnvelope(blob: string): Envelope {
  if (!HEX.test(blob)) {
    throw new WalletError("DECRYPTION_FAILED", "Key envelope is not valid hex");
  }
  const bytes = Buffer.from(blob, "hex");
  if (bytes.length < NONCE_LENGTH + TAG_LENGTH + 1) {
    throw new WalletError("DECRYPTION_FAILED", "Key envelope is too short");
  }
  return {
    nonce: bytes.subarray(0, NONCE_LENGTH),
    ciphertext: bytes.subarray(NONCE_LENGTH, bytes.length - TAG_LENGTH),
    tag: bytes.subarray(bytes.length - TAG_LENGTH),
  };
}
