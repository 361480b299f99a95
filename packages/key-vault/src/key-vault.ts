/**
 * KeyVault: the trust boundary around key material.
 *
 * Holds a reference to the MasterKey and exposes three things:
 * - seal: encrypt key material into a storable hex blob
 * - open: decrypt a blob (caller owns and zeroes the result)
 * - withDecryptedKey: the signing scope, which zeroes the plaintext on exit
 *
 * Plaintext never leaves this module except as the argument of a
 * withDecryptedKey callback or the return value of open().
 */

import type { MasterKey } from "./master-key.js";
import { decrypt, encrypt, parseEnvelope, serializeEnvelope } from "./envelope.js";
import { generateMnemonic } from "./mnemonic.js";
import { deriveKey, type DerivedKey } from "./derivation.js";
import type { ChainTag } from "@custodian/types";

export class KeyVault {
  constructor(private readonly masterKey: MasterKey) {}

  /**
   * Encrypt key material for storage.
   */
  seal(keyMaterial: Uint8Array, associatedData: string): string {
    return serializeEnvelope(encrypt(this.masterKey, keyMaterial, associatedData));
  }

  /**
   * Decrypt a stored blob.
   *
   * @throws WalletError DECRYPTION_FAILED
   */
  open(blob: string, associatedData: string): Uint8Array {
    return decrypt(this.masterKey, parseEnvelope(blob), associatedData);
  }

  /**
   * Run `fn` with the decrypted key. The buffer is zeroed when `fn`
   * settles, whether it returns or throws.
   */
  async withDecryptedKey<T>(
    blob: string,
    associatedData: string,
    fn: (keyMaterial: Uint8Array) => T | Promise<T>,
  ): Promise<T> {
    const keyMaterial = this.open(blob, associatedData);
    try {
      return await fn(keyMaterial);
    } finally {
      keyMaterial.fill(0);
    }
  }

  generateMnemonic(): string {
    return generateMnemonic();
  }

  deriveKey(secret: string, chain: ChainTag, derivationIndex = 0): DerivedKey {
    return deriveKey(secret, chain, derivationIndex);
  }
}
