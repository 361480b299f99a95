/**
 * MasterKey: the process-wide encryption key.
 *
 * Built once at startup from the configured 64-hex-char secret and passed
 * by reference to every vault operation. The raw bytes are wrapped in a
 * secret KeyObject and the source buffer is zeroed; nothing on the handle
 * serialises or prints the key.
 */

import {
  createCipheriv,
  createDecipheriv,
  createSecretKey,
  type CipherGCM,
  type DecipherGCM,
  type KeyObject,
} from "node:crypto";

const MASTER_KEY_HEX = /^[0-9a-fA-F]{64}$/;

export const MASTER_KEY_LENGTH = 32;

export class MasterKey {
  private constructor(private readonly key: KeyObject) {}

  /**
   * Build a master key from 64 hex characters (32 bytes).
   *
   * @throws Error if the input is not exactly 64 hex characters
   */
  static fromHex(hex: string): MasterKey {
    if (!MASTER_KEY_HEX.test(hex)) {
      throw new Error(
        `MasterKey: expected ${MASTER_KEY_LENGTH * 2} hex characters, got ${hex.length}`,
      );
    }
    const raw = Buffer.from(hex, "hex");
    try {
      return new MasterKey(createSecretKey(raw));
    } finally {
      raw.fill(0);
    }
  }

  /** @internal */
  createCipher(nonce: Uint8Array): CipherGCM {
    return createCipheriv("aes-256-gcm", this.key, nonce);
  }

  /** @internal */
  createDecipher(nonce: Uint8Array): DecipherGCM {
    return createDecipheriv("aes-256-gcm", this.key, nonce);
  }

  toJSON(): string {
    return "[MasterKey]";
  }

  toString(): string {
    return "[MasterKey]";
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return "[MasterKey]";
  }
}
