/**
 * @custodian/key-vault: Key material lifecycle.
 *
 * Mnemonic generation, BIP-32 / SLIP-0010 derivation, and AES-256-GCM
 * envelopes bound to the owning wallet.
 */

export { MasterKey, MASTER_KEY_LENGTH } from "./master-key.js";

export type { Envelope } from "./envelope.js";
export {
  NONCE_LENGTH,
  TAG_LENGTH,
  encrypt,
  decrypt,
  serializeEnvelope,
  parseEnvelope,
  walletAssociatedData,
} from "./envelope.js";

export {
  MNEMONIC_STRENGTH,
  generateMnemonic,
  validateMnemonic,
  normalizeMnemonic,
  looksLikeMnemonic,
  wordCount,
  mnemonicToSeed,
} from "./mnemonic.js";

export type { SecretKind, DerivedKey } from "./derivation.js";
export {
  MAX_DERIVATION_INDEX,
  evmDerivationPath,
  solanaDerivationPath,
  deriveEvmKey,
  deriveSolanaKey,
  deriveFromSeed,
  parseEvmPrivateKey,
  parseSolanaSecretKey,
  deriveKey,
} from "./derivation.js";

export { KeyVault } from "./key-vault.js";
