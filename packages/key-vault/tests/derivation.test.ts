import { describe, it, expect, vi } from "vitest";
import { Keypair } from "@solana/web3.js";
import { WalletError } from "@custodian/types";
import bs58 from "bs58";
import { bytesToHex } from "viem";
import { HDKey, privateKeyToAddress } from "viem/accounts";
import {
  deriveKey,
  deriveEvmKey,
  deriveSolanaKey,
  evmDerivationPath,
  solanaDerivationPath,
  parseEvmPrivateKey,
  parseSolanaSecretKey,
} from "../src/derivation.js";
import {
  generateMnemonic,
  validateMnemonic,
  normalizeMnemonic,
  looksLikeMnemonic,
  mnemonicToSeed,
} from "../src/mnemonic.js";

const TEST_MNEMONIC = "test test test test test test test test test test test junk";
const ACCOUNT_0_KEY = "0xac0974bec39a17e36ba4a6b4d238ff944bacb478cbed5efcae784d7bf4f2ff80";
const ACCOUNT_0 = "0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266";
const ACCOUNT_1 = "0x70997970C51812dc3A010C7d01b50e0d17dc79C8";

function expectCode(fn: () => unknown, code: string): void {
  let caught: unknown;
  try {
    fn();
  } catch (err: unknown) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(WalletError);
  expect(caught).toMatchObject({ code });
}

// =============================================================================
// Mnemonics
// =============================================================================

describe("mnemonic", () => {
  it("generates 24 valid words", () => {
    const phrase = generateMnemonic();
    expect(phrase.split(" ")).toHaveLength(24);
    expect(validateMnemonic(phrase)).toBe(true);
  });

  it("generates a fresh phrase each time", () => {
    expect(generateMnemonic()).not.toBe(generateMnemonic());
  });

  it("rejects a bad checksum", () => {
    expect(validateMnemonic(Array(12).fill("abandon").join(" "))).toBe(false);
  });

  it("rejects word counts other than 12 and 24", () => {
    const fifteen = "abandon ".repeat(14) + "address";
    expect(validateMnemonic(fifteen)).toBe(false);
  });

  it("normalises whitespace and case", () => {
    expect(normalizeMnemonic("  Test   TEST\ttest  ")).toBe("test test test");
    expect(validateMnemonic(`  ${TEST_MNEMONIC.toUpperCase().replace(/ /g, "\n")}  `)).toBe(true);
  });

  it("classifies by word count", () => {
    expect(looksLikeMnemonic(TEST_MNEMONIC)).toBe(true);
    expect(looksLikeMnemonic("one two three")).toBe(false);
    expect(looksLikeMnemonic("")).toBe(false);
  });
});

// =============================================================================
// Paths
// =============================================================================

describe("paths", () => {
  it("formats EVM and Solana paths", () => {
    expect(evmDerivationPath(3)).toBe("m/44'/60'/0'/0/3");
    expect(solanaDerivationPath(3)).toBe("m/44'/501'/3'/0'");
  });

  it("rejects negative and fractional indices", () => {
    const seed = mnemonicToSeed(TEST_MNEMONIC);
    expect(() => deriveEvmKey(seed, -1)).toThrow(RangeError);
    expect(() => deriveSolanaKey(seed, 1.5)).toThrow(RangeError);
  });
});

// =============================================================================
// EVM
// =============================================================================

describe("EVM derivation", () => {
  it("derives the well-known account 0 key", () => {
    const { keyMaterial, derivationIndex, kind } = deriveKey(TEST_MNEMONIC, "ETH", 0);
    expect(bytesToHex(keyMaterial)).toBe(ACCOUNT_0_KEY);
    expect(derivationIndex).toBe(0);
    expect(kind).toBe("mnemonic");
  });

  it("derives addresses by index", () => {
    const k0 = deriveKey(TEST_MNEMONIC, "ETH", 0).keyMaterial;
    const k1 = deriveKey(TEST_MNEMONIC, "ETH", 1).keyMaterial;
    expect(privateKeyToAddress(bytesToHex(k0))).toBe(ACCOUNT_0);
    expect(privateKeyToAddress(bytesToHex(k1))).toBe(ACCOUNT_1);
  });

  it("uses the same path for BSC", () => {
    expect(bytesToHex(deriveKey(TEST_MNEMONIC, "BSC", 0).keyMaterial)).toBe(ACCOUNT_0_KEY);
  });

  it("is deterministic", () => {
    const a = deriveKey(TEST_MNEMONIC, "ETH", 7).keyMaterial;
    const b = deriveKey(TEST_MNEMONIC, "ETH", 7).keyMaterial;
    expect(bytesToHex(a)).toBe(bytesToHex(b));
  });

  it("wipes the intermediate HD nodes", () => {
    const wipe = vi.spyOn(HDKey.prototype, "wipePrivateData");
    try {
      const key = deriveEvmKey(mnemonicToSeed(TEST_MNEMONIC), 0);
      expect(bytesToHex(key)).toBe(ACCOUNT_0_KEY);
      expect(wipe.mock.calls.length).toBeGreaterThanOrEqual(2);
    } finally {
      wipe.mockRestore();
    }
  });
});

describe("parseEvmPrivateKey", () => {
  it("returns a standalone copy rather than a pooled buffer", () => {
    const key = parseEvmPrivateKey(ACCOUNT_0_KEY);
    expect(Buffer.isBuffer(key)).toBe(false);
    expect(key.byteOffset).toBe(0);
    expect(key.buffer.byteLength).toBe(32);
  });

  it("accepts hex with or without 0x", () => {
    expect(bytesToHex(parseEvmPrivateKey(ACCOUNT_0_KEY))).toBe(ACCOUNT_0_KEY);
    expect(bytesToHex(parseEvmPrivateKey(ACCOUNT_0_KEY.slice(2)))).toBe(ACCOUNT_0_KEY);
  });

  it("imports a raw key at index 0", () => {
    const derived = deriveKey(ACCOUNT_0_KEY, "ETH", 5);
    expect(derived.derivationIndex).toBe(0);
    expect(derived.kind).toBe("private-key");
  });

  it("rejects malformed and out-of-range keys", () => {
    expectCode(() => parseEvmPrivateKey("0x1234"), "INVALID_PRIVATE_KEY");
    expectCode(() => parseEvmPrivateKey(`0x${"00".repeat(32)}`), "INVALID_PRIVATE_KEY");
    expectCode(() => parseEvmPrivateKey(`0x${"ff".repeat(32)}`), "INVALID_PRIVATE_KEY");
  });
});

// =============================================================================
// Solana
// =============================================================================

describe("Solana derivation", () => {
  it("produces a consistent 64-byte secret key", () => {
    const { keyMaterial } = deriveKey(TEST_MNEMONIC, "SOLANA", 0);
    expect(keyMaterial).toHaveLength(64);
    const fromSeed = Keypair.fromSeed(keyMaterial.slice(0, 32));
    expect(Array.from(keyMaterial.slice(32))).toEqual(Array.from(fromSeed.publicKey.toBytes()));
  });

  it("is deterministic and index-dependent", () => {
    const a0 = bs58.encode(deriveKey(TEST_MNEMONIC, "SOLANA", 0).keyMaterial);
    const b0 = bs58.encode(deriveKey(TEST_MNEMONIC, "SOLANA", 0).keyMaterial);
    const a1 = bs58.encode(deriveKey(TEST_MNEMONIC, "SOLANA", 1).keyMaterial);
    expect(a0).toBe(b0);
    expect(a0).not.toBe(a1);
  });

  it("differs from the EVM key of the same phrase", () => {
    const sol = deriveKey(TEST_MNEMONIC, "SOLANA", 0).keyMaterial.slice(0, 32);
    expect(bytesToHex(sol)).not.toBe(ACCOUNT_0_KEY);
  });
});

describe("parseSolanaSecretKey", () => {
  it("accepts a base58 64-byte secret", () => {
    const kp = Keypair.generate();
    const parsed = parseSolanaSecretKey(bs58.encode(kp.secretKey));
    expect(Array.from(parsed)).toEqual(Array.from(kp.secretKey));
  });

  it("rejects a secret whose public half does not match", () => {
    const secret = Uint8Array.from(Keypair.generate().secretKey);
    secret[40] = (secret[40] ?? 0) ^ 0xff;
    expectCode(() => parseSolanaSecretKey(bs58.encode(secret)), "INVALID_PRIVATE_KEY");
  });

  it("rejects wrong lengths and non-base58 input", () => {
    expectCode(() => parseSolanaSecretKey(bs58.encode(new Uint8Array(32))), "INVALID_PRIVATE_KEY");
    expectCode(() => parseSolanaSecretKey("0OIl"), "INVALID_PRIVATE_KEY");
  });
});

describe("deriveKey input detection", () => {
  it("reports a bad mnemonic as INVALID_MNEMONIC", () => {
    expectCode(() => deriveKey(Array(12).fill("abandon").join(" "), "ETH"), "INVALID_MNEMONIC");
  });

  it("reports other shapes as INVALID_PRIVATE_KEY", () => {
    expectCode(() => deriveKey("not a key at all", "SOLANA"), "INVALID_PRIVATE_KEY");
  });
});
