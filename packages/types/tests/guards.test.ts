/**
 * Runtime type guard tests for @custodian/types
 *
 * Guards must narrow valid inputs and reject malformed rows read back
 * from storage or received from the API layer.
 */
import { describe, it, expect } from "vitest";
import {
  isChainTag,
  parseChainTag,
  isTransactionState,
  isWalletOrigin,
  isWalletRecord,
} from "../src/guards.js";
import { CHAINS, chainFamily, isEvmChain, isSolanaChain } from "../src/chain.js";

const validRecord = {
  id: "9b2d1c1e-0000-4000-8000-000000000001",
  userId: "user-1",
  chain: "ETH",
  address: "0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266",
  derivationIndex: 0,
  encryptedKey: "00aa11bb",
  origin: "generated",
  createdAt: "2026-01-01T00:00:00.000Z",
};

// =============================================================================
// Chains
// =============================================================================

describe("chain table", () => {
  it("maps tags to families", () => {
    expect(chainFamily("ETH")).toBe("evm");
    expect(chainFamily("BSC")).toBe("evm");
    expect(chainFamily("SOLANA")).toBe("solana");
    expect(isEvmChain("BSC")).toBe(true);
    expect(isSolanaChain("ETH")).toBe(false);
  });

  it("carries native symbols and decimals", () => {
    expect(CHAINS.BSC.nativeSymbol).toBe("BNB");
    expect(CHAINS.SOLANA.nativeDecimals).toBe(9);
    expect(CHAINS.ETH.evmChainIds?.testnet).toBe(11155111);
  });
});

describe("isChainTag", () => {
  it("accepts the persisted tags", () => {
    expect(isChainTag("ETH")).toBe(true);
    expect(isChainTag("BSC")).toBe(true);
    expect(isChainTag("SOLANA")).toBe(true);
  });

  it("rejects aliases and other values", () => {
    expect(isChainTag("eth")).toBe(false);
    expect(isChainTag("TRON")).toBe(false);
    expect(isChainTag(1)).toBe(false);
    expect(isChainTag(null)).toBe(false);
  });
});

describe("parseChainTag", () => {
  it("parses aliases case-insensitively", () => {
    expect(parseChainTag("ethereum")).toBe("ETH");
    expect(parseChainTag(" bnb ")).toBe("BSC");
    expect(parseChainTag("sol")).toBe("SOLANA");
  });

  it("returns undefined for unknown chains", () => {
    expect(parseChainTag("tron")).toBeUndefined();
  });
});

// =============================================================================
// Records
// =============================================================================

describe("isTransactionState", () => {
  it("accepts every state", () => {
    for (const s of ["built", "signed", "submitted", "confirmed", "failed", "ambiguous"]) {
      expect(isTransactionState(s)).toBe(true);
    }
  });

  it("rejects unknown states", () => {
    expect(isTransactionState("pending")).toBe(false);
  });
});

describe("isWalletOrigin", () => {
  it("accepts known origins only", () => {
    expect(isWalletOrigin("private-key")).toBe(true);
    expect(isWalletOrigin("imported")).toBe(false);
  });
});

describe("isWalletRecord", () => {
  it("accepts a valid record", () => {
    expect(isWalletRecord(validRecord)).toBe(true);
  });

  it("rejects null and primitives", () => {
    expect(isWalletRecord(null)).toBe(false);
    expect(isWalletRecord("wallet")).toBe(false);
  });

  it("rejects a negative derivation index", () => {
    expect(isWalletRecord({ ...validRecord, derivationIndex: -1 })).toBe(false);
  });

  it("rejects a fractional derivation index", () => {
    expect(isWalletRecord({ ...validRecord, derivationIndex: 1.5 })).toBe(false);
  });

  it("rejects a non-hex encrypted key", () => {
    expect(isWalletRecord({ ...validRecord, encryptedKey: "not-hex" })).toBe(false);
  });

  it("rejects an unknown chain", () => {
    expect(isWalletRecord({ ...validRecord, chain: "TRON" })).toBe(false);
  });

  it("rejects an empty address", () => {
    expect(isWalletRecord({ ...validRecord, address: "" })).toBe(false);
  });
});
