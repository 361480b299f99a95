import { describe, it, expect } from "vitest";
import { isWalletError } from "@custodian/types";
import { RpcFailoverManager } from "@custodian/rpc-failover";
import { ChainProviderRegistry } from "../src/registry.js";
import { EvmChainProvider } from "../src/evm/evm-provider.js";
import { SolanaChainProvider } from "../src/solana/solana-provider.js";
import { TokenRegistry } from "../src/token-registry.js";

describe("ChainProviderRegistry", () => {
  it("creates one provider and one pool per configured chain", () => {
    const manager = new RpcFailoverManager();
    const registry = ChainProviderRegistry.create({
      mode: "testnet",
      endpoints: {
        ETH: ["https://eth-a.test", "https://eth-b.test"],
        BSC: [],
        SOLANA: ["https://sol.test"],
      },
      manager,
      tokens: TokenRegistry.load("testnet"),
    });

    expect(registry.chains()).toEqual(["ETH", "SOLANA"]);
    expect(registry.get("ETH")).toBeInstanceOf(EvmChainProvider);
    expect(registry.get("SOLANA")).toBeInstanceOf(SolanaChainProvider);
    expect(manager.chains()).toEqual(["ETH", "SOLANA"]);
    expect(manager.statusOf("ETH").endpoints.map((e) => e.endpoint)).toEqual([
      "https://eth-a.test",
      "https://eth-b.test",
    ]);
  });

  it("raises UNSUPPORTED_CHAIN for a chain without endpoints", () => {
    const registry = ChainProviderRegistry.create({
      mode: "mainnet",
      endpoints: { BSC: ["https://bsc.test"] },
      manager: new RpcFailoverManager(),
      tokens: TokenRegistry.load("mainnet"),
    });

    let caught: unknown;
    try {
      registry.get("ETH");
    } catch (err: unknown) {
      caught = err;
    }
    expect(isWalletError(caught, "UNSUPPORTED_CHAIN")).toBe(true);
    expect(registry.has("BSC")).toBe(true);
  });

  it("refuses a second provider for the same chain", () => {
    const manager = new RpcFailoverManager();
    const tokens = TokenRegistry.load("testnet");
    const registry = ChainProviderRegistry.create({
      mode: "testnet",
      endpoints: { SOLANA: ["https://sol.test"] },
      manager,
      tokens,
    });
    const [solana] = registry.list();
    expect(solana).toBeDefined();
    if (solana === undefined) return;
    expect(() => registry.register(solana)).toThrow(/already registered/);
  });
});
