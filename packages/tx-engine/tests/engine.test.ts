/**
 * TransactionEngine end to end over a real EVM provider, a real key vault
 * and an in-process node.
 */
import { describe, it, expect, vi } from "vitest";
import { hexToBytes, keccak256, parseTransaction, type Hex } from "viem";
import { isWalletError } from "@custodian/types";
import { KeyVault, MasterKey, walletAssociatedData } from "@custodian/key-vault";
import { RpcPool } from "@custodian/rpc-failover";
import {
  ChainProviderRegistry,
  EvmChainProvider,
  TokenRegistry,
  getEvmNetwork,
  probeEvm,
  type EvmRpc,
} from "@custodian/chain-provider";
import { TransactionEngine, type SigningWallet } from "../src/engine.js";
import type { EngineConfig } from "../src/config.js";
import { FakeEvmChain, GWEI, deferred } from "./fake-chain.js";

const ACCOUNT_0_KEY = "0xac0974bec39a17e36ba4a6b4d238ff944bacb478cbed5efcae784d7bf4f2ff80";
const ACCOUNT_1_KEY = "0x59c6995e998f97a5a0044966f0945389dc9e86dae88c7a8412f4603b6b78690d";
const ACCOUNT_0 = "0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266";
const ACCOUNT_1 = "0x70997970C51812dc3A010C7d01b50e0d17dc79C8";
const ACCOUNT_2 = "0x3C44CdDdB6a900fa2b585dd299e03d12FA4293BC";
const ETH_FEE = 21_000n * 30n * GWEI;

const vault = new KeyVault(MasterKey.fromHex("11".repeat(32)));

function wallet(id: string, key: Hex, address: string, sealedFor: string = address): SigningWallet {
  return {
    id,
    chain: "ETH",
    address,
    encryptedKey: vault.seal(hexToBytes(key), walletAssociatedData("ETH", sealedFor)),
  };
}

const WALLET_A = wallet("wallet-a", ACCOUNT_0_KEY, ACCOUNT_0);
const WALLET_B = wallet("wallet-b", ACCOUNT_1_KEY, ACCOUNT_1);

interface Harness {
  readonly chain: FakeEvmChain;
  readonly engine: TransactionEngine;
}

function harness(config: Partial<EngineConfig> = {}, attemptTimeoutMs = 2000): Harness {
  const chain = new FakeEvmChain();
  const pool = new RpcPool<EvmRpc>({
    chain: "ETH",
    endpoints: [{ url: "http://node.test", client: chain.rpc }],
    probe: probeEvm,
    config: { attemptTimeoutMs },
  });
  const provider = new EvmChainProvider({
    network: getEvmNetwork("ETH", "testnet"),
    pool,
    tokens: TokenRegistry.load("testnet"),
  });
  let next = 0;
  const engine = new TransactionEngine({
    providers: new ChainProviderRegistry([provider]),
    vault,
    config: {
      statusPollAttempts: 3,
      statusPollIntervalMs: 0,
      confirmationPollAttempts: 3,
      confirmationPollIntervalMs: 0,
      ...config,
    },
    clock: () => new Date("2026-01-01T00:00:00.000Z"),
    generateId: () => `tx-${++next}`,
  });
  return { chain, engine };
}

function noncesOf(raws: readonly Hex[]): number[] {
  return raws.map((raw) => parseTransaction(raw).nonce ?? -1);
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err: unknown) {
    return err;
  }
  throw new Error("expected rejection");
}

// =============================================================================
// Happy path
// =============================================================================

describe("TransactionEngine.transfer", () => {
  it("builds, signs and submits a native transfer", async () => {
    const { chain, engine } = harness();
    const record = await engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1000n });

    expect(chain.accepted).toHaveLength(1);
    const raw = chain.accepted[0];
    expect(record).toMatchObject({
      id: "tx-1",
      walletId: "wallet-a",
      chain: "ETH",
      from: ACCOUNT_0,
      to: ACCOUNT_1,
      amount: "1000",
      state: "submitted",
      hash: raw === undefined ? "missing" : keccak256(raw),
      submittedVia: "http://node.test",
      fee: ETH_FEE.toString(),
    });
    expect(record.transitions.map((t) => t.state)).toEqual(["built", "signed", "submitted"]);
    await expect(engine.getRecord("tx-1")).resolves.toEqual(record);
  });

  it("records the token of a token transfer", async () => {
    const { chain, engine } = harness();
    const record = await engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 5n, token: "USDC" });
    expect(record.token).toEqual({
      symbol: "USDC",
      address: "0x1c7D4B196Cb0C7B01d743Fbc6116a902379C7238",
      decimals: 6,
    });
    expect(chain.rpc.getTokenBalance).toHaveBeenCalledTimes(1);
  });

  it("waits for confirmation when asked", async () => {
    const { chain, engine } = harness();
    chain.rpc.getReceiptStatus.mockResolvedValueOnce(null).mockResolvedValueOnce("success");
    const record = await engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n }, { waitForConfirmation: true });
    expect(record.state).toBe("confirmed");
    expect(chain.rpc.getReceiptStatus).toHaveBeenCalledTimes(2);
  });
});

// =============================================================================
// Fund checks and validation
// =============================================================================

describe("TransactionEngine pre-checks", () => {
  it("refuses a native transfer that cannot cover amount plus fee", async () => {
    const { chain, engine } = harness();
    chain.nativeBalance = 1000n + ETH_FEE - 1n;
    const err = await rejection(engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1000n }));
    expect(err).toMatchObject({
      code: "INSUFFICIENT_FUNDS",
      details: { symbol: "ETH", required: (1000n + ETH_FEE).toString() },
    });
    await expect(engine.listByWallet("wallet-a")).resolves.toEqual([]);
    expect(chain.rpc.sendRawTransaction).not.toHaveBeenCalled();
  });

  it("checks the token balance and the native fee separately", async () => {
    const { chain, engine } = harness();
    chain.tokenBalance = 4n;
    const err = await rejection(engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 5n, token: "USDC" }));
    expect(err).toMatchObject({ code: "INSUFFICIENT_FUNDS", details: { symbol: "USDC" } });

    chain.tokenBalance = 5n;
    chain.nativeBalance = 0n;
    const feeErr = await rejection(engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 5n, token: "USDC" }));
    expect(feeErr).toMatchObject({ code: "INSUFFICIENT_FUNDS", details: { symbol: "ETH" } });
  });

  it("rejects an invalid destination before touching the node", async () => {
    const { chain, engine } = harness();
    const err = await rejection(engine.transfer(WALLET_A, { to: "0xnot-an-address", amount: 1n }));
    expect(isWalletError(err, "INVALID_ADDRESS")).toBe(true);
    expect(chain.rpc.estimateGas).not.toHaveBeenCalled();
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("TransactionEngine concurrency", () => {
  it("never signs two transfers of one wallet with the same nonce", async () => {
    const { chain, engine } = harness();
    const records = await Promise.all([
      engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n }),
      engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 2n }),
      engine.transfer(WALLET_A, { to: ACCOUNT_2, amount: 3n }),
      engine.transfer(WALLET_A, { to: ACCOUNT_2, amount: 4n }),
    ]);

    expect(records.map((r) => r.state)).toEqual(["submitted", "submitted", "submitted", "submitted"]);
    expect(noncesOf(chain.accepted)).toEqual([0, 1, 2, 3]);
    expect(new Set(records.map((r) => r.hash)).size).toBe(4);
  });

  it("keeps nonces unique when a nonce read fails over to a lagging endpoint", async () => {
    const primary = new FakeEvmChain();
    const lagging = new FakeEvmChain();
    let nonceReads = 0;
    primary.rpc.getPendingNonce.mockImplementation(async () => {
      nonceReads++;
      if (nonceReads === 2) throw Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
      return primary.accepted.length;
    });
    const pool = new RpcPool<EvmRpc>({
      chain: "ETH",
      endpoints: [
        { url: "http://primary.test", client: primary.rpc },
        { url: "http://lagging.test", client: lagging.rpc },
      ],
      probe: probeEvm,
    });
    const provider = new EvmChainProvider({
      network: getEvmNetwork("ETH", "testnet"),
      pool,
      tokens: TokenRegistry.load("testnet"),
    });
    const engine = new TransactionEngine({ providers: new ChainProviderRegistry([provider]), vault });

    const records = await Promise.all([
      engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n }),
      engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 2n }),
    ]);

    expect(records.map((r) => r.state)).toEqual(["submitted", "submitted"]);
    expect(lagging.rpc.getPendingNonce).toHaveBeenCalledTimes(1);
    expect(noncesOf([...primary.accepted, ...lagging.accepted]).sort()).toEqual([0, 1]);
  });

  it("lets different wallets proceed in parallel", async () => {
    const { chain, engine } = harness({}, 10_000);
    const gate = deferred();
    chain.rpc.getPendingNonce.mockImplementation(async (address) => {
      if (address === ACCOUNT_0) await gate.promise;
      return chain.accepted.length;
    });

    const blocked = engine.transfer(WALLET_A, { to: ACCOUNT_2, amount: 1n });
    const other = await engine.transfer(WALLET_B, { to: ACCOUNT_2, amount: 1n });
    expect(other.state).toBe("submitted");
    expect(chain.accepted).toHaveLength(1);

    gate.release();
    await expect(blocked).resolves.toMatchObject({ state: "submitted" });
    expect(chain.accepted).toHaveLength(2);
  });
});

// =============================================================================
// Uncertain submission
// =============================================================================

describe("TransactionEngine uncertain submission", () => {
  const reset = (): Error => Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });

  it("polls without resending and marks the record ambiguous", async () => {
    const { chain, engine } = harness();
    chain.rpc.sendRawTransaction.mockImplementation(async () => Promise.reject(reset()));

    const record = await engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n });

    expect(record.state).toBe("ambiguous");
    expect(record.hash).toMatch(/^0x[0-9a-f]{64}$/);
    expect(record.submittedVia).toBe("http://node.test");
    expect(record.transitions.map((t) => t.state)).toEqual(["built", "signed", "ambiguous"]);
    expect(chain.rpc.sendRawTransaction).toHaveBeenCalledTimes(1);
    expect(chain.rpc.getReceiptStatus).toHaveBeenCalledTimes(3);
  });

  it("treats a transaction the node has seen as submitted", async () => {
    const { chain, engine } = harness();
    chain.rpc.sendRawTransaction.mockImplementation(async (raw) => {
      await chain.accept(raw);
      throw reset();
    });

    const record = await engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n });
    expect(record.state).toBe("submitted");
    expect(chain.rpc.sendRawTransaction).toHaveBeenCalledTimes(1);
    expect(chain.rpc.getReceiptStatus).toHaveBeenCalledTimes(1);
  });

  it("fails the record when the chain reports a revert", async () => {
    const { chain, engine } = harness();
    chain.rpc.sendRawTransaction.mockImplementation(async () => Promise.reject(reset()));
    chain.rpc.getReceiptStatus.mockResolvedValue("reverted");

    const record = await engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n });
    expect(record.state).toBe("failed");
    expect(record.error?.code).toBe("TRANSACTION_REJECTED");
  });

  it("reconciles an ambiguous record once the chain confirms it", async () => {
    const { chain, engine } = harness();
    chain.rpc.sendRawTransaction.mockImplementation(async () => Promise.reject(reset()));
    const ambiguous = await engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n });
    expect(ambiguous.state).toBe("ambiguous");

    await expect(engine.reconcile(ambiguous.id)).resolves.toEqual(ambiguous);

    chain.receipts.set(ambiguous.hash ?? "", "success");
    const reconciled = await engine.reconcile(ambiguous.id);
    expect(reconciled.state).toBe("confirmed");
    expect(reconciled.transitions.map((t) => t.state)).toEqual(["built", "signed", "ambiguous", "confirmed"]);
    expect(chain.rpc.sendRawTransaction).toHaveBeenCalledTimes(1);

    await expect(engine.reconcile(ambiguous.id)).resolves.toEqual(reconciled);
  });

  it("applies a single outcome when two reconciles race", async () => {
    const { chain, engine } = harness();
    chain.rpc.sendRawTransaction.mockImplementation(async () => Promise.reject(reset()));
    const ambiguous = await engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n });

    chain.rpc.getReceiptStatus
      .mockImplementationOnce(async () => {
        await new Promise((resolve) => setTimeout(resolve, 50));
        return "success";
      })
      .mockImplementationOnce(async () => "reverted");

    const [first, second] = await Promise.all([engine.reconcile(ambiguous.id), engine.reconcile(ambiguous.id)]);
    const stored = await engine.getRecord(ambiguous.id);

    expect(first.state).toBe("confirmed");
    expect(second).toEqual(first);
    expect(stored).toEqual(first);
    expect(stored.transitions.map((t) => t.state)).toEqual(["built", "signed", "ambiguous", "confirmed"]);
    expect(chain.rpc.getReceiptStatus).toHaveBeenCalledTimes(4);
  });

  it("keeps the outcome a reconcile applied while a confirmation wait was polling", async () => {
    const { chain, engine } = harness({ confirmationPollAttempts: 1 });
    const gate = deferred();
    chain.rpc.getReceiptStatus
      .mockImplementationOnce(async () => {
        await gate.promise;
        return "success";
      })
      .mockImplementationOnce(async () => "reverted");

    const waiting = engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n }, { waitForConfirmation: true });
    await vi.waitFor(() => expect(chain.rpc.getReceiptStatus).toHaveBeenCalledTimes(1));

    const reconciled = await engine.reconcile("tx-1");
    expect(reconciled.state).toBe("failed");

    gate.release();
    await expect(waiting).resolves.toEqual(reconciled);
    await expect(engine.getRecord("tx-1")).resolves.toEqual(reconciled);
  });

  it("raises TRANSACTION_NOT_FOUND for an unknown record", async () => {
    const { engine } = harness();
    await expect(engine.reconcile("missing")).rejects.toMatchObject({ code: "TRANSACTION_NOT_FOUND" });
  });
});

// =============================================================================
// Failures after the record exists
// =============================================================================

describe("TransactionEngine recorded failures", () => {
  it("records a definite refusal from the node", async () => {
    const { chain, engine } = harness();
    chain.rpc.sendRawTransaction.mockRejectedValue(new Error("insufficient funds for gas * price + value"));
    const record = await engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n });
    expect(record.state).toBe("failed");
    expect(record.error?.code).toBe("INSUFFICIENT_FUNDS");
    expect(record.transitions.map((t) => t.state)).toEqual(["built", "signed", "failed"]);
  });

  it("fails with DECRYPTION_FAILED when the key does not match the wallet", async () => {
    const { chain, engine } = harness();
    const mismatched: SigningWallet = {
      id: "wallet-x",
      chain: "ETH",
      address: ACCOUNT_1,
      encryptedKey: vault.seal(hexToBytes(ACCOUNT_0_KEY), walletAssociatedData("ETH", ACCOUNT_1)),
    };
    const record = await engine.transfer(mismatched, { to: ACCOUNT_2, amount: 1n });
    expect(record.state).toBe("failed");
    expect(record.error?.code).toBe("DECRYPTION_FAILED");
    expect(chain.rpc.sendRawTransaction).not.toHaveBeenCalled();
  });

  it("fails with DECRYPTION_FAILED when the blob is bound to another wallet", async () => {
    const { engine } = harness();
    const rebound = wallet("wallet-y", ACCOUNT_0_KEY, ACCOUNT_0, ACCOUNT_1);
    const record = await engine.transfer(rebound, { to: ACCOUNT_2, amount: 1n });
    expect(record.error?.code).toBe("DECRYPTION_FAILED");
  });
});

// =============================================================================
// Cancellation
// =============================================================================

describe("TransactionEngine cancellation", () => {
  it("throws CANCELLED and records nothing when cancelled up front", async () => {
    const { chain, engine } = harness();
    const controller = new AbortController();
    controller.abort();
    await expect(
      engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n }, { signal: controller.signal }),
    ).rejects.toMatchObject({ code: "CANCELLED" });
    await expect(engine.listByWallet("wallet-a")).resolves.toEqual([]);
    expect(chain.rpc.estimateGas).not.toHaveBeenCalled();
  });

  it("fails the record without submitting when cancelled before submission", async () => {
    const { chain, engine } = harness();
    const controller = new AbortController();
    chain.rpc.getPendingNonce.mockImplementation(async () => {
      controller.abort();
      return 0;
    });

    const record = await engine.transfer(WALLET_A, { to: ACCOUNT_1, amount: 1n }, { signal: controller.signal });
    expect(record.state).toBe("failed");
    expect(record.error?.code).toBe("CANCELLED");
    expect(chain.rpc.sendRawTransaction).not.toHaveBeenCalled();
  });

  it("only stops local polling when cancelled after submission", async () => {
    const { chain, engine } = harness();
    const controller = new AbortController();
    chain.rpc.getReceiptStatus.mockImplementation(async () => {
      controller.abort();
      return null;
    });

    const record = await engine.transfer(
      WALLET_A,
      { to: ACCOUNT_1, amount: 1n },
      { signal: controller.signal, waitForConfirmation: true },
    );
    expect(record.state).toBe("submitted");
    expect(chain.rpc.getReceiptStatus).toHaveBeenCalledTimes(1);
    expect(chain.accepted).toHaveLength(1);
  });
});

// =============================================================================
// Batches
// =============================================================================

describe("TransactionEngine.transferBatch", () => {
  it("keeps going past an invalid recipient and reports outcomes in order", async () => {
    const { chain, engine } = harness();
    const outcomes = await engine.transferBatch(WALLET_A, [
      { to: ACCOUNT_1, amount: 10n },
      { to: "0xnot-an-address", amount: 20n },
      { to: ACCOUNT_2, amount: 30n },
    ]);

    expect(outcomes.map((o) => [o.index, o.ok])).toEqual([
      [0, true],
      [1, false],
      [2, true],
    ]);
    const invalid = outcomes[1];
    expect(invalid).toMatchObject({ to: "0xnot-an-address", ok: false, error: { code: "INVALID_ADDRESS" } });
    expect(invalid?.record).toBeUndefined();

    expect(chain.accepted).toHaveLength(2);
    expect(noncesOf(chain.accepted)).toEqual([0, 1]);
    const stored = await engine.listByWallet("wallet-a");
    expect(stored.map((r) => r.amount).sort()).toEqual(["10", "30"]);
  });

  it("reports a failed recipient with its record", async () => {
    const { chain, engine } = harness();
    chain.rpc.sendRawTransaction
      .mockImplementationOnce(async (raw) => chain.accept(raw))
      .mockRejectedValueOnce(new Error("nonce too low"));

    const outcomes = await engine.transferBatch(WALLET_A, [
      { to: ACCOUNT_1, amount: 1n },
      { to: ACCOUNT_2, amount: 2n },
    ]);
    const failed = outcomes.find((o) => !o.ok);
    expect(failed).toMatchObject({ ok: false, error: { code: "TRANSACTION_REJECTED" } });
    expect(failed?.record?.state).toBe("failed");
    expect(outcomes.filter((o) => o.ok)).toHaveLength(1);
  });

  it("estimates without recording", async () => {
    const { engine } = harness();
    const fee = await engine.estimate(WALLET_A, { to: ACCOUNT_1, amount: 1n });
    expect(fee).toMatchObject({ family: "evm", total: ETH_FEE });
    await expect(engine.listByWallet("wallet-a")).resolves.toEqual([]);
  });
});
