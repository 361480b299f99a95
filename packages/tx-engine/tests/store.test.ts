import { describe, it, expect } from "vitest";
import type { ChainTag, TransactionRecord } from "@custodian/types";
import { InMemoryTransactionStore, StaleRecordError } from "../src/store.js";
import { advance, createRecord } from "../src/records.js";

const AT = "2026-01-01T00:00:00.000Z";

function record(id: string, walletId: string, chain: ChainTag = "ETH"): TransactionRecord {
  return createRecord({ id, walletId, chain, from: "from", to: "to", amount: 1n }, AT);
}

describe("InMemoryTransactionStore", () => {
  it("replaces a record by id without duplicating it", async () => {
    const store = new InMemoryTransactionStore();
    const built = record("tx-1", "w-1");
    await store.save(built);
    const signed = advance(built, "signed", { hash: "0xABCD" }, AT);
    await store.save(signed, "built");

    expect(store.size).toBe(1);
    await expect(store.get("tx-1")).resolves.toEqual(signed);
    await expect(store.listByWallet("w-1")).resolves.toEqual([signed]);
  });

  it("lists a wallet's records oldest first", async () => {
    const store = new InMemoryTransactionStore();
    await store.save(record("tx-1", "w-1"));
    await store.save(record("tx-2", "w-2"));
    await store.save(record("tx-3", "w-1"));

    const ids = (await store.listByWallet("w-1")).map((r) => r.id);
    expect(ids).toEqual(["tx-1", "tx-3"]);
    await expect(store.listByWallet("w-9")).resolves.toEqual([]);
    await expect(store.get("tx-9")).resolves.toBeUndefined();
  });

  it("finds EVM hashes case-insensitively and Solana signatures exactly", async () => {
    const store = new InMemoryTransactionStore();
    await store.save(advance(record("tx-1", "w-1"), "signed", { hash: "0xABCD" }, AT));
    await store.save(advance(record("tx-2", "w-2", "SOLANA"), "signed", { hash: "5Abc" }, AT));

    await expect(store.findByHash("ETH", "0xabcd")).resolves.toMatchObject({ id: "tx-1" });
    await expect(store.findByHash("BSC", "0xabcd")).resolves.toBeUndefined();
    await expect(store.findByHash("SOLANA", "5Abc")).resolves.toMatchObject({ id: "tx-2" });
    await expect(store.findByHash("SOLANA", "5abc")).resolves.toBeUndefined();
  });

  it("refuses to insert over an existing record", async () => {
    const store = new InMemoryTransactionStore();
    await store.save(record("tx-1", "w-1"));
    await expect(store.save(record("tx-1", "w-1"))).rejects.toBeInstanceOf(StaleRecordError);
  });

  it("refuses a write made from a state the record has left", async () => {
    const store = new InMemoryTransactionStore();
    const built = record("tx-1", "w-1");
    await store.save(built);
    const signed = advance(built, "signed", { hash: "0x01" }, AT);
    await store.save(signed, "built");

    const stale = advance(built, "failed", { error: { code: "CANCELLED", message: "Transfer cancelled" } }, AT);
    await expect(store.save(stale, "built")).rejects.toMatchObject({
      name: "StaleRecordError",
      recordId: "tx-1",
      expected: "built",
      actual: "signed",
    });
    await expect(store.get("tx-1")).resolves.toEqual(signed);
  });

  it("never replaces a final record", async () => {
    const store = new InMemoryTransactionStore();
    const built = record("tx-1", "w-1");
    const signed = advance(built, "signed", { hash: "0x01" }, AT);
    const submitted = advance(signed, "submitted", {}, AT);
    const confirmed = advance(submitted, "confirmed", {}, AT);
    await store.save(built);
    await store.save(signed, "built");
    await store.save(submitted, "signed");
    await store.save(confirmed, "submitted");

    const overwrite = { ...confirmed, state: "failed" as const };
    await expect(store.save(overwrite, "confirmed")).rejects.toBeInstanceOf(StaleRecordError);
    await expect(store.get("tx-1")).resolves.toEqual(confirmed);
  });
});
