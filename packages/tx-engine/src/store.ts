/**
 * TransactionStore: persistence contract for transaction records,
 * and the in-memory implementation used by tests and short-lived
 * processes.
 */

import type { ChainTag, TransactionRecord, TransactionState, TxHash } from "@custodian/types";
import { isFinal } from "./records.js";

/**
 * A write lost a race: the stored record is no longer in the state the
 * writer read it in.
 */
export class StaleRecordError extends Error {
  constructor(
    public readonly recordId: string,
    public readonly expected: TransactionState | undefined,
    public readonly actual: TransactionState | undefined,
  ) {
    super(`Record ${recordId}: expected ${expected ?? "no record"}, found ${actual ?? "no record"}`);
    this.name = "StaleRecordError";
  }
}

export interface TransactionStore {
  /**
   * Compare-and-set by id. Without `expected` the record must be new;
   * with it, the stored record must be in that state and not final.
   *
   * @throws StaleRecordError when the stored record does not match
   */
  save(record: TransactionRecord, expected?: TransactionState): Promise<void>;
  get(id: string): Promise<TransactionRecord | undefined>;
  findByHash(chain: ChainTag, hash: TxHash): Promise<TransactionRecord | undefined>;
  /** Oldest first */
  listByWallet(walletId: string): Promise<readonly TransactionRecord[]>;
}

export class InMemoryTransactionStore implements TransactionStore {
  private readonly records = new Map<string, TransactionRecord>();
  private readonly byWallet = new Map<string, string[]>();
  private readonly byHash = new Map<string, string>();

  async save(record: TransactionRecord, expected?: TransactionState): Promise<void> {
    const stored = this.records.get(record.id);
    if (stored?.state !== expected || (stored !== undefined && isFinal(stored.state))) {
      throw new StaleRecordError(record.id, expected, stored?.state);
    }
    if (stored === undefined) {
      const ids = this.byWallet.get(record.walletId) ?? [];
      ids.push(record.id);
      this.byWallet.set(record.walletId, ids);
    }
    this.records.set(record.id, record);
    if (record.hash !== undefined) {
      this.byHash.set(hashKey(record.chain, record.hash), record.id);
    }
  }

  async get(id: string): Promise<TransactionRecord | undefined> {
    return this.records.get(id);
  }

  async findByHash(chain: ChainTag, hash: TxHash): Promise<TransactionRecord | undefined> {
    const id = this.byHash.get(hashKey(chain, hash));
    return id === undefined ? undefined : this.records.get(id);
  }

  async listByWallet(walletId: string): Promise<readonly TransactionRecord[]> {
    const ids = this.byWallet.get(walletId) ?? [];
    return ids.flatMap((id) => {
      const record = this.records.get(id);
      return record === undefined ? [] : [record];
    });
  }

  get size(): number {
    return this.records.size;
  }
}

function hashKey(chain: ChainTag, hash: TxHash): string {
  return chain === "SOLANA" ? `${chain}:${hash}` : `${chain}:${hash.toLowerCase()}`;
}
