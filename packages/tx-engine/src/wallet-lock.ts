/**
 * WalletLock: keyed exclusive scopes, one per wallet id.
 *
 * A wallet's scope is created on first use and dropped once no caller
 * holds or waits for it. Different wallets never wait on each other.
 */

import pLimit, { type LimitFunction } from "p-limit";

interface Entry {
  readonly limit: LimitFunction;
  users: number;
}

export class WalletLock {
  private readonly entries = new Map<string, Entry>();

  async run<T>(walletId: string, fn: () => Promise<T>): Promise<T> {
    let entry = this.entries.get(walletId);
    if (entry === undefined) {
      entry = { limit: pLimit(1), users: 0 };
      this.entries.set(walletId, entry);
    }
    entry.users++;
    try {
      return await entry.limit(fn);
    } finally {
      entry.users--;
      if (entry.users === 0) this.entries.delete(walletId);
    }
  }

  /** Wallets with a holder or a waiter */
  get size(): number {
    return this.entries.size;
  }
}
