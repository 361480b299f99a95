/**
 * WalletRepository: persistence contract for wallet records, and the
 * in-memory implementation.
 *
 * Indexed by id, by (user, chain) and by (chain, address). EVM addresses
 * are matched case-insensitively, Solana addresses exactly.
 */

import { WalletError, isEvmChain, type ChainTag, type WalletRecord } from "@custodian/types";

export interface WalletRepository {
  /**
   * @throws WalletError WALLET_EXISTS when the user already holds the address
   */
  create(wallet: WalletRecord): Promise<void>;
  findById(id: string): Promise<WalletRecord | undefined>;
  /** Every wallet holding the address, across users */
  findByAddress(chain: ChainTag, address: string): Promise<readonly WalletRecord[]>;
  /** Oldest first */
  findByUserAndChain(userId: string, chain: ChainTag): Promise<readonly WalletRecord[]>;
  /** Oldest first */
  listByUser(userId: string): Promise<readonly WalletRecord[]>;
}

export class InMemoryWalletRepository implements WalletRepository {
  private readonly wallets = new Map<string, WalletRecord>();
  private readonly byUser = new Map<string, string[]>();
  private readonly byAddress = new Map<string, string[]>();

  async create(wallet: WalletRecord): Promise<void> {
    if (this.wallets.has(wallet.id)) {
      throw new Error(`InMemoryWalletRepository: duplicate id ${wallet.id}`);
    }
    const key = addressKey(wallet.chain, wallet.address);
    const holders = this.byAddress.get(key) ?? [];
    if (holders.some((id) => this.wallets.get(id)?.userId === wallet.userId)) {
      throw new WalletError("WALLET_EXISTS", `Wallet ${wallet.address} already exists`, {
        chain: wallet.chain,
        address: wallet.address,
      });
    }

    this.wallets.set(wallet.id, wallet);
    this.byAddress.set(key, [...holders, wallet.id]);
    this.byUser.set(wallet.userId, [...(this.byUser.get(wallet.userId) ?? []), wallet.id]);
  }

  async findById(id: string): Promise<WalletRecord | undefined> {
    return this.wallets.get(id);
  }

  async findByAddress(chain: ChainTag, address: string): Promise<readonly WalletRecord[]> {
    return this.resolve(this.byAddress.get(addressKey(chain, address)));
  }

  async findByUserAndChain(userId: string, chain: ChainTag): Promise<readonly WalletRecord[]> {
    return this.resolve(this.byUser.get(userId)).filter((w) => w.chain === chain);
  }

  async listByUser(userId: string): Promise<readonly WalletRecord[]> {
    return this.resolve(this.byUser.get(userId));
  }

  get size(): number {
    return this.wallets.size;
  }

  private resolve(ids: readonly string[] | undefined): WalletRecord[] {
    return (ids ?? []).flatMap((id) => {
      const wallet = this.wallets.get(id);
      return wallet === undefined ? [] : [wallet];
    });
  }
}

function addressKey(chain: ChainTag, address: string): string {
  return isEvmChain(chain) ? `${chain}:${address.toLowerCase()}` : `${chain}:${address}`;
}
