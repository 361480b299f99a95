/**
 * CustodyService: Composition root for the wallet packages.
 *
 * The API layer delegates to this service; it never touches the vault,
 * the providers or the engine directly. Responses never carry key
 * material, except the mnemonic of a freshly generated wallet, which is
 * returned once and not stored.
 */

import { randomUUID } from "node:crypto";
import pino, { type Logger } from "pino";
import {
  WalletError,
  isWalletError,
  type BatchOutcome,
  type BatchRecipient,
  type ChainTag,
  type FeeEstimate,
  type RecordedError,
  type GeneratedWallet,
  type ImportedWallet,
  type TransactionRecord,
  type TransactionState,
  type TxHash,
  type WalletBalance,
  type WalletBalances,
  type WalletOrigin,
  type WalletRecord,
} from "@custodian/types";
import { walletAssociatedData, type KeyVault } from "@custodian/key-vault";
import type { ChainStatus, RpcFailoverManager } from "@custodian/rpc-failover";
import {
  formatAmount,
  type ChainProvider,
  type ChainProviderRegistry,
  type TokenInfo,
} from "@custodian/chain-provider";
import type { TransactionEngine, TransferOptions, TransferParams } from "@custodian/tx-engine";
import type { WalletRepository } from "./wallet-repository.js";

// =============================================================================
// Configuration
// =============================================================================

export interface CustodyServiceOptions {
  readonly vault: KeyVault;
  readonly providers: ChainProviderRegistry;
  readonly engine: TransactionEngine;
  readonly wallets: WalletRepository;
  readonly failover: RpcFailoverManager;
  /** Explorer base URL per chain */
  readonly explorers: Readonly<Record<ChainTag, string>>;
  readonly logger?: Logger;
  readonly clock?: () => Date;
  readonly generateId?: () => string;
}

/** A wallet as shown to callers: the record without its ciphertext */
export type WalletView = Omit<WalletRecord, "encryptedKey">;

export interface TransferReceipt {
  readonly recordId: string;
  readonly hash?: TxHash;
  readonly status: TransactionState;
  readonly explorerUrl?: string;
}

// =============================================================================
// Service
// =============================================================================

export class CustodyService {
  private readonly vault: KeyVault;
  private readonly providers: ChainProviderRegistry;
  private readonly engine: TransactionEngine;
  private readonly wallets: WalletRepository;
  private readonly failover: RpcFailoverManager;
  private readonly explorers: Readonly<Record<ChainTag, string>>;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(options: CustodyServiceOptions) {
    this.vault = options.vault;
    this.providers = options.providers;
    this.engine = options.engine;
    this.wallets = options.wallets;
    this.failover = options.failover;
    this.explorers = options.explorers;
    this.logger = (options.logger ?? pino({ level: "silent" })).child({ component: "custody" });
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  // ─── Wallets ───────────────────────────────────────────────────────

  /**
   * Create a wallet from a fresh 24-word mnemonic.
   */
  async generateWallet(userId: string, chain: ChainTag, derivationIndex = 0): Promise<GeneratedWallet> {
    this.providers.get(chain);
    const mnemonic = this.vault.generateMnemonic();
    const wallet = await this.storeKey(userId, chain, mnemonic, derivationIndex, "generated");
    return { ...wallet, mnemonic };
  }

  /**
   * Import a mnemonic or a raw private key. A raw key is always index 0.
   *
   * @throws WalletError WALLET_EXISTS when the user already holds the address
   */
  async importWallet(
    userId: string,
    chain: ChainTag,
    secret: string,
    derivationIndex = 0,
  ): Promise<ImportedWallet> {
    this.providers.get(chain);
    return this.storeKey(userId, chain, secret, derivationIndex, undefined);
  }

  async getWallet(walletId: string): Promise<WalletView> {
    return viewOf(await this.requireWallet(walletId));
  }

  async listWallets(userId: string, chain?: ChainTag): Promise<readonly WalletView[]> {
    const wallets =
      chain === undefined
        ? await this.wallets.listByUser(userId)
        : await this.wallets.findByUserAndChain(userId, chain);
    return wallets.map(viewOf);
  }

  async getBalance(walletId: string, token?: string, signal?: AbortSignal): Promise<WalletBalance> {
    const wallet = await this.requireWallet(walletId);
    const provider = this.providers.get(wallet.chain);
    return this.balanceOf(wallet, provider, provider.resolveToken(token), signal);
  }

  /**
   * Native balance and the balance of every token listed for the wallet's
   * chain. The native read must succeed; a failed token read is logged
   * and left out.
   */
  async getAllBalances(walletId: string, signal?: AbortSignal): Promise<WalletBalances> {
    const wallet = await this.requireWallet(walletId);
    const provider = this.providers.get(wallet.chain);
    const listed = provider.tokens.list(wallet.chain);

    const [native, tokens] = await Promise.all([
      this.balanceOf(wallet, provider, undefined, signal),
      Promise.all(
        listed.map(async (token) => {
          try {
            return await this.balanceOf(wallet, provider, token, signal);
          } catch (err: unknown) {
            if (isWalletError(err, "CANCELLED")) throw err;
            this.logger.warn({ walletId, token: token.symbol, err }, "Token balance unavailable");
            return undefined;
          }
        }),
      ),
    ]);
    return {
      walletId: wallet.id,
      chain: wallet.chain,
      address: wallet.address,
      native,
      tokens: tokens.filter((balance): balance is WalletBalance => balance !== undefined),
    };
  }

  // ─── Transfers ─────────────────────────────────────────────────────

  async estimateFee(walletId: string, params: TransferParams, signal?: AbortSignal): Promise<FeeEstimate> {
    return this.engine.estimate(await this.requireWallet(walletId), params, signal);
  }

  /**
   * Transfer from a wallet.
   *
   * @throws WalletError AMBIGUOUS_SUBMISSION with `recordId` and `hash` when
   *   the chain never confirmed whether the transaction arrived
   * @throws WalletError with the recorded code when the attempt failed
   */
  async transfer(walletId: string, params: TransferParams, options: TransferOptions = {}): Promise<TransferReceipt> {
    const record = await this.engine.transfer(await this.requireWallet(walletId), params, options);

    if (record.state === "ambiguous") {
      throw new WalletError(
        "AMBIGUOUS_SUBMISSION",
        "Submission outcome unknown; check the transaction before retrying",
        { recordId: record.id, hash: record.hash },
      );
    }
    if (record.state === "failed") {
      const error: RecordedError = record.error ?? { code: "TRANSACTION_REJECTED", message: "Transfer failed" };
      throw new WalletError(error.code, error.message, { recordId: record.id, hash: record.hash });
    }
    return this.receiptOf(record);
  }

  async transferBatch(
    walletId: string,
    recipients: readonly BatchRecipient[],
    options: TransferOptions = {},
  ): Promise<readonly BatchOutcome[]> {
    return this.engine.transferBatch(await this.requireWallet(walletId), recipients, options);
  }

  async getTransaction(recordId: string): Promise<TransactionRecord> {
    return this.engine.getRecord(recordId);
  }

  async listTransactions(walletId: string): Promise<readonly TransactionRecord[]> {
    const wallet = await this.requireWallet(walletId);
    return this.engine.listByWallet(wallet.id);
  }

  async reconcileTransaction(recordId: string, signal?: AbortSignal): Promise<TransferReceipt> {
    return this.receiptOf(await this.engine.reconcile(recordId, signal));
  }

  // ─── Observability ─────────────────────────────────────────────────

  explorerUrl(chain: ChainTag, hash: TxHash): string {
    return explorerTxUrl(this.explorers[chain], hash);
  }

  rpcStatus(): readonly ChainStatus[] {
    return this.failover.status();
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private async balanceOf(
    wallet: WalletRecord,
    provider: ChainProvider,
    token: TokenInfo | undefined,
    signal: AbortSignal | undefined,
  ): Promise<WalletBalance> {
    const amount = await provider.queryBalance(wallet.address, token, signal !== undefined ? { signal } : {});
    const asset = token ?? provider.nativeAsset();
    return {
      walletId: wallet.id,
      chain: wallet.chain,
      address: wallet.address,
      amount: amount.toString(),
      symbol: asset.symbol,
      decimals: asset.decimals,
      formatted: formatAmount(amount, asset.decimals),
      ...(token !== undefined ? { token: token.address } : {}),
    };
  }

  private async requireWallet(walletId: string): Promise<WalletRecord> {
    const wallet = await this.wallets.findById(walletId);
    if (wallet === undefined) {
      throw new WalletError("WALLET_NOT_FOUND", `Wallet ${walletId} not found`, { walletId });
    }
    return wallet;
  }

  private async storeKey(
    userId: string,
    chain: ChainTag,
    secret: string,
    derivationIndex: number,
    origin: WalletOrigin | undefined,
  ): Promise<ImportedWallet> {
    const provider = this.providers.get(chain);
    const derived = this.vault.deriveKey(secret, chain, derivationIndex);
    let address: string;
    let encryptedKey: string;
    try {
      address = provider.addressFromKey(derived.keyMaterial);
      encryptedKey = this.vault.seal(derived.keyMaterial, walletAssociatedData(chain, address));
    } finally {
      derived.keyMaterial.fill(0);
    }

    const record: WalletRecord = {
      id: this.generateId(),
      userId,
      chain,
      address,
      derivationIndex: derived.derivationIndex,
      encryptedKey,
      origin: origin ?? derived.kind,
      createdAt: this.clock().toISOString(),
    };
    await this.wallets.create(record);
    this.logger.info(
      { walletId: record.id, userId, chain, address, origin: record.origin },
      "Wallet created",
    );
    return { id: record.id, chain, address, derivationIndex: record.derivationIndex };
  }

  private receiptOf(record: TransactionRecord): TransferReceipt {
    return {
      recordId: record.id,
      status: record.state,
      ...(record.hash !== undefined
        ? { hash: record.hash, explorerUrl: this.explorerUrl(record.chain, record.hash) }
        : {}),
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function viewOf(wallet: WalletRecord): WalletView {
  const { encryptedKey: _sealed, ...view } = wallet;
  return view;
}

/**
 * `${base}/tx/${hash}`, keeping any query on the base (Solana clusters).
 */
export function explorerTxUrl(base: string, hash: TxHash): string {
  const url = new URL(base);
  url.pathname = `${url.pathname.replace(/\/+$/, "")}/tx/${hash}`;
  return url.toString();
}
