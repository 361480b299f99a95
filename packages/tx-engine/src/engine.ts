/**
 * TransactionEngine: moves a transfer from intent to a final record.
 *
 *   validate → build → price → fund check            (outside any lock)
 *   ┌ wallet scope ───────────────────────────────┐
 *   │ sequence → sign (vault scope) → submit      │
 *   │ uncertain submit → poll status, never resend │
 *   └─────────────────────────────────────────────┘
 *   optional: poll until confirmed / failed
 *
 * Rules:
 * - Errors before a record exists are thrown; after that they are recorded
 * - A signed transaction is submitted at most once
 * - Cancellation before submission fails the record with CANCELLED;
 *   after submission it only stops local polling
 * - Chain outcomes (reconcile, confirmation wait) are applied in the
 *   wallet scope to a fresh read; every write is compare-and-set
 */

import { randomUUID } from "node:crypto";
import pino, { type Logger } from "pino";
import {
  WalletError,
  isWalletError,
  type BatchOutcome,
  type BatchRecipient,
  type FeeEstimate,
  type RecordedError,
  type TransactionRecord,
  type TransactionState,
  type TransferRequest,
  type TxHash,
  type WalletRecord,
} from "@custodian/types";
import { walletAssociatedData, type KeyVault } from "@custodian/key-vault";
import { isSubmissionOutcomeUnknown, type CallOptions } from "@custodian/rpc-failover";
import type {
  ChainProvider,
  ChainProviderRegistry,
  PricedTransfer,
  SignedTransfer,
  StatusContext,
  SubmitResult,
  TransactionStatus,
  TransferIntent,
} from "@custodian/chain-provider";
import { resolveEngineConfig, type EngineConfig } from "./config.js";
import { advance, createRecord, type RecordPatch } from "./records.js";
import { InMemoryTransactionStore, type TransactionStore } from "./store.js";
import { WalletLock } from "./wallet-lock.js";

// =============================================================================
// Types
// =============================================================================

/** The parts of a wallet the engine needs to sign for it */
export type SigningWallet = Pick<WalletRecord, "id" | "chain" | "address" | "encryptedKey">;

export type TransferParams = Omit<TransferRequest, "walletId">;

export interface TransferOptions {
  readonly signal?: AbortSignal;
  /** Poll after submission until the transfer is final or the budget runs out */
  readonly waitForConfirmation?: boolean;
}

export interface TransactionEngineOptions {
  readonly providers: ChainProviderRegistry;
  readonly vault: KeyVault;
  readonly store?: TransactionStore;
  readonly config?: Partial<EngineConfig>;
  readonly logger?: Logger;
  readonly clock?: () => Date;
  readonly generateId?: () => string;
}

const FAILED_ON_CHAIN: RecordedError = {
  code: "TRANSACTION_REJECTED",
  message: "Transaction failed on chain",
};

const EXPIRED: RecordedError = {
  code: "TRANSACTION_REJECTED",
  message: "Transaction expired before it was included",
};

// =============================================================================
// Engine
// =============================================================================

export class TransactionEngine {
  readonly store: TransactionStore;
  readonly config: EngineConfig;
  private readonly providers: ChainProviderRegistry;
  private readonly vault: KeyVault;
  private readonly lock = new WalletLock();
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(options: TransactionEngineOptions) {
    this.providers = options.providers;
    this.vault = options.vault;
    this.store = options.store ?? new InMemoryTransactionStore();
    this.config = resolveEngineConfig(options.config);
    this.logger = (options.logger ?? pino({ level: "silent" })).child({ component: "tx-engine" });
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transfers
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Fee of a transfer as it would be built now. Nothing is recorded.
   */
  async estimate(wallet: SigningWallet, params: TransferParams, signal?: AbortSignal): Promise<FeeEstimate> {
    const provider = this.providers.get(wallet.chain);
    const unsigned = provider.buildTransfer(intentOf(wallet, params));
    const priced = await provider.estimateFee(unsigned, params.fees, callOptions(signal));
    return priced.fee;
  }

  /**
   * Run one transfer. Resolves with the record in its latest state;
   * inspect `state` for the outcome.
   *
   * @throws WalletError for failures before a record exists (validation,
   *         fee estimation, fund check, early cancellation)
   */
  async transfer(
    wallet: SigningWallet,
    params: TransferParams,
    options: TransferOptions = {},
  ): Promise<TransactionRecord> {
    const { signal } = options;
    throwIfCancelled(signal);

    const provider = this.providers.get(wallet.chain);
    const unsigned = provider.buildTransfer(intentOf(wallet, params));
    const priced = await provider.estimateFee(unsigned, params.fees, callOptions(signal));
    await this.checkFunds(provider, priced, signal);
    throwIfCancelled(signal);

    const built = createRecord(
      {
        id: this.generateId(),
        walletId: wallet.id,
        chain: wallet.chain,
        from: priced.from,
        to: priced.to,
        amount: priced.amount,
        ...(priced.token !== undefined ? { token: priced.token } : {}),
        fee: priced.fee.total,
      },
      this.timestamp(),
    );
    await this.store.save(built);
    this.logger.info(
      { recordId: built.id, walletId: wallet.id, chain: wallet.chain, token: built.token?.symbol },
      "Transaction built",
    );

    let record = await this.lock.run(wallet.id, () =>
      this.signAndSubmit(built, wallet, provider, priced, signal),
    );

    if (options.waitForConfirmation === true && record.state === "submitted") {
      record = await this.awaitFinal(record, provider, signal);
    }
    return record;
  }

  /**
   * One independent transfer per recipient. Outcomes are in input order;
   * a failing recipient does not stop the others.
   */
  async transferBatch(
    wallet: SigningWallet,
    recipients: readonly BatchRecipient[],
    options: TransferOptions = {},
  ): Promise<readonly BatchOutcome[]> {
    return Promise.all(
      recipients.map(async (recipient, index): Promise<BatchOutcome> => {
        try {
          const record = await this.transfer(wallet, recipient, options);
          return outcomeOf(index, recipient.to, record);
        } catch (err: unknown) {
          return { index, to: recipient.to, ok: false, error: this.toRecordedError(err) };
        }
      }),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Records
  // ───────────────────────────────────────────────────────────────────────

  /**
   * @throws WalletError TRANSACTION_NOT_FOUND
   */
  async getRecord(recordId: string): Promise<TransactionRecord> {
    const record = await this.store.get(recordId);
    if (record === undefined) {
      throw new WalletError("TRANSACTION_NOT_FOUND", `Transaction ${recordId} not found`, { recordId });
    }
    return record;
  }

  listByWallet(walletId: string): Promise<readonly TransactionRecord[]> {
    return this.store.listByWallet(walletId);
  }

  /**
   * Re-query the chain for a submitted or ambiguous record and advance
   * it. Records in other states are returned unchanged. Runs in the
   * wallet's scope, so concurrent reconciles apply one outcome.
   *
   * @throws WalletError TRANSACTION_NOT_FOUND, or a provider error
   */
  async reconcile(recordId: string, signal?: AbortSignal): Promise<TransactionRecord> {
    const { walletId } = await this.getRecord(recordId);
    return this.lock.run(walletId, async () => {
      const record = await this.getRecord(recordId);
      if (!awaitsChain(record) || record.hash === undefined) return record;
      const provider = this.providers.get(record.chain);
      const status = await provider.getTransactionStatus(record.hash, contextOf(record), callOptions(signal));
      this.logger.debug({ recordId, status }, "Reconciled transaction status");
      return this.applyStatus(record, status);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private async signAndSubmit(
    built: TransactionRecord,
    wallet: SigningWallet,
    provider: ChainProvider,
    priced: PricedTransfer,
    signal: AbortSignal | undefined,
  ): Promise<TransactionRecord> {
    let record = built;
    let signed: SignedTransfer;
    try {
      throwIfCancelled(signal);
      const sequenced = await provider.resolveSequence(priced, callOptions(signal));
      signed = await this.vault.withDecryptedKey(
        wallet.encryptedKey,
        walletAssociatedData(wallet.chain, wallet.address),
        (keyMaterial) => {
          if (provider.addressFromKey(keyMaterial) !== wallet.address) {
            throw new WalletError("DECRYPTION_FAILED", "Decrypted key does not match the wallet address", {
              walletId: wallet.id,
            });
          }
          return provider.sign(sequenced, keyMaterial);
        },
      );
      const { lastValidBlockHeight } = signed.context;
      record = await this.move(record, "signed", {
        hash: signed.hash,
        ...(lastValidBlockHeight !== undefined ? { lastValidBlockHeight } : {}),
      });
      throwIfCancelled(signal);
    } catch (err: unknown) {
      return this.fail(record, err);
    }

    let result: SubmitResult;
    try {
      result = await provider.submit(signed);
    } catch (err: unknown) {
      if (isSubmissionOutcomeUnknown(err)) {
        return this.resolveAmbiguity(record, provider, signed, err.endpoint, signal);
      }
      return this.fail(record, err);
    }
    return this.move(record, "submitted", { submittedVia: result.endpoint });
  }

  /**
   * The submission may or may not have landed. Ask the chain a bounded
   * number of times; never send again.
   */
  private async resolveAmbiguity(
    record: TransactionRecord,
    provider: ChainProvider,
    signed: SignedTransfer,
    endpoint: string,
    signal: AbortSignal | undefined,
  ): Promise<TransactionRecord> {
    this.logger.warn({ recordId: record.id, hash: signed.hash, endpoint }, "Submission outcome unknown");
    const status = await this.pollStatus(
      provider,
      signed.hash,
      signed.context,
      this.config.statusPollAttempts,
      this.config.statusPollIntervalMs,
      signal,
      (s) => s !== "unknown",
    );

    const via: RecordPatch = { submittedVia: endpoint };
    switch (status) {
      case "pending":
        return this.move(record, "submitted", via);
      case "confirmed":
        return this.move(await this.move(record, "submitted", via), "confirmed", {});
      case "failed":
        return this.move(record, "failed", { ...via, error: FAILED_ON_CHAIN });
      case "expired":
        return this.move(record, "failed", { ...via, error: EXPIRED });
      case "unknown":
        return this.move(record, "ambiguous", via);
    }
  }

  private async awaitFinal(
    record: TransactionRecord,
    provider: ChainProvider,
    signal: AbortSignal | undefined,
  ): Promise<TransactionRecord> {
    if (record.hash === undefined) return record;
    const status = await this.pollStatus(
      provider,
      record.hash,
      contextOf(record),
      this.config.confirmationPollAttempts,
      this.config.confirmationPollIntervalMs,
      signal,
      (s) => s === "confirmed" || s === "failed" || s === "expired",
    );
    return this.lock.run(record.walletId, async () =>
      this.applyStatus(await this.getRecord(record.id), status),
    );
  }

  /**
   * Advance a record by a chain status. Call inside the wallet's scope
   * with a record read there; one that no longer awaits the chain is
   * returned as stored.
   */
  private async applyStatus(record: TransactionRecord, status: TransactionStatus): Promise<TransactionRecord> {
    if (!awaitsChain(record)) return record;
    switch (status) {
      case "confirmed":
        return this.move(record, "confirmed", {});
      case "failed":
        return this.move(record, "failed", { error: FAILED_ON_CHAIN });
      case "expired":
        return this.move(record, "failed", { error: EXPIRED });
      case "pending":
        return record.state === "ambiguous" ? this.move(record, "submitted", {}) : record;
      case "unknown":
        return record;
    }
  }

  /**
   * Query up to `attempts` times, `intervalMs` apart, until `done` holds.
   * Stops early on abort. Query errors count as "unknown".
   */
  private async pollStatus(
    provider: ChainProvider,
    hash: TxHash,
    context: StatusContext,
    attempts: number,
    intervalMs: number,
    signal: AbortSignal | undefined,
    done: (status: TransactionStatus) => boolean,
  ): Promise<TransactionStatus> {
    let status: TransactionStatus = "unknown";
    for (let attempt = 0; attempt < attempts; attempt++) {
      if (attempt > 0) await delay(intervalMs, signal);
      if (signal?.aborted === true) break;
      try {
        status = await provider.getTransactionStatus(hash, context);
      } catch (err: unknown) {
        this.logger.warn({ hash, attempt, err }, "Status query failed");
        status = "unknown";
      }
      if (done(status)) break;
    }
    return status;
  }

  private async checkFunds(
    provider: ChainProvider,
    priced: PricedTransfer,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const native = provider.nativeAsset();
    const fee = priced.fee.total;
    const options = callOptions(signal);

    if (priced.token === undefined) {
      const balance = await provider.queryBalance(priced.from, undefined, options);
      const required = priced.amount + fee;
      if (balance < required) throw insufficient(native.symbol, required, balance);
      return;
    }

    const [tokenBalance, nativeBalance] = await Promise.all([
      provider.queryBalance(priced.from, priced.token, options),
      provider.queryBalance(priced.from, undefined, options),
    ]);
    if (tokenBalance < priced.amount) throw insufficient(priced.token.symbol, priced.amount, tokenBalance);
    if (nativeBalance < fee) throw insufficient(native.symbol, fee, nativeBalance);
  }

  private async move(
    record: TransactionRecord,
    to: TransactionState,
    patch: RecordPatch,
  ): Promise<TransactionRecord> {
    const next = advance(record, to, patch, this.timestamp());
    await this.store.save(next, record.state);
    this.logger.info(
      {
        recordId: next.id,
        walletId: next.walletId,
        chain: next.chain,
        from: record.state,
        to,
        hash: next.hash,
        error: next.error?.code,
      },
      "Transaction state changed",
    );
    return next;
  }

  private fail(record: TransactionRecord, err: unknown): Promise<TransactionRecord> {
    return this.move(record, "failed", { error: this.toRecordedError(err) });
  }

  private toRecordedError(err: unknown): RecordedError {
    if (isWalletError(err)) return { code: err.code, message: err.message };
    this.logger.error({ err }, "Unexpected transfer error");
    return { code: "TRANSACTION_REJECTED", message: "Internal error" };
  }

  private timestamp(): string {
    return this.clock().toISOString();
  }
}

// =============================================================================
// Helpers
// =============================================================================

function intentOf(wallet: SigningWallet, params: TransferParams): TransferIntent {
  return {
    from: wallet.address,
    to: params.to,
    amount: params.amount,
    ...(params.token !== undefined ? { token: params.token } : {}),
  };
}

function callOptions(signal: AbortSignal | undefined): CallOptions {
  return signal !== undefined ? { signal } : {};
}

function awaitsChain(record: TransactionRecord): boolean {
  return record.state === "submitted" || record.state === "ambiguous";
}

function contextOf(record: TransactionRecord): StatusContext {
  return record.lastValidBlockHeight !== undefined
    ? { lastValidBlockHeight: record.lastValidBlockHeight }
    : {};
}

function outcomeOf(index: number, to: string, record: TransactionRecord): BatchOutcome {
  switch (record.state) {
    case "submitted":
    case "confirmed":
      return { index, to, ok: true, record };
    case "ambiguous":
      return {
        index,
        to,
        ok: false,
        error: { code: "AMBIGUOUS_SUBMISSION", message: "Submission outcome unknown" },
        record,
      };
    default:
      return {
        index,
        to,
        ok: false,
        error: record.error ?? { code: "TRANSACTION_REJECTED", message: `Transfer ended ${record.state}` },
        record,
      };
  }
}

function insufficient(symbol: string, required: bigint, available: bigint): WalletError {
  return new WalletError("INSUFFICIENT_FUNDS", `Insufficient ${symbol} balance`, {
    symbol,
    required: required.toString(),
    available: available.toString(),
  });
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted === true) {
    throw new WalletError("CANCELLED", "Transfer cancelled", undefined, { cause: signal.reason });
  }
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
function delay(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted === true) {
      resolve();
      return;
    }
    const finish = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal?.addEventListener("abort", finish, { once: true });
  });
}
