/**
 * SolanaRpc: the narrow slice of a Solana node the provider uses,
 * backed by a web3.js Connection per endpoint.
 */

import { Connection, PublicKey } from "@solana/web3.js";
import type { Logger } from "pino";
import type { RpcFailoverManager, RpcPool } from "@custodian/rpc-failover";

export interface SolanaBlockhash {
  readonly blockhash: string;
  readonly lastValidBlockHeight: number;
}

export interface SolanaSignatureStatus {
  /** The transaction landed and its execution failed */
  readonly failed: boolean;
  readonly confirmationStatus?: "processed" | "confirmed" | "finalized";
}

export interface SolanaRpc {
  getBalance(owner: PublicKey): Promise<bigint>;
  /** Sum over the owner's token accounts of `mint`; 0 when there are none */
  getTokenBalance(owner: PublicKey, mint: PublicKey): Promise<bigint>;
  getLatestBlockhash(): Promise<SolanaBlockhash>;
  /** Median recent prioritization fee, micro-lamports per CU */
  getPriorityFee(): Promise<bigint>;
  accountExists(address: PublicKey): Promise<boolean>;
  getRentExemption(space: number): Promise<bigint>;
  sendRawTransaction(raw: Uint8Array): Promise<string>;
  getSignatureStatus(signature: string): Promise<SolanaSignatureStatus | null>;
  getBlockHeight(): Promise<number>;
  getSlot(): Promise<number>;
}

export class Web3SolanaRpc implements SolanaRpc {
  private readonly connection: Connection;

  constructor(url: string) {
    this.connection = new Connection(url, {
      commitment: "confirmed",
      disableRetryOnRateLimit: true,
    });
  }

  async getBalance(owner: PublicKey): Promise<bigint> {
    return BigInt(await this.connection.getBalance(owner));
  }

  async getTokenBalance(owner: PublicKey, mint: PublicKey): Promise<bigint> {
    const { value } = await this.connection.getParsedTokenAccountsByOwner(owner, { mint });
    let total = 0n;
    for (const { account } of value) {
      total += tokenAmountOf(account.data.parsed);
    }
    return total;
  }

  async getLatestBlockhash(): Promise<SolanaBlockhash> {
    const { blockhash, lastValidBlockHeight } = await this.connection.getLatestBlockhash();
    return { blockhash, lastValidBlockHeight };
  }

  async getPriorityFee(): Promise<bigint> {
    const fees = await this.connection.getRecentPrioritizationFees();
    return BigInt(median(fees.map((f) => f.prioritizationFee)));
  }

  async accountExists(address: PublicKey): Promise<boolean> {
    return (await this.connection.getAccountInfo(address)) !== null;
  }

  async getRentExemption(space: number): Promise<bigint> {
    return BigInt(await this.connection.getMinimumBalanceForRentExemption(space));
  }

  sendRawTransaction(raw: Uint8Array): Promise<string> {
    return this.connection.sendRawTransaction(raw, { maxRetries: 0 });
  }

  async getSignatureStatus(signature: string): Promise<SolanaSignatureStatus | null> {
    const { value } = await this.connection.getSignatureStatuses([signature], {
      searchTransactionHistory: true,
    });
    const status = value[0];
    if (status === undefined || status === null) return null;
    return {
      failed: status.err !== null,
      ...(status.confirmationStatus !== undefined
        ? { confirmationStatus: status.confirmationStatus }
        : {}),
    };
  }

  getBlockHeight(): Promise<number> {
    return this.connection.getBlockHeight();
  }

  getSlot(): Promise<number> {
    return this.connection.getSlot();
  }
}

/**
 * `tokenAmount.amount` of a jsonParsed SPL token account.
 */
export function tokenAmountOf(parsed: unknown): bigint {
  if (typeof parsed !== "object" || parsed === null || !("info" in parsed)) return 0n;
  const { info } = parsed;
  if (typeof info !== "object" || info === null || !("tokenAmount" in info)) return 0n;
  const { tokenAmount } = info;
  if (typeof tokenAmount !== "object" || tokenAmount === null || !("amount" in tokenAmount)) return 0n;
  const { amount } = tokenAmount;
  return typeof amount === "string" && /^\d+$/.test(amount) ? BigInt(amount) : 0n;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return Math.floor(((sorted[mid - 1] ?? 0) + upper) / 2);
}

export function probeSolana(rpc: SolanaRpc): Promise<number> {
  return rpc.getSlot();
}

/**
 * Build and register the failover pool of Solana.
 */
export function createSolanaPool(
  manager: RpcFailoverManager,
  urls: readonly string[],
  logger?: Logger,
): RpcPool<SolanaRpc> {
  logger?.debug({ chain: "SOLANA", endpoints: urls.length }, "Creating Solana pool");
  return manager.createPool<SolanaRpc>({
    chain: "SOLANA",
    endpoints: urls.map((url) => ({ url, client: new Web3SolanaRpc(url) })),
    probe: probeSolana,
  });
}
