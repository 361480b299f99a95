/**
 * Transfer Types
 *
 * Requests, fee shapes and the per-attempt transaction record.
 *
 * Rules:
 * - Amounts are bigint in smallest units on the way in, decimal strings
 *   once recorded; never floating point
 * - A record is immutable once it reaches "confirmed" or "failed"
 */

import type { ChainTag, TxHash } from "./chain.js";
import type { WalletErrorCode } from "./errors.js";

// =============================================================================
// Requests
// =============================================================================

/**
 * Caller-supplied fee knobs. Fields that do not apply to a chain family are
 * ignored by that family.
 */
export interface FeeOverrides {
  /** EVM gas limit */
  readonly gasLimit?: bigint;
  /** EVM legacy gas price (wei) */
  readonly gasPrice?: bigint;
  /** EIP-1559 max fee per gas (wei) */
  readonly maxFeePerGas?: bigint;
  /** EIP-1559 priority fee per gas (wei) */
  readonly maxPriorityFeePerGas?: bigint;
  /** Solana compute-unit limit */
  readonly computeUnitLimit?: number;
  /** Solana compute-unit price (micro-lamports per CU) */
  readonly computeUnitPrice?: bigint;
}

/**
 * A transfer from a custodial wallet.
 */
export interface TransferRequest {
  readonly walletId: string;
  readonly to: string;

  /** Smallest-unit amount; must be positive */
  readonly amount: bigint;

  /** Token symbol or contract/mint; absent for the native asset */
  readonly token?: string;

  readonly fees?: FeeOverrides;
}

/**
 * One recipient of a batch.
 */
export interface BatchRecipient {
  readonly to: string;
  readonly amount: bigint;
  readonly token?: string;
  readonly fees?: FeeOverrides;
}

// =============================================================================
// Fees
// =============================================================================

export interface EvmFeeEstimate {
  readonly family: "evm";
  readonly gasLimit: bigint;
  /** Present for legacy (type 0) pricing */
  readonly gasPrice?: bigint;
  /** Present for EIP-1559 (type 2) pricing */
  readonly maxFeePerGas?: bigint;
  readonly maxPriorityFeePerGas?: bigint;
  /** Upper bound of the fee in wei */
  readonly total: bigint;
}

export interface SolanaFeeEstimate {
  readonly family: "solana";
  readonly computeUnitLimit: number;
  /** Micro-lamports per compute unit */
  readonly computeUnitPrice: bigint;
  /** Signature fee in lamports */
  readonly baseFee: bigint;
  /** Rent for creating the recipient's token account, when it is missing */
  readonly accountRent?: bigint;
  /** Upper bound of the fee in lamports */
  readonly total: bigint;
}

export type FeeEstimate = EvmFeeEstimate | SolanaFeeEstimate;

// =============================================================================
// Transaction Record
// =============================================================================

export type TransactionState =
  | "built"
  | "signed"
  | "submitted"
  | "confirmed"
  | "failed"
  | "ambiguous";

export interface TokenRef {
  readonly symbol: string;
  /** Contract (EVM) or mint (Solana) */
  readonly address: string;
  readonly decimals: number;
}

export interface StateTransition {
  readonly state: TransactionState;
  readonly at: string;
}

export interface RecordedError {
  readonly code: WalletErrorCode;
  readonly message: string;
}

/**
 * One transfer attempt.
 */
export interface TransactionRecord {
  readonly id: string;
  readonly walletId: string;
  readonly chain: ChainTag;
  readonly from: string;
  readonly to: string;

  /** Smallest-unit amount as a decimal string */
  readonly amount: string;
  readonly token?: TokenRef;

  readonly state: TransactionState;

  /** Hash (EVM) or signature (Solana), known from signing onwards */
  readonly hash?: TxHash;

  /** Endpoint the submission went through */
  readonly submittedVia?: string;

  /** Solana only: block height after which the signed transaction cannot land */
  readonly lastValidBlockHeight?: number;

  /** Fee upper bound in native smallest units */
  readonly fee?: string;

  readonly error?: RecordedError;
  readonly transitions: readonly StateTransition[];
  readonly createdAt: string;
  readonly updatedAt: string;
}

/**
 * Outcome of one batch recipient: either a record, or the error that
 * stopped it before a record could progress.
 */
export type BatchOutcome =
  | { readonly index: number; readonly to: string; readonly ok: true; readonly record: TransactionRecord }
  | {
      readonly index: number;
      readonly to: string;
      readonly ok: false;
      readonly error: RecordedError;
      readonly record?: TransactionRecord;
    };
