/**
 * ChainProvider: one capability set over heterogeneous chain families.
 *
 * A transfer moves through four shapes, each produced by one step:
 *
 *   buildTransfer → UnsignedTransfer      (pure)
 *   estimateFee   → PricedTransfer        (reads fee market)
 *   resolveSequence → SequencedTransfer   (nonce / blockhash)
 *   sign          → SignedTransfer        (no I/O; hash known here)
 *
 * Each shape is a union over families; a provider rejects a transfer of
 * the other family.
 */

import type { TransactionInstruction } from "@solana/web3.js";
import type { Address, Hex } from "viem";
import type {
  ChainFamily,
  ChainTag,
  EvmFeeEstimate,
  FeeOverrides,
  SolanaFeeEstimate,
  TxHash,
} from "@custodian/types";
import type { CallOptions, ChainStatus } from "@custodian/rpc-failover";
import type { NativeAsset, TokenInfo, TokenRegistry } from "./token-registry.js";

// =============================================================================
// Transfer shapes
// =============================================================================

export interface TransferIntent {
  readonly from: string;
  readonly to: string;
  readonly amount: bigint;
  /** Symbol or contract / mint; absent (or the native symbol) for native */
  readonly token?: string;
}

interface TransferBase {
  readonly chain: ChainTag;
  readonly from: string;
  readonly to: string;
  readonly amount: bigint;
  readonly token?: TokenInfo;
}

export interface EvmCall {
  readonly to: Address;
  readonly value: bigint;
  readonly data?: Hex;
}

export interface EvmUnsignedTransfer extends TransferBase {
  readonly family: "evm";
  readonly call: EvmCall;
}

export interface SolanaUnsignedTransfer extends TransferBase {
  readonly family: "solana";
  readonly instructions: readonly TransactionInstruction[];
  /** Set for token transfers: the recipient's associated token account */
  readonly recipientTokenAccount?: string;
}

export type UnsignedTransfer = EvmUnsignedTransfer | SolanaUnsignedTransfer;

export interface EvmPricedTransfer extends EvmUnsignedTransfer {
  readonly fee: EvmFeeEstimate;
}

export interface SolanaPricedTransfer extends SolanaUnsignedTransfer {
  readonly fee: SolanaFeeEstimate;
}

export type PricedTransfer = EvmPricedTransfer | SolanaPricedTransfer;

export interface EvmSequencedTransfer extends EvmPricedTransfer {
  readonly nonce: number;
}

export interface SolanaSequencedTransfer extends SolanaPricedTransfer {
  readonly blockhash: string;
  readonly lastValidBlockHeight: number;
}

export type SequencedTransfer = EvmSequencedTransfer | SolanaSequencedTransfer;

/**
 * Context needed to interpret a status query later.
 */
export interface StatusContext {
  /** Solana: the signed transaction cannot land above this height */
  readonly lastValidBlockHeight?: number;
}

export interface SignedTransfer {
  readonly family: ChainFamily;
  readonly chain: ChainTag;
  readonly from: string;
  /** Transaction hash (EVM) or first signature (Solana) */
  readonly hash: TxHash;
  /** 0x-hex (EVM) or base64 (Solana) wire encoding */
  readonly raw: string;
  readonly context: StatusContext;
}

export interface SubmitResult {
  readonly hash: TxHash;
  /** Redacted endpoint the transaction went through */
  readonly endpoint: string;
}

/**
 * - confirmed: included and succeeded
 * - failed:    included and reverted / errored
 * - pending:   seen by the node, not yet final
 * - expired:   Solana blockhash lapsed without the signature landing
 * - unknown:   not seen
 */
export type TransactionStatus = "confirmed" | "failed" | "pending" | "expired" | "unknown";

// =============================================================================
// Provider
// =============================================================================

export interface ChainProvider {
  readonly chain: ChainTag;
  readonly family: ChainFamily;
  readonly tokens: TokenRegistry;

  /** Address at `derivationIndex` of a BIP-39 seed. Pure. */
  deriveAddress(seed: Uint8Array, derivationIndex: number): string;

  /** Address controlled by raw key material. Pure. */
  addressFromKey(keyMaterial: Uint8Array): string;

  validateAddress(address: string): boolean;

  /**
   * Canonical form of a valid address (EIP-55 for EVM).
   *
   * @throws WalletError INVALID_ADDRESS
   */
  normalizeAddress(address: string): string;

  nativeAsset(): NativeAsset;

  /**
   * Resolve a token reference; undefined means the native asset.
   *
   * @throws WalletError UNSUPPORTED_TOKEN
   */
  resolveToken(token: string | undefined): TokenInfo | undefined;

  /**
   * @throws WalletError INVALID_ADDRESS | INVALID_AMOUNT | UNSUPPORTED_TOKEN
   */
  buildTransfer(intent: TransferIntent): UnsignedTransfer;

  estimateFee(
    tx: UnsignedTransfer,
    overrides?: FeeOverrides,
    options?: CallOptions,
  ): Promise<PricedTransfer>;

  resolveSequence(tx: PricedTransfer, options?: CallOptions): Promise<SequencedTransfer>;

  sign(tx: SequencedTransfer, keyMaterial: Uint8Array): Promise<SignedTransfer>;

  /** Balance in smallest units of the native asset or `token` */
  queryBalance(address: string, token?: TokenInfo, options?: CallOptions): Promise<bigint>;

  /**
   * @throws SubmissionOutcomeUnknownError when the outcome cannot be known
   * @throws WalletError INSUFFICIENT_FUNDS | TRANSACTION_REJECTED on definite refusal
   */
  submit(tx: SignedTransfer): Promise<SubmitResult>;

  getTransactionStatus(
    hash: TxHash,
    context?: StatusContext,
    options?: CallOptions,
  ): Promise<TransactionStatus>;

  /** Probe every endpoint of the chain */
  probeEndpoints(): Promise<ChainStatus>;
}
