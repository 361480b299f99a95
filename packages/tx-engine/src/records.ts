/**
 * Transaction record state machine.
 *
 * Rules:
 * - One record per transfer attempt
 * - Only declared transitions are allowed
 * - "confirmed" and "failed" are final; a final record never changes
 */

import type {
  ChainTag,
  RecordedError,
  TokenRef,
  TransactionRecord,
  TransactionState,
  TxHash,
} from "@custodian/types";

// =============================================================================
// Error
// =============================================================================

export class TransactionStateError extends Error {
  constructor(
    public readonly recordId: string,
    public readonly from: TransactionState,
    public readonly to: TransactionState,
  ) {
    super(`Record ${recordId}: cannot move from ${from} to ${to}`);
    this.name = "TransactionStateError";
  }
}

// =============================================================================
// Transitions
// =============================================================================

const VALID_TRANSITIONS: Readonly<Record<TransactionState, readonly TransactionState[]>> = {
  built: ["signed", "failed"],
  signed: ["submitted", "ambiguous", "failed"],
  submitted: ["confirmed", "failed"],
  ambiguous: ["submitted", "confirmed", "failed"],
  confirmed: [],
  failed: [],
};

export function canTransition(from: TransactionState, to: TransactionState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isFinal(state: TransactionState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}

// =============================================================================
// Records
// =============================================================================

export interface NewRecord {
  readonly id: string;
  readonly walletId: string;
  readonly chain: ChainTag;
  readonly from: string;
  readonly to: string;
  readonly amount: bigint;
  readonly token?: TokenRef;
  readonly fee?: bigint;
}

export interface RecordPatch {
  readonly hash?: TxHash;
  readonly submittedVia?: string;
  readonly lastValidBlockHeight?: number;
  readonly error?: RecordedError;
}

export function createRecord(input: NewRecord, at: string): TransactionRecord {
  const base: TransactionRecord = {
    id: input.id,
    walletId: input.walletId,
    chain: input.chain,
    from: input.from,
    to: input.to,
    amount: input.amount.toString(),
    state: "built",
    transitions: [{ state: "built", at }],
    createdAt: at,
    updatedAt: at,
  };
  return {
    ...base,
    ...(input.token !== undefined
      ? { token: { symbol: input.token.symbol, address: input.token.address, decimals: input.token.decimals } }
      : {}),
    ...(input.fee !== undefined ? { fee: input.fee.toString() } : {}),
  };
}

/**
 * @throws TransactionStateError on an undeclared transition
 */
export function advance(
  record: TransactionRecord,
  to: TransactionState,
  patch: RecordPatch,
  at: string,
): TransactionRecord {
  if (!canTransition(record.state, to)) {
    throw new TransactionStateError(record.id, record.state, to);
  }
  return {
    ...record,
    ...patch,
    state: to,
    transitions: [...record.transitions, { state: to, at }],
    updatedAt: at,
  };
}
