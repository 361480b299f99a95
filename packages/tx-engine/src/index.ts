/**
 * @custodian/tx-engine: Sequenced, serialised transfers with a
 * per-attempt record.
 */

export type { EngineConfig } from "./config.js";
export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from "./config.js";

export type { NewRecord, RecordPatch } from "./records.js";
export { TransactionStateError, canTransition, isFinal, createRecord, advance } from "./records.js";

export type { TransactionStore } from "./store.js";
export { InMemoryTransactionStore, StaleRecordError } from "./store.js";

export { WalletLock } from "./wallet-lock.js";

export type {
  SigningWallet,
  TransferParams,
  TransferOptions,
  TransactionEngineOptions,
} from "./engine.js";
export { TransactionEngine } from "./engine.js";
