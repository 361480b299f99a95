/**
 * @custodian/types: Shared domain types for the custodian stack.
 *
 * - Chain tags and static chain facts
 * - Wallet records and creation responses
 * - Transfer requests, fees and transaction records
 * - The WalletError taxonomy
 */

// Chain
export type { ChainTag, ChainFamily, NetworkMode, ChainId, TxHash, ChainInfo } from "./chain.js";
export {
  CHAIN_TAGS,
  CHAINS,
  getChainInfo,
  chainFamily,
  isEvmChain,
  isSolanaChain,
} from "./chain.js";

// Wallet
export type {
  WalletOrigin,
  WalletRecord,
  GeneratedWallet,
  ImportedWallet,
  WalletBalance,
  WalletBalances,
} from "./wallet.js";

// Transfer
export type {
  FeeOverrides,
  TransferRequest,
  BatchRecipient,
  EvmFeeEstimate,
  SolanaFeeEstimate,
  FeeEstimate,
  TransactionState,
  TokenRef,
  StateTransition,
  RecordedError,
  TransactionRecord,
  BatchOutcome,
} from "./transfer.js";

// Errors
export type { WalletErrorCode, ErrorDetail, ErrorEnvelope } from "./errors.js";
export { WalletError, isWalletError, isWalletErrorCode, toErrorEnvelope } from "./errors.js";

// Guards
export {
  isChainTag,
  parseChainTag,
  isTransactionState,
  isWalletOrigin,
  isWalletRecord,
} from "./guards.js";
