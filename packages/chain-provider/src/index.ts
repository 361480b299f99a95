/**
 * @custodian/chain-provider: One capability set over EVM and Solana.
 *
 * - ChainProvider: build → price → sequence → sign → submit → track
 * - EVM (Ethereum, BNB Smart Chain) over viem
 * - Solana over @solana/web3.js and @solana/spl-token
 * - TokenRegistry of supported tokens per chain
 */

export type {
  TransferIntent,
  EvmCall,
  EvmUnsignedTransfer,
  SolanaUnsignedTransfer,
  UnsignedTransfer,
  EvmPricedTransfer,
  SolanaPricedTransfer,
  PricedTransfer,
  EvmSequencedTransfer,
  SolanaSequencedTransfer,
  SequencedTransfer,
  StatusContext,
  SignedTransfer,
  SubmitResult,
  TransactionStatus,
  ChainProvider,
} from "./provider.js";

export type { TokenInfo, NativeAsset, TokenFile } from "./token-registry.js";
export { TokenRegistry, TokenFileSchema, DEFAULT_TOKEN_FILE } from "./token-registry.js";

export { formatAmount, parseAmount, assertPositiveAmount, MAX_UINT256, MAX_UINT64 } from "./units.js";
export { errorText, toSubmitError } from "./submit-errors.js";

// EVM
export type { EvmNetwork } from "./evm/networks.js";
export { getEvmNetwork } from "./evm/networks.js";
export type { EvmRpc, EvmGasRequest, EvmFeesPerGas, EvmReceiptStatus } from "./evm/rpc.js";
export { ViemEvmRpc, createEvmPool, probeEvm } from "./evm/rpc.js";
export type { EvmChainProviderOptions } from "./evm/evm-provider.js";
export { EvmChainProvider } from "./evm/evm-provider.js";

// Solana
export type { SolanaRpc, SolanaBlockhash, SolanaSignatureStatus } from "./solana/rpc.js";
export { Web3SolanaRpc, createSolanaPool, probeSolana, tokenAmountOf, median } from "./solana/rpc.js";
export type { SolanaChainProviderOptions } from "./solana/solana-provider.js";
export {
  SolanaChainProvider,
  BASE_SIGNATURE_FEE,
  NATIVE_COMPUTE_UNIT_LIMIT,
  TOKEN_COMPUTE_UNIT_LIMIT,
  TOKEN_ACCOUNT_SIZE,
  priorityFee,
} from "./solana/solana-provider.js";

// Registry
export type { ChainProviderSetup } from "./registry.js";
export { ChainProviderRegistry } from "./registry.js";
