/**
 * EvmChainProvider: Ethereum and BNB Smart Chain.
 *
 * Native transfers carry the amount in `value`; ERC-20 transfers call
 * `transfer(address,uint256)` on the token contract with zero value.
 * Every network call goes through the chain's failover pool.
 *
 * Nonces: the pending nonce comes from whichever endpoint serves the
 * read, and a lagging endpoint can report one this process already
 * spent. The provider keeps a floor per sender (one past the last nonce
 * submitted, or possibly submitted) and never signs below it. Callers
 * serialise resolveSequence → submit per sender.
 */

import pino, { type Logger } from "pino";
import {
  bytesToHex,
  encodeFunctionData,
  erc20Abi,
  getAddress,
  isAddress,
  isHash,
  isHex,
  keccak256,
  parseTransaction,
  type Address,
  type Hex,
} from "viem";
import { privateKeyToAccount, privateKeyToAddress } from "viem/accounts";
import {
  WalletError,
  type ChainTag,
  type EvmFeeEstimate,
  type FeeOverrides,
  type TxHash,
} from "@custodian/types";
import { deriveFromSeed } from "@custodian/key-vault";
import {
  isSubmissionOutcomeUnknown,
  toChainStatus,
  type CallOptions,
  type ChainStatus,
  type RpcPool,
} from "@custodian/rpc-failover";
import type {
  ChainProvider,
  EvmPricedTransfer,
  EvmSequencedTransfer,
  EvmUnsignedTransfer,
  PricedTransfer,
  SequencedTransfer,
  SignedTransfer,
  StatusContext,
  SubmitResult,
  TransactionStatus,
  TransferIntent,
  UnsignedTransfer,
} from "../provider.js";
import type { NativeAsset, TokenInfo, TokenRegistry } from "../token-registry.js";
import { MAX_UINT256, assertPositiveAmount } from "../units.js";
import { errorText, toSubmitError } from "../submit-errors.js";
import type { EvmNetwork } from "./networks.js";
import type { EvmRpc } from "./rpc.js";

const INSUFFICIENT_FUNDS = /insufficient funds/i;
const ALREADY_KNOWN = /already known|known transaction/i;
const PRIVATE_KEY_LENGTH = 32;

export interface EvmChainProviderOptions {
  readonly network: EvmNetwork;
  readonly pool: RpcPool<EvmRpc>;
  readonly tokens: TokenRegistry;
  readonly logger?: Logger;
}

export class EvmChainProvider implements ChainProvider {
  readonly family = "evm" as const;
  readonly chain: ChainTag;
  readonly tokens: TokenRegistry;
  private readonly network: EvmNetwork;
  private readonly pool: RpcPool<EvmRpc>;
  private readonly logger: Logger;
  private readonly nonceFloors = new Map<Address, number>();

  constructor(options: EvmChainProviderOptions) {
    this.network = options.network;
    this.chain = options.network.chain;
    this.pool = options.pool;
    this.tokens = options.tokens;
    this.logger = (options.logger ?? pino({ level: "silent" })).child({
      component: "evm-provider",
      chain: this.chain,
    });
  }

  // ===========================================================================
  // Addresses
  // ===========================================================================

  deriveAddress(seed: Uint8Array, derivationIndex: number): string {
    const key = deriveFromSeed(seed, "evm", derivationIndex);
    try {
      return this.addressFromKey(key);
    } finally {
      key.fill(0);
    }
  }

  addressFromKey(keyMaterial: Uint8Array): string {
    if (keyMaterial.length !== PRIVATE_KEY_LENGTH) {
      throw new WalletError("INVALID_PRIVATE_KEY", `EVM key must be ${PRIVATE_KEY_LENGTH} bytes`);
    }
    return privateKeyToAddress(bytesToHex(keyMaterial));
  }

  /**
   * 20-byte hex; a mixed-case address must carry a valid EIP-55 checksum.
   */
  validateAddress(address: string): boolean {
    return isAddress(address, { strict: true });
  }

  normalizeAddress(address: string): Address {
    if (!this.validateAddress(address)) {
      throw new WalletError("INVALID_ADDRESS", `Invalid ${this.chain} address: ${address}`, {
        chain: this.chain,
        address,
      });
    }
    return getAddress(address);
  }

  nativeAsset(): NativeAsset {
    return this.tokens.nativeAsset(this.chain);
  }

  resolveToken(token: string | undefined): TokenInfo | undefined {
    if (token === undefined) return undefined;
    if (token.trim().toUpperCase() === this.nativeAsset().symbol) return undefined;
    return this.tokens.require(this.chain, token);
  }

  // ===========================================================================
  // Transfer pipeline
  // ===========================================================================

  buildTransfer(intent: TransferIntent): EvmUnsignedTransfer {
    const from = this.normalizeAddress(intent.from);
    const to = this.normalizeAddress(intent.to);
    assertPositiveAmount(intent.amount, MAX_UINT256);
    const token = this.resolveToken(intent.token);

    const base = { family: "evm" as const, chain: this.chain, from, to, amount: intent.amount };
    if (token === undefined) {
      return { ...base, call: { to, value: intent.amount } };
    }
    return {
      ...base,
      token,
      call: {
        to: getAddress(token.address),
        value: 0n,
        data: encodeFunctionData({
          abi: erc20Abi,
          functionName: "transfer",
          args: [to, intent.amount],
        }),
      },
    };
  }

  /**
   * Gas limit × per-gas price. A caller's gasPrice selects legacy pricing;
   * a caller's maxFeePerGas, or a chain with EIP-1559, selects type 2.
   */
  async estimateFee(
    tx: UnsignedTransfer,
    overrides: FeeOverrides = {},
    options: CallOptions = {},
  ): Promise<EvmPricedTransfer> {
    const evm = this.expectEvm(tx);
    const from = getAddress(evm.from);

    const gasLimit =
      overrides.gasLimit ??
      (await this.pool.read(
        (rpc) =>
          rpc.estimateGas({
            from,
            to: evm.call.to,
            value: evm.call.value,
            ...(evm.call.data !== undefined ? { data: evm.call.data } : {}),
          }),
        options,
      ));

    const fee = await this.priceGas(gasLimit, overrides, options);
    return { ...evm, fee };
  }

  async resolveSequence(tx: PricedTransfer, options: CallOptions = {}): Promise<EvmSequencedTransfer> {
    if (tx.family !== "evm") throw this.wrongFamily(tx.family);
    const from = getAddress(tx.from);
    const pending = await this.pool.read((rpc) => rpc.getPendingNonce(from), options);
    const floor = this.nonceFloors.get(from) ?? 0;
    if (pending < floor) {
      this.logger.warn({ from, pending, floor }, "Endpoint reported a spent nonce; using local floor");
    }
    return { ...tx, nonce: Math.max(pending, floor) };
  }

  async sign(tx: SequencedTransfer, keyMaterial: Uint8Array): Promise<SignedTransfer> {
    if (tx.family !== "evm") throw this.wrongFamily(tx.family);
    const account = privateKeyToAccount(bytesToHex(keyMaterial));
    if (account.address !== getAddress(tx.from)) {
      throw new WalletError("DECRYPTION_FAILED", "Key material does not control the sending address", {
        chain: this.chain,
      });
    }

    const common = {
      chainId: this.network.chainId,
      nonce: tx.nonce,
      gas: tx.fee.gasLimit,
      to: tx.call.to,
      value: tx.call.value,
      ...(tx.call.data !== undefined ? { data: tx.call.data } : {}),
    };

    let raw: Hex;
    const { gasPrice, maxFeePerGas, maxPriorityFeePerGas } = tx.fee;
    if (gasPrice !== undefined) {
      raw = await account.signTransaction({ ...common, type: "legacy", gasPrice });
    } else if (maxFeePerGas !== undefined && maxPriorityFeePerGas !== undefined) {
      raw = await account.signTransaction({
        ...common,
        type: "eip1559",
        maxFeePerGas,
        maxPriorityFeePerGas,
      });
    } else {
      throw new Error("EvmChainProvider: fee estimate carries no gas price");
    }

    return {
      family: "evm",
      chain: this.chain,
      from: account.address,
      hash: keccak256(raw),
      raw,
      context: {},
    };
  }

  async queryBalance(address: string, token?: TokenInfo, options: CallOptions = {}): Promise<bigint> {
    const owner = this.normalizeAddress(address);
    if (token === undefined) {
      return this.pool.read((rpc) => rpc.getBalance(owner), options);
    }
    const contract = getAddress(token.address);
    return this.pool.read((rpc) => rpc.getTokenBalance(contract, owner), options);
  }

  /**
   * A node that already holds the transaction counts as a successful
   * submission: the hash was fixed at signing.
   */
  async submit(tx: SignedTransfer): Promise<SubmitResult> {
    if (tx.family !== "evm") throw this.wrongFamily(tx.family);
    if (!isHex(tx.raw)) {
      throw new Error("EvmChainProvider: signed transaction is not hex");
    }
    const raw = tx.raw;
    try {
      const { endpoint } = await this.pool.submit(async (rpc) => {
        try {
          return await rpc.sendRawTransaction(raw);
        } catch (err: unknown) {
          if (ALREADY_KNOWN.test(errorText(err))) return tx.hash;
          throw err;
        }
      });
      this.spendNonce(tx.from, raw);
      this.logger.info({ hash: tx.hash, endpoint }, "Transaction submitted");
      return { hash: tx.hash, endpoint };
    } catch (err: unknown) {
      if (isSubmissionOutcomeUnknown(err)) this.spendNonce(tx.from, raw);
      throw toSubmitError(this.chain, err, INSUFFICIENT_FUNDS);
    }
  }

  async getTransactionStatus(
    hash: TxHash,
    _context: StatusContext = {},
    options: CallOptions = {},
  ): Promise<TransactionStatus> {
    if (!isHash(hash)) {
      throw new WalletError("TRANSACTION_NOT_FOUND", `Malformed ${this.chain} transaction hash`, {
        chain: this.chain,
        hash,
      });
    }
    const receipt = await this.pool.read((rpc) => rpc.getReceiptStatus(hash), options);
    if (receipt === "success") return "confirmed";
    if (receipt === "reverted") return "failed";
    const known = await this.pool.read((rpc) => rpc.hasTransaction(hash), options);
    return known ? "pending" : "unknown";
  }

  async probeEndpoints(): Promise<ChainStatus> {
    return toChainStatus(this.chain, await this.pool.probeAll());
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async priceGas(
    gasLimit: bigint,
    overrides: FeeOverrides,
    options: CallOptions,
  ): Promise<EvmFeeEstimate> {
    if (overrides.gasPrice !== undefined) {
      return { family: "evm", gasLimit, gasPrice: overrides.gasPrice, total: gasLimit * overrides.gasPrice };
    }

    if (this.network.eip1559 || overrides.maxFeePerGas !== undefined) {
      let maxFeePerGas = overrides.maxFeePerGas;
      let maxPriorityFeePerGas = overrides.maxPriorityFeePerGas;
      if (maxFeePerGas === undefined || maxPriorityFeePerGas === undefined) {
        const market = await this.pool.read((rpc) => rpc.estimateFeesPerGas(), options);
        maxFeePerGas ??= market.maxFeePerGas;
        maxPriorityFeePerGas ??= market.maxPriorityFeePerGas;
      }
      if (maxPriorityFeePerGas > maxFeePerGas) maxPriorityFeePerGas = maxFeePerGas;
      return {
        family: "evm",
        gasLimit,
        maxFeePerGas,
        maxPriorityFeePerGas,
        total: gasLimit * maxFeePerGas,
      };
    }

    const gasPrice = await this.pool.read((rpc) => rpc.getGasPrice(), options);
    return { family: "evm", gasLimit, gasPrice, total: gasLimit * gasPrice };
  }

  /** Raise the sender's floor past the nonce `raw` was signed with */
  private spendNonce(from: string, raw: Hex): void {
    const { nonce } = parseTransaction(raw);
    if (nonce === undefined) return;
    const sender = getAddress(from);
    const floor = this.nonceFloors.get(sender) ?? 0;
    if (nonce + 1 > floor) this.nonceFloors.set(sender, nonce + 1);
  }

  private expectEvm(tx: UnsignedTransfer): EvmUnsignedTransfer {
    if (tx.family !== "evm") throw this.wrongFamily(tx.family);
    return tx;
  }

  private wrongFamily(family: string): Error {
    return new Error(`EvmChainProvider(${this.chain}): cannot handle a ${family} transfer`);
  }
}
