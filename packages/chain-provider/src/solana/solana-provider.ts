/**
 * SolanaChainProvider: native SOL and SPL token transfers.
 *
 * Token transfers create the recipient's associated token account
 * idempotently and move funds with TransferChecked. Compute-budget
 * instructions are prepended at signing, once the fee is fixed.
 */

import bs58 from "bs58";
import pino, { type Logger } from "pino";
import {
  ComputeBudgetProgram,
  Keypair,
  PublicKey,
  SystemProgram,
  Transaction,
} from "@solana/web3.js";
import {
  createAssociatedTokenAccountIdempotentInstruction,
  createTransferCheckedInstruction,
  getAssociatedTokenAddressSync,
} from "@solana/spl-token";
import {
  WalletError,
  type FeeOverrides,
  type SolanaFeeEstimate,
  type TxHash,
} from "@custodian/types";
import { deriveFromSeed } from "@custodian/key-vault";
import { toChainStatus, type CallOptions, type ChainStatus, type RpcPool } from "@custodian/rpc-failover";
import type {
  ChainProvider,
  PricedTransfer,
  SequencedTransfer,
  SignedTransfer,
  SolanaPricedTransfer,
  SolanaSequencedTransfer,
  SolanaUnsignedTransfer,
  StatusContext,
  SubmitResult,
  TransactionStatus,
  TransferIntent,
  UnsignedTransfer,
} from "../provider.js";
import type { NativeAsset, TokenInfo, TokenRegistry } from "../token-registry.js";
import { MAX_UINT64, assertPositiveAmount } from "../units.js";
import { errorText, toSubmitError } from "../submit-errors.js";
import type { SolanaRpc } from "./rpc.js";

/** Lamports per signature */
export const BASE_SIGNATURE_FEE = 5000n;
export const NATIVE_COMPUTE_UNIT_LIMIT = 10_000;
export const TOKEN_COMPUTE_UNIT_LIMIT = 100_000;
/** Size of an SPL token account */
export const TOKEN_ACCOUNT_SIZE = 165;

const MICRO_LAMPORTS = 1_000_000n;
const PUBLIC_KEY_LENGTH = 32;
const SECRET_KEY_LENGTH = 64;
const SIGNATURE_LENGTH = 64;

const INSUFFICIENT_FUNDS =
  /insufficient (funds|lamports)|no record of a prior credit|custom program error: 0x1\b/i;
const ALREADY_PROCESSED = /already been processed/i;

export interface SolanaChainProviderOptions {
  readonly pool: RpcPool<SolanaRpc>;
  readonly tokens: TokenRegistry;
  readonly logger?: Logger;
}

export class SolanaChainProvider implements ChainProvider {
  readonly family = "solana" as const;
  readonly chain = "SOLANA" as const;
  readonly tokens: TokenRegistry;
  private readonly pool: RpcPool<SolanaRpc>;
  private readonly logger: Logger;

  constructor(options: SolanaChainProviderOptions) {
    this.pool = options.pool;
    this.tokens = options.tokens;
    this.logger = (options.logger ?? pino({ level: "silent" })).child({
      component: "solana-provider",
      chain: this.chain,
    });
  }

  // ===========================================================================
  // Addresses
  // ===========================================================================

  deriveAddress(seed: Uint8Array, derivationIndex: number): string {
    const key = deriveFromSeed(seed, "solana", derivationIndex);
    try {
      return this.addressFromKey(key);
    } finally {
      key.fill(0);
    }
  }

  /**
   * Accepts a 64-byte secret key or its 32-byte seed half.
   */
  addressFromKey(keyMaterial: Uint8Array): string {
    if (keyMaterial.length !== SECRET_KEY_LENGTH && keyMaterial.length !== PUBLIC_KEY_LENGTH) {
      throw new WalletError("INVALID_PRIVATE_KEY", "Solana key must be 32 or 64 bytes");
    }
    return Keypair.fromSeed(keyMaterial.subarray(0, PUBLIC_KEY_LENGTH)).publicKey.toBase58();
  }

  validateAddress(address: string): boolean {
    try {
      return bs58.decode(address).length === PUBLIC_KEY_LENGTH;
    } catch {
      return false;
    }
  }

  normalizeAddress(address: string): string {
    return this.publicKey(address).toBase58();
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

  buildTransfer(intent: TransferIntent): SolanaUnsignedTransfer {
    const from = this.publicKey(intent.from);
    const to = this.publicKey(intent.to);
    assertPositiveAmount(intent.amount, MAX_UINT64);
    const token = this.resolveToken(intent.token);

    const base = {
      family: "solana" as const,
      chain: this.chain,
      from: from.toBase58(),
      to: to.toBase58(),
      amount: intent.amount,
    };

    if (token === undefined) {
      return {
        ...base,
        instructions: [
          SystemProgram.transfer({ fromPubkey: from, toPubkey: to, lamports: intent.amount }),
        ],
      };
    }

    if (!PublicKey.isOnCurve(to.toBytes())) {
      throw new WalletError("INVALID_ADDRESS", `${base.to} cannot own a token account`, {
        chain: this.chain,
        address: base.to,
      });
    }
    const mint = new PublicKey(token.address);
    const source = getAssociatedTokenAddressSync(mint, from);
    const destination = getAssociatedTokenAddressSync(mint, to);

    return {
      ...base,
      token,
      recipientTokenAccount: destination.toBase58(),
      instructions: [
        createAssociatedTokenAccountIdempotentInstruction(from, destination, to, mint),
        createTransferCheckedInstruction(source, mint, destination, from, intent.amount, token.decimals),
      ],
    };
  }

  /**
   * Base signature fee + compute-unit limit × price, plus rent for the
   * recipient's token account when it does not exist yet.
   */
  async estimateFee(
    tx: UnsignedTransfer,
    overrides: FeeOverrides = {},
    options: CallOptions = {},
  ): Promise<SolanaPricedTransfer> {
    const sol = this.expectSolana(tx);

    const computeUnitLimit =
      overrides.computeUnitLimit ??
      (sol.token === undefined ? NATIVE_COMPUTE_UNIT_LIMIT : TOKEN_COMPUTE_UNIT_LIMIT);
    if (!Number.isInteger(computeUnitLimit) || computeUnitLimit <= 0) {
      throw new WalletError("INVALID_AMOUNT", "Compute-unit limit must be a positive integer");
    }

    const computeUnitPrice =
      overrides.computeUnitPrice ?? (await this.pool.read((rpc) => rpc.getPriorityFee(), options));

    let accountRent: bigint | undefined;
    if (sol.recipientTokenAccount !== undefined) {
      const account = new PublicKey(sol.recipientTokenAccount);
      const exists = await this.pool.read((rpc) => rpc.accountExists(account), options);
      if (!exists) {
        accountRent = await this.pool.read((rpc) => rpc.getRentExemption(TOKEN_ACCOUNT_SIZE), options);
      }
    }

    const fee: SolanaFeeEstimate = {
      family: "solana",
      computeUnitLimit,
      computeUnitPrice,
      baseFee: BASE_SIGNATURE_FEE,
      ...(accountRent !== undefined ? { accountRent } : {}),
      total:
        BASE_SIGNATURE_FEE +
        priorityFee(computeUnitLimit, computeUnitPrice) +
        (accountRent ?? 0n),
    };
    return { ...sol, fee };
  }

  async resolveSequence(tx: PricedTransfer, options: CallOptions = {}): Promise<SolanaSequencedTransfer> {
    if (tx.family !== "solana") throw this.wrongFamily(tx.family);
    const { blockhash, lastValidBlockHeight } = await this.pool.read(
      (rpc) => rpc.getLatestBlockhash(),
      options,
    );
    return { ...tx, blockhash, lastValidBlockHeight };
  }

  async sign(tx: SequencedTransfer, keyMaterial: Uint8Array): Promise<SignedTransfer> {
    if (tx.family !== "solana") throw this.wrongFamily(tx.family);
    if (keyMaterial.length !== SECRET_KEY_LENGTH) {
      throw new WalletError("INVALID_PRIVATE_KEY", "Solana signing key must be 64 bytes");
    }
    const signer = Keypair.fromSecretKey(keyMaterial);
    if (signer.publicKey.toBase58() !== tx.from) {
      throw new WalletError("DECRYPTION_FAILED", "Key material does not control the sending address", {
        chain: this.chain,
      });
    }

    const transaction = new Transaction({
      feePayer: signer.publicKey,
      blockhash: tx.blockhash,
      lastValidBlockHeight: tx.lastValidBlockHeight,
    });
    transaction.add(
      ComputeBudgetProgram.setComputeUnitLimit({ units: tx.fee.computeUnitLimit }),
      ComputeBudgetProgram.setComputeUnitPrice({ microLamports: tx.fee.computeUnitPrice }),
      ...tx.instructions,
    );
    transaction.sign(signer);

    const signature = transaction.signature;
    if (signature === null) {
      throw new Error("SolanaChainProvider: transaction has no fee-payer signature");
    }

    return {
      family: "solana",
      chain: this.chain,
      from: tx.from,
      hash: bs58.encode(signature),
      raw: transaction.serialize().toString("base64"),
      context: { lastValidBlockHeight: tx.lastValidBlockHeight },
    };
  }

  async queryBalance(address: string, token?: TokenInfo, options: CallOptions = {}): Promise<bigint> {
    const owner = this.publicKey(address);
    if (token === undefined) {
      return this.pool.read((rpc) => rpc.getBalance(owner), options);
    }
    const mint = new PublicKey(token.address);
    return this.pool.read((rpc) => rpc.getTokenBalance(owner, mint), options);
  }

  async submit(tx: SignedTransfer): Promise<SubmitResult> {
    if (tx.family !== "solana") throw this.wrongFamily(tx.family);
    const raw = Buffer.from(tx.raw, "base64");
    try {
      const { endpoint } = await this.pool.submit(async (rpc) => {
        try {
          return await rpc.sendRawTransaction(raw);
        } catch (err: unknown) {
          if (ALREADY_PROCESSED.test(errorText(err))) return tx.hash;
          throw err;
        }
      });
      this.logger.info({ hash: tx.hash, endpoint }, "Transaction submitted");
      return { hash: tx.hash, endpoint };
    } catch (err: unknown) {
      throw toSubmitError(this.chain, err, INSUFFICIENT_FUNDS);
    }
  }

  /**
   * A signature the node has never seen is "expired" once the chain has
   * passed the blockhash's last valid height: it can no longer land.
   */
  async getTransactionStatus(
    hash: TxHash,
    context: StatusContext = {},
    options: CallOptions = {},
  ): Promise<TransactionStatus> {
    if (!isSignature(hash)) {
      throw new WalletError("TRANSACTION_NOT_FOUND", "Malformed Solana signature", {
        chain: this.chain,
        hash,
      });
    }
    const status = await this.pool.read((rpc) => rpc.getSignatureStatus(hash), options);
    if (status !== null) {
      if (status.failed) return "failed";
      if (status.confirmationStatus === "confirmed" || status.confirmationStatus === "finalized") {
        return "confirmed";
      }
      return "pending";
    }

    const { lastValidBlockHeight } = context;
    if (lastValidBlockHeight === undefined) return "unknown";
    const height = await this.pool.read((rpc) => rpc.getBlockHeight(), options);
    return height > lastValidBlockHeight ? "expired" : "unknown";
  }

  async probeEndpoints(): Promise<ChainStatus> {
    return toChainStatus(this.chain, await this.pool.probeAll());
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private publicKey(address: string): PublicKey {
    if (!this.validateAddress(address)) {
      throw new WalletError("INVALID_ADDRESS", `Invalid SOLANA address: ${address}`, {
        chain: this.chain,
        address,
      });
    }
    return new PublicKey(address);
  }

  private expectSolana(tx: UnsignedTransfer): SolanaUnsignedTransfer {
    if (tx.family !== "solana") throw this.wrongFamily(tx.family);
    return tx;
  }

  private wrongFamily(family: string): Error {
    return new Error(`SolanaChainProvider: cannot handle a ${family} transfer`);
  }
}

/**
 * Lamports paid for compute-unit priority, rounded up.
 */
export function priorityFee(computeUnitLimit: number, computeUnitPrice: bigint): bigint {
  const microLamports = BigInt(computeUnitLimit) * computeUnitPrice;
  return (microLamports + MICRO_LAMPORTS - 1n) / MICRO_LAMPORTS;
}

function isSignature(value: string): boolean {
  try {
    return bs58.decode(value).length === SIGNATURE_LENGTH;
  } catch {
    return false;
  }
}
