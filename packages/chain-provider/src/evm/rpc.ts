/**
 * EvmRpc: the narrow slice of an EVM node the provider uses.
 *
 * ViemEvmRpc backs it with a viem public client per endpoint. Retries are
 * disabled in the transport: the failover pool owns retry policy.
 */

import {
  TransactionNotFoundError,
  TransactionReceiptNotFoundError,
  createPublicClient,
  erc20Abi,
  http,
  type Address,
  type Chain,
  type Hash,
  type Hex,
  type HttpTransport,
  type PublicClient,
} from "viem";
import type { Logger } from "pino";
import type { ChainTag } from "@custodian/types";
import type { RpcFailoverManager, RpcPool } from "@custodian/rpc-failover";
import type { EvmNetwork } from "./networks.js";

export interface EvmGasRequest {
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
  readonly data?: Hex;
}

export interface EvmFeesPerGas {
  readonly maxFeePerGas: bigint;
  readonly maxPriorityFeePerGas: bigint;
}

export type EvmReceiptStatus = "success" | "reverted";

export interface EvmRpc {
  getBalance(address: Address): Promise<bigint>;
  getTokenBalance(token: Address, owner: Address): Promise<bigint>;
  estimateGas(request: EvmGasRequest): Promise<bigint>;
  getGasPrice(): Promise<bigint>;
  estimateFeesPerGas(): Promise<EvmFeesPerGas>;
  getPendingNonce(address: Address): Promise<number>;
  sendRawTransaction(raw: Hex): Promise<Hash>;
  /** null when no receipt exists yet */
  getReceiptStatus(hash: Hash): Promise<EvmReceiptStatus | null>;
  /** true when the node knows the transaction (mempool or mined) */
  hasTransaction(hash: Hash): Promise<boolean>;
  getBlockNumber(): Promise<bigint>;
}

export class ViemEvmRpc implements EvmRpc {
  private readonly client: PublicClient<HttpTransport, Chain>;

  constructor(url: string, chain: Chain, timeoutMs: number) {
    this.client = createPublicClient({
      chain,
      transport: http(url, { retryCount: 0, timeout: timeoutMs }),
    });
  }

  getBalance(address: Address): Promise<bigint> {
    return this.client.getBalance({ address });
  }

  getTokenBalance(token: Address, owner: Address): Promise<bigint> {
    return this.client.readContract({
      address: token,
      abi: erc20Abi,
      functionName: "balanceOf",
      args: [owner],
    });
  }

  estimateGas(request: EvmGasRequest): Promise<bigint> {
    return this.client.estimateGas({
      account: request.from,
      to: request.to,
      value: request.value,
      ...(request.data !== undefined ? { data: request.data } : {}),
    });
  }

  getGasPrice(): Promise<bigint> {
    return this.client.getGasPrice();
  }

  async estimateFeesPerGas(): Promise<EvmFeesPerGas> {
    const fees = await this.client.estimateFeesPerGas({ type: "eip1559" });
    return {
      maxFeePerGas: fees.maxFeePerGas,
      maxPriorityFeePerGas: fees.maxPriorityFeePerGas,
    };
  }

  getPendingNonce(address: Address): Promise<number> {
    return this.client.getTransactionCount({ address, blockTag: "pending" });
  }

  sendRawTransaction(raw: Hex): Promise<Hash> {
    return this.client.sendRawTransaction({ serializedTransaction: raw });
  }

  async getReceiptStatus(hash: Hash): Promise<EvmReceiptStatus | null> {
    try {
      const receipt = await this.client.getTransactionReceipt({ hash });
      return receipt.status;
    } catch (err: unknown) {
      if (err instanceof TransactionReceiptNotFoundError) return null;
      throw err;
    }
  }

  async hasTransaction(hash: Hash): Promise<boolean> {
    try {
      await this.client.getTransaction({ hash });
      return true;
    } catch (err: unknown) {
      if (err instanceof TransactionNotFoundError) return false;
      throw err;
    }
  }

  getBlockNumber(): Promise<bigint> {
    return this.client.getBlockNumber();
  }
}

export function probeEvm(rpc: EvmRpc): Promise<bigint> {
  return rpc.getBlockNumber();
}

/**
 * Build and register the failover pool of an EVM chain.
 */
export function createEvmPool(
  manager: RpcFailoverManager,
  network: EvmNetwork,
  urls: readonly string[],
  logger?: Logger,
): RpcPool<EvmRpc> {
  const chain: ChainTag = network.chain;
  logger?.debug({ chain, endpoints: urls.length }, "Creating EVM pool");
  return manager.createPool<EvmRpc>({
    chain,
    endpoints: urls.map((url) => ({
      url,
      client: new ViemEvmRpc(url, network.viemChain, manager.config.attemptTimeoutMs),
    })),
    probe: probeEvm,
  });
}
