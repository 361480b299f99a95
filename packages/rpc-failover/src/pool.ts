/**
 * RpcPool: ranked endpoints of one chain with failover.
 *
 * A call walks the candidates (see selectCandidates) and stops at the first
 * success, at the first terminal error, or after maxEndpointsPerCall
 * distinct endpoints. Each attempt is raced against attemptTimeoutMs and
 * the caller's signal. The clients take no signal, so a request that
 * loses the race is bounded by the client's own transport timeout.
 *
 * Submissions differ from reads: once a request may have reached a node,
 * failing over could broadcast the same transaction twice, so only
 * unreachable and rate-limited failures move on to the next endpoint.
 */

import pino, { type Logger } from "pino";
import { WalletError, type ChainTag } from "@custodian/types";
import { resolveFailoverConfig, type FailoverConfig } from "./config.js";
import { AttemptTimeoutError, SubmissionOutcomeUnknownError } from "./errors.js";
import { classifyRpcError, type ErrorClassifier, type FailureClass } from "./classify.js";
import {
  createEndpointState,
  recordFailure,
  recordSuccess,
  selectCandidates,
  snapshot,
  type EndpointSnapshot,
  type EndpointState,
  type HealthChange,
} from "./endpoint.js";

// =============================================================================
// Types
// =============================================================================

export interface PoolEndpoint<TClient> {
  readonly url: string;
  readonly client: TClient;
}

/**
 * One attempt against one endpoint.
 */
export type RpcCall<TClient, T> = (client: TClient) => Promise<T>;

/**
 * Low-cost liveness check (block number, slot).
 */
export type ProbeFn<TClient> = (client: TClient) => Promise<unknown>;

export interface RpcPoolOptions<TClient> {
  readonly chain: ChainTag;
  readonly endpoints: readonly PoolEndpoint<TClient>[];
  readonly probe: ProbeFn<TClient>;
  readonly config?: Partial<FailoverConfig>;
  readonly classify?: ErrorClassifier;
  readonly logger?: Logger;
  /** Clock, injectable for tests */
  readonly now?: () => number;
}

export interface CallOptions {
  /** Caller cancellation; aborting rejects with CANCELLED */
  readonly signal?: AbortSignal;
}

export interface CallResult<T> {
  readonly value: T;
  /** Redacted endpoint that served the call */
  readonly endpoint: string;
}

type CallKind = "read" | "submit";

interface Member<TClient> {
  readonly state: EndpointState;
  readonly client: TClient;
}

function describeError(err: unknown, cls: FailureClass): string {
  const name = err instanceof Error ? err.name : typeof err;
  return `${name} (${cls})`;
}

// =============================================================================
// Pool
// =============================================================================

export class RpcPool<TClient> {
  readonly chain: ChainTag;
  private readonly members: readonly Member<TClient>[];
  private readonly probeFn: ProbeFn<TClient>;
  private readonly config: FailoverConfig;
  private readonly classify: ErrorClassifier;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: RpcPoolOptions<TClient>) {
    if (options.endpoints.length === 0) {
      throw new WalletError("UNSUPPORTED_CHAIN", `No RPC endpoints configured for ${options.chain}`, {
        chain: options.chain,
      });
    }
    this.chain = options.chain;
    this.members = options.endpoints.map((e, i) => ({
      state: createEndpointState(e.url, options.chain, i),
      client: e.client,
    }));
    this.probeFn = options.probe;
    this.config = resolveFailoverConfig(options.config);
    this.classify = options.classify ?? classifyRpcError;
    this.logger = (options.logger ?? pino({ level: "silent" })).child({
      component: "rpc-pool",
      chain: options.chain,
    });
    this.now = options.now ?? Date.now;
  }

  /**
   * Run a read-only call with failover.
   */
  async read<T>(fn: RpcCall<TClient, T>, options: CallOptions = {}): Promise<T> {
    const result = await this.execute("read", fn, options.signal);
    return result.value;
  }

  /**
   * Run a submission. Fails over only when the previous endpoint provably
   * never received the request.
   *
   * @throws SubmissionOutcomeUnknownError when the request may have landed
   */
  async submit<T>(fn: RpcCall<TClient, T>): Promise<CallResult<T>> {
    return this.execute("submit", fn, undefined);
  }

  /**
   * Probe every endpoint once, updating health. Unhealthy endpoints are
   * probed even inside their backoff window.
   */
  async probeAll(): Promise<readonly EndpointSnapshot[]> {
    await Promise.all(this.members.map((m) => this.runProbe(m)));
    return this.status();
  }

  status(): readonly EndpointSnapshot[] {
    return this.members.map((m) => snapshot(m.state));
  }

  get size(): number {
    return this.members.length;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async execute<T>(
    kind: CallKind,
    fn: RpcCall<TClient, T>,
    signal: AbortSignal | undefined,
  ): Promise<CallResult<T>> {
    const byState = new Map(this.members.map((m) => [m.state, m]));
    const candidates = selectCandidates(
      this.members.map((m) => m.state),
      this.now(),
    );

    if (candidates.length === 0) {
      throw new WalletError("PROVIDER_UNAVAILABLE", `No healthy RPC endpoint for ${this.chain}`, {
        chain: this.chain,
        attempted: [],
      });
    }

    const attempted: string[] = [];
    const failures: FailureClass[] = [];
    let lastError: unknown;

    for (const state of candidates) {
      if (attempted.length >= this.config.maxEndpointsPerCall) break;
      const member = byState.get(state);
      if (member === undefined) continue;
      throwIfCancelled(signal);
      attempted.push(state.label);

      if (state.health === "unhealthy") {
        const probeFailure = await this.runProbe(member);
        if (probeFailure !== undefined) {
          failures.push(probeFailure);
          continue;
        }
      }

      const startedEpoch = state.epoch;
      try {
        const value = await this.attempt(member, fn, signal);
        this.report(state, recordSuccess(state, startedEpoch, this.now()));
        return { value, endpoint: state.label };
      } catch (err: unknown) {
        if (signal?.aborted === true) throw cancelled(err);

        const cls = err instanceof AttemptTimeoutError ? "transient" : this.classify(err);
        if (cls === "terminal") throw err;

        lastError = err;
        this.report(state, recordFailure(state, describeError(err, cls), this.now(), this.config));

        if (kind === "submit" && cls === "transient") {
          throw new SubmissionOutcomeUnknownError(state.label, { cause: err });
        }
        failures.push(cls);
      }
    }

    const allRateLimited = failures.length > 0 && failures.every((f) => f === "rate-limited");
    const code = allRateLimited ? "RATE_LIMITED" : "PROVIDER_UNAVAILABLE";
    throw new WalletError(
      code,
      allRateLimited
        ? `All RPC endpoints for ${this.chain} are rate limiting`
        : `RPC endpoints for ${this.chain} exhausted`,
      { chain: this.chain, attempted },
      { cause: lastError },
    );
  }

  private attempt<T>(
    member: Member<TClient>,
    fn: RpcCall<TClient, T>,
    outer: AbortSignal | undefined,
  ): Promise<T> {
    const { label } = member.state;
    const timeoutMs = this.config.attemptTimeoutMs;

    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    const guard = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new AttemptTimeoutError(label, timeoutMs)), timeoutMs);

      if (outer !== undefined) {
        onAbort = () => reject(cancelled(outer.reason));
        outer.addEventListener("abort", onAbort, { once: true });
      }
    });

    return Promise.race([fn(member.client), guard]).finally(() => {
      clearTimeout(timer);
      if (outer !== undefined && onAbort !== undefined) {
        outer.removeEventListener("abort", onAbort);
      }
    });
  }

  /**
   * Resolves to undefined when the probe passed, else to the failure class.
   * Any probe failure counts against the endpoint, terminal ones included.
   */
  private async runProbe(member: Member<TClient>): Promise<FailureClass | undefined> {
    const { state } = member;
    const startedEpoch = state.epoch;
    try {
      await this.attempt(member, this.probeFn, undefined);
      this.report(state, recordSuccess(state, startedEpoch, this.now()));
      return undefined;
    } catch (err: unknown) {
      const cls = err instanceof AttemptTimeoutError ? "transient" : this.classify(err);
      this.report(state, recordFailure(state, describeError(err, cls), this.now(), this.config));
      return cls;
    }
  }

  private report(state: EndpointState, change: HealthChange): void {
    const fields = {
      endpoint: state.label,
      failures: state.consecutiveFailures,
      backoffUntil: state.backoffUntil,
    };
    switch (change.kind) {
      case "degraded":
        this.logger.warn({ ...fields, error: state.lastError }, "Endpoint degraded");
        break;
      case "unhealthy":
        this.logger.warn(
          { ...fields, error: state.lastError, epoch: state.epoch },
          "Endpoint marked unhealthy",
        );
        break;
      case "restored":
        this.logger.info({ ...fields, from: change.from }, "Endpoint restored");
        break;
      case "none":
        break;
    }
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted === true) throw cancelled(signal.reason);
}

function cancelled(cause: unknown): WalletError {
  return new WalletError("CANCELLED", "Operation cancelled", undefined, { cause });
}
