/**
 * Error classification for RPC attempts.
 *
 * - terminal:     the request was understood and refused (revert, bad
 *                 params, domain errors); no failover, no health penalty
 * - transient:    timeout, 5xx, network error after connect, malformed
 *                 payload; failover for reads, outcome unknown for writes
 * - unreachable:  the request provably never reached the node
 *                 (connection refused, DNS, gateway auth refusal)
 * - rate-limited: 429 or a JSON-RPC limit error; never reached the node
 *
 * The whole cause chain is inspected, since HTTP clients wrap the socket
 * error that carries the useful code.
 */

import { WalletError } from "@custodian/types";
import { AttemptTimeoutError } from "./errors.js";

export type FailureClass = "terminal" | "transient" | "unreachable" | "rate-limited";

export type ErrorClassifier = (err: unknown) => FailureClass;

const UNREACHABLE_CODES = new Set([
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "ECONNABORTED",
  "UND_ERR_SOCKET",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/** JSON-RPC "limit exceeded" */
const RPC_LIMIT_CODE = -32005;

const STATUS_PREFIX = /^(\d{3})\s/;
const RATE_LIMIT_TEXT = /\b429\b|too many requests|rate limit/i;
const NETWORK_TEXT = /fetch failed|socket hang up|network error|failed to fetch/i;

function causeChain(err: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = err;
  while (current !== undefined && current !== null && chain.length < 8) {
    chain.push(current);
    current = typeof current === "object" && "cause" in current ? current.cause : undefined;
  }
  return chain;
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if (err instanceof Error) {
    const match = STATUS_PREFIX.exec(err.message);
    if (match?.[1] !== undefined) return Number(match[1]);
  }
  return undefined;
}

function errorCode(err: unknown): string | number | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const code = err.code;
  return typeof code === "string" || typeof code === "number" ? code : undefined;
}

/**
 * Default classifier, aware of Node socket errors, fetch wrappers, viem
 * HTTP errors and the plain "<status> <text>" errors of the Solana client.
 */
export function classifyRpcError(err: unknown): FailureClass {
  const chain = causeChain(err);

  if (chain.some((e) => e instanceof WalletError)) return "terminal";

  if (
    chain.some((e) => {
      if (httpStatus(e) === 429 || errorCode(e) === RPC_LIMIT_CODE) return true;
      return e instanceof Error && RATE_LIMIT_TEXT.test(e.message);
    })
  ) {
    return "rate-limited";
  }

  if (
    chain.some((e) => {
      const code = errorCode(e);
      if (typeof code === "string" && UNREACHABLE_CODES.has(code)) return true;
      const status = httpStatus(e);
      return status === 401 || status === 403;
    })
  ) {
    return "unreachable";
  }

  if (
    chain.some((e) => {
      if (e instanceof AttemptTimeoutError || e instanceof SyntaxError) return true;
      const code = errorCode(e);
      if (typeof code === "string" && TRANSIENT_CODES.has(code)) return true;
      const status = httpStatus(e);
      if (status !== undefined && (status >= 500 || status === 408)) return true;
      return e instanceof Error && NETWORK_TEXT.test(e.message);
    })
  ) {
    return "transient";
  }

  return "terminal";
}
