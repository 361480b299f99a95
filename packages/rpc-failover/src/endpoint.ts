/**
 * Endpoint health state machine.
 *
 *   healthy ──failure──▶ degraded ──(threshold)──▶ unhealthy
 *      ▲                    │                          │
 *      └──────success───────┘◀──────passing probe──────┘
 *
 * Every report is a synchronous read-modify-write on one EndpointState, so
 * concurrent reports cannot lose a failure. A demotion to unhealthy bumps
 * the epoch; a success reported by an attempt that began in an older
 * epoch is ignored.
 */

import type { ChainTag } from "@custodian/types";
import { computeBackoff, type FailoverConfig } from "./config.js";

export type EndpointHealth = "healthy" | "degraded" | "unhealthy";

export interface EndpointState {
  readonly url: string;
  /** Redacted form safe for logs and status output */
  readonly label: string;
  readonly chain: ChainTag;
  /** Configured order, 0 = first */
  readonly priority: number;
  health: EndpointHealth;
  consecutiveFailures: number;
  /** Epoch ms; 0 when not backing off */
  backoffUntil: number;
  epoch: number;
  lastError: string | undefined;
  lastSuccessAt: number | undefined;
  lastFailureAt: number | undefined;
}

export interface EndpointSnapshot {
  readonly endpoint: string;
  readonly chain: ChainTag;
  readonly priority: number;
  readonly health: EndpointHealth;
  readonly consecutiveFailures: number;
  readonly backoffUntil: number;
  readonly epoch: number;
  readonly lastError?: string;
  readonly lastSuccessAt?: number;
  readonly lastFailureAt?: number;
}

export type HealthChange =
  | { readonly kind: "none" }
  | { readonly kind: "degraded" }
  | { readonly kind: "unhealthy" }
  | { readonly kind: "restored"; readonly from: EndpointHealth };

/**
 * Strip credentials, path and query from an endpoint URL. Providers embed
 * API keys in both.
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const hidden = parsed.pathname !== "/" || parsed.search !== "" || parsed.username !== "";
    return `${parsed.protocol}//${parsed.host}${hidden ? "/***" : ""}`;
  } catch {
    return "[invalid-url]";
  }
}

export function createEndpointState(url: string, chain: ChainTag, priority: number): EndpointState {
  return {
    url,
    label: redactUrl(url),
    chain,
    priority,
    health: "healthy",
    consecutiveFailures: 0,
    backoffUntil: 0,
    epoch: 0,
    lastError: undefined,
    lastSuccessAt: undefined,
    lastFailureAt: undefined,
  };
}

export function recordSuccess(state: EndpointState, startedEpoch: number, now: number): HealthChange {
  if (startedEpoch !== state.epoch) return { kind: "none" };
  const previous = state.health;
  state.health = "healthy";
  state.consecutiveFailures = 0;
  state.backoffUntil = 0;
  state.lastSuccessAt = now;
  return previous === "healthy" ? { kind: "none" } : { kind: "restored", from: previous };
}

export function recordFailure(
  state: EndpointState,
  message: string,
  now: number,
  config: FailoverConfig,
): HealthChange {
  state.consecutiveFailures += 1;
  state.backoffUntil = now + computeBackoff(state.consecutiveFailures, config);
  state.lastError = message;
  state.lastFailureAt = now;

  if (state.health !== "unhealthy" && state.consecutiveFailures >= config.failureThreshold) {
    state.health = "unhealthy";
    state.epoch += 1;
    return { kind: "unhealthy" };
  }
  if (state.health === "healthy") {
    state.health = "degraded";
    return { kind: "degraded" };
  }
  return { kind: "none" };
}

/**
 * Endpoints eligible for a call, in the order they should be tried:
 * backoff elapsed first, then configured priority. Unhealthy endpoints are
 * eligible only once their backoff has elapsed (they must pass a probe).
 */
export function selectCandidates(
  states: readonly EndpointState[],
  now: number,
): EndpointState[] {
  return states
    .filter((s) => s.health !== "unhealthy" || s.backoffUntil <= now)
    .sort((a, b) => {
      const aReady = a.backoffUntil <= now ? 0 : 1;
      const bReady = b.backoffUntil <= now ? 0 : 1;
      return aReady - bReady || a.priority - b.priority;
    });
}

export function snapshot(state: EndpointState): EndpointSnapshot {
  return {
    endpoint: state.label,
    chain: state.chain,
    priority: state.priority,
    health: state.health,
    consecutiveFailures: state.consecutiveFailures,
    backoffUntil: state.backoffUntil,
    epoch: state.epoch,
    ...(state.lastError !== undefined ? { lastError: state.lastError } : {}),
    ...(state.lastSuccessAt !== undefined ? { lastSuccessAt: state.lastSuccessAt } : {}),
    ...(state.lastFailureAt !== undefined ? { lastFailureAt: state.lastFailureAt } : {}),
  };
}
