/**
 * Wallet error taxonomy.
 *
 * Every failure the core surfaces to its callers is a WalletError with a
 * stable code. Transient provider errors never appear here unless the
 * whole endpoint pool is exhausted.
 */

// =============================================================================
// Codes
// =============================================================================

export type WalletErrorCode =
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT"
  | "INVALID_MNEMONIC"
  | "INVALID_PRIVATE_KEY"
  | "UNSUPPORTED_CHAIN"
  | "UNSUPPORTED_TOKEN"
  | "INSUFFICIENT_FUNDS"
  | "PROVIDER_UNAVAILABLE"
  | "AMBIGUOUS_SUBMISSION"
  | "DECRYPTION_FAILED"
  | "RATE_LIMITED"
  | "WALLET_NOT_FOUND"
  | "WALLET_EXISTS"
  | "TRANSACTION_NOT_FOUND"
  | "TRANSACTION_REJECTED"
  | "CANCELLED";

const WALLET_ERROR_CODES = new Set<string>([
  "INVALID_ADDRESS",
  "INVALID_AMOUNT",
  "INVALID_MNEMONIC",
  "INVALID_PRIVATE_KEY",
  "UNSUPPORTED_CHAIN",
  "UNSUPPORTED_TOKEN",
  "INSUFFICIENT_FUNDS",
  "PROVIDER_UNAVAILABLE",
  "AMBIGUOUS_SUBMISSION",
  "DECRYPTION_FAILED",
  "RATE_LIMITED",
  "WALLET_NOT_FOUND",
  "WALLET_EXISTS",
  "TRANSACTION_NOT_FOUND",
  "TRANSACTION_REJECTED",
  "CANCELLED",
]);

export function isWalletErrorCode(value: unknown): value is WalletErrorCode {
  return typeof value === "string" && WALLET_ERROR_CODES.has(value);
}

// =============================================================================
// Error
// =============================================================================

/**
 * Structured error from the wallet core.
 * Always thrown, never returned as a status value.
 */
export class WalletError extends Error {
  public readonly code: WalletErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: WalletErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "WalletError";
    this.code = code;
    this.details = details;
  }
}

export function isWalletError(err: unknown, code?: WalletErrorCode): err is WalletError {
  if (!(err instanceof WalletError)) return false;
  return code === undefined || err.code === code;
}

// =============================================================================
// Envelope
// =============================================================================

export interface ErrorDetail {
  readonly code: WalletErrorCode | "INTERNAL_ERROR";
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

/**
 * Render any thrown value as the envelope the API layer returns.
 *
 * Unknown errors are collapsed to INTERNAL_ERROR so that provider
 * messages (which may echo request payloads) never reach the caller.
 */
export function toErrorEnvelope(err: unknown): ErrorEnvelope {
  if (err instanceof WalletError) {
    const error: ErrorDetail = { code: err.code, message: err.message };
    if (err.details !== undefined) {
      return { error: { ...error, details: err.details } };
    }
    return { error };
  }
  return { error: { code: "INTERNAL_ERROR", message: "Internal error" } };
}
