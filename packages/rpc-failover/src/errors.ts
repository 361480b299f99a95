/**
 * Failover errors.
 */

/**
 * A single attempt exceeded its time budget.
 */
export class AttemptTimeoutError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly timeoutMs: number,
  ) {
    super(`RPC attempt against ${endpoint} timed out after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

/**
 * A submission may or may not have reached the node. The caller must not
 * resend; it should query the transaction status instead.
 */
export class SubmissionOutcomeUnknownError extends Error {
  constructor(
    /** Endpoint the submission went through (redacted form) */
    public readonly endpoint: string,
    options?: { readonly cause?: unknown },
  ) {
    super(`Submission outcome via ${endpoint} is unknown`, options);
    this.name = "SubmissionOutcomeUnknownError";
  }
}

export function isSubmissionOutcomeUnknown(err: unknown): err is SubmissionOutcomeUnknownError {
  return err instanceof SubmissionOutcomeUnknownError;
}
