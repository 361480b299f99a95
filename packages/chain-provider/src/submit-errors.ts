/**
 * Mapping of definite submission refusals onto the wallet taxonomy.
 *
 * Only errors the failover pool classed as terminal reach this point:
 * exhaustion is already a WalletError and an uncertain outcome is a
 * SubmissionOutcomeUnknownError, both passed through untouched.
 */

import { WalletError, type ChainTag } from "@custodian/types";
import { isSubmissionOutcomeUnknown } from "@custodian/rpc-failover";

/**
 * Concatenated messages of an error and its causes. Clients tend to put
 * the node's own words in a nested cause or a `details` field.
 */
export function errorText(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;
  for (let depth = 0; depth < 8 && current !== undefined && current !== null; depth++) {
    if (current instanceof Error) {
      parts.push(current.message);
    } else if (typeof current === "string") {
      parts.push(current);
    }
    if (typeof current === "object" && "details" in current && typeof current.details === "string") {
      parts.push(current.details);
    }
    if (typeof current === "object" && "logs" in current && Array.isArray(current.logs)) {
      for (const line of current.logs) {
        if (typeof line === "string") parts.push(line);
      }
    }
    current = typeof current === "object" && "cause" in current ? current.cause : undefined;
  }
  return parts.join(" | ");
}

/**
 * @returns the error to throw for a failed submission
 */
export function toSubmitError(chain: ChainTag, err: unknown, insufficientFunds: RegExp): unknown {
  if (err instanceof WalletError || isSubmissionOutcomeUnknown(err)) return err;
  const text = errorText(err);
  if (insufficientFunds.test(text)) {
    return new WalletError("INSUFFICIENT_FUNDS", `Insufficient funds to submit on ${chain}`, { chain }, {
      cause: err,
    });
  }
  return new WalletError("TRANSACTION_REJECTED", `Transaction rejected by ${chain} node`, { chain }, {
    cause: err,
  });
}
