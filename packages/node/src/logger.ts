/**
 * @custodian/node: Logger.
 *
 * Pino with key material redacted wherever it appears one level deep.
 * Pretty output in development.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import type { AppConfig } from "./config.js";

const SECRET_FIELDS = ["mnemonic", "secret", "privateKey", "keyMaterial", "encryptedKey"] as const;

export const REDACT_PATHS: readonly string[] = [
  ...SECRET_FIELDS,
  ...SECRET_FIELDS.map((field) => `*.${field}`),
];

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  const options: LoggerOptions = {
    level: config.LOG_LEVEL,
    redact: { paths: [...REDACT_PATHS], censor: "[Redacted]" },
    ...(config.NODE_ENV === "development" && destination === undefined
      ? { transport: { target: "pino-pretty" } }
      : {}),
  };
  return destination === undefined ? pino(options) : pino(options, destination);
}
