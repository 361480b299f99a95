/**
 * @custodian/node: Custody service composition.
 */

export { ConfigSchema, loadConfig, endpointsOf, explorersOf, failoverConfigOf, engineConfigOf } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, REDACT_PATHS } from "./logger.js";
export type { WalletRepository } from "./wallet-repository.js";
export { InMemoryWalletRepository } from "./wallet-repository.js";
export { CustodyService, explorerTxUrl } from "./custody-service.js";
export type { CustodyServiceOptions, WalletView, TransferReceipt } from "./custody-service.js";
export { createCustody } from "./bootstrap.js";
export type { Custody, CustodyOptions } from "./bootstrap.js";
