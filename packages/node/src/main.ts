/**
 * @custodian/node: Preflight entry point.
 *
 * Loads config, wires the custody service and probes every configured
 * endpoint once. Exits non-zero when the configuration is invalid or no
 * chain has a reachable endpoint.
 */

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createCustody } from "./bootstrap.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const { failover } = createCustody(config, { logger });

  logger.info({ mode: config.NETWORK_MODE, chains: failover.chains() }, "Custody service configured");

  const statuses = await failover.probeAll();
  for (const status of statuses) {
    const healthy = status.endpoints.filter((e) => e.health === "healthy").length;
    const fields = { chain: status.chain, healthy, total: status.endpoints.length };
    if (status.available) {
      logger.info(fields, "Chain reachable");
    } else {
      logger.warn(fields, "Chain unreachable");
    }
  }

  if (!statuses.some((s) => s.available)) {
    logger.error("No chain has a reachable RPC endpoint");
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
