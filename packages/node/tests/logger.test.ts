import { describe, it, expect } from "vitest";
import { createLogger } from "../src/logger.js";

function capture(): { lines: Record<string, unknown>[]; stream: { write(line: string): void } } {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    stream: {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === "object" && parsed !== null) lines.push({ ...parsed });
      },
    },
  };
}

describe("createLogger", () => {
  it("redacts key material at the top level and one level down", () => {
    const { lines, stream } = capture();
    const logger = createLogger({ LOG_LEVEL: "info", NODE_ENV: "test" }, stream);

    logger.info(
      { mnemonic: "test-secret words", wallet: { id: "w-1", encryptedKey: "00ff", privateKey: "test-secret" } },
      "wallet event",
    );

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      msg: "wallet event",
      mnemonic: "[Redacted]",
      wallet: { id: "w-1", encryptedKey: "[Redacted]", privateKey: "[Redacted]" },
    });
  });

  it("honours the configured level", () => {
    const { lines, stream } = capture();
    const logger = createLogger({ LOG_LEVEL: "warn", NODE_ENV: "production" }, stream);
    logger.info("hidden");
    logger.warn("shown");
    expect(lines.map((l) => l["msg"])).toEqual(["shown"]);
  });
});
