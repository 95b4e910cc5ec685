import { describe, expect, it } from "vitest";
import { createLogger } from "../../src/infrastructure/logging/logger";

describe("createLogger", () => {
  it("formats lines and filters by level", () => {
    const lines: string[] = [];
    const logger = createLogger({ logLevel: "warn" }, "test", (l) =>
      lines.push(l),
    );

    logger.debug("noise");
    logger.info("noise");
    logger.warn("careful");
    logger.error("broken");

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - test - WARN - careful$/,
    );
    expect(lines[1]).toMatch(/ - test - ERROR - broken$/);
  });

  it("writes nothing when silent", () => {
    const lines: string[] = [];
    const logger = createLogger({ logLevel: "silent" }, "test", (l) =>
      lines.push(l),
    );

    logger.error("broken");

    expect(lines).toEqual([]);
  });
});
