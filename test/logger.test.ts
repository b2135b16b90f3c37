import { afterEach, describe, expect, it } from "vitest";
import { configureLogger, logger } from "../src/utils/logger";

describe("configureLogger", () => {
  afterEach(() => {
    logger.level = "info";
  });

  it("applies the configured level", () => {
    configureLogger({ level: "debug" });

    expect(logger.level).toBe("debug");
    expect(logger.isDebugEnabled()).toBe(true);
  });

  it("keeps console-only output without a log directory", () => {
    const before = logger.transports.length;
    configureLogger({ level: "warn" });

    expect(logger.transports).toHaveLength(before);
    expect(logger.isInfoEnabled()).toBe(false);
  });
});
