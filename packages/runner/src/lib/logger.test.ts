import { describe, it, expect, afterEach } from "vitest";
import { logger } from "./logger.js";

describe("logger.createChild", () => {
  afterEach(() => {
    logger.setLogConfig({});
  });

  it("applies the LOG_MODULES level for its module", () => {
    logger.setLogConfig({ search: "debug" });
    expect(logger.createChild("search").level).toBe("debug");
  });

  it("inherits the base level for modules without an override", () => {
    logger.setLogConfig({ search: "debug" });
    expect(logger.createChild("cli").level).toBe(logger.level);
  });
});
