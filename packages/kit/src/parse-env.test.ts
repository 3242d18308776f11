import { describe, it, expect } from "vitest";
import { z } from "zod";
import { parseEnv } from "./parse-env.js";

describe("parseEnv", () => {
  it("parses env vars matching the schema", () => {
    const schema = z.object({ TUNE_TIMEOUT_MS: z.coerce.number() });
    expect(parseEnv(schema, { TUNE_TIMEOUT_MS: "2500" }).TUNE_TIMEOUT_MS).toBe(2500);
  });

  it("applies defaults from the schema", () => {
    const schema = z.object({ LOG_LEVEL: z.string().default("info") });
    expect(parseEnv(schema, {}).LOG_LEVEL).toBe("info");
  });

  it("throws on invalid env", () => {
    const schema = z.object({ LOG_LEVEL: z.enum(["debug", "info"]) });
    expect(() => parseEnv(schema, { LOG_LEVEL: "loud" })).toThrow();
  });
});
