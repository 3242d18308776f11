import { describe, it, expect } from "vitest";
import { parseArgs } from "./parse-args.js";

const argv = (...flags: string[]) => ["node", "torque-tune", ...flags];

describe("parseArgs", () => {
  it("defaults to stdin, no timeout override and compact output", () => {
    expect(parseArgs(argv())).toEqual({
      inputPath: undefined,
      timeoutMs: undefined,
      pretty: false,
      help: false,
    });
  });

  it("reads every flag", () => {
    expect(parseArgs(argv("--input", "req.json", "--timeout-ms", "250", "--pretty"))).toEqual({
      inputPath: "req.json",
      timeoutMs: 250,
      pretty: true,
      help: false,
    });
  });

  it("recognises --help and -h", () => {
    expect(parseArgs(argv("--help")).help).toBe(true);
    expect(parseArgs(argv("-h")).help).toBe(true);
  });

  it("rejects a non-positive timeout", () => {
    expect(() => parseArgs(argv("--timeout-ms", "0"))).toThrow("--timeout-ms must be a positive integer, got 0");
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => parseArgs(argv("--timeout-ms", "soon"))).toThrow(
      "--timeout-ms must be a positive integer, got soon",
    );
  });
});
