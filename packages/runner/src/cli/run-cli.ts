import fs from "node:fs/promises";
import pTimeout, { TimeoutError } from "p-timeout";
import { errorResponse, type ErrorCode, type TuneResponse } from "../contract/response.js";
import { extractRequestId } from "../contract/request.js";
import { processRequest } from "../process-request.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { parseArgs, USAGE } from "./parse-args.js";

export interface CliIo {
  stdin: AsyncIterable<Buffer | string>;
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
  argv: readonly string[];
}

export interface CliOptions {
  /** Fallback when --timeout-ms is not given. */
  defaultTimeoutMs?: number;
  now?: () => number;
}

class InputError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "InputError";
  }
}

async function readStream(stream: AsyncIterable<Buffer | string>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function readRaw(io: CliIo, inputPath: string | undefined): Promise<string> {
  try {
    return inputPath ? await fs.readFile(inputPath, "utf8") : await readStream(io.stdin);
  } catch (err) {
    throw new InputError("STDIN_READ_ERROR", err instanceof Error ? err.message : String(err));
  }
}

function decodeRequest(text: string): object {
  if (!text.trim()) {
    throw new InputError("EMPTY_INPUT", "stdin was empty");
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new InputError("JSON_PARSE_ERROR", err instanceof Error ? err.message : String(err));
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new InputError("INVALID_REQUEST_TYPE", "Request must be a JSON object");
  }
  return parsed;
}

/**
 * One request in, one JSON line out. Logs go to stderr via pino; stdout
 * carries only the response. `--help` writes usage to stderr and reads
 * nothing. Resolves to the process exit code.
 */
export async function runCli(io: CliIo, opts: CliOptions = {}): Promise<number> {
  logger.setLogConfig(env.LOG_MODULES);
  const log = logger.createChild("cli");

  let pretty = false;
  const write = (response: TuneResponse): void => {
    io.stdout.write(`${JSON.stringify(response, null, pretty ? 2 : undefined)}\n`);
  };

  let request: object;
  try {
    const args = parseArgs(io.argv);
    pretty = args.pretty;
    if (args.help) {
      io.stderr.write(USAGE);
      return 0;
    }
    const timeoutMs = args.timeoutMs ?? opts.defaultTimeoutMs ?? env.TUNE_TIMEOUT_MS;
    log.info({ input: args.inputPath ?? "stdin", timeoutMs }, "runner started, waiting for request");

    const text = await pTimeout(readRaw(io, args.inputPath), {
      milliseconds: timeoutMs,
      message: `no complete request within ${timeoutMs} ms`,
    });
    request = decodeRequest(text);
  } catch (err) {
    if (err instanceof InputError) {
      log.error({ code: err.code, message: err.message }, "could not read request");
      write(errorResponse("unknown", err.code, err.message));
    } else if (err instanceof TimeoutError) {
      log.error({ message: err.message }, "timed out waiting for request");
      write(errorResponse("unknown", "TIMEOUT", err.message));
    } else {
      log.fatal({ err }, "runner failed before processing");
      write(errorResponse("unknown", "UNHANDLED_ERROR", err instanceof Error ? err.message : String(err)));
    }
    return 1;
  }

  try {
    write(processRequest(request, { now: opts.now }));
  } catch (err) {
    log.fatal({ err }, "unhandled exception in processRequest");
    write(
      errorResponse(extractRequestId(request), "UNHANDLED_ERROR", err instanceof Error ? err.message : String(err)),
    );
  }
  return 0;
}
