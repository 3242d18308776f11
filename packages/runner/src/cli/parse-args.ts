import { cac } from "cac";

export interface CliArgs {
  inputPath?: string;
  timeoutMs?: number;
  pretty: boolean;
  help: boolean;
}

/** Usage text; runCli writes it to stderr so stdout only ever carries the response. */
export const USAGE = `Usage: torque-tune [options] < request.json

Options:
  --input <file>     Read the request JSON from a file instead of stdin
  --timeout-ms <n>   Give up waiting for the request after n milliseconds
  --pretty           Indent the JSON response
  -h, --help         Display this message
`;

/**
 * Parse CLI flags for the stdio runner. The request itself arrives on stdin
 * unless --input names a file.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const cli = cac("torque-tune");
  cli.option("--input <file>", "Read the request JSON from a file instead of stdin");
  cli.option("--timeout-ms <n>", "Give up waiting for the request after n milliseconds");
  cli.option("--pretty", "Indent the JSON response");
  // no cli.help(): cac would print usage to stdout
  cli.option("-h, --help", "Display this message");

  const { options } = cli.parse([...argv], { run: false });

  const timeoutMs = options.timeoutMs === undefined ? undefined : Number(options.timeoutMs);
  if (timeoutMs !== undefined && (!Number.isInteger(timeoutMs) || timeoutMs <= 0)) {
    throw new Error(`--timeout-ms must be a positive integer, got ${String(options.timeoutMs)}`);
  }

  return {
    inputPath: typeof options.input === "string" ? options.input : undefined,
    timeoutMs,
    pretty: Boolean(options.pretty),
    help: Boolean(options.help),
  };
}
