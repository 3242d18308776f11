#!/usr/bin/env node
/**
 * Stdio entry point: one JSON request on stdin (or --input), one JSON
 * response line on stdout, logs on stderr.
 */

import { isMainModule } from "@torque-tune/kit";
import { runCli } from "./cli/run-cli.js";
import { logger } from "./lib/logger.js";

if (isMainModule(import.meta.url)) {
  runCli({ stdin: process.stdin, stdout: process.stdout, stderr: process.stderr, argv: process.argv })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.fatal({ err }, "runner crashed");
      process.exitCode = 1;
    })
    .finally(() => {
      // a timed-out read leaves stdin open
      process.stdin.destroy();
    });
}
