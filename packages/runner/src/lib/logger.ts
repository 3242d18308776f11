import pino from "pino";
import { join } from "node:path";
import { env } from "./env.js";

// module name -> level, from LOG_MODULES
let logLevelOverrides: Record<string, string> = {};

// stdout carries the JSON response only, so every destination here is stderr or a file.
function createPinoLogger(): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }

  if (!env.LOG_DIR) {
    return pino({ level: env.LOG_LEVEL }, pino.destination({ dest: 2, sync: true }));
  }

  return pino(
    { level: env.LOG_LEVEL },
    pino.transport({
      targets: [
        { target: "pino/file", level: env.LOG_LEVEL, options: { destination: 2 } },
        {
          target: "pino-roll",
          level: env.LOG_LEVEL,
          options: {
            file: join(env.LOG_DIR, "tuner"),
            frequency: "daily",
            dateFormat: "yyyy-MM-dd",
            extension: ".ndjson",
            mkdir: true,
          },
        },
      ],
    }),
  );
}

const pinoInstance = createPinoLogger();

/** The runner's pino instance, plus LOG_MODULES level overrides for its module children. */
export const logger = Object.assign(pinoInstance, {
  /** Replace the level overrides parsed from LOG_MODULES (`search=debug` becomes `{ search: "debug" }`). */
  setLogConfig(overrides: Record<string, string>): void {
    logLevelOverrides = overrides;
  },

  /** Child tagged `module`, at its LOG_MODULES level when one is set. */
  createChild(module: string): pino.Logger {
    const level = logLevelOverrides[module] ?? undefined;
    const child = pinoInstance.child({ module });
    if (level) {
      child.level = level;
    }
    return child;
  },
});
