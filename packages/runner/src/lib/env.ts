import dotenv from "dotenv";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { parseEnv } from "@torque-tune/kit";

const __dirname = dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: join(__dirname, "../../.env") });

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

/** "search=debug,request=warn" -> { search: "debug", request: "warn" } */
export function parseModuleLevels(raw: string): Record<string, string> {
  const levels: Record<string, string> = {};
  for (const entry of raw.split(",")) {
    const [module, level] = entry.split("=").map((part) => part.trim());
    if (!module || !level) continue;
    levels[module] = LogLevelSchema.parse(level);
  }
  return levels;
}

const EnvSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default("info"),
  LOG_MODULES: z.string().default("").transform(parseModuleLevels),
  LOG_DIR: z.string().optional(),
  TUNE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export type Env = z.infer<typeof EnvSchema>;
export const env = parseEnv(EnvSchema);
