export { assertPositiveInt } from "./assert-positive-int.js";
export { roundTo } from "./round-to.js";
export { isMainModule } from "./is-main.js";
export { parseEnv } from "./parse-env.js";
export { formatZodErrors, formatZodPath } from "./zod-helpers.js";
