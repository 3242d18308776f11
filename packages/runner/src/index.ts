export { processRequest } from "./process-request.js";
export type { ProcessOptions } from "./process-request.js";
export { runCli } from "./cli/run-cli.js";
export type { CliIo, CliOptions } from "./cli/run-cli.js";
export { parseArgs, USAGE } from "./cli/parse-args.js";
export type { CliArgs } from "./cli/parse-args.js";
export {
  CONTRACT_VERSION,
  TuneRequestSchema,
  ConstraintsSchema,
  BaselineCurveSchema,
  parseTuneRequest,
  extractRequestId,
} from "./contract/request.js";
export type { TuneRequest, TuneRequestInput, ParseResult } from "./contract/request.js";
export { errorResponse, okResponse, rejectedResponse, validateResponse } from "./contract/response.js";
export type { ErrorCode, Proposal, ResponseStatus, RunMetrics, TuneResponse } from "./contract/response.js";
