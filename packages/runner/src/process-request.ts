import type { Logger } from "pino";
import { roundTo } from "@torque-tune/kit";
import { runSearch, type SearchLogger, type SearchResult } from "@torque-tune/tuner";
import { CONTRACT_VERSION, extractRequestId, parseTuneRequest } from "./contract/request.js";
import {
  errorResponse,
  okResponse,
  rejectedResponse,
  validateResponse,
  type TuneResponse,
} from "./contract/response.js";
import { logger } from "./lib/logger.js";

export interface ProcessOptions {
  /** Monotonic clock in ms, injectable for tests. */
  now?: () => number;
  /** Request-level logger; the search logs through a `module: "search"` child of it. */
  log?: Logger;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toSearchLogger(log: Logger): SearchLogger {
  return { debug: (obj, msg) => log.debug(obj, msg) };
}

/**
 * Validate one request, run the search and wrap the result in a response envelope.
 * Never throws: every failure becomes an `error` or `rejected` envelope.
 */
export function processRequest(raw: unknown, opts: ProcessOptions = {}): TuneResponse {
  const now = opts.now ?? (() => performance.now());
  const log = opts.log ?? logger.createChild("request");
  const searchLog = opts.log ? opts.log.child({ module: "search" }) : logger.createChild("search");
  const started = now();
  const requestId = extractRequestId(raw);

  const parsed = parseTuneRequest(raw);
  if (!parsed.ok) {
    log.warn({ requestId, errors: parsed.errors }, "request schema validation failed");
    return errorResponse(requestId, "SCHEMA_ERROR", parsed.errors.join("; "));
  }

  const { request } = parsed;
  const baseline = request.baseline_curve;
  log.info(
    { requestId, seed: request.seed, cycleBudget: request.cycle_budget, bins: baseline.rpmBins.length },
    "processing request",
  );

  let result: SearchResult;
  try {
    result = runSearch({
      baseline,
      constraints: request.constraints,
      cycleBudget: request.cycle_budget,
      seed: request.seed,
      logger: toSearchLogger(searchLog),
    });
  } catch (err) {
    log.error({ err, requestId }, "optimizer raised an unexpected error");
    return errorResponse(requestId, "OPTIMIZER_ERROR", errorMessage(err));
  }

  // The result was re-validated against the request's constraints when it was assembled.
  if (result.finalRejection !== null) {
    log.warn({ requestId, reason: result.finalRejection }, "final validation rejected proposal");
    return rejectedResponse(
      requestId,
      [result.finalRejection],
      ["Proposal failed final self-validation. Returning rejected."],
    );
  }

  const notes = [`tuner v${CONTRACT_VERSION}`, `Optimization completed in ${result.cyclesUsed} cycles`];
  if (result.rejectedCount > 0) {
    notes.push(`${result.rejectedCount} of ${result.cyclesUsed} candidates rejected by constraints`);
  }

  const response = okResponse(
    requestId,
    {
      calibration: { ...result.calibration },
      torque_delta_nm: [...result.delta],
      confidence: roundTo(result.confidence, 4),
      estimated_peak_gain_ratio: roundTo(result.estimatedPeakGainRatio, 6),
    },
    {
      cycles_used: result.cyclesUsed,
      runtime_ms: roundTo(now() - started, 2),
      best_score: roundTo(result.bestScore, 4),
    },
    [...new Set(result.warnings)],
    notes,
  );

  const problems = validateResponse(response);
  if (problems.length > 0) {
    log.error({ requestId, problems }, "response failed self-check");
    return errorResponse(requestId, "NON_FINITE_OUTPUT", problems.join("; "));
  }

  log.info(
    {
      requestId,
      runtimeMs: response.metrics?.runtime_ms,
      peakGain: result.estimatedPeakGainRatio,
      improvements: result.improvements,
    },
    "request complete",
  );
  return response;
}
