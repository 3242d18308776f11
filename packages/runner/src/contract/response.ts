import { z } from "zod";
import { formatZodErrors } from "@torque-tune/kit";
import type { Calibration } from "@torque-tune/tuner";
import { CONTRACT_VERSION } from "./request.js";

export type ResponseStatus = "ok" | "rejected" | "error";

export type ErrorCode =
  | "SCHEMA_ERROR"
  | "OPTIMIZER_ERROR"
  | "NON_FINITE_OUTPUT"
  | "EMPTY_INPUT"
  | "JSON_PARSE_ERROR"
  | "INVALID_REQUEST_TYPE"
  | "STDIN_READ_ERROR"
  | "TIMEOUT"
  | "UNHANDLED_ERROR";

export interface Proposal {
  calibration: Calibration;
  torque_delta_nm: number[];
  confidence: number;
  estimated_peak_gain_ratio: number;
}

export interface RunMetrics {
  cycles_used: number;
  runtime_ms: number;
  best_score: number;
}

export interface TuneResponse {
  contract_version: string;
  request_id: string;
  status: ResponseStatus;
  proposal: Proposal | null;
  metrics: RunMetrics | null;
  debug: { notes: string[]; warnings: string[] };
  error: { code: ErrorCode; message: string } | null;
}

export function errorResponse(requestId: string, code: ErrorCode, message: string): TuneResponse {
  return {
    contract_version: CONTRACT_VERSION,
    request_id: requestId,
    status: "error",
    proposal: null,
    metrics: null,
    debug: { notes: [], warnings: [] },
    error: { code, message },
  };
}

export function rejectedResponse(requestId: string, warnings: string[], notes: string[]): TuneResponse {
  return {
    contract_version: CONTRACT_VERSION,
    request_id: requestId,
    status: "rejected",
    proposal: null,
    metrics: null,
    debug: { notes, warnings },
    error: null,
  };
}

export function okResponse(
  requestId: string,
  proposal: Proposal,
  metrics: RunMetrics,
  warnings: string[],
  notes: string[],
): TuneResponse {
  return {
    contract_version: CONTRACT_VERSION,
    request_id: requestId,
    status: "ok",
    proposal,
    metrics,
    debug: { notes, warnings },
    error: null,
  };
}

const finite = z.number().finite();

const ProposalSchema = z.object({
  calibration: z.record(z.string(), finite),
  torque_delta_nm: z.array(finite),
  confidence: finite.min(0).max(1),
  estimated_peak_gain_ratio: finite,
});

const TuneResponseSchema = z
  .object({
    contract_version: z.literal(CONTRACT_VERSION),
    request_id: z.string(),
    status: z.enum(["ok", "rejected", "error"]),
    proposal: ProposalSchema.nullable(),
    metrics: z
      .object({ cycles_used: z.number().int().nonnegative(), runtime_ms: finite, best_score: finite })
      .nullable(),
    debug: z.object({ notes: z.array(z.string()), warnings: z.array(z.string()) }),
    error: z.object({ code: z.string(), message: z.string() }).nullable(),
  })
  .superRefine((resp, ctx) => {
    if (resp.status === "ok" && (resp.proposal === null || resp.metrics === null)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "status=ok requires proposal and metrics" });
    }
    if (resp.status === "error" && resp.error === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "status=error requires error" });
    }
  });

/** Self-check an envelope before it is written. Returns the problems found, empty when valid. */
export function validateResponse(resp: TuneResponse): string[] {
  const result = TuneResponseSchema.safeParse(resp);
  return result.success ? [] : formatZodErrors(result.error);
}
