import { z } from "zod";
import { formatZodErrors } from "@torque-tune/kit";
import {
  CALIBRATION_PARAMS,
  resolveConstraints,
  type BaselineCurve,
  type CalibrationRanges,
  type Constraints,
} from "@torque-tune/tuner";

export const CONTRACT_VERSION = "1.0";

const RangeSchema = z
  .tuple([z.number().finite(), z.number().finite()])
  .refine(([lo, hi]) => lo <= hi, { message: "range lower bound exceeds upper bound" });

function pickCalibrationRanges(raw: Record<string, [number, number]> | undefined): CalibrationRanges {
  const ranges: CalibrationRanges = {};
  if (!raw) return ranges;
  for (const param of CALIBRATION_PARAMS) {
    const range = raw[param];
    if (range) ranges[param] = range;
  }
  return ranges;
}

/** Wire constraints (snake_case, every field optional) resolved onto the tuner defaults. */
export const ConstraintsSchema = z
  .object({
    max_peak_gain_ratio: z.number().finite().optional(),
    max_bin_delta_nm: z.number().finite().optional(),
    max_bin_delta_ratio: z.number().finite().optional(),
    smoothness: z.object({ max_second_derivative: z.number().finite().optional() }).optional(),
    calibration_ranges: z.record(z.string(), RangeSchema).optional(),
  })
  .transform(
    (c): Constraints =>
      resolveConstraints({
        maxPeakGainRatio: c.max_peak_gain_ratio,
        maxBinDeltaNm: c.max_bin_delta_nm,
        maxBinDeltaRatio: c.max_bin_delta_ratio,
        smoothness:
          c.smoothness?.max_second_derivative !== undefined
            ? { maxSecondDerivative: c.smoothness.max_second_derivative }
            : undefined,
        calibrationRanges: pickCalibrationRanges(c.calibration_ranges),
      }),
  );

export const BaselineCurveSchema = z
  .object({
    rpm_bins: z.array(z.number().int()).min(1, "baseline_curve.rpm_bins must be a non-empty list"),
    torque_nm: z.array(z.number()).min(1, "baseline_curve.torque_nm must be a non-empty list"),
  })
  .superRefine((curve, ctx) => {
    const { rpm_bins: rpm, torque_nm: torque } = curve;
    if (rpm.length !== torque.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["torque_nm"],
        message: `rpm_bins length ${rpm.length} != torque_nm length ${torque.length}`,
      });
      return;
    }
    for (let i = 1; i < rpm.length; i++) {
      if (rpm[i] <= rpm[i - 1]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rpm_bins", i],
          message: `rpm_bins must be monotonically ascending: rpm_bins[${i - 1}]=${rpm[i - 1]} >= rpm_bins[${i}]=${rpm[i]}`,
        });
        return;
      }
    }
    torque.forEach((t, i) => {
      if (!Number.isFinite(t) || t <= 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["torque_nm", i],
          message: `torque_nm[${i}]=${t} must be finite and positive`,
        });
      }
    });
  })
  .transform((curve): BaselineCurve => ({ rpmBins: curve.rpm_bins, torqueNm: curve.torque_nm }));

/** Context the caller sends along; the tuner ignores it but the contract still checks it. */
export const VehicleSchema = z.object({
  vehicle_id: z.string().optional(),
  engine_family: z.string().optional(),
  aspiration: z.enum(["NA", "Turbo", "Supercharged"]),
  drivetrain: z.enum(["FWD", "RWD", "AWD"]),
});

export const TuneRequestSchema = z.object({
  contract_version: z.string().superRefine((version, ctx) => {
    if (version !== CONTRACT_VERSION) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unsupported contract_version '${version}'. Expected '${CONTRACT_VERSION}'`,
      });
    }
  }),
  request_id: z.string().min(1),
  seed: z
    .number({ invalid_type_error: "seed must be an integer" })
    .int("seed must be an integer")
    .min(Number.MIN_SAFE_INTEGER, "seed must be a safe integer")
    .max(Number.MAX_SAFE_INTEGER, "seed must be a safe integer"),
  cycle_budget: z
    .number({ invalid_type_error: "cycle_budget must be a positive integer" })
    .int("cycle_budget must be a positive integer")
    .min(1, "cycle_budget must be a positive integer"),
  vehicle: VehicleSchema.optional(),
  environment: z.record(z.string(), z.unknown()).optional(),
  street_cred: z.record(z.string(), z.unknown()).optional(),
  parts: z.array(z.unknown()).optional(),
  baseline_curve: BaselineCurveSchema,
  constraints: ConstraintsSchema,
});

export type TuneRequestInput = z.input<typeof TuneRequestSchema>;
export type TuneRequest = z.output<typeof TuneRequestSchema>;

export type ParseResult = { ok: true; request: TuneRequest } | { ok: false; errors: string[] };

export function parseTuneRequest(raw: unknown): ParseResult {
  const result = TuneRequestSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, errors: formatZodErrors(result.error) };
  }
  return { ok: true, request: result.data };
}

/** Best-effort request id for error envelopes, before the request is validated. */
export function extractRequestId(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "request_id" in raw) {
    const id = raw.request_id;
    if (typeof id === "string" && id.length > 0) return id;
  }
  return "unknown";
}
