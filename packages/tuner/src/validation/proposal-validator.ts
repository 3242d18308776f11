import { CALIBRATION_PARAMS, type Calibration, type Constraints } from "../types/constraints.js";
import type { RejectionRule, ValidationOutcome } from "../types/result.js";
import { applyDelta, peakOf, secondDifference } from "../engine/curve-math.js";

export interface ProposalInput {
  delta: readonly number[];
  calibration: Partial<Calibration>;
  baseline: readonly number[];
  rpmBins: readonly number[];
  constraints: Constraints;
}

function reject(rule: RejectionRule, reason: string): ValidationOutcome {
  return { ok: false, rule, reason };
}

/**
 * Check a (delta, calibration) candidate against every hard constraint.
 *
 * Checks run in a fixed order and stop at the first violation:
 * lengths, finite deltas, baseline sanity, per-bin caps, peak gain,
 * smoothness of the delta curve, calibration ranges.
 * A proposal that lowers peak torque is allowed but produces a warning.
 */
export function validateProposal(input: ProposalInput): ValidationOutcome {
  const { delta, calibration, baseline, rpmBins, constraints } = input;
  const warnings: string[] = [];

  if (delta.length !== rpmBins.length) {
    return reject("length", `torque_delta length ${delta.length} != rpm_bins length ${rpmBins.length}`);
  }
  if (baseline.length !== rpmBins.length) {
    return reject("length", `baseline_torque length ${baseline.length} != rpm_bins length ${rpmBins.length}`);
  }

  for (let i = 0; i < delta.length; i++) {
    if (!Number.isFinite(delta[i])) {
      return reject("non_finite_delta", `torque_delta[${i}] is not finite: ${delta[i]}`);
    }
  }

  for (let i = 0; i < baseline.length; i++) {
    if (!Number.isFinite(baseline[i]) || baseline[i] <= 0) {
      return reject("invalid_baseline", `baseline_torque_nm[${i}] is invalid: ${baseline[i]}`);
    }
  }

  const { maxBinDeltaNm, maxBinDeltaRatio, maxPeakGainRatio } = constraints;
  for (let i = 0; i < delta.length; i++) {
    const absDelta = Math.abs(delta[i]);
    if (absDelta > maxBinDeltaNm) {
      return reject(
        "bin_delta_nm",
        `bin ${i} delta ${delta[i].toFixed(4)} Nm exceeds max_bin_delta_nm ${maxBinDeltaNm}`,
      );
    }
    const ratio = absDelta / baseline[i];
    if (ratio > maxBinDeltaRatio) {
      return reject(
        "bin_delta_ratio",
        `bin ${i} delta ratio ${ratio.toFixed(4)} exceeds max_bin_delta_ratio ${maxBinDeltaRatio}`,
      );
    }
  }

  if (baseline.length > 0) {
    const baselinePeak = peakOf(baseline);
    const gain = (peakOf(applyDelta(baseline, delta)) - baselinePeak) / baselinePeak;
    if (gain > maxPeakGainRatio) {
      return reject("peak_gain", `peak gain ratio ${gain.toFixed(4)} exceeds cap ${maxPeakGainRatio}`);
    }
    if (gain < 0) {
      warnings.push(`proposal reduces peak torque by ${(Math.abs(gain) * 100).toFixed(2)}%`);
    }
  }

  const { maxSecondDerivative } = constraints.smoothness;
  if (delta.length >= 3) {
    for (let i = 1; i < delta.length - 1; i++) {
      const secondDeriv = secondDifference(delta, i);
      if (secondDeriv > maxSecondDerivative) {
        return reject(
          "smoothness",
          `smoothness violation at bin ${i}: delta second_derivative=${secondDeriv.toFixed(4)} > max ${maxSecondDerivative}`,
        );
      }
    }
  }

  for (const param of CALIBRATION_PARAMS) {
    const value = calibration[param];
    if (value === undefined) continue;
    if (!Number.isFinite(value)) {
      return reject("calibration", `calibration.${param} is not finite: ${value}`);
    }
    const range = constraints.calibrationRanges[param];
    if (range && !(range[0] <= value && value <= range[1])) {
      return reject(
        "calibration",
        `calibration.${param}=${value} outside allowed range [${range[0]}, ${range[1]}]`,
      );
    }
  }

  return { ok: true, warnings };
}
