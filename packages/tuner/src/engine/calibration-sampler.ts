import type { UniformSource } from "../random/random-stream.js";
import {
  CALIBRATION_PARAMS,
  DEFAULT_CALIBRATION_RANGES,
  type Calibration,
  type CalibrationRange,
  type Constraints,
} from "../types/constraints.js";

/** Configured range for a parameter, else the built-in default; inverted bounds are swapped. */
export function samplingRange(
  param: keyof Calibration,
  constraints: Constraints,
): CalibrationRange {
  const [lo, hi] = constraints.calibrationRanges[param] ?? DEFAULT_CALIBRATION_RANGES[param];
  return lo > hi ? [hi, lo] : [lo, hi];
}

/** Draw every calibration parameter uniformly, in CALIBRATION_PARAMS order. */
export function sampleCalibration(source: UniformSource, constraints: Constraints): Calibration {
  const calibration: Calibration = { afr_target: 0, ign_timing_deg: 0, boost_target_psi: 0 };
  for (const param of CALIBRATION_PARAMS) {
    const [lo, hi] = samplingRange(param, constraints);
    calibration[param] = source.uniform(lo, hi);
  }
  return calibration;
}
