export const CALIBRATION_PARAMS = ["afr_target", "ign_timing_deg", "boost_target_psi"] as const;

export type CalibrationParam = (typeof CALIBRATION_PARAMS)[number];

export type Calibration = Record<CalibrationParam, number>;

export type CalibrationRange = readonly [lo: number, hi: number];

export type CalibrationRanges = Partial<Record<CalibrationParam, CalibrationRange>>;

export interface SmoothnessConstraints {
  /** Absolute bound on |d[i+1] - 2d[i] + d[i-1]| of the delta curve, in Nm. */
  maxSecondDerivative: number;
}

export interface Constraints {
  maxPeakGainRatio: number;
  maxBinDeltaNm: number;
  maxBinDeltaRatio: number;
  smoothness: SmoothnessConstraints;
  calibrationRanges: CalibrationRanges;
}

export interface ConstraintsOverrides {
  maxPeakGainRatio?: number;
  maxBinDeltaNm?: number;
  maxBinDeltaRatio?: number;
  smoothness?: Partial<SmoothnessConstraints>;
  calibrationRanges?: CalibrationRanges;
}

export const DEFAULT_CONSTRAINTS: Constraints = {
  maxPeakGainRatio: 0.02,
  maxBinDeltaNm: 8.0,
  maxBinDeltaRatio: 0.03,
  smoothness: { maxSecondDerivative: 0.15 },
  calibrationRanges: {},
};

/** Sampling ranges for parameters the caller did not configure. Not enforced by the validator. */
export const DEFAULT_CALIBRATION_RANGES: Record<CalibrationParam, CalibrationRange> = {
  afr_target: [12.5, 13.5],
  ign_timing_deg: [0.0, 4.0],
  boost_target_psi: [0.0, 14.0],
};

export function resolveConstraints(overrides: ConstraintsOverrides = {}): Constraints {
  return {
    maxPeakGainRatio: overrides.maxPeakGainRatio ?? DEFAULT_CONSTRAINTS.maxPeakGainRatio,
    maxBinDeltaNm: overrides.maxBinDeltaNm ?? DEFAULT_CONSTRAINTS.maxBinDeltaNm,
    maxBinDeltaRatio: overrides.maxBinDeltaRatio ?? DEFAULT_CONSTRAINTS.maxBinDeltaRatio,
    smoothness: { ...DEFAULT_CONSTRAINTS.smoothness, ...overrides.smoothness },
    calibrationRanges: { ...overrides.calibrationRanges },
  };
}
