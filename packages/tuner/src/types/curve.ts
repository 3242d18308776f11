/** Baseline torque curve handed in by the caller. Index i of both arrays is one bin. */
export interface BaselineCurve {
  rpmBins: readonly number[];
  torqueNm: readonly number[];
}

/** Additive per-bin torque change, same length as the baseline. */
export type DeltaProfile = number[];
