import type { Calibration } from "./constraints.js";
import type { DeltaProfile } from "./curve.js";

export type RejectionRule =
  | "length"
  | "non_finite_delta"
  | "invalid_baseline"
  | "bin_delta_nm"
  | "bin_delta_ratio"
  | "peak_gain"
  | "smoothness"
  | "calibration";

export type ValidationOutcome =
  | { ok: true; warnings: string[] }
  | { ok: false; rule: RejectionRule; reason: string };

export interface Candidate {
  delta: DeltaProfile;
  calibration: Calibration;
}

export interface SearchStats {
  cyclesUsed: number;
  acceptedCount: number;
  rejectedCount: number;
  improvements: number;
  rejectionsByRule: Partial<Record<RejectionRule, number>>;
}

export interface SearchResult extends SearchStats {
  readonly delta: readonly number[];
  readonly calibration: Readonly<Calibration>;
  readonly bestScore: number;
  readonly estimatedPeakGainRatio: number;
  /** Proximity of the achieved peak gain to the allowed ceiling, 0-1. */
  readonly confidence: number;
  readonly warnings: readonly string[];
  /** Set only when re-validating the retained best candidate failed. */
  readonly finalRejection: string | null;
}
