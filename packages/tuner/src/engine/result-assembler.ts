import type { Constraints } from "../types/constraints.js";
import type { BaselineCurve } from "../types/curve.js";
import type { Candidate, SearchResult, SearchStats } from "../types/result.js";
import { validateProposal } from "../validation/proposal-validator.js";
import { clamp, peakGainRatio } from "./curve-math.js";

export interface AssembleParams {
  baseline: BaselineCurve;
  constraints: Constraints;
  best: Candidate;
  bestScore: number;
  stats: SearchStats;
}

/**
 * Derive final metrics from the retained best candidate.
 * Warnings come from validating that candidate again, not from the cycle that found it.
 */
export function assembleResult({ baseline, constraints, best, bestScore, stats }: AssembleParams): SearchResult {
  const estimatedPeakGainRatio = peakGainRatio(baseline.torqueNm, best.delta);
  const confidence =
    constraints.maxPeakGainRatio > 0
      ? clamp(estimatedPeakGainRatio / constraints.maxPeakGainRatio, 0, 1)
      : 0;

  const outcome = validateProposal({
    delta: best.delta,
    calibration: best.calibration,
    baseline: baseline.torqueNm,
    rpmBins: baseline.rpmBins,
    constraints,
  });

  return Object.freeze({
    ...stats,
    delta: Object.freeze([...best.delta]),
    calibration: Object.freeze({ ...best.calibration }),
    bestScore,
    estimatedPeakGainRatio,
    confidence,
    warnings: Object.freeze(outcome.ok ? [...outcome.warnings] : []),
    finalRejection: outcome.ok ? null : outcome.reason,
  });
}
