import type { Constraints } from "../types/constraints.js";

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/** Largest value, or -Infinity for an empty list. */
export function peakOf(values: readonly number[]): number {
  let peak = Number.NEGATIVE_INFINITY;
  for (const v of values) {
    if (v > peak) peak = v;
  }
  return peak;
}

/** Smallest value, or Infinity for an empty list. Loops so long curves never hit the argument limit. */
export function minOf(values: readonly number[]): number {
  let low = Number.POSITIVE_INFINITY;
  for (const v of values) {
    if (v < low) low = v;
  }
  return low;
}

export function applyDelta(baseline: readonly number[], delta: readonly number[]): number[] {
  return baseline.map((b, i) => b + (delta[i] ?? 0));
}

/**
 * Fractional change of the curve maximum after applying `delta`.
 * Returns 0 when the baseline peak is not positive.
 */
export function peakGainRatio(baseline: readonly number[], delta: readonly number[]): number {
  const baselinePeak = peakOf(baseline);
  if (!(baselinePeak > 0)) return 0;
  return (peakOf(applyDelta(baseline, delta)) - baselinePeak) / baselinePeak;
}

/** |v[i+1] - 2v[i] + v[i-1]| for an interior bin. */
export function secondDifference(values: readonly number[], i: number): number {
  return Math.abs(values[i + 1] - 2 * values[i] + values[i - 1]);
}

/** Tightest of the absolute and ratio caps, per bin. */
export function perBinLimits(baseline: readonly number[], constraints: Constraints): number[] {
  return baseline.map((b) => Math.min(constraints.maxBinDeltaNm, b * constraints.maxBinDeltaRatio));
}

/** Score of a proposed curve: total torque under it. Higher is better. */
export function scoreCurve(baseline: readonly number[], delta: readonly number[]): number {
  return sum(applyDelta(baseline, delta));
}

export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}
