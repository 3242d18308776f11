import type { UniformSource } from "../random/random-stream.js";
import type { Constraints } from "../types/constraints.js";
import type { DeltaProfile } from "../types/curve.js";
import { clamp, minOf, perBinLimits } from "./curve-math.js";

/**
 * Build one Gaussian-bell delta profile that is smooth by construction.
 *
 * The bell's curvature peaks at roughly `peak / sigma^2`, so drawing sigma no
 * smaller than `sqrt(peak / maxSecondDerivative)` keeps every discrete second
 * difference within the smoothness bound without a reject-and-retry loop.
 *
 * Draw order: peak, sigma, center. Degenerate limits return zeros without drawing.
 *
 * @param scale - exploration breadth in (0, 1]; scales the peak ceiling
 */
export function generateDeltaProfile(
  source: UniformSource,
  baseline: readonly number[],
  constraints: Constraints,
  scale: number,
): DeltaProfile {
  const n = baseline.length;
  const zeros = (): DeltaProfile => new Array<number>(n).fill(0);
  if (n === 0) return [];

  const limits = perBinLimits(baseline, constraints);
  const globalLimit = minOf(limits) * scale;
  const maxSecondDerivative = constraints.smoothness.maxSecondDerivative;

  // NaN limits fall through here too
  if (!(globalLimit > 0) || !(maxSecondDerivative > 0)) return zeros();

  const peak = source.uniform(0, globalLimit);
  if (peak <= 0) return zeros();

  const minSigma = Math.sqrt(peak / maxSecondDerivative);
  const maxSigma = Math.max(n, minSigma + 0.1);
  const sigma = source.uniform(minSigma, maxSigma);

  const center = source.uniform(0, n - 1);

  return limits.map((limit, i) => {
    const z = (i - center) / sigma;
    // clamp only guards floating-point edge cases; the peak is already under every limit
    return clamp(peak * Math.exp(-0.5 * z * z), 0, limit);
  });
}
