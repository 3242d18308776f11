import type { UniformSource } from "./random/random-stream.js";
import { resolveConstraints, type Constraints, type ConstraintsOverrides } from "./types/constraints.js";

/** Replays fixed fractions: the k-th draw returns lo + (hi - lo) * fractions[k]. */
export class ScriptedSource implements UniformSource {
  readonly calls: Array<[number, number]> = [];
  private index = 0;

  constructor(private readonly fractions: readonly number[]) {}

  uniform(lo: number, hi: number): number {
    if (this.index >= this.fractions.length) {
      throw new Error(`ScriptedSource exhausted after ${this.index} draws`);
    }
    this.calls.push([lo, hi]);
    return lo + (hi - lo) * this.fractions[this.index++];
  }
}

export const STOCK_RANGES = {
  afr_target: [11.5, 14.7],
  ign_timing_deg: [-2.0, 8.0],
  boost_target_psi: [0.0, 22.0],
} as const;

export function stockConstraints(overrides: ConstraintsOverrides = {}): Constraints {
  return resolveConstraints({
    maxPeakGainRatio: 0.02,
    maxBinDeltaNm: 8.0,
    maxBinDeltaRatio: 0.03,
    smoothness: { maxSecondDerivative: 0.15 },
    calibrationRanges: STOCK_RANGES,
    ...overrides,
  });
}

export const FIVE_BIN_RPM = [1000, 2000, 3000, 4000, 5000];
export const FIVE_BIN_TORQUE = [200, 210, 220, 215, 200];

export const ELEVEN_BIN_RPM = [1000, 1500, 2000, 2500, 3000, 3500, 4000, 4500, 5000, 5500, 6000];
export const ELEVEN_BIN_TORQUE = [180, 195, 210, 220, 225, 222, 215, 205, 190, 170, 145];
