import { describe, it, expect } from "vitest";
import { sampleCalibration, samplingRange } from "./calibration-sampler.js";
import { ScriptedSource, stockConstraints } from "../test-helpers.js";
import { resolveConstraints } from "../types/constraints.js";

describe("sampleCalibration", () => {
  it("draws each parameter from its configured range, in fixed order", () => {
    const source = new ScriptedSource([0, 0.5, 1]);
    const calibration = sampleCalibration(source, stockConstraints());

    expect(source.calls).toEqual([
      [11.5, 14.7],
      [-2, 8],
      [0, 22],
    ]);
    expect(calibration).toEqual({ afr_target: 11.5, ign_timing_deg: 3, boost_target_psi: 22 });
  });

  it("falls back to built-in ranges for unconfigured parameters", () => {
    const source = new ScriptedSource([0.5, 0.5, 0.5]);
    expect(sampleCalibration(source, resolveConstraints())).toEqual({
      afr_target: 13,
      ign_timing_deg: 2,
      boost_target_psi: 7,
    });
  });

  it("mixes configured and default ranges", () => {
    const constraints = resolveConstraints({ calibrationRanges: { boost_target_psi: [5, 6] } });
    const source = new ScriptedSource([0, 0, 0]);
    expect(sampleCalibration(source, constraints)).toEqual({
      afr_target: 12.5,
      ign_timing_deg: 0,
      boost_target_psi: 5,
    });
  });
});

describe("samplingRange", () => {
  it("swaps inverted bounds", () => {
    const constraints = resolveConstraints({ calibrationRanges: { afr_target: [14.7, 11.5] } });
    expect(samplingRange("afr_target", constraints)).toEqual([11.5, 14.7]);
  });

  it("keeps ordered bounds", () => {
    expect(samplingRange("ign_timing_deg", stockConstraints())).toEqual([-2, 8]);
  });
});
