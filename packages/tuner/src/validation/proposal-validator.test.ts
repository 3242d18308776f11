import { describe, it, expect } from "vitest";
import { validateProposal, type ProposalInput } from "./proposal-validator.js";
import { secondDifference } from "../engine/curve-math.js";
import { FIVE_BIN_RPM, FIVE_BIN_TORQUE, stockConstraints } from "../test-helpers.js";

const CAL = { afr_target: 13.0, ign_timing_deg: 2.0, boost_target_psi: 10.0 };

function input(overrides: Partial<ProposalInput>): ProposalInput {
  return {
    delta: [0, 0, 0, 0, 0],
    calibration: CAL,
    baseline: FIVE_BIN_TORQUE,
    rpmBins: FIVE_BIN_RPM,
    constraints: stockConstraints(),
    ...overrides,
  };
}

describe("validateProposal", () => {
  it("accepts a flat delta with no warnings", () => {
    expect(validateProposal(input({ delta: [1, 1, 1, 1, 1] }))).toEqual({ ok: true, warnings: [] });
  });

  it("accepts a flat delta whatever the positive smoothness bound", () => {
    for (const bound of [0.001, 0.15, 100]) {
      const constraints = stockConstraints({ smoothness: { maxSecondDerivative: bound } });
      expect(validateProposal(input({ delta: [1, 1, 1, 1, 1], constraints })).ok).toBe(true);
    }
  });

  it("rejects a spike for smoothness, naming the first bad bin", () => {
    const delta = [0, 0, 5, 0, 0];
    const constraints = stockConstraints({ maxPeakGainRatio: 0.05 });
    const outcome = validateProposal(input({ delta, baseline: [200, 200, 200, 200, 200], constraints }));

    expect(secondDifference(delta, 2)).toBe(10);
    expect(outcome).toEqual({
      ok: false,
      rule: "smoothness",
      reason: "smoothness violation at bin 1: delta second_derivative=5.0000 > max 0.15",
    });
  });

  it("rejects an out-of-range calibration, naming the parameter", () => {
    const outcome = validateProposal(input({ calibration: { ...CAL, afr_target: 10.0 } }));
    expect(outcome).toEqual({
      ok: false,
      rule: "calibration",
      reason: "calibration.afr_target=10 outside allowed range [11.5, 14.7]",
    });
  });

  it("treats range bounds as inclusive", () => {
    const calibration = { afr_target: 11.5, ign_timing_deg: 8, boost_target_psi: 0 };
    expect(validateProposal(input({ calibration })).ok).toBe(true);
  });

  it("does not range-check parameters without a configured range", () => {
    const constraints = stockConstraints({ calibrationRanges: {} });
    expect(validateProposal(input({ calibration: { ...CAL, boost_target_psi: 99 }, constraints })).ok).toBe(true);
  });

  it("rejects a non-finite calibration value even without a range", () => {
    const constraints = stockConstraints({ calibrationRanges: {} });
    const outcome = validateProposal(input({ calibration: { ign_timing_deg: Number.NaN }, constraints }));
    expect(outcome).toEqual({ ok: false, rule: "calibration", reason: "calibration.ign_timing_deg is not finite: NaN" });
  });

  it("rejects a delta/rpm length mismatch", () => {
    const outcome = validateProposal(input({ delta: [1, 1] }));
    expect(outcome).toEqual({ ok: false, rule: "length", reason: "torque_delta length 2 != rpm_bins length 5" });
  });

  it("rejects a baseline/rpm length mismatch", () => {
    const outcome = validateProposal(input({ baseline: [200, 210, 220] }));
    expect(outcome).toEqual({ ok: false, rule: "length", reason: "baseline_torque length 3 != rpm_bins length 5" });
  });

  it("checks length before finiteness", () => {
    const outcome = validateProposal(input({ delta: [Number.NaN] }));
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.rule).toBe("length");
  });

  it("rejects NaN and infinite deltas", () => {
    expect(validateProposal(input({ delta: [1, Number.NaN, 1, 1, 1] }))).toEqual({
      ok: false,
      rule: "non_finite_delta",
      reason: "torque_delta[1] is not finite: NaN",
    });
    expect(validateProposal(input({ delta: [1, 1, Number.POSITIVE_INFINITY, 1, 1] }))).toEqual({
      ok: false,
      rule: "non_finite_delta",
      reason: "torque_delta[2] is not finite: Infinity",
    });
  });

  it("rejects a non-positive baseline value", () => {
    const outcome = validateProposal(input({ baseline: [200, 0, 220, 215, 200] }));
    expect(outcome).toEqual({ ok: false, rule: "invalid_baseline", reason: "baseline_torque_nm[1] is invalid: 0" });
  });

  it("rejects a bin over the absolute cap", () => {
    const outcome = validateProposal(input({ delta: [1, 9, 1, 1, 1] }));
    expect(outcome).toEqual({
      ok: false,
      rule: "bin_delta_nm",
      reason: "bin 1 delta 9.0000 Nm exceeds max_bin_delta_nm 8",
    });
  });

  it("applies the absolute cap to negative deltas", () => {
    const outcome = validateProposal(input({ delta: [-9, 0, 0, 0, 0] }));
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.reason).toBe("bin 0 delta -9.0000 Nm exceeds max_bin_delta_nm 8");
  });

  it("rejects a bin over the ratio cap", () => {
    // 7 / 210 = 0.0333
    const outcome = validateProposal(input({ delta: [1, 7, 1, 1, 1] }));
    expect(outcome).toEqual({
      ok: false,
      rule: "bin_delta_ratio",
      reason: "bin 1 delta ratio 0.0333 exceeds max_bin_delta_ratio 0.03",
    });
  });

  it("rejects a peak gain over the cap", () => {
    // 5 / 220 = 0.0227 > 0.02
    const constraints = stockConstraints({
      maxBinDeltaRatio: 0.05,
      smoothness: { maxSecondDerivative: 100 },
      calibrationRanges: {},
    });
    const outcome = validateProposal(
      input({ delta: [0, 5, 0], baseline: [200, 220, 200], rpmBins: [1000, 2000, 3000], constraints }),
    );
    expect(outcome).toEqual({ ok: false, rule: "peak_gain", reason: "peak gain ratio 0.0227 exceeds cap 0.02" });
  });

  it("allows gains away from the peak bin", () => {
    // bin 0 rises to 205, still under the 220 peak: peak gain is zero
    const constraints = stockConstraints({ smoothness: { maxSecondDerivative: 100 } });
    expect(validateProposal(input({ delta: [5, 0, 0, 0, 0], constraints }))).toEqual({ ok: true, warnings: [] });
  });

  it("warns when the proposal lowers peak torque", () => {
    const outcome = validateProposal(input({ delta: [-2, -2, -2, -2, -2] }));
    expect(outcome).toEqual({ ok: true, warnings: ["proposal reduces peak torque by 0.91%"] });
  });

  it("skips smoothness on curves shorter than three bins", () => {
    const outcome = validateProposal(
      input({ delta: [3], baseline: [200], rpmBins: [1000], constraints: stockConstraints() }),
    );
    expect(outcome).toEqual({ ok: true, warnings: [] });
  });

  it("stops at the first violation in check order", () => {
    // over the ratio cap, over the peak cap and not smooth: ratio is checked first
    const outcome = validateProposal(input({ delta: [0, 0, 7.5, 0, 0] }));
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.rule).toBe("bin_delta_ratio");
  });
});
