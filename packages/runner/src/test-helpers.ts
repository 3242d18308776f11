export interface RequestOverrides {
  seed?: number;
  cycle_budget?: number;
  rpm_bins?: number[];
  torque_nm?: number[];
  constraints?: Record<string, unknown>;
  request_id?: string;
  contract_version?: string;
}

export const STOCK_CONSTRAINTS = {
  max_peak_gain_ratio: 0.02,
  max_bin_delta_nm: 8.0,
  max_bin_delta_ratio: 0.03,
  smoothness: { max_second_derivative: 0.15 },
  calibration_ranges: {
    afr_target: [11.5, 14.7],
    ign_timing_deg: [-2.0, 8.0],
    boost_target_psi: [0.0, 22.0],
  },
};

/** A complete, valid request; delete or override fields to build bad ones. */
export function makeRequest(overrides: RequestOverrides = {}): Record<string, unknown> {
  return {
    contract_version: overrides.contract_version ?? "1.0",
    request_id: overrides.request_id ?? "test-001",
    seed: overrides.seed ?? 42,
    cycle_budget: overrides.cycle_budget ?? 40,
    vehicle: {
      vehicle_id: "test-vehicle",
      engine_family: "inline-4",
      aspiration: "Turbo",
      drivetrain: "FWD",
    },
    environment: { biome_id: "urban", altitude_m: 0.0, ambient_temp_c: 25.0 },
    street_cred: { level: 1, modifier: 1.0 },
    baseline_curve: {
      rpm_bins: overrides.rpm_bins ?? [1000, 1500, 2000, 2500, 3000, 3500, 4000, 4500, 5000, 5500, 6000],
      torque_nm: overrides.torque_nm ?? [180, 195, 210, 220, 225, 222, 215, 205, 190, 170, 145],
    },
    constraints: overrides.constraints ?? STOCK_CONSTRAINTS,
    parts: [],
  };
}

/** Deterministic clock: returns the given ticks in order, then repeats the last one. */
export function fixedClock(...ticks: number[]): () => number {
  let i = 0;
  return () => ticks[Math.min(i++, ticks.length - 1)];
}
