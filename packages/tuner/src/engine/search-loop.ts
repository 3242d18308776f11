import { assertPositiveInt } from "@torque-tune/kit";
import { RandomStream } from "../random/random-stream.js";
import type { Constraints } from "../types/constraints.js";
import type { BaselineCurve } from "../types/curve.js";
import type { Candidate, SearchResult, SearchStats } from "../types/result.js";
import { validateProposal } from "../validation/proposal-validator.js";
import { generateDeltaProfile } from "./candidate-generator.js";
import { sampleCalibration } from "./calibration-sampler.js";
import { scoreCurve, sum } from "./curve-math.js";
import { assembleResult } from "./result-assembler.js";

/** Structural subset of a pino logger; the search never writes anywhere itself. */
export interface SearchLogger {
  debug(obj: Record<string, unknown>, msg: string): void;
}

export interface SearchParams {
  baseline: BaselineCurve;
  constraints: Constraints;
  cycleBudget: number;
  seed: number;
  logger?: SearchLogger;
}

/** Exploration breadth for a cycle: 1.0 on the first cycle, narrowing toward 0.5. */
export function explorationScale(cycle: number, cycleBudget: number): number {
  return 1.0 - (cycle / cycleBudget) * 0.5;
}

/**
 * Seeded best-of-budget search for a torque delta and calibration.
 *
 * Each cycle draws one delta profile then one calibration, validates the pair
 * and keeps it only if it strictly beats the best score so far. Rejected
 * candidates are dropped; the cycle still counts. The untouched baseline
 * (zero delta) is the floor, so the result always satisfies the constraints.
 */
export function runSearch(params: SearchParams): SearchResult {
  const { baseline, constraints, seed, logger } = params;
  const cycleBudget = assertPositiveInt(params.cycleBudget, "cycleBudget");
  const torque = baseline.torqueNm;
  const stream = new RandomStream(seed);

  let best: Candidate = {
    delta: new Array<number>(torque.length).fill(0),
    calibration: sampleCalibration(stream, constraints),
  };
  let bestScore = sum(torque);

  const stats: SearchStats = {
    cyclesUsed: 0,
    acceptedCount: 0,
    rejectedCount: 0,
    improvements: 0,
    rejectionsByRule: {},
  };

  for (let cycle = 0; cycle < cycleBudget; cycle++) {
    stats.cyclesUsed++;
    const scale = explorationScale(cycle, cycleBudget);

    const delta = generateDeltaProfile(stream, torque, constraints, scale);
    const calibration = sampleCalibration(stream, constraints);

    const outcome = validateProposal({
      delta,
      calibration,
      baseline: torque,
      rpmBins: baseline.rpmBins,
      constraints,
    });

    if (!outcome.ok) {
      stats.rejectedCount++;
      stats.rejectionsByRule[outcome.rule] = (stats.rejectionsByRule[outcome.rule] ?? 0) + 1;
      logger?.debug({ cycle, rule: outcome.rule, reason: outcome.reason }, "candidate rejected");
      continue;
    }

    stats.acceptedCount++;
    const score = scoreCurve(torque, delta);
    if (score > bestScore) {
      best = { delta, calibration };
      bestScore = score;
      stats.improvements++;
      logger?.debug({ cycle, score, scale }, "new best candidate");
    }
  }

  return assembleResult({ baseline, constraints, best, bestScore, stats });
}
