// Types
export type { BaselineCurve, DeltaProfile } from "./types/curve.js";
export type {
  Calibration,
  CalibrationParam,
  CalibrationRange,
  CalibrationRanges,
  Constraints,
  ConstraintsOverrides,
  SmoothnessConstraints,
} from "./types/constraints.js";
export {
  CALIBRATION_PARAMS,
  DEFAULT_CALIBRATION_RANGES,
  DEFAULT_CONSTRAINTS,
  resolveConstraints,
} from "./types/constraints.js";
export type {
  Candidate,
  RejectionRule,
  SearchResult,
  SearchStats,
  ValidationOutcome,
} from "./types/result.js";

// Randomness
export { RandomStream } from "./random/random-stream.js";
export type { UniformSource } from "./random/random-stream.js";

// Engine
export { generateDeltaProfile } from "./engine/candidate-generator.js";
export { sampleCalibration, samplingRange } from "./engine/calibration-sampler.js";
export { runSearch, explorationScale } from "./engine/search-loop.js";
export type { SearchLogger, SearchParams } from "./engine/search-loop.js";
export { assembleResult } from "./engine/result-assembler.js";
export type { AssembleParams } from "./engine/result-assembler.js";
export { peakGainRatio, scoreCurve, secondDifference, perBinLimits } from "./engine/curve-math.js";

// Validation
export { validateProposal } from "./validation/proposal-validator.js";
export type { ProposalInput } from "./validation/proposal-validator.js";
