export { evaluateRequirement } from "./requirement-scorer.js";
export {
  evaluateTestCase,
  REQUIREMENT_LINK_EVIDENCE,
} from "./test-case-scorer.js";
export { completenessScore } from "./completeness.js";
export { clampScore, complianceLevelForScore } from "./levels.js";
export { createUnknownResult, isAssessed } from "./result-factory.js";
export type { ComplianceResult } from "./types.js";
export { ComplianceLevel } from "./types.js";
export {
  COMPLETENESS_POINTS,
  COMPLETENESS_SCALE,
  LEVEL_THRESHOLDS,
  REQUIREMENT_WEIGHTS,
  TEST_CASE_WEIGHTS,
} from "./weights.js";
