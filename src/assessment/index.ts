export {
  assessRequirement,
  assessTestCase,
  calculateOverallCompliance,
  rollup,
} from "./result-aggregator.js";
export { validateCoverage, type CoverageOptions } from "./coverage.js";
export { analyzeTraceability } from "./traceability.js";
export { findRelatedRequirement, sameId } from "./related.js";
export type {
  CoverageGap,
  CoverageReport,
  StandardRollup,
  TraceabilityAnalysis,
} from "./types.js";
