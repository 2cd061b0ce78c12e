export { loadBatch } from "./batch-loader.js";
export {
  normalizeLink,
  normalizeRequirement,
  normalizeTestCase,
  parseBatch,
} from "./normalize.js";
export {
  displayId,
  stepsOf,
  summaryText,
  testCaseText,
  textOf,
} from "./entity-text.js";
export type {
  RecordBatch,
  RecordId,
  RequirementRecord,
  TestCaseRecord,
  TraceabilityLink,
} from "./types.js";
export { EntityType } from "./types.js";
