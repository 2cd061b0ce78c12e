import { stepsOf } from "../input/entity-text.js";
import type { TestCaseRecord } from "../input/types.js";
import { COMPLETENESS_POINTS, COMPLETENESS_SCALE } from "./weights.js";

export function completenessScore(testCase: TestCaseRecord): number {
  let points = 0;
  if (isPresent(testCase.title)) {
    points += COMPLETENESS_POINTS.title;
  }
  if (isPresent(testCase.description)) {
    points += COMPLETENESS_POINTS.description;
  }
  if (isPresent(testCase.preconditions)) {
    points += COMPLETENESS_POINTS.preconditions;
  }
  if (stepsOf(testCase).length > 0) {
    points += COMPLETENESS_POINTS.test_steps;
  }
  if (isPresent(testCase.expected_results)) {
    points += COMPLETENESS_POINTS.expected_results;
  }
  if (isPresent(testCase.postconditions)) {
    points += COMPLETENESS_POINTS.postconditions;
  }
  if (isPresent(testCase.priority)) {
    points += COMPLETENESS_POINTS.priority;
  }
  return points / COMPLETENESS_SCALE;
}

function isPresent(value: unknown): boolean {
  return typeof value === "string" && value.length > 0;
}
