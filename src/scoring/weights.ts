export const REQUIREMENT_WEIGHTS = {
  pattern: 0.6,
  criteria: 0.4,
} as const;

export const TEST_CASE_WEIGHTS = {
  pattern: 0.7,
  requirementBonus: 0.3,
  defaultPatternScore: 0.5,
} as const;

export const LEVEL_THRESHOLDS = {
  compliant: 0.8,
  partial: 0.5,
} as const;

// Tenths, so a fully populated test case sums to exactly 1.
export const COMPLETENESS_POINTS = {
  title: 1,
  description: 1,
  preconditions: 1,
  test_steps: 3,
  expected_results: 2,
  postconditions: 1,
  priority: 1,
} as const;

export const COMPLETENESS_SCALE = 10;
