import type { RuleCatalog } from "../catalog/rule-catalog.js";
import { summaryText, testCaseText } from "../input/entity-text.js";
import type { RequirementRecord, TestCaseRecord } from "../input/types.js";
import { complianceLevelForScore } from "../scoring/levels.js";
import { evaluateRequirement } from "../scoring/requirement-scorer.js";
import { isAssessed } from "../scoring/result-factory.js";
import { evaluateTestCase } from "../scoring/test-case-scorer.js";
import type { ComplianceResult } from "../scoring/types.js";
import type { StandardRollup } from "./types.js";

export function assessRequirement(
  catalog: RuleCatalog,
  requirement: RequirementRecord,
): ComplianceResult[] {
  const text = summaryText(requirement);
  const results: ComplianceResult[] = [];
  for (const rule of catalog.allRules()) {
    const result = evaluateRequirement(text, requirement, rule);
    if (isAssessed(result)) {
      results.push(result);
    }
  }
  return results;
}

export function assessTestCase(
  catalog: RuleCatalog,
  testCase: TestCaseRecord,
  requirement?: RequirementRecord,
): ComplianceResult[] {
  const text = testCaseText(testCase);
  const results: ComplianceResult[] = [];
  for (const rule of catalog.allRules()) {
    const result = evaluateTestCase(text, testCase, rule, requirement);
    if (isAssessed(result)) {
      results.push(result);
    }
  }
  return results;
}

/**
 * Rolls the results of one standard into a single score. Requirement and
 * test-case averages weigh equally when both exist. Returns null when the
 * standard has no results at all.
 */
export function rollup(
  standard: string,
  requirementResults: readonly ComplianceResult[],
  testCaseResults: readonly ComplianceResult[],
): StandardRollup | null {
  const reqScores = scoresFor(standard, requirementResults);
  const tcScores = scoresFor(standard, testCaseResults);
  if (reqScores.length === 0 && tcScores.length === 0) {
    return null;
  }

  let score: number;
  if (reqScores.length > 0 && tcScores.length > 0) {
    score = (average(reqScores) + average(tcScores)) / 2;
  } else if (reqScores.length > 0) {
    score = average(reqScores);
  } else {
    score = average(tcScores);
  }

  return {
    score,
    compliance_level: complianceLevelForScore(score),
    requirement_count: reqScores.length,
    test_case_count: tcScores.length,
  };
}

export function calculateOverallCompliance(
  standards: readonly string[],
  requirementResults: readonly ComplianceResult[],
  testCaseResults: readonly ComplianceResult[],
): Record<string, StandardRollup> {
  const overall: Record<string, StandardRollup> = {};
  for (const standard of standards) {
    const entry = rollup(standard, requirementResults, testCaseResults);
    if (entry) {
      overall[standard] = entry;
    }
  }
  return overall;
}

function scoresFor(
  standard: string,
  results: readonly ComplianceResult[],
): number[] {
  return results
    .filter((result) => result.standard === standard)
    .map((result) => result.score);
}

function average(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
