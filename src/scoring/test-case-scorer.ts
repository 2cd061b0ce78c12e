import type { CompiledRule } from "../catalog/types.js";
import { summaryText } from "../input/entity-text.js";
import type { RequirementRecord, TestCaseRecord } from "../input/types.js";
import { isRequired } from "../matcher/criteria-checker.js";
import { countMatches, matchPatterns } from "../matcher/pattern-matcher.js";
import { completenessScore } from "./completeness.js";
import { clampScore, complianceLevelForScore } from "./levels.js";
import { createUnknownResult } from "./result-factory.js";
import { ComplianceLevel } from "./types.js";
import type { ComplianceResult } from "./types.js";
import { TEST_CASE_WEIGHTS } from "./weights.js";

export const REQUIREMENT_LINK_EVIDENCE =
  "Test case addresses compliance-related requirements";

export function evaluateTestCase(
  text: string,
  testCase: TestCaseRecord,
  rule: CompiledRule,
  requirement?: RequirementRecord,
): ComplianceResult {
  const match = matchPatterns(text, rule.test_case_regexes);
  const requirementMatches = requirement
    ? countMatches(summaryText(requirement), rule.requirement_regexes)
    : 0;

  if (match.count === 0 && requirementMatches === 0) {
    return createUnknownResult(rule);
  }

  const evidence = match.matched.map(
    (source) => `Found test pattern: ${source}`,
  );
  const patternScore =
    rule.test_case_regexes.length > 0
      ? Math.min(match.count / rule.test_case_regexes.length, 1)
      : TEST_CASE_WEIGHTS.defaultPatternScore;

  let score = patternScore * TEST_CASE_WEIGHTS.pattern;
  if (requirementMatches > 0) {
    score += TEST_CASE_WEIGHTS.requirementBonus;
    evidence.push(REQUIREMENT_LINK_EVIDENCE);
  }
  score = clampScore((score + completenessScore(testCase)) / 2);

  const findings: string[] = [];
  const recommendations: string[] = [];
  const level = complianceLevelForScore(score);
  if (level === ComplianceLevel.PartiallyCompliant) {
    findings.push("Test case partially covers compliance requirements");
    recommendations.push(
      `Enhance test case to fully verify ${rule.standard} compliance`,
    );
  } else if (level === ComplianceLevel.NonCompliant) {
    findings.push("Test case does not adequately verify compliance");
    recommendations.push(`Add test steps to verify ${rule.standard} compliance`);
  }

  const criteria = rule.validation_criteria;
  if (
    isRequired(criteria, "requires_security_testing") &&
    !text.includes("security")
  ) {
    recommendations.push("Add security testing steps");
  }
  if (isRequired(criteria, "requires_verification") && !text.includes("verify")) {
    recommendations.push("Add verification steps");
  }

  return {
    rule_id: rule.rule_id,
    standard: rule.standard,
    compliance_level: level,
    score,
    findings,
    recommendations,
    evidence,
    risk_assessment: rule.risk_level,
  };
}
