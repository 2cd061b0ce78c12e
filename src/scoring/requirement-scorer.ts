import type { CompiledRule } from "../catalog/types.js";
import { summaryText } from "../input/entity-text.js";
import type { RequirementRecord } from "../input/types.js";
import { checkCriteria, isRequired } from "../matcher/criteria-checker.js";
import { matchPatterns } from "../matcher/pattern-matcher.js";
import { clampScore, complianceLevelForScore } from "./levels.js";
import { createUnknownResult } from "./result-factory.js";
import { ComplianceLevel } from "./types.js";
import type { ComplianceResult } from "./types.js";
import { REQUIREMENT_WEIGHTS } from "./weights.js";

export function evaluateRequirement(
  text: string,
  requirement: RequirementRecord,
  rule: CompiledRule,
): ComplianceResult {
  const match = matchPatterns(text, rule.requirement_regexes);
  if (match.count === 0) {
    return createUnknownResult(rule);
  }

  const patternScore = Math.min(
    match.count / rule.requirement_regexes.length,
    1,
  );
  const criteriaScore = checkCriteria(
    summaryText(requirement),
    rule.validation_criteria,
  );
  const score = clampScore(
    patternScore * REQUIREMENT_WEIGHTS.pattern +
      criteriaScore * REQUIREMENT_WEIGHTS.criteria,
  );

  const findings: string[] = [];
  const recommendations: string[] = [];
  const level = complianceLevelForScore(score);
  if (level === ComplianceLevel.PartiallyCompliant) {
    findings.push("Requirement partially meets compliance criteria");
    recommendations.push(
      `Enhance requirement to fully comply with ${rule.standard}`,
    );
  } else if (level === ComplianceLevel.NonCompliant) {
    findings.push("Requirement does not meet compliance criteria");
    recommendations.push(`Revise requirement to comply with ${rule.standard}`);
  }

  const criteria = rule.validation_criteria;
  if (
    isRequired(criteria, "requires_traceability") &&
    !text.includes("traceability")
  ) {
    recommendations.push("Add traceability requirements");
  }
  if (isRequired(criteria, "requires_risk_analysis") && !text.includes("risk")) {
    recommendations.push("Include risk analysis requirements");
  }

  return {
    rule_id: rule.rule_id,
    standard: rule.standard,
    compliance_level: level,
    score,
    findings,
    recommendations,
    evidence: match.matched.map((source) => `Found pattern: ${source}`),
    risk_assessment: rule.risk_level,
  };
}
