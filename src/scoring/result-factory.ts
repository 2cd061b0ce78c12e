import { RiskLevel } from "../catalog/types.js";
import type { ComplianceRule } from "../catalog/types.js";
import { ComplianceLevel } from "./types.js";
import type { ComplianceResult } from "./types.js";

export function createUnknownResult(rule: ComplianceRule): ComplianceResult {
  return {
    rule_id: rule.rule_id,
    standard: rule.standard,
    compliance_level: ComplianceLevel.Unknown,
    score: 0,
    findings: [],
    recommendations: [],
    evidence: [],
    risk_assessment: RiskLevel.Unknown,
  };
}

export function isAssessed(result: ComplianceResult): boolean {
  return result.compliance_level !== ComplianceLevel.Unknown;
}
