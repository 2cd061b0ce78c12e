import type { RiskLevel } from "../catalog/types.js";

export const enum ComplianceLevel {
  Compliant = "compliant",
  PartiallyCompliant = "partially_compliant",
  NonCompliant = "non_compliant",
  Unknown = "unknown",
}

export interface ComplianceResult {
  readonly rule_id: string;
  readonly standard: string;
  readonly compliance_level: ComplianceLevel;
  /** Always within [0, 1]. */
  readonly score: number;
  readonly findings: readonly string[];
  readonly recommendations: readonly string[];
  readonly evidence: readonly string[];
  readonly risk_assessment: RiskLevel;
}
