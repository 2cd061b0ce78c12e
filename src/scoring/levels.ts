import { ComplianceLevel } from "./types.js";
import { LEVEL_THRESHOLDS } from "./weights.js";

export function complianceLevelForScore(score: number): ComplianceLevel {
  if (score >= LEVEL_THRESHOLDS.compliant) {
    return ComplianceLevel.Compliant;
  }
  if (score >= LEVEL_THRESHOLDS.partial) {
    return ComplianceLevel.PartiallyCompliant;
  }
  return ComplianceLevel.NonCompliant;
}

export function clampScore(score: number): number {
  return Math.min(Math.max(score, 0), 1);
}
