import type { StandardRollup } from "../assessment/types.js";
import type { ComplianceResult } from "../scoring/types.js";

export interface ReportSummary {
  readonly total_requirements: number;
  readonly total_test_cases: number;
  readonly standards_assessed: readonly string[];
}

export interface RequirementCompliance {
  readonly requirement_id: string;
  readonly compliance_results: readonly ComplianceResult[];
}

export interface TestCaseCompliance {
  readonly test_case_id: string;
  readonly compliance_results: readonly ComplianceResult[];
}

export interface ComplianceReport {
  readonly generated_at: string;
  readonly summary: ReportSummary;
  readonly requirement_compliance: readonly RequirementCompliance[];
  readonly test_case_compliance: readonly TestCaseCompliance[];
  readonly overall_compliance: Readonly<Record<string, StandardRollup>>;
  readonly recommendations: readonly string[];
}

export interface ReportOptions {
  readonly now?: Date;
  readonly maxRecommendations?: number;
}
