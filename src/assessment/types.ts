import type { ComplianceLevel } from "../scoring/types.js";

export interface StandardRollup {
  readonly score: number;
  readonly compliance_level: ComplianceLevel;
  readonly requirement_count: number;
  readonly test_case_count: number;
}

export interface CoverageGap {
  readonly requirement_id: string;
  readonly title?: string;
  readonly test_case_id?: string;
  readonly standard?: string;
  readonly compliance_level?: ComplianceLevel;
  readonly issue: string;
  readonly recommendation: string;
}

export interface CoverageReport {
  readonly standard: string | null;
  readonly total_requirements: number;
  readonly total_test_cases: number;
  readonly coverage_gaps: readonly CoverageGap[];
  readonly recommendations: readonly string[];
}

export interface TraceabilityAnalysis {
  readonly total_requirements: number;
  readonly requirements_with_tests: number;
  readonly requirements_coverage_percentage: number;
  readonly total_test_cases: number;
  readonly test_cases_with_requirements: number;
  readonly test_cases_coverage_percentage: number;
  readonly orphaned_requirements: number;
  readonly orphaned_test_cases: number;
  /** Links with an endpoint that is not in the batch. */
  readonly unresolved_links: number;
}
