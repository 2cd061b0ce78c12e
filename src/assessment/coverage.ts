import type { RuleCatalog } from "../catalog/rule-catalog.js";
import { displayId } from "../input/entity-text.js";
import type { RequirementRecord, TestCaseRecord } from "../input/types.js";
import { ComplianceLevel } from "../scoring/types.js";
import { assessTestCase } from "./result-aggregator.js";
import { findRelatedRequirement } from "./related.js";
import type { CoverageGap, CoverageReport } from "./types.js";

export interface CoverageOptions {
  /** Restricts requirements and gaps to one standard. */
  readonly standard?: string;
}

const GAP_RECOMMENDATIONS = [
  "Review and enhance test cases for requirements with compliance gaps",
  "Ensure all regulatory requirements have adequate test coverage",
  "Consider adding specific compliance verification steps to test cases",
];

const NO_GAP_RECOMMENDATIONS = [
  "Test coverage appears adequate for compliance requirements",
  "Continue monitoring and updating test cases as requirements evolve",
];

export function validateCoverage(
  catalog: RuleCatalog,
  requirements: readonly RequirementRecord[],
  testCases: readonly TestCaseRecord[],
  options: CoverageOptions = {},
): CoverageReport {
  const standard = options.standard;
  const gaps: CoverageGap[] = [];

  for (const requirement of requirements) {
    if (standard && !(requirement.regulatory_standards ?? []).includes(standard)) {
      continue;
    }

    const requirementId = displayId(requirement.requirement_id);
    const related = testCases.filter(
      (testCase) =>
        findRelatedRequirement(testCase, requirements) === requirement,
    );
    if (related.length === 0) {
      gaps.push({
        requirement_id: requirementId,
        title: requirement.title ?? "",
        issue: "No test cases found",
        recommendation: "Create test cases to verify this requirement",
      });
      continue;
    }

    for (const testCase of related) {
      for (const result of assessTestCase(catalog, testCase, requirement)) {
        if (standard && result.standard !== standard) {
          continue;
        }
        if (result.compliance_level === ComplianceLevel.Compliant) {
          continue;
        }
        gaps.push({
          requirement_id: requirementId,
          test_case_id: displayId(testCase.test_case_id),
          standard: result.standard,
          compliance_level: result.compliance_level,
          issue: result.findings.join(", "),
          recommendation: result.recommendations.join(", "),
        });
      }
    }
  }

  return {
    standard: standard ?? null,
    total_requirements: requirements.length,
    total_test_cases: testCases.length,
    coverage_gaps: gaps,
    recommendations:
      gaps.length > 0 ? [...GAP_RECOMMENDATIONS] : [...NO_GAP_RECOMMENDATIONS],
  };
}
