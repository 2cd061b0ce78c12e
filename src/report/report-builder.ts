import {
  assessRequirement,
  assessTestCase,
  calculateOverallCompliance,
} from "../assessment/result-aggregator.js";
import { findRelatedRequirement } from "../assessment/related.js";
import type { RuleCatalog } from "../catalog/rule-catalog.js";
import { displayId } from "../input/entity-text.js";
import type { RequirementRecord, TestCaseRecord } from "../input/types.js";
import type { ComplianceResult } from "../scoring/types.js";
import { rankRecommendations } from "./recommendations.js";
import type {
  ComplianceReport,
  ReportOptions,
  RequirementCompliance,
  TestCaseCompliance,
} from "./types.js";

export function generateReport(
  catalog: RuleCatalog,
  requirements: readonly RequirementRecord[],
  testCases: readonly TestCaseRecord[],
  options: ReportOptions = {},
): ComplianceReport {
  const now = options.now ?? new Date();
  const allRequirementResults: ComplianceResult[] = [];
  const allTestCaseResults: ComplianceResult[] = [];

  const requirementCompliance: RequirementCompliance[] = requirements.map(
    (requirement) => {
      const results = assessRequirement(catalog, requirement);
      allRequirementResults.push(...results);
      return {
        requirement_id: displayId(requirement.requirement_id),
        compliance_results: results,
      };
    },
  );

  const testCaseCompliance: TestCaseCompliance[] = testCases.map(
    (testCase) => {
      const related = findRelatedRequirement(testCase, requirements);
      const results = assessTestCase(catalog, testCase, related);
      allTestCaseResults.push(...results);
      return {
        test_case_id: displayId(testCase.test_case_id),
        compliance_results: results,
      };
    },
  );

  return {
    generated_at: now.toISOString(),
    summary: {
      total_requirements: requirements.length,
      total_test_cases: testCases.length,
      standards_assessed: [...catalog.standards()],
    },
    requirement_compliance: requirementCompliance,
    test_case_compliance: testCaseCompliance,
    overall_compliance: calculateOverallCompliance(
      catalog.standards(),
      allRequirementResults,
      allTestCaseResults,
    ),
    recommendations: rankRecommendations(
      [...allRequirementResults, ...allTestCaseResults],
      options.maxRecommendations,
    ),
  };
}
