import type { StandardRollup } from "../assessment/types.js";
import type { ComplianceResult } from "../scoring/types.js";
import type { ComplianceReport } from "./types.js";

/**
 * Narrows an existing report to the given standards without rescoring.
 * Entity sections left without results are dropped. An empty set leaves
 * the report as it is.
 */
export function filterReport(
  report: ComplianceReport,
  standards: Iterable<string>,
): ComplianceReport {
  const wanted = new Set(standards);
  if (wanted.size === 0) {
    return report;
  }

  const keep = (results: readonly ComplianceResult[]): ComplianceResult[] =>
    results.filter((result) => wanted.has(result.standard));

  const requirementCompliance = report.requirement_compliance
    .map((entry) => ({
      ...entry,
      compliance_results: keep(entry.compliance_results),
    }))
    .filter((entry) => entry.compliance_results.length > 0);

  const testCaseCompliance = report.test_case_compliance
    .map((entry) => ({
      ...entry,
      compliance_results: keep(entry.compliance_results),
    }))
    .filter((entry) => entry.compliance_results.length > 0);

  const overall: Record<string, StandardRollup> = {};
  for (const [standard, rollup] of Object.entries(report.overall_compliance)) {
    if (wanted.has(standard)) {
      overall[standard] = rollup;
    }
  }

  return {
    ...report,
    requirement_compliance: requirementCompliance,
    test_case_compliance: testCaseCompliance,
    overall_compliance: overall,
  };
}
