import {
  EntityType,
  type RecordId,
  type RequirementRecord,
  type TestCaseRecord,
  type TraceabilityLink,
} from "../input/types.js";
import { logDebug } from "../telemetry/logger.js";
import { sameId } from "./related.js";
import type { TraceabilityAnalysis } from "./types.js";

interface ResolvedLink {
  readonly requirement: RequirementRecord;
  readonly testCase: TestCaseRecord;
}

/**
 * Link endpoints are matched to batch entities by record id first, then by
 * public id. Links whose endpoints are not in the batch are not counted.
 */
export function analyzeTraceability(
  requirements: readonly RequirementRecord[],
  testCases: readonly TestCaseRecord[],
  links: readonly TraceabilityLink[],
): TraceabilityAnalysis {
  const requirementsWithTests = new Set<RequirementRecord>();
  const testCasesWithRequirements = new Set<TestCaseRecord>();
  let unresolved = 0;

  for (const link of links) {
    const resolved = resolveLink(link, requirements, testCases);
    if (!resolved) {
      unresolved += 1;
      continue;
    }
    requirementsWithTests.add(resolved.requirement);
    testCasesWithRequirements.add(resolved.testCase);
  }

  if (unresolved > 0) {
    logDebug("Skipped unresolved traceability links", { links: unresolved });
  }

  const totalRequirements = requirements.length;
  const totalTestCases = testCases.length;
  return {
    total_requirements: totalRequirements,
    requirements_with_tests: requirementsWithTests.size,
    requirements_coverage_percentage: percentage(
      requirementsWithTests.size,
      totalRequirements,
    ),
    total_test_cases: totalTestCases,
    test_cases_with_requirements: testCasesWithRequirements.size,
    test_cases_coverage_percentage: percentage(
      testCasesWithRequirements.size,
      totalTestCases,
    ),
    orphaned_requirements: totalRequirements - requirementsWithTests.size,
    orphaned_test_cases: totalTestCases - testCasesWithRequirements.size,
    unresolved_links: unresolved,
  };
}

function resolveLink(
  link: TraceabilityLink,
  requirements: readonly RequirementRecord[],
  testCases: readonly TestCaseRecord[],
): ResolvedLink | undefined {
  let requirementRef: RecordId;
  let testCaseRef: RecordId;
  if (
    link.source_type === EntityType.Requirement &&
    link.target_type === EntityType.TestCase
  ) {
    requirementRef = link.source_id;
    testCaseRef = link.target_id;
  } else if (
    link.source_type === EntityType.TestCase &&
    link.target_type === EntityType.Requirement
  ) {
    testCaseRef = link.source_id;
    requirementRef = link.target_id;
  } else {
    return undefined;
  }

  const requirement =
    requirements.find((entry) => sameId(requirementRef, entry.id)) ??
    requirements.find((entry) => sameId(requirementRef, entry.requirement_id));
  const testCase =
    testCases.find((entry) => sameId(testCaseRef, entry.id)) ??
    testCases.find((entry) => sameId(testCaseRef, entry.test_case_id));
  if (!requirement || !testCase) {
    return undefined;
  }
  return { requirement, testCase };
}

function percentage(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}
