import type {
  RequirementRecord,
  TestCaseRecord,
  TraceabilityLink,
} from "../../src/input/types.js";

export const privacyRequirement: RequirementRecord = {
  id: 1,
  requirement_id: "REQ-1",
  title: "Patient data privacy",
  description:
    "Patient data must be encrypted at rest with access control and audit logging",
  regulatory_standards: ["HIPAA", "ISO 27001"],
};

export const designRequirement: RequirementRecord = {
  id: 2,
  requirement_id: "REQ-2",
  title: "Design review",
  description:
    "Design inputs and design outputs shall be verified by design review, with verification and validation records and traceability",
  regulatory_standards: ["FDA 21 CFR Part 820"],
};

export const layoutRequirement: RequirementRecord = {
  id: 3,
  requirement_id: "REQ-3",
  title: "Export layout",
  description: "The export screen lists columns in a fixed order",
  regulatory_standards: [],
};

export const accessControlTest: TestCaseRecord = {
  id: 11,
  test_case_id: "TC-1",
  title: "Access control verification",
  description: "Checks login restrictions",
  preconditions: "User accounts exist",
  test_steps: ["verify access control", "authentication test"],
  expected_results: "Unauthorized users are rejected",
  postconditions: "Session closed",
  priority: "high",
  requirement_id: 1,
};

export const designReviewTest: TestCaseRecord = {
  id: 12,
  test_case_id: "TC-2",
  title: "Design review walkthrough",
  description: "Verify design outputs against inputs",
  test_steps: ["Open the design review record", "Confirm traceability matrix"],
  expected_results: "Every output traces to an input",
  priority: "medium",
  requirement_id: "REQ-2",
};

export const privacyTest: TestCaseRecord = {
  id: 13,
  test_case_id: "TC-3",
  title: "Privacy test of export",
  description: "Runs the privacy test suite",
  test_steps: [],
};

export const requirements: readonly RequirementRecord[] = [
  privacyRequirement,
  designRequirement,
  layoutRequirement,
];

export const testCases: readonly TestCaseRecord[] = [
  accessControlTest,
  designReviewTest,
  privacyTest,
];

export const links: readonly TraceabilityLink[] = [
  {
    source_type: "requirement",
    source_id: 1,
    target_type: "test_case",
    target_id: 11,
    link_type: "covers",
  },
  {
    source_type: "test_case",
    source_id: 12,
    target_type: "requirement",
    target_id: 2,
    link_type: "validates",
  },
];
