import type { RecordId, RequirementRecord, TestCaseRecord } from "./types.js";

const UNKNOWN_ID = "Unknown";

export function textOf(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/** Public id as shown in reports; entities without one are "Unknown". */
export function displayId(value: RecordId | undefined): string {
  if (value === undefined || value === "") {
    return UNKNOWN_ID;
  }
  return String(value);
}

export function stepsOf(testCase: TestCaseRecord): string[] {
  const steps: unknown = testCase.test_steps;
  if (!Array.isArray(steps)) {
    return [];
  }
  return steps.filter((step): step is string => typeof step === "string");
}

/** Lower-cased title and description, joined by one space. */
export function summaryText(
  entity: RequirementRecord | TestCaseRecord,
): string {
  return `${textOf(entity.title)} ${textOf(entity.description)}`.toLowerCase();
}

/** Lower-cased title, description and test steps. */
export function testCaseText(testCase: TestCaseRecord): string {
  const steps = stepsOf(testCase).join(" ").toLowerCase();
  return `${summaryText(testCase)} ${steps}`;
}
