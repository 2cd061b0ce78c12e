import type {
  RecordId,
  RequirementRecord,
  TestCaseRecord,
} from "../input/types.js";

/**
 * A test case points at its requirement through `requirement_id`, which may
 * carry either the requirement's record id or its public requirement_id.
 * Record ids win over public ids.
 */
export function findRelatedRequirement(
  testCase: TestCaseRecord,
  requirements: readonly RequirementRecord[],
): RequirementRecord | undefined {
  const ref = testCase.requirement_id;
  if (ref === undefined || ref === "") {
    return undefined;
  }
  return (
    requirements.find((requirement) => sameId(ref, requirement.id)) ??
    requirements.find((requirement) =>
      sameId(ref, requirement.requirement_id),
    )
  );
}

export function sameId(a: RecordId, b: RecordId | undefined): boolean {
  return b !== undefined && String(a) === String(b);
}
