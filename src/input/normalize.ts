import type {
  RecordBatch,
  RecordId,
  RequirementRecord,
  TestCaseRecord,
  TraceabilityLink,
} from "./types.js";

/**
 * Validate and normalize an untrusted batch document. Text fields of the
 * wrong type degrade to empty values; only structural problems are errors.
 */
export function parseBatch(input: unknown, source = "batch"): RecordBatch {
  const errors: string[] = [];
  if (!isRecord(input)) {
    throw new Error(`Invalid ${source}: document must be an object`);
  }

  const requirements = parseList(input.requirements, "requirements", errors)
    .map((item, index) => {
      if (!isRecord(item)) {
        errors.push(`requirements[${index}] must be an object`);
        return null;
      }
      return normalizeRequirement(item);
    })
    .filter((item): item is RequirementRecord => item !== null);

  const testCases = parseList(input.test_cases, "test_cases", errors)
    .map((item, index) => {
      if (!isRecord(item)) {
        errors.push(`test_cases[${index}] must be an object`);
        return null;
      }
      return normalizeTestCase(item);
    })
    .filter((item): item is TestCaseRecord => item !== null);

  const links = parseList(input.links, "links", errors)
    .map((item, index) => normalizeLink(item, `links[${index}]`, errors))
    .filter((item): item is TraceabilityLink => item !== null);

  if (errors.length > 0) {
    throw new Error(`Invalid ${source}: ${errors.join("; ")}`);
  }
  return { requirements, test_cases: testCases, links };
}

export function normalizeRequirement(
  input: Record<string, unknown>,
): RequirementRecord {
  return {
    id: optionalId(input.id),
    requirement_id: optionalId(input.requirement_id),
    title: text(input.title),
    description: text(input.description),
    type: optionalText(input.type),
    priority: optionalText(input.priority),
    source_document: optionalText(input.source_document),
    regulatory_standards: stringList(input.regulatory_standards),
  };
}

export function normalizeTestCase(
  input: Record<string, unknown>,
): TestCaseRecord {
  return {
    id: optionalId(input.id),
    test_case_id: optionalId(input.test_case_id),
    title: text(input.title),
    description: text(input.description),
    preconditions: text(input.preconditions),
    test_steps: stringList(input.test_steps),
    expected_results: text(input.expected_results),
    postconditions: text(input.postconditions),
    priority: text(input.priority),
    test_data: isRecord(input.test_data) ? input.test_data : {},
    compliance_tags: stringList(input.compliance_tags),
    requirement_id: optionalId(input.requirement_id),
  };
}

export function normalizeLink(
  input: unknown,
  label: string,
  errors: string[],
): TraceabilityLink | null {
  if (!isRecord(input)) {
    errors.push(`${label} must be an object`);
    return null;
  }
  const sourceId = optionalId(input.source_id);
  const targetId = optionalId(input.target_id);
  const sourceType = optionalText(input.source_type);
  const targetType = optionalText(input.target_type);
  if (
    sourceId === undefined ||
    targetId === undefined ||
    !sourceType ||
    !targetType
  ) {
    errors.push(
      `${label} requires source_type, source_id, target_type and target_id`,
    );
    return null;
  }
  return {
    id: optionalId(input.id),
    source_type: sourceType,
    source_id: sourceId,
    target_type: targetType,
    target_id: targetId,
    link_type: optionalText(input.link_type) ?? "covers",
  };
}

function parseList(input: unknown, label: string, errors: string[]): unknown[] {
  if (input === undefined || input === null) {
    return [];
  }
  if (!Array.isArray(input)) {
    errors.push(`${label} must be a list`);
    return [];
  }
  return input;
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function optionalText(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalId(value: unknown): RecordId | undefined {
  if (typeof value === "string" || typeof value === "number") {
    return value;
  }
  return undefined;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
