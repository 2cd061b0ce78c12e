export type RecordId = string | number;

export interface RequirementRecord {
  readonly id?: RecordId;
  readonly requirement_id?: RecordId;
  readonly title?: string;
  readonly description?: string;
  readonly type?: string;
  readonly priority?: string;
  readonly source_document?: string;
  readonly regulatory_standards?: readonly string[];
}

export interface TestCaseRecord {
  readonly id?: RecordId;
  readonly test_case_id?: RecordId;
  readonly title?: string;
  readonly description?: string;
  readonly preconditions?: string;
  readonly test_steps?: readonly string[];
  readonly expected_results?: string;
  readonly postconditions?: string;
  readonly priority?: string;
  readonly test_data?: Readonly<Record<string, unknown>>;
  readonly compliance_tags?: readonly string[];
  /** Id or public id of the requirement this test case verifies. */
  readonly requirement_id?: RecordId;
}

export const enum EntityType {
  Requirement = "requirement",
  TestCase = "test_case",
}

export interface TraceabilityLink {
  readonly id?: RecordId;
  readonly source_type: string;
  readonly source_id: RecordId;
  readonly target_type: string;
  readonly target_id: RecordId;
  readonly link_type: string;
}

export interface RecordBatch {
  readonly requirements: readonly RequirementRecord[];
  readonly test_cases: readonly TestCaseRecord[];
  readonly links: readonly TraceabilityLink[];
}
