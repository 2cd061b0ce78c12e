export const enum RiskLevel {
  High = "high",
  Medium = "medium",
  Low = "low",
  Unknown = "unknown",
}

export type ValidationCriteria = Readonly<Record<string, boolean>>;

export interface ComplianceRule {
  readonly rule_id: string;
  readonly standard: string;
  readonly title: string;
  readonly description: string;
  readonly requirement_patterns: readonly string[];
  readonly test_case_patterns: readonly string[];
  readonly mandatory: boolean;
  readonly risk_level: RiskLevel;
  readonly validation_criteria: ValidationCriteria;
}

export interface CompiledPattern {
  readonly source: string;
  readonly regex: RegExp;
}

/** A rule together with its patterns compiled once at catalog construction. */
export interface CompiledRule extends ComplianceRule {
  readonly requirement_regexes: readonly CompiledPattern[];
  readonly test_case_regexes: readonly CompiledPattern[];
}

export interface CatalogMeta {
  readonly rule_format_version: string;
  readonly standards: readonly string[];
}

export interface StandardInfo {
  readonly name: string;
  readonly rules_count: number;
  readonly mandatory_rules: number;
  readonly high_risk_rules: number;
}
