import { RiskLevel } from "./types.js";
import type {
  CatalogMeta,
  CompiledPattern,
  CompiledRule,
  ComplianceRule,
  StandardInfo,
} from "./types.js";

/**
 * Read-only set of compliance rules. Every pattern is compiled up front, so a
 * malformed expression fails construction instead of an evaluation.
 */
export class RuleCatalog {
  private readonly rules: readonly CompiledRule[];
  private readonly byId: ReadonlyMap<string, CompiledRule>;
  private readonly standardNames: readonly string[];

  constructor(rules: readonly ComplianceRule[], meta: CatalogMeta) {
    const known = new Set(meta.standards);
    const byId = new Map<string, CompiledRule>();
    const compiled: CompiledRule[] = [];

    for (const rule of rules) {
      if (byId.has(rule.rule_id)) {
        throw new Error(`Duplicate rule_id in catalog: ${rule.rule_id}`);
      }
      if (!known.has(rule.standard)) {
        throw new Error(
          `Rule ${rule.rule_id} references unknown standard: ${rule.standard}`,
        );
      }
      const entry = compileRule(rule);
      byId.set(rule.rule_id, entry);
      compiled.push(entry);
    }

    this.rules = Object.freeze(compiled);
    this.byId = byId;
    this.standardNames = Object.freeze([...meta.standards]);
  }

  allRules(): readonly CompiledRule[] {
    return this.rules;
  }

  rulesForStandard(standard: string): CompiledRule[] {
    return this.rules.filter((rule) => rule.standard === standard);
  }

  standards(): readonly string[] {
    return this.standardNames;
  }

  getRule(ruleId: string): CompiledRule | undefined {
    return this.byId.get(ruleId);
  }

  standardsInfo(): StandardInfo[] {
    return this.standardNames.map((name) => {
      const rules = this.rulesForStandard(name);
      return {
        name,
        rules_count: rules.length,
        mandatory_rules: rules.filter((rule) => rule.mandatory).length,
        high_risk_rules: rules.filter(
          (rule) => rule.risk_level === RiskLevel.High,
        ).length,
      };
    });
  }
}

function compileRule(rule: ComplianceRule): CompiledRule {
  return Object.freeze({
    ...rule,
    requirement_patterns: Object.freeze([...rule.requirement_patterns]),
    test_case_patterns: Object.freeze([...rule.test_case_patterns]),
    validation_criteria: Object.freeze({ ...rule.validation_criteria }),
    requirement_regexes: Object.freeze(
      rule.requirement_patterns.map((source) => compilePattern(rule, source)),
    ),
    test_case_regexes: Object.freeze(
      rule.test_case_patterns.map((source) => compilePattern(rule, source)),
    ),
  });
}

function compilePattern(rule: ComplianceRule, source: string): CompiledPattern {
  try {
    return { source, regex: new RegExp(source, "i") };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(
      `Rule ${rule.rule_id} has an invalid pattern "${source}": ${message}`,
    );
  }
}
