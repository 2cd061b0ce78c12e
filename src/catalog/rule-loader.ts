import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { logDebug } from "../telemetry/logger.js";
import { RiskLevel } from "./types.js";
import type { CatalogMeta, ComplianceRule, ValidationCriteria } from "./types.js";

export interface LoadedRules {
  readonly rules: ComplianceRule[];
  readonly meta: CatalogMeta;
}

export interface LoadRulesOptions {
  readonly baseDir: string;
  readonly overrideDir?: string;
}

const META_FILE = "_meta.yaml";

const RISK_LEVELS: Readonly<Record<string, RiskLevel>> = {
  high: RiskLevel.High,
  medium: RiskLevel.Medium,
  low: RiskLevel.Low,
  unknown: RiskLevel.Unknown,
};

export async function loadRulesWithOverrides(
  options: LoadRulesOptions,
): Promise<LoadedRules> {
  const base = await loadRules(options.baseDir);
  if (!options.overrideDir) {
    return base;
  }

  const override = await loadRules(options.overrideDir);
  logDebug("Merging override rules", {
    overrideDir: options.overrideDir,
    rules: override.rules.length,
  });
  const meta = mergeMeta(base.meta, override.meta);
  const rules = orderRules(mergeRules(base.rules, override.rules), meta);
  return { rules, meta };
}

export async function loadRules(rulesDir: string): Promise<LoadedRules> {
  const meta = await loadMeta(path.join(rulesDir, META_FILE));
  const entries = await fs.readdir(rulesDir, { withFileTypes: true });

  const rules: ComplianceRule[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }
    if (!isYamlFile(entry.name) || entry.name === META_FILE) {
      continue;
    }

    const filePath = path.join(rulesDir, entry.name);
    rules.push(...(await loadRuleFile(filePath)));
  }

  logDebug("Loaded rules", { rulesDir, rules: rules.length });
  return { rules: orderRules(rules, meta), meta };
}

/**
 * Rules are ordered by the position of their standard in the meta file, then
 * by id. Result lists and recommendation ranking follow this order.
 */
export function orderRules(
  rules: readonly ComplianceRule[],
  meta: CatalogMeta,
): ComplianceRule[] {
  const position = new Map(meta.standards.map((name, index) => [name, index]));
  return [...rules].sort((a, b) => {
    const aRank = position.get(a.standard) ?? meta.standards.length;
    const bRank = position.get(b.standard) ?? meta.standards.length;
    if (aRank !== bRank) {
      return aRank - bRank;
    }
    return a.rule_id.localeCompare(b.rule_id);
  });
}

function mergeRules(
  baseRules: readonly ComplianceRule[],
  overrideRules: readonly ComplianceRule[],
): ComplianceRule[] {
  const merged = new Map<string, ComplianceRule>();
  for (const rule of baseRules) {
    merged.set(rule.rule_id, rule);
  }
  for (const rule of overrideRules) {
    merged.set(rule.rule_id, rule);
  }
  return Array.from(merged.values());
}

function mergeMeta(base: CatalogMeta, override: CatalogMeta): CatalogMeta {
  const standards = [...base.standards];
  for (const standard of override.standards) {
    if (!standards.includes(standard)) {
      standards.push(standard);
    }
  }
  return {
    rule_format_version: override.rule_format_version,
    standards,
  };
}

async function loadMeta(metaPath: string): Promise<CatalogMeta> {
  const doc = await readYaml(metaPath);
  if (!isRecord(doc)) {
    throw new Error(`Invalid rules meta format: ${metaPath}`);
  }

  const version = doc.rule_format_version;
  if (typeof version !== "string" && typeof version !== "number") {
    throw new Error(`Missing rule_format_version in ${metaPath}`);
  }

  const standards = doc.standards;
  if (!isStringArray(standards) || standards.length === 0) {
    throw new Error(`Missing standards list in ${metaPath}`);
  }

  return { rule_format_version: String(version), standards };
}

async function loadRuleFile(filePath: string): Promise<ComplianceRule[]> {
  const doc = await readYaml(filePath);
  if (!isRecord(doc)) {
    throw new Error(`Invalid rule file format: ${filePath}`);
  }
  const rules = doc.rules ?? [];
  if (!Array.isArray(rules)) {
    throw new Error(`Rule file must contain a rules list: ${filePath}`);
  }
  return rules.map((rule, index) => parseRule(rule, `${filePath}#${index}`));
}

export function parseRule(value: unknown, location: string): ComplianceRule {
  if (!isRecord(value)) {
    throw new Error(`Rule must be a mapping in ${location}`);
  }

  const { rule_id, standard, title, description } = value;
  if (
    typeof rule_id !== "string" ||
    typeof standard !== "string" ||
    typeof title !== "string" ||
    typeof description !== "string" ||
    !rule_id ||
    !standard ||
    !title
  ) {
    throw new Error(`Rule missing required fields in ${location}`);
  }

  const requirementPatterns = value.requirement_patterns;
  if (!isStringArray(requirementPatterns) || requirementPatterns.length === 0) {
    throw new Error(`Rule ${rule_id} requirement_patterns missing in ${location}`);
  }

  const testCasePatterns = value.test_case_patterns ?? [];
  if (!isStringArray(testCasePatterns)) {
    throw new Error(`Rule ${rule_id} test_case_patterns invalid in ${location}`);
  }

  const riskLevel =
    typeof value.risk_level === "string"
      ? RISK_LEVELS[value.risk_level.toLowerCase()]
      : undefined;
  if (!riskLevel) {
    throw new Error(`Rule ${rule_id} has invalid risk_level in ${location}`);
  }

  return {
    rule_id,
    standard,
    title,
    description,
    requirement_patterns: requirementPatterns,
    test_case_patterns: testCasePatterns,
    mandatory: value.mandatory === true,
    risk_level: riskLevel,
    validation_criteria: parseCriteria(
      value.validation_criteria,
      rule_id,
      location,
    ),
  };
}

function parseCriteria(
  value: unknown,
  ruleId: string,
  location: string,
): ValidationCriteria {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new Error(
      `Rule ${ruleId} validation_criteria must be a mapping in ${location}`,
    );
  }

  const criteria: Record<string, boolean> = {};
  for (const [name, required] of Object.entries(value)) {
    if (typeof required !== "boolean") {
      throw new Error(
        `Rule ${ruleId} criterion ${name} must be true or false in ${location}`,
      );
    }
    criteria[name] = required;
  }
  return criteria;
}

async function readYaml(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  try {
    return yaml.load(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse ${filePath}: ${message}`);
  }
}

function isYamlFile(name: string): boolean {
  return name.endsWith(".yaml") || name.endsWith(".yml");
}

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === "string")
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
