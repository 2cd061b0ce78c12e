import { beforeAll, describe, expect, it } from "vitest";
import {
  assessRequirement,
  assessTestCase,
} from "../../src/assessment/result-aggregator.js";
import { loadCatalog } from "../../src/catalog/load-catalog.js";
import { RuleCatalog } from "../../src/catalog/rule-catalog.js";
import { RiskLevel } from "../../src/catalog/types.js";
import { testCaseText } from "../../src/input/entity-text.js";
import { normalizeTestCase } from "../../src/input/normalize.js";
import { completenessScore } from "../../src/scoring/completeness.js";
import {
  clampScore,
  complianceLevelForScore,
} from "../../src/scoring/levels.js";
import {
  createUnknownResult,
  isAssessed,
} from "../../src/scoring/result-factory.js";
import {
  REQUIREMENT_LINK_EVIDENCE,
  evaluateTestCase,
} from "../../src/scoring/test-case-scorer.js";
import { ComplianceLevel } from "../../src/scoring/types.js";
import {
  accessControlTest,
  designRequirement,
  designReviewTest,
  privacyRequirement,
  privacyTest,
} from "../fixtures/records.js";

let catalog: RuleCatalog;

beforeAll(async () => {
  catalog = await loadCatalog();
});

describe("compliance levels", () => {
  it("maps scores onto thresholds", () => {
    expect(complianceLevelForScore(0.8)).toBe(ComplianceLevel.Compliant);
    expect(complianceLevelForScore(0.79)).toBe(
      ComplianceLevel.PartiallyCompliant,
    );
    expect(complianceLevelForScore(0.5)).toBe(
      ComplianceLevel.PartiallyCompliant,
    );
    expect(complianceLevelForScore(0.4999)).toBe(ComplianceLevel.NonCompliant);
    expect(complianceLevelForScore(0)).toBe(ComplianceLevel.NonCompliant);
  });

  it("clamps scores into the unit interval", () => {
    expect(clampScore(1.2)).toBe(1);
    expect(clampScore(-0.1)).toBe(0);
    expect(clampScore(0.42)).toBe(0.42);
  });

  it("builds unknown results", () => {
    const rule = catalog.getRule("GDPR_001");
    if (!rule) {
      throw new Error("GDPR_001 missing from catalog");
    }
    const result = createUnknownResult(rule);

    expect(result).toEqual({
      rule_id: "GDPR_001",
      standard: "GDPR",
      compliance_level: ComplianceLevel.Unknown,
      score: 0,
      findings: [],
      recommendations: [],
      evidence: [],
      risk_assessment: RiskLevel.Unknown,
    });
    expect(isAssessed(result)).toBe(false);
  });
});

describe("completeness", () => {
  it("scores a fully populated test case as 1", () => {
    expect(completenessScore(accessControlTest)).toBe(1);
  });

  it("weights each populated field", () => {
    expect(completenessScore(designReviewTest)).toBeCloseTo(0.8, 10);
    expect(completenessScore(privacyTest)).toBeCloseTo(0.2, 10);
  });

  it("scores an empty test case as 0", () => {
    expect(completenessScore({})).toBe(0);
  });

  it("treats non-list steps as missing", () => {
    const testCase = normalizeTestCase({ test_steps: "click save" });

    expect(testCase.test_steps).toEqual([]);
    expect(completenessScore(testCase)).toBe(0);
  });
});

describe("requirement scoring", () => {
  const riskRequirement = {
    title: "",
    description:
      "The system shall perform risk analysis and hazard identification for all patient data flows, with full traceability to design inputs",
  };

  it("scores every rule the text matches", () => {
    const results = assessRequirement(catalog, riskRequirement);

    expect(results.map((result) => result.rule_id)).toEqual([
      "FDA_820_001",
      "FDA_820_002",
      "HIPAA_001",
    ]);

    const [design, risk, hipaa] = results;
    expect(design?.score).toBeCloseTo(0.23333333, 6);
    expect(design?.compliance_level).toBe(ComplianceLevel.NonCompliant);
    expect(design?.findings).toEqual([
      "Requirement does not meet compliance criteria",
    ]);
    expect(design?.recommendations).toEqual([
      "Revise requirement to comply with FDA 21 CFR Part 820",
    ]);
    expect(design?.evidence).toEqual(["Found pattern: design\\s+input"]);
    expect(design?.risk_assessment).toBe(RiskLevel.High);

    expect(risk?.score).toBeCloseTo(0.55, 10);
    expect(risk?.compliance_level).toBe(ComplianceLevel.PartiallyCompliant);
    expect(risk?.recommendations).toEqual([
      "Enhance requirement to fully comply with FDA 21 CFR Part 820",
    ]);

    expect(hipaa?.score).toBeCloseTo(0.5, 10);
    expect(hipaa?.compliance_level).toBe(ComplianceLevel.PartiallyCompliant);
    expect(hipaa?.evidence).toEqual(["Found pattern: patient\\s+data"]);
  });

  it("returns nothing for an empty requirement", () => {
    expect(assessRequirement(catalog, { title: "", description: "" })).toEqual(
      [],
    );
  });

  it("scores a design control requirement", () => {
    const [design] = assessRequirement(catalog, designRequirement);

    expect(design?.rule_id).toBe("FDA_820_001");
    expect(design?.score).toBeCloseTo(0.7, 10);
    expect(design?.evidence).toEqual([
      "Found pattern: design\\s+input",
      "Found pattern: design\\s+output",
      "Found pattern: design\\s+review",
    ]);
  });

  it("recommends the missing traceability", () => {
    const [design] = assessRequirement(catalog, {
      title: "Design review",
      description: "Each design review is verified and validated",
    });

    expect(design?.rule_id).toBe("FDA_820_001");
    expect(design?.recommendations).toEqual([
      "Revise requirement to comply with FDA 21 CFR Part 820",
      "Add traceability requirements",
    ]);
  });

  it("is deterministic and bounded", () => {
    const first = assessRequirement(catalog, privacyRequirement);
    const second = assessRequirement(catalog, privacyRequirement);

    expect(second).toEqual(first);
    for (const result of first) {
      expect(result.score).toBeGreaterThanOrEqual(0);
      expect(result.score).toBeLessThanOrEqual(1);
    }
  });
});

describe("test case scoring", () => {
  it("adds the requirement link bonus", () => {
    const results = assessTestCase(catalog, accessControlTest, {
      title: "Stored records",
      description: "Stored records use encryption and access control",
    });
    const iso = results.find((result) => result.rule_id === "ISO_27001_001");

    expect(iso?.score).toBeCloseTo(0.72, 10);
    expect(iso?.compliance_level).toBe(ComplianceLevel.PartiallyCompliant);
    expect(iso?.evidence).toEqual([
      "Found test pattern: authentication\\s+test",
      REQUIREMENT_LINK_EVIDENCE,
    ]);
    expect(iso?.recommendations).toEqual([
      "Enhance test case to fully verify ISO 27001 compliance",
      "Add security testing steps",
    ]);
  });

  it("scores a well documented design review as compliant", () => {
    const [design] = assessTestCase(
      catalog,
      designReviewTest,
      designRequirement,
    );

    expect(design?.rule_id).toBe("FDA_820_001");
    expect(design?.score).toBeCloseTo(0.8125, 10);
    expect(design?.compliance_level).toBe(ComplianceLevel.Compliant);
    expect(design?.findings).toEqual([]);
    expect(design?.recommendations).toEqual([]);
  });

  it("scores a sparse test case without a requirement", () => {
    const results = assessTestCase(catalog, privacyTest);

    expect(results.map((result) => result.rule_id)).toEqual([
      "HIPAA_001",
      "GDPR_001",
    ]);
    expect(results[0]?.score).toBeCloseTo(0.1875, 10);
    expect(results[0]?.recommendations).toEqual([
      "Add test steps to verify HIPAA compliance",
    ]);
    expect(results[1]?.score).toBeCloseTo(0.17, 10);
  });

  it("uses the default pattern score for rules without test patterns", () => {
    const custom = new RuleCatalog(
      [
        {
          rule_id: "QA_001",
          standard: "Internal QA",
          title: "Release gate",
          description: "Releases pass a documented gate",
          requirement_patterns: ["release\\s+gate"],
          test_case_patterns: [],
          mandatory: false,
          risk_level: RiskLevel.Low,
          validation_criteria: {},
        },
      ],
      { rule_format_version: "1", standards: ["Internal QA"] },
    );
    const rule = custom.getRule("QA_001");
    if (!rule) {
      throw new Error("QA_001 missing from catalog");
    }

    const result = evaluateTestCase(
      testCaseText(accessControlTest),
      accessControlTest,
      rule,
      { title: "Release gate checklist", description: "" },
    );

    expect(result.score).toBeCloseTo(0.825, 10);
    expect(result.compliance_level).toBe(ComplianceLevel.Compliant);
    expect(result.evidence).toEqual([REQUIREMENT_LINK_EVIDENCE]);
  });
});
