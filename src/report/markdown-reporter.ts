import type { CoverageReport } from "../assessment/types.js";
import type { StandardInfo } from "../catalog/types.js";
import type { ComplianceResult } from "../scoring/types.js";
import { renderAsciiBox, renderAsciiTable } from "./ascii-table.js";
import { formatLevel, formatScore, truncateText } from "./report-utils.js";
import type { ComplianceReport } from "./types.js";

export interface MarkdownRenderOptions {
  readonly showSummary?: boolean;
  readonly showResults?: boolean;
  readonly showEvidence?: boolean;
}

const ENTITY_WIDTH = 40;

interface ResultRow {
  readonly entity: string;
  readonly ruleId: string;
  readonly standard: string;
  readonly level: string;
  readonly score: number;
  readonly risk: string;
  readonly evidence: readonly string[];
}

export function renderMarkdownReport(
  report: ComplianceReport,
  options: MarkdownRenderOptions = {},
): string {
  const showSummary = options.showSummary ?? true;
  const showResults = options.showResults ?? true;
  const showEvidence = options.showEvidence ?? false;
  const lines: string[] = [];

  if (showSummary) {
    lines.push(
      renderAsciiBox([
        "Compliance Report",
        `Generated: ${report.generated_at}`,
        `Requirements: ${report.summary.total_requirements}`,
        `Test cases: ${report.summary.total_test_cases}`,
      ]),
    );
    lines.push("");
    lines.push("### Overall Compliance");
    lines.push("");
    const overall = Object.entries(report.overall_compliance);
    if (overall.length === 0) {
      lines.push("No compliance evidence found.");
    } else {
      lines.push(
        renderAsciiTable(
          overall.map(([standard, rollup]) => [
            standard,
            formatScore(rollup.score),
            formatLevel(rollup.compliance_level),
            String(rollup.requirement_count),
            String(rollup.test_case_count),
          ]),
          ["Standard", "Score", "Level", "Requirements", "Test Cases"],
        ),
      );
    }
  }

  if (showResults) {
    const requirementRows = report.requirement_compliance.flatMap((entry) =>
      entry.compliance_results.map((result) =>
        toRow(entry.requirement_id, result),
      ),
    );
    const testCaseRows = report.test_case_compliance.flatMap((entry) =>
      entry.compliance_results.map((result) =>
        toRow(entry.test_case_id, result),
      ),
    );
    pushResultSection(lines, "Requirement Results", requirementRows);
    pushResultSection(lines, "Test Case Results", testCaseRows);

    if (showEvidence) {
      lines.push("");
      lines.push("### Evidence");
      lines.push("");
      for (const row of [...requirementRows, ...testCaseRows]) {
        lines.push(`- ${row.entity} / ${row.ruleId}`);
        for (const item of row.evidence) {
          lines.push(`  - ${item}`);
        }
      }
    }
  }

  if (report.recommendations.length > 0) {
    lines.push("");
    lines.push("### Recommendations");
    lines.push("");
    report.recommendations.forEach((recommendation, index) => {
      lines.push(`${index + 1}. ${recommendation}`);
    });
  }

  return lines.join("\n").replace(/^\n+/, "");
}

export function renderStandardsTable(standards: readonly StandardInfo[]): string {
  return renderAsciiTable(
    standards.map((info) => [
      info.name,
      String(info.rules_count),
      String(info.mandatory_rules),
      String(info.high_risk_rules),
    ]),
    ["Standard", "Rules", "Mandatory", "High Risk"],
  );
}

export function renderCoverageReport(coverage: CoverageReport): string {
  const lines: string[] = [
    renderAsciiBox([
      "Coverage Report",
      `Standard: ${coverage.standard ?? "all"}`,
      `Requirements: ${coverage.total_requirements}`,
      `Test cases: ${coverage.total_test_cases}`,
    ]),
    "",
  ];

  if (coverage.coverage_gaps.length === 0) {
    lines.push("No coverage gaps detected.");
  } else {
    lines.push("### Coverage Gaps");
    lines.push("");
    lines.push(
      renderAsciiTable(
        coverage.coverage_gaps.map((gap) => [
          gap.requirement_id,
          gap.test_case_id ?? "-",
          gap.standard ?? "-",
          gap.compliance_level ? formatLevel(gap.compliance_level) : "-",
          gap.issue,
        ]),
        ["Requirement", "Test Case", "Standard", "Level", "Issue"],
      ),
    );
  }

  lines.push("");
  lines.push("### Recommendations");
  lines.push("");
  for (const recommendation of coverage.recommendations) {
    lines.push(`- ${recommendation}`);
  }
  return lines.join("\n");
}

function toRow(entity: string, result: ComplianceResult): ResultRow {
  return {
    entity,
    ruleId: result.rule_id,
    standard: result.standard,
    level: result.compliance_level,
    score: result.score,
    risk: result.risk_assessment,
    evidence: result.evidence,
  };
}

function pushResultSection(
  lines: string[],
  heading: string,
  rows: readonly ResultRow[],
): void {
  lines.push("");
  lines.push(`### ${heading}`);
  lines.push("");
  if (rows.length === 0) {
    lines.push("No results.");
    return;
  }
  lines.push(
    renderAsciiTable(
      rows.map((row) => [
        truncateText(row.entity, ENTITY_WIDTH),
        row.ruleId,
        row.standard,
        formatLevel(row.level),
        formatScore(row.score),
        formatLevel(row.risk),
      ]),
      ["Entity", "Rule", "Standard", "Level", "Score", "Risk"],
    ),
  );
}
