import fs from "node:fs/promises";
import { loadCatalog } from "../catalog/load-catalog.js";
import { loadBatch } from "../input/batch-loader.js";
import {
  renderMarkdownReport,
  type MarkdownRenderOptions,
} from "../report/markdown-reporter.js";
import { generateReport } from "../report/report-builder.js";
import { filterReport } from "../report/report-filter.js";
import type { ComplianceReport } from "../report/types.js";
import { logInfo } from "../telemetry/logger.js";

export type OutputFormat = "json" | "md";

export type ReportSection = "summary" | "results" | "all";

export interface ReportCommandOptions {
  readonly input: string;
  readonly format: OutputFormat;
  readonly out?: string;
  readonly standards?: readonly string[];
  readonly rulesDir?: string;
  readonly maxRecommendations?: number;
  readonly failBelow?: number;
  readonly show?: ReportSection;
  readonly showEvidence?: boolean;
  readonly now?: Date;
}

export interface ReportCommandResult {
  readonly report: ComplianceReport;
  readonly output: string;
  /** Standards whose rolled-up score is under `failBelow`. */
  readonly failing: readonly string[];
}

export async function runReportCommand(
  options: ReportCommandOptions,
): Promise<ReportCommandResult> {
  const catalog = await loadCatalog({ overrideDir: options.rulesDir });
  const batch = await loadBatch(options.input);

  const unknown = (options.standards ?? []).filter(
    (standard) => !catalog.standards().includes(standard),
  );
  if (unknown.length > 0) {
    throw new Error(
      `Unknown standard(s): ${unknown.join(", ")}. Run "regscore standards" to list supported standards.`,
    );
  }

  const fullReport = generateReport(
    catalog,
    batch.requirements,
    batch.test_cases,
    { now: options.now, maxRecommendations: options.maxRecommendations },
  );
  const report = filterReport(fullReport, options.standards ?? []);
  logInfo("Report generated", {
    requirements: report.summary.total_requirements,
    testCases: report.summary.total_test_cases,
    standards: Object.keys(report.overall_compliance).length,
  });

  const output = buildOutput(report, options);
  if (options.out) {
    await fs.writeFile(options.out, output, "utf8");
  }

  return { report, output, failing: failingStandards(report, options.failBelow) };
}

export function buildOutput(
  report: ComplianceReport,
  options: Pick<ReportCommandOptions, "format" | "show" | "showEvidence">,
): string {
  if (options.format === "json") {
    return JSON.stringify(report, null, 2);
  }
  return renderMarkdownReport(report, buildMarkdownOptions(options));
}

function buildMarkdownOptions(
  options: Pick<ReportCommandOptions, "show" | "showEvidence">,
): MarkdownRenderOptions {
  const show = options.show ?? "all";
  return {
    showSummary: show === "summary" || show === "all",
    showResults: show === "results" || show === "all",
    showEvidence: options.showEvidence ?? false,
  };
}

function failingStandards(
  report: ComplianceReport,
  failBelow?: number,
): string[] {
  if (failBelow === undefined) {
    return [];
  }
  return Object.entries(report.overall_compliance)
    .filter(([, rollup]) => rollup.score < failBelow)
    .map(([standard]) => standard);
}
