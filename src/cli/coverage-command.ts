import { validateCoverage } from "../assessment/coverage.js";
import { analyzeTraceability } from "../assessment/traceability.js";
import { loadCatalog } from "../catalog/load-catalog.js";
import { loadBatch } from "../input/batch-loader.js";
import { renderCoverageReport } from "../report/markdown-reporter.js";
import type { OutputFormat } from "./report-command.js";

export interface CoverageCommandOptions {
  readonly input: string;
  readonly format: OutputFormat;
  readonly standard?: string;
  readonly rulesDir?: string;
}

export async function runCoverageCommand(
  options: CoverageCommandOptions,
): Promise<string> {
  const catalog = await loadCatalog({ overrideDir: options.rulesDir });
  const batch = await loadBatch(options.input);
  const coverage = validateCoverage(
    catalog,
    batch.requirements,
    batch.test_cases,
    { standard: options.standard },
  );

  if (options.format === "json") {
    const traceability =
      batch.links.length > 0
        ? analyzeTraceability(batch.requirements, batch.test_cases, batch.links)
        : undefined;
    return JSON.stringify({ ...coverage, traceability }, null, 2);
  }

  const output = renderCoverageReport(coverage);
  if (batch.links.length === 0) {
    return output;
  }
  const analysis = analyzeTraceability(
    batch.requirements,
    batch.test_cases,
    batch.links,
  );
  return [
    output,
    "",
    "### Traceability",
    "",
    `Requirements with tests: ${ratio(
      analysis.requirements_with_tests,
      analysis.total_requirements,
      analysis.requirements_coverage_percentage,
    )}`,
    `Test cases with requirements: ${ratio(
      analysis.test_cases_with_requirements,
      analysis.total_test_cases,
      analysis.test_cases_coverage_percentage,
    )}`,
  ].join("\n");
}

function ratio(part: number, total: number, percentage: number): string {
  return `${part}/${total} (${percentage.toFixed(1)}%)`;
}
