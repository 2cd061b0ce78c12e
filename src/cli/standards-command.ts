import { loadCatalog } from "../catalog/load-catalog.js";
import { renderStandardsTable } from "../report/markdown-reporter.js";
import type { OutputFormat } from "./report-command.js";

export interface StandardsCommandOptions {
  readonly format: OutputFormat;
  readonly rulesDir?: string;
}

export async function runStandardsCommand(
  options: StandardsCommandOptions,
): Promise<string> {
  const catalog = await loadCatalog({ overrideDir: options.rulesDir });
  const standards = catalog.standardsInfo();
  if (options.format === "json") {
    return JSON.stringify(
      { standards, total_standards: standards.length },
      null,
      2,
    );
  }
  return renderStandardsTable(standards);
}
