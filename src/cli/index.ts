#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { logError, setLogLevel } from "../telemetry/logger.js";
import { runCoverageCommand } from "./coverage-command.js";
import {
  runReportCommand,
  type OutputFormat,
  type ReportSection,
} from "./report-command.js";
import { runStandardsCommand } from "./standards-command.js";

type GlobalCliOptions = {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
};

interface ReportCliOptions {
  readonly format: string;
  readonly out?: string;
  readonly standards?: string;
  readonly rules?: string;
  readonly maxRecommendations?: string;
  readonly failBelow?: string;
  readonly show: string;
  readonly showEvidence?: boolean;
}

interface StandardsCliOptions {
  readonly format: string;
  readonly rules?: string;
}

interface CoverageCliOptions {
  readonly format: string;
  readonly standard?: string;
  readonly rules?: string;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("regscore")
  .version(toolVersion)
  .option("--verbose", "Verbose output")
  .option("--quiet", "Suppress non-essential output")
  .hook("preAction", () => {
    const globals = program.opts<GlobalCliOptions>();
    if (globals.quiet) {
      setLogLevel("error");
    } else if (globals.verbose) {
      setLogLevel("debug");
    } else {
      setLogLevel("warn");
    }
  });

program
  .command("report")
  .argument("<input>", "JSON or YAML file with requirements and test_cases")
  .option("--format <format>", "Output format (json|md)", "md")
  .option("--out <file>", "Write report to file")
  .option("--standards <list>", "Comma-separated standards to keep")
  .option("--rules <path>", "Rules directory merged over the built-in rules")
  .option("--max-recommendations <number>", "Limit ranked recommendations")
  .option("--fail-below <score>", "Exit with code 2 if any standard scores lower")
  .option("--show <section>", "Output sections (summary|results|all)", "all")
  .option("--show-evidence", "Include matched patterns in markdown output")
  .action(async (input: string, options: ReportCliOptions) => {
    try {
      const result = await runReportCommand({
        input,
        format: parseFormat(options.format),
        out: options.out,
        standards: parseList(options.standards),
        rulesDir: options.rules,
        maxRecommendations: parseOptionalNumber(
          options.maxRecommendations,
          "--max-recommendations",
        ),
        failBelow: parseOptionalNumber(options.failBelow, "--fail-below"),
        show: parseShow(options.show),
        showEvidence: Boolean(options.showEvidence),
      });

      if (!options.out) {
        await writeStdout(result.output + "\n");
      }

      if (result.failing.length > 0) {
        writeError(`Below threshold: ${result.failing.join(", ")}`);
        process.exitCode = 2;
      }
    } catch (error) {
      writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("standards")
  .option("--format <format>", "Output format (json|md)", "md")
  .option("--rules <path>", "Rules directory merged over the built-in rules")
  .action(async (options: StandardsCliOptions) => {
    try {
      const output = await runStandardsCommand({
        format: parseFormat(options.format),
        rulesDir: options.rules,
      });
      await writeStdout(output + "\n");
    } catch (error) {
      writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("coverage")
  .argument("<input>", "JSON or YAML file with requirements, test_cases, links")
  .option("--format <format>", "Output format (json|md)", "md")
  .option("--standard <name>", "Only check requirements tagged with a standard")
  .option("--rules <path>", "Rules directory merged over the built-in rules")
  .action(async (input: string, options: CoverageCliOptions) => {
    try {
      const output = await runCoverageCommand({
        input,
        format: parseFormat(options.format),
        standard: options.standard,
        rulesDir: options.rules,
      });
      await writeStdout(output + "\n");
    } catch (error) {
      writeError(error);
      process.exitCode = 1;
    }
  });

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json: unknown = JSON.parse(raw);
  if (
    json &&
    typeof json === "object" &&
    "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "0.0.0";
}

function parseFormat(value: string): OutputFormat {
  if (value === "json" || value === "md") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

function parseShow(value: string): ReportSection {
  if (value === "summary" || value === "results" || value === "all") {
    return value;
  }
  throw new Error(`Unsupported section: ${value}. Use summary, results or all.`);
}

function parseList(value?: string): string[] | undefined {
  if (!value) {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseOptionalNumber(
  value: string | undefined,
  flag: string,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${flag} expects a number, got: ${value}`);
  }
  return parsed;
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

function writeError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  logError(message);
}

const argv = [...process.argv];
const separatorIndex = argv.indexOf("--");
if (separatorIndex !== -1) {
  argv.splice(separatorIndex, 1);
}

await program.parseAsync(argv);
