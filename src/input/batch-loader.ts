import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { logDebug } from "../telemetry/logger.js";
import { parseBatch } from "./normalize.js";
import type { RecordBatch } from "./types.js";

export async function loadBatch(filePath: string): Promise<RecordBatch> {
  const resolvedPath = path.resolve(filePath);
  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new Error(
        `Input file does not exist: ${resolvedPath}. Provide a JSON or YAML batch file.`,
      );
    }
    throw error;
  }

  const doc = parseDocument(raw, resolvedPath);
  const batch = parseBatch(doc, resolvedPath);
  logDebug("Loaded batch", {
    file: resolvedPath,
    requirements: batch.requirements.length,
    testCases: batch.test_cases.length,
    links: batch.links.length,
  });
  return batch;
}

function parseDocument(raw: string, filePath: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  try {
    if (ext === ".json") {
      return JSON.parse(raw);
    }
    if (ext === ".yaml" || ext === ".yml") {
      return yaml.load(raw);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse ${filePath}: ${message}`);
  }
  throw new Error(
    `Unsupported input format: ${ext || "(none)"}. Use .json, .yaml or .yml.`,
  );
}
