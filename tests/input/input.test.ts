import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadBatch } from "../../src/input/batch-loader.js";
import {
  stepsOf,
  summaryText,
  testCaseText,
} from "../../src/input/entity-text.js";
import { parseBatch } from "../../src/input/normalize.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "regscore-input-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("batch parsing", () => {
  it("normalizes loosely typed records", () => {
    const batch = parseBatch({
      requirements: [
        {
          id: 4,
          requirement_id: "REQ-4",
          title: 12,
          description: "Audit logging",
          regulatory_standards: ["HIPAA", 7],
        },
      ],
      test_cases: [
        { test_case_id: "TC-4", test_steps: "not a list", requirement_id: 4 },
      ],
    });

    expect(batch.requirements[0]).toEqual({
      id: 4,
      requirement_id: "REQ-4",
      title: "",
      description: "Audit logging",
      regulatory_standards: ["HIPAA"],
    });
    expect(batch.test_cases[0]?.test_steps).toEqual([]);
    expect(batch.test_cases[0]?.requirement_id).toBe(4);
    expect(
      parseBatch({ requirements: [{ requirement_id: 42 }] }).requirements[0]
        ?.requirement_id,
    ).toBe(42);
    expect(batch.links).toEqual([]);
  });

  it("defaults the link type", () => {
    const batch = parseBatch({
      links: [
        {
          source_type: "requirement",
          source_id: 1,
          target_type: "test_case",
          target_id: "11",
        },
      ],
    });

    expect(batch.links[0]?.link_type).toBe("covers");
  });

  it("collects structural errors", () => {
    expect(() =>
      parseBatch(
        { requirements: ["text"], test_cases: {}, links: [{ source_id: 1 }] },
        "upload",
      ),
    ).toThrow(
      "Invalid upload: requirements[0] must be an object; test_cases must be a list; links[0] requires source_type, source_id, target_type and target_id",
    );
  });

  it("rejects non-object documents", () => {
    expect(() => parseBatch([])).toThrow(
      "Invalid batch: document must be an object",
    );
  });
});

describe("entity text", () => {
  it("joins and lowercases text fields", () => {
    const testCase = {
      title: "Audit Trail",
      description: "Checks Logging",
      test_steps: ["Open LOG", "Export"],
    };

    expect(summaryText(testCase)).toBe("audit trail checks logging");
    expect(testCaseText(testCase)).toBe(
      "audit trail checks logging open log export",
    );
    expect(summaryText({})).toBe(" ");
    expect(stepsOf({})).toEqual([]);
  });
});

describe("batch files", () => {
  it("loads JSON", async () => {
    const filePath = path.join(tempDir, "batch.json");
    await fs.writeFile(
      filePath,
      JSON.stringify({ requirements: [{ requirement_id: "REQ-1" }] }),
      "utf8",
    );

    const batch = await loadBatch(filePath);

    expect(batch.requirements[0]?.requirement_id).toBe("REQ-1");
  });

  it("loads YAML", async () => {
    const filePath = path.join(tempDir, "batch.yml");
    await fs.writeFile(
      filePath,
      [
        "test_cases:",
        "  - test_case_id: TC-9",
        "    title: Consent test",
        "    test_steps:",
        "      - Withdraw consent",
        "",
      ].join("\n"),
      "utf8",
    );

    const batch = await loadBatch(filePath);

    expect(batch.test_cases[0]?.test_steps).toEqual(["Withdraw consent"]);
  });

  it("rejects missing files", async () => {
    await expect(loadBatch(path.join(tempDir, "nope.json"))).rejects.toThrow(
      "Input file does not exist",
    );
  });

  it("rejects unsupported formats", async () => {
    const filePath = path.join(tempDir, "batch.csv");
    await fs.writeFile(filePath, "id,title\n", "utf8");

    await expect(loadBatch(filePath)).rejects.toThrow(
      "Unsupported input format: .csv. Use .json, .yaml or .yml.",
    );
  });

  it("reports parse failures", async () => {
    const filePath = path.join(tempDir, "batch.json");
    await fs.writeFile(filePath, "{ nope", "utf8");

    await expect(loadBatch(filePath)).rejects.toThrow(
      `Failed to parse ${filePath}`,
    );
  });
});
