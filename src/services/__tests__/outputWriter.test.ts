import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { AssemblyResult } from "../../domain/merge.js";
import { defaultReportPath, writeMergeOutputs } from "../outputWriter.js";

const assembly = (output: Uint8Array | null): AssemblyResult => ({
  output,
  errors: [],
  mergedCount: output ? 1 : 0,
  pageCount: output ? 1 : 0,
});

describe("outputWriter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "waiver-out-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("derives the report path from the output path", () => {
    expect(defaultReportPath(path.join("out", "merged.pdf"))).toBe(path.join("out", "merged.txt"));
  });

  it("writes the document and the report, creating folders", async () => {
    const outputPath = path.join(dir, "out", "merged.pdf");
    const reportPath = path.join(dir, "out", "merged.txt");

    const result = await writeMergeOutputs(
      { assembly: assembly(new Uint8Array([1, 2, 3])), report: "report\n" },
      { outputPath, reportPath, overwriteExisting: false }
    );

    expect(result).toEqual({ outputWritten: true, reportWritten: true });
    expect([...(await fs.readFile(outputPath))]).toEqual([1, 2, 3]);
    expect(await fs.readFile(reportPath, "utf8")).toBe("report\n");
  });

  it("leaves existing files alone unless overwriting", async () => {
    const outputPath = path.join(dir, "merged.pdf");
    const reportPath = path.join(dir, "merged.txt");
    await fs.writeFile(outputPath, "old");
    await fs.writeFile(reportPath, "old report");
    const outcome = { assembly: assembly(new Uint8Array([9])), report: "new report" };

    const kept = await writeMergeOutputs(outcome, { outputPath, reportPath, overwriteExisting: false });
    expect(kept).toEqual({ outputWritten: false, reportWritten: false, skipped: "exists", reportSkipped: "exists" });
    expect(await fs.readFile(outputPath, "utf8")).toBe("old");

    const replaced = await writeMergeOutputs(outcome, { outputPath, reportPath, overwriteExisting: true });
    expect(replaced).toEqual({ outputWritten: true, reportWritten: true });
    expect(await fs.readFile(reportPath, "utf8")).toBe("new report");
  });

  it("writes only the report when there is no document", async () => {
    const outputPath = path.join(dir, "merged.pdf");
    const reportPath = path.join(dir, "merged.txt");

    const result = await writeMergeOutputs(
      { assembly: assembly(null), report: "nothing" },
      { outputPath, reportPath, overwriteExisting: false }
    );

    expect(result).toEqual({ outputWritten: false, reportWritten: true, skipped: "no-output" });
    await expect(fs.access(outputPath)).rejects.toThrow();
  });
});
