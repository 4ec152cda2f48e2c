/**
 * Output Writer
 *
 * Persists a merge outcome: the assembled PDF and the status report.
 * Existing files are only replaced when `overwriteExisting` is set.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { MergeOutcome } from "../domain/merge.js";

export interface WriteOutputsOptions {
  outputPath: string;
  /** Report destination; no report is written when omitted */
  reportPath?: string;
  overwriteExisting: boolean;
}

export type SkipReason = "exists" | "no-output";

export interface WriteOutputsResult {
  outputWritten: boolean;
  reportWritten: boolean;
  skipped?: SkipReason;
  reportSkipped?: SkipReason;
}

/** Report path derived from the output path: "merged.pdf" -> "merged.txt". */
export function defaultReportPath(outputPath: string): string {
  const parsed = path.parse(outputPath);
  return path.join(parsed.dir, `${parsed.name}.txt`);
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function writeCreatingDirs(filePath: string, data: Uint8Array | string): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(filePath, data);
}

export async function writeMergeOutputs(
  outcome: Pick<MergeOutcome, "assembly" | "report">,
  options: WriteOutputsOptions
): Promise<WriteOutputsResult> {
  const result: WriteOutputsResult = { outputWritten: false, reportWritten: false };
  const { output } = outcome.assembly;

  if (output === null) {
    result.skipped = "no-output";
  } else if (!options.overwriteExisting && (await pathExists(options.outputPath))) {
    result.skipped = "exists";
  } else {
    await writeCreatingDirs(options.outputPath, output);
    result.outputWritten = true;
  }

  if (options.reportPath !== undefined) {
    if (!options.overwriteExisting && (await pathExists(options.reportPath))) {
      result.reportSkipped = "exists";
    } else {
      await writeCreatingDirs(options.reportPath, outcome.report);
      result.reportWritten = true;
    }
  }

  return result;
}
