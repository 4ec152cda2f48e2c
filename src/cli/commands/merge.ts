import fs from "node:fs/promises";
import path from "node:path";
import type { AppContext } from "../../app/context.js";
import { isWaiverMergeError, ParseError } from "../../domain/errors.js";
import type { MergePlan, MergePolicy } from "../../domain/merge.js";
import { loadDocumentFolder } from "../../services/documentFolder.js";
import { executeMerge, planMerge } from "../../services/mergePipeline.js";
import { defaultReportPath, pathExists, writeMergeOutputs } from "../../services/outputWriter.js";
import { confirmProceed, type Confirm } from "../utils/confirm.js";
import { printToStdout, type Print } from "../utils/output.js";

export interface MergeCommandOptions {
  column?: string;
  headerFallbackRows?: number;
  report?: string;
  strictFilenames?: boolean;
  pattern?: string;
  overwrite?: boolean;
  recursive?: boolean;
  yes?: boolean;
}

export interface MergeCommandDeps {
  print?: Print;
  confirm?: Confirm;
  now?: () => Date;
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (err) {
    throw new ParseError(`Invalid filename pattern: ${source}`, { cause: err });
  }
}

export function printPlan(plan: MergePlan, print: Print): void {
  const { match, summary } = plan;

  for (const id of match.missing) {
    print(`ERROR: No waiver found for EYF ID ${id}`);
  }
  for (const { id, names } of match.duplicates) {
    print(`ERROR: Multiple waivers found for EYF ID ${id}:`);
    for (const name of names) {
      print(`  ${name}`);
    }
  }
  if (match.orphans.length > 0) {
    print(`WARNING: ${match.orphans.length} file(s) match no EYF ID and will be ignored:`);
    for (const name of match.orphans) {
      print(`  ${name}`);
    }
  }

  print(`Successfully matched waivers for ${summary.matched} out of ${summary.identifiers} EYF IDs.`);
}

/**
 * merge <document_folder> <identifier_source> <output_path>
 *
 * Exit codes: 0 on success (also with skipped files) or when cancelled,
 * 1 when nothing was produced.
 */
export async function runMerge(
  documentFolder: string,
  identifierSource: string,
  outputPath: string,
  options: MergeCommandOptions,
  ctx: AppContext,
  deps: MergeCommandDeps = {}
): Promise<number> {
  const print = deps.print ?? printToStdout;
  const log = ctx.logger.child({ command: "merge" });

  try {
    const policy: Partial<MergePolicy> = {
      columnName: options.column ?? ctx.config.rosterColumn,
      headerFallbackRows: options.headerFallbackRows ?? ctx.config.headerFallbackRows,
      requireFilenamePattern: options.strictFilenames ?? true,
      filenamePattern: compilePattern(options.pattern ?? ctx.config.filenamePattern),
      overwriteExisting: options.overwrite ?? false,
    };

    const candidates = await loadDocumentFolder(documentFolder, { recursive: options.recursive });
    let rosterBytes: Buffer;
    try {
      rosterBytes = await fs.readFile(identifierSource);
    } catch (err) {
      throw new ParseError(`Could not read roster file: ${identifierSource}`, { cause: err });
    }

    const plan = planMerge(
      { roster: { name: path.basename(identifierSource), bytes: new Uint8Array(rosterBytes) }, candidates, policy },
      { logger: log }
    );
    printPlan(plan, print);

    const reportPath = options.report ?? defaultReportPath(outputPath);
    if (!plan.policy.overwriteExisting && (await pathExists(outputPath))) {
      print(`${outputPath} already exists; use --overwrite to replace it.`);
      return 1;
    }

    // With nothing matched there is nothing to confirm; the report is still written
    if (plan.match.matched.length > 0) {
      const proceed = await confirmProceed(options, "Proceed with PDF generation?", deps.confirm);
      if (!proceed) {
        print("Operation cancelled.");
        return 0;
      }
    }

    const outcome = await executeMerge(plan, { logger: log, reportTitle: ctx.config.reportTitle, now: deps.now });
    const written = await writeMergeOutputs(outcome, {
      outputPath,
      reportPath,
      overwriteExisting: plan.policy.overwriteExisting,
    });

    for (const error of outcome.assembly.errors) {
      print(`WARNING: skipped ${error}`);
    }
    if (written.reportWritten) {
      print(`Status report written to ${reportPath}`);
    } else if (written.reportSkipped === "exists") {
      print("Status report already exists; use --overwrite to replace it.");
    }

    if (written.skipped === "no-output") {
      print(
        plan.match.matched.length === 0
          ? "Nothing to merge: no EYF ID has exactly one waiver."
          : "Nothing to merge: no waiver could be read."
      );
      return 1;
    }
    if (written.skipped === "exists") {
      print(`${outputPath} already exists; use --overwrite to replace it.`);
      return 1;
    }

    const { mergedCount, pageCount, errors } = outcome.assembly;
    const partial = errors.length > 0 ? ` (${errors.length} skipped)` : "";
    print(`Merged ${mergedCount} waiver(s), ${pageCount} page(s), into ${outputPath}${partial}`);
    return 0;
  } catch (err) {
    if (!isWaiverMergeError(err)) throw err;
    log.error({ code: err.code, err }, "Merge failed");
    print(`ERROR: ${err.message}`);
    return 1;
  }
}
