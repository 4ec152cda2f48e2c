/**
 * Merge Pipeline
 *
 * Two-phase API over the roster → match → merge/report flow:
 *
 *   planMerge()    extract IDs, check file names, classify files (sync, no output)
 *   executeMerge() build the merged PDF and the status report from a plan
 *
 * Callers decide what happens between the two (the CLI asks for confirmation,
 * tests go straight through). All state for one run lives on the plan object.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { FilenameFormatError } from "../domain/errors.js";
import type { CandidatePool, MergeOutcome, MergePlan, MergePolicy, MergeSummary, RosterSource } from "../domain/merge.js";
import { assembleDocuments } from "./documentAssembler.js";
import { DEFAULT_FILENAME_PATTERN, matchDocuments, validateFilenames } from "./documentMatcher.js";
import { DEFAULT_ID_COLUMN, extractIdentifiers } from "./rosterExtractor.js";
import { generateStatusReport } from "./statusReporter.js";

export const DEFAULT_MERGE_POLICY: Readonly<MergePolicy> = {
  columnName: DEFAULT_ID_COLUMN,
  headerFallbackRows: 1,
  requireFilenamePattern: false,
  filenamePattern: new RegExp(DEFAULT_FILENAME_PATTERN),
  overwriteExisting: false,
};

export interface PlanMergeInput {
  roster: RosterSource;
  candidates: CandidatePool;
  policy?: Partial<MergePolicy>;
}

export interface PipelineDeps {
  logger: Logger;
  /** Fixed run id (defaults to a random UUID) */
  runId?: string;
}

export interface ExecuteMergeDeps {
  logger: Logger;
  reportTitle?: string;
  now?: () => Date;
}

export function resolveMergePolicy(overrides: Partial<MergePolicy> = {}): MergePolicy {
  return {
    columnName: overrides.columnName ?? DEFAULT_MERGE_POLICY.columnName,
    headerFallbackRows: overrides.headerFallbackRows ?? DEFAULT_MERGE_POLICY.headerFallbackRows,
    requireFilenamePattern: overrides.requireFilenamePattern ?? DEFAULT_MERGE_POLICY.requireFilenamePattern,
    filenamePattern: overrides.filenamePattern ?? DEFAULT_MERGE_POLICY.filenamePattern,
    overwriteExisting: overrides.overwriteExisting ?? DEFAULT_MERGE_POLICY.overwriteExisting,
  };
}

function summarize(plan: Pick<MergePlan, "identifiers" | "candidates" | "match">): MergeSummary {
  return {
    identifiers: plan.identifiers.length,
    candidates: plan.candidates.size,
    matched: plan.match.matched.length,
    missing: plan.match.missing.length,
    duplicates: plan.match.duplicates.length,
    orphans: plan.match.orphans.length,
  };
}

/**
 * Phase 1: everything short of building output.
 *
 * @throws FilenameFormatError when the strict naming check is on and any file fails it
 * @throws SchemaError | ParseError | DuplicateIdentifierError from roster extraction
 */
export function planMerge(input: PlanMergeInput, deps: PipelineDeps): MergePlan {
  const policy = resolveMergePolicy(input.policy);
  const runId = deps.runId ?? randomUUID();
  const log = deps.logger.child({ runId });

  if (policy.requireFilenamePattern) {
    const { invalid } = validateFilenames(input.candidates.keys(), policy.filenamePattern);
    if (invalid.length > 0) {
      log.error({ invalid, pattern: policy.filenamePattern.source }, "File names do not match the expected format");
      throw new FilenameFormatError(invalid, policy.filenamePattern);
    }
  }

  const identifiers = extractIdentifiers(input.roster, {
    columnName: policy.columnName,
    headerFallbackRows: policy.headerFallbackRows,
  });
  const match = matchDocuments(input.candidates, identifiers);
  const summary = summarize({ identifiers, candidates: input.candidates, match });

  log.info({ roster: input.roster.name, ...summary }, "Merge planned");
  if (match.orphans.length > 0) {
    log.warn({ orphans: match.orphans }, "Files match no roster ID and will be ignored");
  }

  return { runId, policy, identifiers, candidates: input.candidates, match, summary };
}

/**
 * Phase 2: merge the plan's matched files and render the status report.
 * Per-file failures are collected in `assembly.errors`; `assembly.output` is
 * null when nothing could be merged.
 */
export async function executeMerge(plan: MergePlan, deps: ExecuteMergeDeps): Promise<MergeOutcome> {
  const log = deps.logger.child({ runId: plan.runId });
  const now = deps.now ?? (() => new Date());

  const report = generateStatusReport(plan.match.missing, plan.match.duplicates, {
    title: deps.reportTitle,
    generatedAt: now(),
    orphans: plan.match.orphans,
  });

  const assembly = await assembleDocuments(plan.match.matched, { logger: log });

  return { runId: plan.runId, assembly, report };
}
