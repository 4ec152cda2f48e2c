/** Canonical decimal string naming one roster record, e.g. "104522". */
export type Identifier = string;

/** Identifiers in roster row order. */
export type IdentifierSet = readonly Identifier[];

/** Uploaded documents keyed by file name. */
export type CandidatePool = ReadonlyMap<string, Uint8Array>;

export type RosterFormat = "xlsx" | "xls" | "csv" | "txt";

export interface RosterSource {
  /** File name, used to infer the format and in error messages */
  name: string;
  bytes: Uint8Array;
  /** Overrides the format inferred from `name` */
  format?: RosterFormat;
  /** Spreadsheet sheet to read; defaults to the first one */
  sheetName?: string;
}

export interface MatchedDocument {
  id: Identifier;
  name: string;
  bytes: Uint8Array;
}

export interface DuplicateConflict {
  id: Identifier;
  names: string[];
}

export interface MatchResult {
  matched: MatchedDocument[];
  missing: Identifier[];
  duplicates: DuplicateConflict[];
  /** Candidate names that claim no roster identifier */
  orphans: string[];
}

export interface AssemblyResult {
  /** Null when no item could be decoded */
  output: Uint8Array | null;
  errors: string[];
  mergedCount: number;
  pageCount: number;
}

export interface MergePolicy {
  columnName: string;
  headerFallbackRows: number;
  requireFilenamePattern: boolean;
  filenamePattern: RegExp;
  overwriteExisting: boolean;
}

export interface MergeSummary {
  identifiers: number;
  candidates: number;
  matched: number;
  missing: number;
  duplicates: number;
  orphans: number;
}

export interface MergePlan {
  runId: string;
  policy: MergePolicy;
  identifiers: IdentifierSet;
  candidates: CandidatePool;
  match: MatchResult;
  summary: MergeSummary;
}

export interface MergeOutcome {
  runId: string;
  assembly: AssemblyResult;
  report: string;
}
