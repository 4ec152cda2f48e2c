/**
 * Roster Extractor
 *
 * Reads the list of expected student IDs from a roster file.
 *
 * Key behaviors:
 * - Header is expected on the first row; if the ID column is not there, the
 *   next row is tried (title/banner rows above the real header), up to
 *   `headerFallbackRows` retries
 * - Rows with an empty ID cell are dropped
 * - Every ID is normalized to its canonical decimal form ("12345.0" → "12345")
 * - Any ID that cannot be read as an integer fails the whole extraction
 * - Any repeated ID fails the whole extraction, naming every repeated value
 *
 * Supported formats: .xlsx / .xls (SheetJS), .csv (csv-parse), .txt (one ID per line, no header)
 */

import path from "node:path";
import * as XLSX from "xlsx";
import { parse as parseCsv } from "csv-parse/sync";
import { DuplicateIdentifierError, ParseError, SchemaError } from "../domain/errors.js";
import type { Identifier, IdentifierSet, RosterFormat, RosterSource } from "../domain/merge.js";

// ============================================================================
// Types
// ============================================================================

export interface ExtractOptions {
  /** Column holding the IDs (default "EYFID") */
  columnName?: string;
  /** How many rows below the first to try as the header (default 1) */
  headerFallbackRows?: number;
}

type Grid = unknown[][];

interface ColumnLocation {
  headerIndex: number;
  columnIndex: number;
}

const ROSTER_FORMATS: readonly RosterFormat[] = ["xlsx", "xls", "csv", "txt"];

export const DEFAULT_ID_COLUMN = "EYFID";

// ============================================================================
// Helpers
// ============================================================================

function isRosterFormat(value: string): value is RosterFormat {
  return ROSTER_FORMATS.some((format) => format === value);
}

export function detectRosterFormat(fileName: string): RosterFormat {
  const ext = path.extname(fileName).slice(1).toLowerCase();
  if (isRosterFormat(ext)) {
    return ext;
  }
  throw new ParseError(`Unsupported roster file type: ${fileName} (expected .xlsx, .xls, .csv or .txt)`);
}

function cellText(cell: unknown): string {
  if (cell === null || cell === undefined) return "";
  if (typeof cell === "string") return cell.trim();
  if (cell instanceof Date) return cell.toISOString();
  return String(cell).trim();
}

/**
 * Normalize a raw cell to a canonical ID.
 *
 * @returns the ID, or null when the cell is empty
 * @throws ParseError when the cell holds something other than an integer
 */
export function toIdentifier(value: unknown, location: string): Identifier | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "number") {
    if (Number.isSafeInteger(value)) {
      return String(value);
    }
    throw new ParseError(`${location}: ${value} is not a valid student ID`);
  }

  if (typeof value === "bigint") {
    return value.toString();
  }

  if (typeof value === "string") {
    const text = value.trim();
    if (text === "") return null;

    // Integer, optionally carrying a zero fraction the way numeric cells export ("12345.0")
    const match = /^([+-]?)(\d+)(?:\.0*)?$/.exec(text);
    if (match) {
      const magnitude = BigInt(match[2]).toString();
      return match[1] === "-" && magnitude !== "0" ? `-${magnitude}` : magnitude;
    }
    throw new ParseError(`${location}: "${text}" is not a valid student ID`);
  }

  throw new ParseError(`${location}: ${JSON.stringify(value)} is not a valid student ID`);
}

function readSpreadsheet(source: RosterSource): Grid {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(Buffer.from(source.bytes), { type: "buffer" });
  } catch (err) {
    throw new ParseError(
      `Could not read ${source.name}. Please check that it's a valid .xlsx or .xls file.`,
      { cause: err }
    );
  }

  const sheetName = source.sheetName ?? workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new ParseError(`Sheet '${source.sheetName ?? "(first)"}' not found in ${source.name}`);
  }

  // header: 1 keeps raw rows so the header row can be chosen here; blank rows keep positions stable
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: true });
}

function readCsv(source: RosterSource): Grid {
  try {
    const records: unknown[][] = parseCsv(Buffer.from(source.bytes).toString("utf8"), {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: false,
    });
    return records;
  } catch (err) {
    throw new ParseError(`Could not read ${source.name}. Please check that it's a valid CSV file.`, {
      cause: err,
    });
  }
}

function locateColumn(grid: Grid, columnName: string, headerFallbackRows: number): ColumnLocation | null {
  for (let headerIndex = 0; headerIndex <= headerFallbackRows && headerIndex < grid.length; headerIndex++) {
    const columnIndex = grid[headerIndex].findIndex((cell) => cellText(cell) === columnName);
    if (columnIndex >= 0) {
      return { headerIndex, columnIndex };
    }
  }
  return null;
}

/**
 * Fail if any ID occurs more than once, listing each offending value once
 * (in order of first appearance).
 */
export function assertUniqueIdentifiers(ids: IdentifierSet): void {
  const counts = new Map<Identifier, number>();
  for (const id of ids) {
    counts.set(id, (counts.get(id) ?? 0) + 1);
  }

  const duplicates = [...counts].filter(([, count]) => count > 1).map(([id]) => id);
  if (duplicates.length > 0) {
    throw new DuplicateIdentifierError(duplicates);
  }
}

// ============================================================================
// Extraction
// ============================================================================

function extractFromGrid(grid: Grid, source: RosterSource, columnName: string, headerFallbackRows: number): Identifier[] {
  const location = locateColumn(grid, columnName, headerFallbackRows);
  if (!location) {
    throw new SchemaError(columnName, source.name);
  }

  const ids: Identifier[] = [];
  for (let rowIndex = location.headerIndex + 1; rowIndex < grid.length; rowIndex++) {
    const id = toIdentifier(grid[rowIndex][location.columnIndex], `Row ${rowIndex + 1}, column '${columnName}'`);
    if (id !== null) {
      ids.push(id);
    }
  }
  return ids;
}

function extractFromText(source: RosterSource): Identifier[] {
  const lines = Buffer.from(source.bytes).toString("utf8").split(/\r?\n/);
  const ids: Identifier[] = [];
  lines.forEach((line, index) => {
    const id = toIdentifier(line.replace(/^\uFEFF/, ""), `Line ${index + 1}`);
    if (id !== null) {
      ids.push(id);
    }
  });
  return ids;
}

function readIdentifiers(
  source: RosterSource,
  format: RosterFormat,
  columnName: string,
  headerFallbackRows: number
): Identifier[] {
  switch (format) {
    case "xlsx":
    case "xls":
      return extractFromGrid(readSpreadsheet(source), source, columnName, headerFallbackRows);
    case "csv":
      return extractFromGrid(readCsv(source), source, columnName, headerFallbackRows);
    case "txt":
      return extractFromText(source);
  }
}

/**
 * Extract the ordered list of unique student IDs from a roster.
 *
 * @throws SchemaError when the ID column is not found
 * @throws ParseError when the file or an ID cell cannot be read
 * @throws DuplicateIdentifierError when any ID repeats
 */
export function extractIdentifiers(source: RosterSource, options: ExtractOptions = {}): IdentifierSet {
  const columnName = options.columnName ?? DEFAULT_ID_COLUMN;
  const headerFallbackRows = options.headerFallbackRows ?? 1;
  const format = source.format ?? detectRosterFormat(source.name);

  const ids = readIdentifiers(source, format, columnName, headerFallbackRows);
  assertUniqueIdentifiers(ids);
  return ids;
}
