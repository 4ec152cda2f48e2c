import type { DuplicateConflict, Identifier } from "../domain/merge.js";

export const DEFAULT_REPORT_TITLE = "FERPA Waiver Status Report";

export interface ReportOptions {
  title?: string;
  generatedAt?: Date;
  /** Files that matched no roster ID; listed only when non-empty */
  orphans?: readonly string[];
}

const pad = (value: number) => String(value).padStart(2, "0");

/** Local time as "YYYY-MM-DD HH:MM:SS". */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Plain-text status report of students without a usable waiver.
 * Empty sections are left out entirely.
 */
export function generateStatusReport(
  missing: readonly Identifier[],
  duplicates: readonly DuplicateConflict[],
  options: ReportOptions = {}
): string {
  const lines: string[] = [
    options.title ?? DEFAULT_REPORT_TITLE,
    `Generated: ${formatTimestamp(options.generatedAt ?? new Date())}`,
    "=".repeat(50),
    "",
  ];

  if (missing.length > 0) {
    lines.push(`MISSING WAIVERS (${missing.length} students)`, "-".repeat(30));
    for (const id of missing) {
      lines.push(`  - EYF ID: ${id}`);
    }
    lines.push("");
  }

  if (duplicates.length > 0) {
    lines.push(`DUPLICATE FILES (${duplicates.length} students)`, "-".repeat(30));
    for (const { id, names } of duplicates) {
      lines.push(`  - EYF ID ${id}:`);
      for (const name of names) {
        lines.push(`      ${name}`);
      }
    }
    lines.push("");
  }

  const orphans = options.orphans ?? [];
  if (orphans.length > 0) {
    lines.push(`UNMATCHED FILES (${orphans.length} files)`, "-".repeat(30));
    for (const name of orphans) {
      lines.push(`  - ${name}`);
    }
    lines.push("");
  }

  if (missing.length === 0 && duplicates.length === 0) {
    lines.push("All students have exactly one waiver on file.");
  }

  return `${lines.join("\n")}\n`;
}
