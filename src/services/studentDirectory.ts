/**
 * Student Directory
 *
 * SQLite-backed student list with waiver attachment:
 * - importStudents(): load a student CSV, replacing every row, and attach the
 *   waiver file of each student flagged as signed
 * - buildPacket(): cover page + every attached waiver, by last name
 *
 * Waiver files in the directory follow "{studentId}_{lastName}-{firstName}-{stamp}.pdf".
 */

import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseCsv } from "csv-parse/sync";
import type { Logger } from "pino";
import { z } from "zod";
import { StudentDirectoryError } from "../domain/errors.js";
import type { AssemblyResult } from "../domain/merge.js";
import type { StudentCounts, StudentRecord } from "../domain/student.js";
import type { StudentRepository } from "../repositories/studentRepository.js";
import { assembleDocuments } from "./documentAssembler.js";
import { PACKET_TITLE, renderCoverPage } from "./coverPage.js";

// ============================================================================
// CSV rows
// ============================================================================

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim() ?? "";
    return trimmed === "" ? null : trimmed;
  });

const studentCsvRowSchema = z.object({
  student_id: z.string().trim().min(1, "student_id is required"),
  first_name: z.string().trim().min(1, "first_name is required"),
  last_name: z.string().trim().min(1, "last_name is required"),
  email: optionalText,
  major: optionalText,
  gpa: optionalText.transform((value, ctx) => {
    if (value === null) return null;
    const gpa = Number(value);
    if (!Number.isFinite(gpa)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a number` });
      return z.NEVER;
    }
    return gpa;
  }),
  enrollment_date: optionalText,
  has_waiver: optionalText.transform((value) =>
    value === null ? false : ["yes", "y", "1", "true"].includes(value.toLowerCase())
  ),
});

export type StudentCsvRow = z.infer<typeof studentCsvRowSchema>;

export function parseStudentCsv(csvText: string): StudentCsvRow[] {
  let records: unknown[];
  try {
    records = parseCsv(csvText, { columns: true, bom: true, skip_empty_lines: true, trim: true });
  } catch (err) {
    throw new StudentDirectoryError("Could not read student CSV", { cause: err });
  }

  const firstSeen = new Map<string, number>();
  return records.map((record, index) => {
    // +2: header line, 1-based
    const line = index + 2;
    const parsed = studentCsvRowSchema.safeParse(record);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new StudentDirectoryError(`Student CSV line ${line}: ${detail}`);
    }

    const earlier = firstSeen.get(parsed.data.student_id);
    if (earlier !== undefined) {
      throw new StudentDirectoryError(
        `Student CSV line ${line}: student_id ${parsed.data.student_id} already appears on line ${earlier}`
      );
    }
    firstSeen.set(parsed.data.student_id, line);
    return parsed.data;
  });
}

// ============================================================================
// Service
// ============================================================================

export interface ImportSummary {
  imported: number;
  flagged: number;
  attached: number;
  /** Flagged students whose waiver file was not found */
  missingFiles: string[];
}

export interface PacketResult {
  students: StudentRecord[];
  counts: StudentCounts;
  assembly: AssemblyResult;
}

export function waiverFilePrefix(student: Pick<StudentRecord, "studentId" | "firstName" | "lastName">): string {
  return `${student.studentId}_${student.lastName}-${student.firstName}-`;
}

async function listWaiverFiles(waiverDir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(waiverDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".pdf"))
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    throw new StudentDirectoryError(`Waiver folder not found: ${waiverDir}`, { cause: err });
  }
}

export class StudentDirectory {
  private readonly logger: Logger;

  constructor(private readonly repository: StudentRepository, logger: Logger) {
    this.logger = logger.child({ service: "studentDirectory" });
  }

  async importStudents(csvText: string, waiverDir: string): Promise<ImportSummary> {
    const rows = parseStudentCsv(csvText);
    const waiverFiles = await listWaiverFiles(waiverDir);
    const missingFiles: string[] = [];
    let attached = 0;

    const students = rows.map((row): StudentRecord => {
      const student: StudentRecord = {
        studentId: row.student_id,
        firstName: row.first_name,
        lastName: row.last_name,
        email: row.email,
        major: row.major,
        gpa: row.gpa,
        enrollmentDate: row.enrollment_date,
        hasWaiver: row.has_waiver,
        waiverPath: null,
      };

      if (student.hasWaiver) {
        const prefix = waiverFilePrefix(student);
        const fileName = waiverFiles.find((name) => name.startsWith(prefix));
        if (fileName === undefined) {
          missingFiles.push(student.studentId);
          this.logger.warn({ studentId: student.studentId }, "No waiver file found for student");
        } else {
          student.waiverPath = path.join(waiverDir, fileName);
          attached++;
        }
      }
      return student;
    });

    const imported = this.repository.replaceAll(students);
    const flagged = students.filter((student) => student.hasWaiver).length;
    this.logger.info({ imported, flagged, attached, missing: missingFiles.length }, "Student directory imported");

    return { imported, flagged, attached, missingFiles };
  }

  listWithWaivers(): StudentRecord[] {
    return this.repository.listWithWaivers();
  }

  counts(): StudentCounts {
    return this.repository.counts();
  }

  /**
   * Cover page plus every attached waiver, sorted by last name.
   *
   * @throws StudentDirectoryError when nobody has a waiver on file, or when
   *   any attached file no longer exists (nothing is assembled then)
   */
  async buildPacket(options: { now?: () => Date } = {}): Promise<PacketResult> {
    const students = this.repository.listWithWaivers();
    const counts = this.repository.counts();
    if (students.length === 0) {
      throw new StudentDirectoryError("No students with waiver files found in the directory");
    }

    const items: { name: string; bytes: Uint8Array }[] = [];
    const missing: string[] = [];
    for (const student of students) {
      const waiverPath = student.waiverPath ?? "";
      try {
        items.push({ name: path.basename(waiverPath), bytes: new Uint8Array(await fs.readFile(waiverPath)) });
      } catch (err) {
        this.logger.error({ studentId: student.studentId, waiverPath, err }, "Waiver file missing");
        missing.push(waiverPath);
      }
    }
    if (missing.length > 0) {
      throw new StudentDirectoryError(`${missing.length} waiver file(s) are missing: ${missing.join(", ")}`);
    }

    const cover = await renderCoverPage({
      students,
      totalStudents: counts.total,
      generatedAt: (options.now ?? (() => new Date()))(),
    });

    const assembly = await assembleDocuments(items, {
      logger: this.logger,
      leadingPages: [cover],
      title: PACKET_TITLE,
    });

    return { students, counts, assembly };
  }
}
