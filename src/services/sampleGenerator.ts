/**
 * Sample Generator
 *
 * Writes a roster plus one consent PDF per sample student so the merge can be
 * tried end to end. Students flagged `duplicate` get a second file and those
 * flagged `missing` get none, so every report section shows up.
 *
 * generateDirectorySamples() does the same for the student directory: a
 * student CSV and "{id}_{last}-{first}-{stamp}.pdf" files, with one flagged
 * student left without a file.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import PDFDocument from "pdfkit";
import * as XLSX from "xlsx";
import { z } from "zod";
import { DEFAULT_ID_COLUMN } from "./rosterExtractor.js";

const sampleStudentSchema = z.object({
  id: z.string().regex(/^[0-9]+$/),
  firstName: z.string().regex(/^[A-Za-z ]+$/),
  lastName: z.string().regex(/^[A-Za-z ]+$/),
  duplicate: z.boolean().default(false),
  missing: z.boolean().default(false),
});

export type SampleStudent = z.infer<typeof sampleStudentSchema>;

export type SampleRosterFormat = "xlsx" | "csv";

export interface GenerateSamplesOptions {
  format?: SampleRosterFormat;
  /** Put a title row above the header so the header fallback kicks in */
  banner?: boolean;
  students?: readonly SampleStudent[];
  date?: Date;
}

export interface GeneratedSamples {
  rosterPath: string;
  waiverDir: string;
  waiverFiles: string[];
}

export const ROSTER_BANNER = "KCS Records Consent Roster";

const SAMPLE_DATA_PATH = fileURLToPath(new URL("../../data/sample-students.json", import.meta.url));
const DIRECTORY_DATA_PATH = fileURLToPath(new URL("../../data/sample-directory.json", import.meta.url));

export async function loadSampleStudents(filePath: string = SAMPLE_DATA_PATH): Promise<SampleStudent[]> {
  const raw: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
  return z.array(sampleStudentSchema).parse(raw);
}

const pad = (value: number) => String(value).padStart(2, "0");

const compactDate = (date: Date) => `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;

const compactTimestamp = (date: Date) =>
  `${compactDate(date)}${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

/** "{id}_{First Last}_KCS Records Consent_{original}_{yyyymmdd}.pdf" */
export function sampleWaiverName(student: SampleStudent, original: string, date: Date): string {
  return `${student.id}_${student.firstName} ${student.lastName}_KCS Records Consent_${original}_${compactDate(date)}.pdf`;
}

export function buildRosterRows(students: readonly SampleStudent[], banner: boolean): string[][] {
  const rows = students.map((student) => [student.id, student.firstName, student.lastName]);
  const header = [DEFAULT_ID_COLUMN, "First Name", "Last Name"];
  return banner ? [[ROSTER_BANNER], header, ...rows] : [header, ...rows];
}

async function renderWaiver(student: SampleStudent, date: Date): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: "LETTER", margin: 72 });

    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    doc.font("Helvetica-Bold").fontSize(22).text("KCS Records Consent");
    doc.moveDown();
    doc.font("Helvetica").fontSize(13);
    doc.text(`Client: ${student.firstName} ${student.lastName}`);
    doc.text(`EYF ID: ${student.id}`);
    doc.text(`Signed: ${date.toISOString().slice(0, 10)}`);
    doc.moveDown();
    doc
      .fontSize(11)
      .text(
        "I consent to the release of my education records to the program staff named above " +
          "for the purpose of coordinating services."
      );

    doc.end();
  });
}

export async function generateSamples(outDir: string, options: GenerateSamplesOptions = {}): Promise<GeneratedSamples> {
  const students = options.students ?? (await loadSampleStudents());
  const date = options.date ?? new Date();
  const format = options.format ?? "xlsx";
  const waiverDir = path.join(outDir, "waivers");
  await fs.mkdir(waiverDir, { recursive: true });

  const sheet = XLSX.utils.aoa_to_sheet(buildRosterRows(students, options.banner ?? false));
  const rosterPath = path.join(outDir, `roster.${format}`);
  if (format === "csv") {
    await fs.writeFile(rosterPath, `${XLSX.utils.sheet_to_csv(sheet)}\n`);
  } else {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, "Roster");
    const bytes: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
    await fs.writeFile(rosterPath, bytes);
  }

  const waiverFiles: string[] = [];
  for (const student of students) {
    if (student.missing) continue;
    const originals = student.duplicate ? ["consent form", "consent form rescan"] : ["consent form"];
    for (const original of originals) {
      const name = sampleWaiverName(student, original, date);
      await fs.writeFile(path.join(waiverDir, name), await renderWaiver(student, date));
      waiverFiles.push(name);
    }
  }

  return { rosterPath, waiverDir, waiverFiles };
}

// ============================================================================
// Student directory samples
// ============================================================================

const directoryStudentSchema = z.object({
  studentId: z.string().min(1),
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  email: z.string(),
  major: z.string(),
  gpa: z.number(),
  enrollmentDate: z.string(),
  hasWaiver: z.boolean(),
  /** Flagged as signed, but no file is written */
  fileMissing: z.boolean().default(false),
});

export type DirectorySampleStudent = z.infer<typeof directoryStudentSchema>;

export interface GenerateDirectorySamplesOptions {
  students?: readonly DirectorySampleStudent[];
  date?: Date;
}

export interface GeneratedDirectorySamples {
  csvPath: string;
  waiverDir: string;
  waiverFiles: string[];
}

export const STUDENT_CSV_HEADER = [
  "student_id",
  "first_name",
  "last_name",
  "email",
  "major",
  "gpa",
  "enrollment_date",
  "has_waiver",
];

export async function loadDirectorySampleStudents(
  filePath: string = DIRECTORY_DATA_PATH
): Promise<DirectorySampleStudent[]> {
  const raw: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
  return z.array(directoryStudentSchema).parse(raw);
}

/** "{id}_{last}-{first}-{yyyymmddHHMMSS}.pdf" */
export function directoryWaiverName(student: DirectorySampleStudent, date: Date): string {
  return `${student.studentId}_${student.lastName}-${student.firstName}-${compactTimestamp(date)}.pdf`;
}

export function buildStudentCsvRows(students: readonly DirectorySampleStudent[]): string[][] {
  return [
    STUDENT_CSV_HEADER,
    ...students.map((student) => [
      student.studentId,
      student.firstName,
      student.lastName,
      student.email,
      student.major,
      student.gpa.toFixed(2),
      student.enrollmentDate,
      student.hasWaiver ? "Yes" : "No",
    ]),
  ];
}

async function renderStudentRecord(student: DirectorySampleStudent): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: "LETTER", margin: 72 });

    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    doc.font("Helvetica-Bold").fontSize(24).text("Student Information");
    doc.moveDown();
    const fields: [string, string][] = [
      ["Student Name", `${student.firstName} ${student.lastName}`],
      ["Student ID", student.studentId],
      ["Email", student.email],
      ["Major", student.major],
      ["GPA", student.gpa.toFixed(2)],
      ["Enrollment Date", student.enrollmentDate],
    ];
    for (const [label, value] of fields) {
      doc.font("Helvetica-Bold").fontSize(14).text(`${label}: `, { continued: true });
      doc.font("Helvetica").text(value);
    }
    doc.moveDown();
    doc.fontSize(11).text("FERPA release on file.");

    doc.end();
  });
}

export async function generateDirectorySamples(
  outDir: string,
  options: GenerateDirectorySamplesOptions = {}
): Promise<GeneratedDirectorySamples> {
  const students = options.students ?? (await loadDirectorySampleStudents());
  const date = options.date ?? new Date();
  const waiverDir = path.join(outDir, "student_pdfs");
  await fs.mkdir(waiverDir, { recursive: true });

  const csvPath = path.join(outDir, "students.csv");
  const sheet = XLSX.utils.aoa_to_sheet(buildStudentCsvRows(students));
  await fs.writeFile(csvPath, `${XLSX.utils.sheet_to_csv(sheet)}\n`);

  const waiverFiles: string[] = [];
  for (const student of students) {
    if (!student.hasWaiver || student.fileMissing) continue;
    const name = directoryWaiverName(student, date);
    await fs.writeFile(path.join(waiverDir, name), await renderStudentRecord(student));
    waiverFiles.push(name);
  }

  return { csvPath, waiverDir, waiverFiles };
}
