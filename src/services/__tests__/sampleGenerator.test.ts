import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import Database from "better-sqlite3";
import { StudentRepository } from "../../repositories/studentRepository.js";
import { loadDocumentFolder } from "../documentFolder.js";
import { planMerge } from "../mergePipeline.js";
import { extractIdentifiers } from "../rosterExtractor.js";
import { StudentDirectory } from "../studentDirectory.js";
import {
  buildRosterRows,
  buildStudentCsvRows,
  directoryWaiverName,
  generateDirectorySamples,
  generateSamples,
  loadDirectorySampleStudents,
  loadSampleStudents,
  type DirectorySampleStudent,
  ROSTER_BANNER,
  sampleWaiverName,
  type SampleStudent,
} from "../sampleGenerator.js";
import { silentLogger } from "./helpers.js";

const students: SampleStudent[] = [
  { id: "11", firstName: "Ana", lastName: "Diaz", duplicate: false, missing: false },
  { id: "12", firstName: "Ben", lastName: "Ek", duplicate: true, missing: false },
  { id: "13", firstName: "Cy", lastName: "Fox", duplicate: false, missing: true },
];
const date = new Date(2024, 0, 5);

const directoryStudents: DirectorySampleStudent[] = [
  { studentId: "S1", firstName: "Ann", lastName: "Zimmer", email: "ann@example.edu", major: "History", gpa: 3.5, enrollmentDate: "2023-09-01", hasWaiver: true, fileMissing: false },
  { studentId: "S2", firstName: "Ben", lastName: "Abbott", email: "ben@example.edu", major: "Biology", gpa: 3, enrollmentDate: "2023-09-01", hasWaiver: true, fileMissing: true },
  { studentId: "S3", firstName: "Cy", lastName: "Moss", email: "cy@example.edu", major: "Physics", gpa: 2.75, enrollmentDate: "2024-01-16", hasWaiver: false, fileMissing: false },
];

describe("sampleGenerator", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "waiver-samples-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("names waivers after the consent convention", () => {
    expect(sampleWaiverName(students[0], "consent form", date)).toBe(
      "11_Ana Diaz_KCS Records Consent_consent form_20240105.pdf"
    );
  });

  it("puts the banner above the header when asked", () => {
    expect(buildRosterRows(students.slice(0, 1), true)).toEqual([
      [ROSTER_BANNER],
      ["EYFID", "First Name", "Last Name"],
      ["11", "Ana", "Diaz"],
    ]);
    expect(buildRosterRows(students.slice(0, 1), false)[0]).toEqual(["EYFID", "First Name", "Last Name"]);
  });

  it("ships a valid bundled student list", async () => {
    const bundled = await loadSampleStudents();

    expect(bundled.length).toBeGreaterThan(0);
    expect(bundled.some((student) => student.duplicate)).toBe(true);
    expect(bundled.some((student) => student.missing)).toBe(true);
  });

  it("writes a roster and waivers that exercise every report section", async () => {
    const generated = await generateSamples(dir, { students, date, format: "csv", banner: true });

    expect(generated.rosterPath).toBe(path.join(dir, "roster.csv"));
    expect(generated.waiverFiles).toEqual([
      "11_Ana Diaz_KCS Records Consent_consent form_20240105.pdf",
      "12_Ben Ek_KCS Records Consent_consent form_20240105.pdf",
      "12_Ben Ek_KCS Records Consent_consent form rescan_20240105.pdf",
    ]);

    const roster = { name: "roster.csv", bytes: new Uint8Array(await fs.readFile(generated.rosterPath)) };
    expect(extractIdentifiers(roster)).toEqual(["11", "12", "13"]);

    const candidates = await loadDocumentFolder(generated.waiverDir);
    const plan = planMerge({ roster, candidates, policy: { requireFilenamePattern: true } }, { logger: silentLogger });
    expect(plan.summary).toEqual({ identifiers: 3, candidates: 3, matched: 1, missing: 1, duplicates: 1, orphans: 0 });
  });

  it("writes an xlsx roster by default", async () => {
    const generated = await generateSamples(dir, { students, date });
    const bytes = new Uint8Array(await fs.readFile(generated.rosterPath));

    expect(generated.rosterPath).toBe(path.join(dir, "roster.xlsx"));
    expect(extractIdentifiers({ name: "roster.xlsx", bytes })).toEqual(["11", "12", "13"]);
  });

  describe("student directory samples", () => {
    it("names record files the way the directory import looks for them", () => {
      expect(directoryWaiverName(directoryStudents[0], new Date(2024, 0, 5, 9, 3, 7))).toBe(
        "S1_Zimmer-Ann-20240105090307.pdf"
      );
    });

    it("writes CSV rows with the import header", () => {
      expect(buildStudentCsvRows(directoryStudents.slice(0, 1))).toEqual([
        ["student_id", "first_name", "last_name", "email", "major", "gpa", "enrollment_date", "has_waiver"],
        ["S1", "Ann", "Zimmer", "ann@example.edu", "History", "3.50", "2023-09-01", "Yes"],
      ]);
    });

    it("ships a valid bundled directory list", async () => {
      const bundled = await loadDirectorySampleStudents();

      expect(bundled.some((student) => student.hasWaiver && !student.fileMissing)).toBe(true);
      expect(bundled.some((student) => student.fileMissing)).toBe(true);
    });

    it("produces files that the directory import attaches", async () => {
      const generated = await generateDirectorySamples(dir, { students: directoryStudents, date });
      expect(generated.waiverFiles).toEqual(["S1_Zimmer-Ann-20240105000000.pdf"]);

      const db = new Database(":memory:");
      try {
        const directory = new StudentDirectory(new StudentRepository(db), silentLogger);
        const summary = await directory.importStudents(
          await fs.readFile(generated.csvPath, "utf8"),
          generated.waiverDir
        );

        expect(summary).toEqual({ imported: 3, flagged: 2, attached: 1, missingFiles: ["S2"] });
        expect(directory.listWithWaivers()[0]?.gpa).toBe(3.5);
      } finally {
        db.close();
      }
    });
  });
});
