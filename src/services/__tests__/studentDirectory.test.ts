import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { StudentDirectoryError } from "../../domain/errors.js";
import { StudentRepository } from "../../repositories/studentRepository.js";
import { coverLine, formatLongDate } from "../coverPage.js";
import { parseStudentCsv, StudentDirectory, waiverFilePrefix } from "../studentDirectory.js";
import { makePdf, pageWidths, silentLogger } from "./helpers.js";

const CSV_HEADER = "student_id,first_name,last_name,email,major,gpa,enrollment_date,has_waiver";

describe("studentDirectory", () => {
  let dir: string;
  let db: Database.Database;
  let directory: StudentDirectory;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "waiver-students-"));
    db = new Database(":memory:");
    directory = new StudentDirectory(new StudentRepository(db), silentLogger);
  });

  afterEach(async () => {
    db.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("parseStudentCsv", () => {
    it("normalizes flags, blanks and numbers", () => {
      const rows = parseStudentCsv(
        [CSV_HEADER, "STU001,Maya,Alvarez,maya@example.edu,Biology,3.7,2023-08-21,Yes", "STU002,Jordan,Brooks,,,,,no"].join("\n")
      );

      expect(rows).toEqual([
        {
          student_id: "STU001",
          first_name: "Maya",
          last_name: "Alvarez",
          email: "maya@example.edu",
          major: "Biology",
          gpa: 3.7,
          enrollment_date: "2023-08-21",
          has_waiver: true,
        },
        {
          student_id: "STU002",
          first_name: "Jordan",
          last_name: "Brooks",
          email: null,
          major: null,
          gpa: null,
          enrollment_date: null,
          has_waiver: false,
        },
      ]);
    });

    it("names the line of an invalid row", () => {
      expect(() => parseStudentCsv([CSV_HEADER, "STU001,Maya,Alvarez,,,high,,y"].join("\n"))).toThrow(
        "Student CSV line 2: gpa: 'high' is not a number"
      );
      expect(() => parseStudentCsv([CSV_HEADER, ",Maya,Alvarez,,,,,y"].join("\n"))).toThrow(StudentDirectoryError);
    });

    it("rejects a repeated student_id, naming both lines", () => {
      const csv = [CSV_HEADER, "STU001,Maya,Alvarez,,,,,y", "STU002,Jordan,Brooks,,,,,n", "STU001,Mia,Alvarez,,,,,n"].join("\n");

      expect(() => parseStudentCsv(csv)).toThrow("Student CSV line 4: student_id STU001 already appears on line 2");
    });
  });

  it("builds the waiver file prefix from ID and names", () => {
    expect(waiverFilePrefix({ studentId: "STU001", firstName: "Maya", lastName: "Alvarez" })).toBe("STU001_Alvarez-Maya-");
  });

  it("imports students and attaches waiver files of flagged students", async () => {
    const waivers = path.join(dir, "waivers");
    await fs.mkdir(waivers);
    await fs.writeFile(path.join(waivers, "STU001_Alvarez-Maya-20240105.pdf"), await makePdf([[201, 400]]));
    await fs.writeFile(path.join(waivers, "STU002_Brooks-Jordan-20240105.pdf"), await makePdf([[202, 400]]));

    const summary = await directory.importStudents(
      [
        CSV_HEADER,
        "STU001,Maya,Alvarez,,Biology,3.1,,yes",
        "STU002,Jordan,Brooks,,History,2.9,,no",
        "STU003,Priya,Chandran,,Physics,3.9,,1",
      ].join("\n"),
      waivers
    );

    expect(summary).toEqual({ imported: 3, flagged: 2, attached: 1, missingFiles: ["STU003"] });
    expect(directory.listWithWaivers().map((s) => s.waiverPath)).toEqual([
      path.join(waivers, "STU001_Alvarez-Maya-20240105.pdf"),
    ]);
  });

  it("fails a repeated student_id without touching the stored directory", async () => {
    const waivers = path.join(dir, "waivers");
    await fs.mkdir(waivers);
    await directory.importStudents([CSV_HEADER, "S1,Ann,Zimmer,,,,,n"].join("\n"), waivers);

    await expect(
      directory.importStudents([CSV_HEADER, "S2,Ben,Abbott,,,,,n", "S2,Ben,Abbott,,,,,n"].join("\n"), waivers)
    ).rejects.toThrow(StudentDirectoryError);
    expect(directory.counts().total).toBe(1);
  });

  it("fails the import when the waiver folder is missing", async () => {
    await expect(directory.importStudents(CSV_HEADER, path.join(dir, "nope"))).rejects.toThrow(StudentDirectoryError);
  });

  it("builds a packet: cover first, then waivers by last name", async () => {
    const waivers = path.join(dir, "waivers");
    await fs.mkdir(waivers);
    await fs.writeFile(path.join(waivers, "S1_Zimmer-Ann-1.pdf"), await makePdf([[301, 400]]));
    await fs.writeFile(path.join(waivers, "S2_Abbott-Ben-1.pdf"), await makePdf([[302, 400], [303, 400]]));
    await directory.importStudents(
      [CSV_HEADER, "S1,Ann,Zimmer,,,,,y", "S2,Ben,Abbott,,,,,y", "S3,Cy,Moss,,,,,n"].join("\n"),
      waivers
    );

    const packet = await directory.buildPacket({ now: () => new Date(2024, 0, 5, 15, 4) });

    expect(packet.students.map((s) => s.studentId)).toEqual(["S2", "S1"]);
    expect(packet.counts.total).toBe(3);
    expect(packet.assembly.mergedCount).toBe(2);
    expect(packet.assembly.output).not.toBeNull();
    if (packet.assembly.output) {
      const widths = await pageWidths(packet.assembly.output);
      // letter-size cover, then the waivers
      expect(widths).toEqual([612, 302, 303, 301]);
    }
  });

  it("refuses to build a packet when an attached file is gone", async () => {
    const waivers = path.join(dir, "waivers");
    await fs.mkdir(waivers);
    const file = path.join(waivers, "S1_Zimmer-Ann-1.pdf");
    await fs.writeFile(file, await makePdf([[301, 400]]));
    await directory.importStudents([CSV_HEADER, "S1,Ann,Zimmer,,,,,y"].join("\n"), waivers);
    await fs.rm(file);

    await expect(directory.buildPacket()).rejects.toThrow(`1 waiver file(s) are missing: ${file}`);
  });

  it("refuses to build an empty packet", async () => {
    await expect(directory.buildPacket()).rejects.toThrow("No students with waiver files found in the directory");
  });

  describe("cover page text", () => {
    it("formats the generation time", () => {
      expect(formatLongDate(new Date(2024, 0, 5, 15, 4))).toBe("January 05, 2024 at 03:04 PM");
      expect(formatLongDate(new Date(2024, 11, 31, 0, 30))).toBe("December 31, 2024 at 12:30 AM");
    });

    it("numbers each student line", () => {
      const line = coverLine(
        {
          studentId: "S1",
          firstName: "Ann",
          lastName: "Zimmer",
          email: null,
          major: "History",
          gpa: null,
          enrollmentDate: null,
          hasWaiver: true,
          waiverPath: "x.pdf",
        },
        0
      );
      expect(line).toBe("1. Ann Zimmer (ID: S1) - History");
    });
  });
});
