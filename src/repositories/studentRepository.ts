import Database from "better-sqlite3";
import type { StudentCounts, StudentRecord } from "../domain/student.js";

// ============================================================================
// Row shape
// ============================================================================

interface StudentRow {
  student_id: string;
  first_name: string;
  last_name: string;
  email: string | null;
  major: string | null;
  gpa: number | null;
  enrollment_date: string | null;
  has_waiver: number;
  waiver_path: string | null;
  created_at: number;
  updated_at: number;
}

interface CountsRow {
  total: number;
  flagged: number | null;
  attached: number | null;
  pending: number | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS students (
    student_id TEXT PRIMARY KEY,
    first_name TEXT NOT NULL,
    last_name TEXT NOT NULL,
    email TEXT,
    major TEXT,
    gpa REAL,
    enrollment_date TEXT,
    has_waiver INTEGER NOT NULL DEFAULT 0,
    waiver_path TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_students_name ON students (last_name, first_name);
`;

const toRecord = (row: StudentRow): StudentRecord => ({
  studentId: row.student_id,
  firstName: row.first_name,
  lastName: row.last_name,
  email: row.email,
  major: row.major,
  gpa: row.gpa,
  enrollmentDate: row.enrollment_date,
  hasWaiver: row.has_waiver === 1,
  waiverPath: row.waiver_path,
});

// ============================================================================
// Repository
// ============================================================================

export class StudentRepository {
  constructor(private readonly db: Database.Database, private readonly now: () => number = Date.now) {
    this.db.exec(SCHEMA);
  }

  /** Replace the whole directory with `students` in one transaction. */
  replaceAll(students: readonly StudentRecord[]): number {
    const timestamp = this.now();
    const insert = this.db.prepare(
      `INSERT INTO students (
        student_id, first_name, last_name, email, major, gpa,
        enrollment_date, has_waiver, waiver_path, created_at, updated_at
      ) VALUES (
        @student_id, @first_name, @last_name, @email, @major, @gpa,
        @enrollment_date, @has_waiver, @waiver_path, @created_at, @updated_at
      )`
    );

    const replace = this.db.transaction((rows: readonly StudentRecord[]) => {
      this.db.prepare("DELETE FROM students").run();
      for (const student of rows) {
        insert.run({
          student_id: student.studentId,
          first_name: student.firstName,
          last_name: student.lastName,
          email: student.email,
          major: student.major,
          gpa: student.gpa,
          enrollment_date: student.enrollmentDate,
          has_waiver: student.hasWaiver ? 1 : 0,
          waiver_path: student.waiverPath,
          created_at: timestamp,
          updated_at: timestamp,
        });
      }
      return rows.length;
    });

    return replace(students);
  }

  /** Students flagged as signed with a waiver file attached, by last then first name. */
  listWithWaivers(): StudentRecord[] {
    return this.db
      .prepare<[], StudentRow>(
        `SELECT * FROM students
         WHERE has_waiver = 1 AND waiver_path IS NOT NULL
         ORDER BY last_name, first_name`
      )
      .all()
      .map(toRecord);
  }

  counts(): StudentCounts {
    const row = this.db
      .prepare<[], CountsRow>(
        `SELECT
           COUNT(*) AS total,
           SUM(has_waiver) AS flagged,
           SUM(CASE WHEN waiver_path IS NOT NULL THEN 1 ELSE 0 END) AS attached,
           SUM(CASE WHEN has_waiver = 1 AND waiver_path IS NULL THEN 1 ELSE 0 END) AS pending
         FROM students`
      )
      .get();

    return {
      total: row?.total ?? 0,
      flagged: row?.flagged ?? 0,
      attached: row?.attached ?? 0,
      pending: row?.pending ?? 0,
    };
  }
}
