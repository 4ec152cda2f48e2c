export interface StudentRecord {
  studentId: string;
  firstName: string;
  lastName: string;
  email: string | null;
  major: string | null;
  gpa: number | null;
  enrollmentDate: string | null;
  /** Roster says a waiver was signed */
  hasWaiver: boolean;
  /** Waiver file found on disk for this student, if any */
  waiverPath: string | null;
}

export interface StudentCounts {
  total: number;
  flagged: number;
  attached: number;
  /** Flagged as signed but no file attached */
  pending: number;
}
