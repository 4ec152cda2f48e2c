/**
 * Cover page for the student directory packet, drawn with pdfkit.
 */

import PDFDocument from "pdfkit";
import type { StudentRecord } from "../domain/student.js";

export interface CoverPageInput {
  students: readonly StudentRecord[];
  totalStudents: number;
  generatedAt: Date;
  title?: string;
}

export const PACKET_TITLE = "Student FERPA Records";

const INCH = 72;
const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

/** "October 19, 2026 at 03:04 PM" */
export function formatLongDate(date: Date): string {
  const hours = date.getHours() % 12 || 12;
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const meridiem = date.getHours() < 12 ? "AM" : "PM";
  return (
    `${MONTHS[date.getMonth()]} ${String(date.getDate()).padStart(2, "0")}, ${date.getFullYear()} ` +
    `at ${String(hours).padStart(2, "0")}:${minutes} ${meridiem}`
  );
}

/** One line per student on the cover list. */
export function coverLine(student: StudentRecord, index: number): string {
  const major = student.major ? ` - ${student.major}` : "";
  return `${index + 1}. ${student.firstName} ${student.lastName} (ID: ${student.studentId})${major}`;
}

export async function renderCoverPage(input: CoverPageInput): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: "LETTER",
      margins: { top: INCH, bottom: INCH, left: INCH, right: INCH },
      info: { Title: input.title ?? PACKET_TITLE },
    });

    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    doc.font("Helvetica-Bold").fontSize(28).text(input.title ?? PACKET_TITLE, { align: "center" });
    doc.fontSize(18).text("Combined Report", { align: "center" });
    doc.moveDown(0.5);

    const ruleY = doc.y;
    doc.lineWidth(2).moveTo(INCH, ruleY).lineTo(doc.page.width - INCH, ruleY).stroke();
    doc.moveDown(1.5);

    const pending = input.totalStudents - input.students.length;
    doc.font("Helvetica").fontSize(12);
    doc.text(`Total Students in Database: ${input.totalStudents}`);
    doc.text(`Students with FERPA Files: ${input.students.length}`);
    if (pending > 0) {
      doc.text(`Students Pending FERPA: ${pending}`);
    }
    doc.text(`Generated: ${formatLongDate(input.generatedAt)}`);
    doc.moveDown();

    doc.font("Helvetica-Bold").fontSize(14).text("Students with FERPA Files (Alphabetically Sorted):");
    doc.moveDown(0.5);

    // pdfkit continues onto a new page when the list overflows
    doc.font("Helvetica").fontSize(11);
    input.students.forEach((student, index) => {
      doc.text(coverLine(student, index), { indent: INCH / 2 });
    });

    doc.end();
  });
}
