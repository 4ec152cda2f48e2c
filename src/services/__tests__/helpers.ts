import { PDFDocument } from "pdf-lib";
import pino from "pino";
import * as XLSX from "xlsx";

export const silentLogger = pino({ level: "silent" });

export const utf8 = (text: string): Uint8Array => new TextEncoder().encode(text);

/** One page per entry, each with its own [width, height] so order can be checked. */
export async function makePdf(pageSizes: [number, number][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  for (const size of pageSizes) {
    doc.addPage(size);
  }
  return doc.save();
}

/** A one-page PDF whose trailer carries an /Encrypt entry, as a password-protected file does. */
export async function makeEncryptedPdf(): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  doc.addPage([100, 100]);
  doc.context.trailerInfo.Encrypt = doc.context.obj({ Filter: "Standard", V: 2, R: 3 });
  return doc.save({ useObjectStreams: false });
}

export async function pageWidths(bytes: Uint8Array): Promise<number[]> {
  const doc = await PDFDocument.load(bytes);
  return doc.getPages().map((page) => page.getWidth());
}

export function makeXlsx(rows: unknown[][], sheetName = "Sheet1"): Uint8Array {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), sheetName);
  const bytes: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return new Uint8Array(bytes);
}
