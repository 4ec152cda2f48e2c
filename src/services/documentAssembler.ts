/**
 * Document Assembler
 *
 * Concatenates matched waiver PDFs into one document.
 *
 * Key behaviors:
 * - Pages are appended in item order, each item's pages in their own order
 * - A file that fails to decode is skipped and reported; the batch continues
 * - No output at all when nothing decoded (never an empty PDF)
 * - Output carries no creation/modification timestamps, so the same inputs
 *   always serialize to the same bytes
 */

import { PDFDocument } from "pdf-lib";
import type { Logger } from "pino";
import { ItemProcessingError, MalformedDocumentError, WaiverMergeError } from "../domain/errors.js";
import type { AssemblyResult, MatchedDocument } from "../domain/merge.js";

export type AssemblyItem = Pick<MatchedDocument, "name" | "bytes">;

export interface AssembleOptions {
  logger?: Logger;
  /** Already-encoded PDFs placed before the items (e.g. a cover page) */
  leadingPages?: Uint8Array[];
  /** Document title written to the output's info dictionary */
  title?: string;
}

// pdf-lib's error classes are compiled to ES5 and fail instanceof; match on message instead
const ENCRYPTED_MESSAGE = /is encrypted/;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function decode(item: AssemblyItem): Promise<PDFDocument> {
  try {
    const doc = await PDFDocument.load(item.bytes, { updateMetadata: false });
    // Loading is lenient; a missing catalog or page tree only shows up when pages are read
    doc.getPageIndices();
    return doc;
  } catch (err) {
    if (ENCRYPTED_MESSAGE.test(errorMessage(err))) {
      throw new ItemProcessingError(item.name, "document is password-protected", { cause: err });
    }
    throw new MalformedDocumentError(item.name, { cause: err });
  }
}

async function appendAllPages(output: PDFDocument, source: PDFDocument): Promise<number> {
  const pages = await output.copyPages(source, source.getPageIndices());
  for (const page of pages) {
    output.addPage(page);
  }
  return pages.length;
}

async function appendItem(output: PDFDocument, item: AssemblyItem): Promise<number> {
  const source = await decode(item);
  try {
    return await appendAllPages(output, source);
  } catch (err) {
    throw new ItemProcessingError(item.name, errorMessage(err), { cause: err });
  }
}

/**
 * Merge every item's pages into one PDF.
 *
 * Never rejects for a bad item: each failure becomes one entry in `errors`
 * ("{name}: invalid or corrupted document" or "{name}: {message}").
 */
export async function assembleDocuments(
  items: readonly AssemblyItem[],
  options: AssembleOptions = {}
): Promise<AssemblyResult> {
  const { logger } = options;
  const output = await PDFDocument.create({ updateMetadata: false });
  if (options.title) {
    output.setTitle(options.title);
  }

  for (const leading of options.leadingPages ?? []) {
    await appendAllPages(output, await PDFDocument.load(leading, { updateMetadata: false }));
  }

  const errors: string[] = [];
  let mergedCount = 0;

  for (const item of items) {
    try {
      const pages = await appendItem(output, item);
      mergedCount++;
      logger?.info({ document: item.name, pages }, "Appended document");
    } catch (err) {
      if (!(err instanceof WaiverMergeError)) throw err;
      errors.push(err.message);
      logger?.warn({ document: item.name, code: err.code, err: err.cause }, "Skipped document");
    }
  }

  if (mergedCount === 0) {
    logger?.warn({ items: items.length, failed: errors.length }, "No documents could be merged");
    return { output: null, errors, mergedCount, pageCount: 0 };
  }

  const bytes = await output.save({ addDefaultPage: false });
  const pageCount = output.getPageCount();
  logger?.info({ mergedCount, pageCount, skipped: errors.length }, "Assembled merged document");

  return { output: bytes, errors, mergedCount, pageCount };
}
