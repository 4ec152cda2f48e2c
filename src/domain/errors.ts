export type WaiverMergeErrorCode =
  | "SCHEMA"
  | "DUPLICATE_IDENTIFIER"
  | "PARSE"
  | "FILENAME_FORMAT"
  | "DOCUMENT_FOLDER"
  | "MALFORMED_DOCUMENT"
  | "ITEM_PROCESSING"
  | "STUDENT_DIRECTORY";

export class WaiverMergeError extends Error {
  constructor(
    message: string,
    public readonly code: WaiverMergeErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "WaiverMergeError";
  }
}

/** The identifier column could not be located, even after header fallback. */
export class SchemaError extends WaiverMergeError {
  constructor(public readonly columnName: string, source: string) {
    super(
      `Could not find '${columnName}' column in ${source}. ` +
        `Please make sure the column is named exactly '${columnName}'.`,
      "SCHEMA"
    );
    this.name = "SchemaError";
  }
}

export class DuplicateIdentifierError extends WaiverMergeError {
  constructor(public readonly duplicates: string[]) {
    super(`Duplicate student IDs found in roster: ${duplicates.join(", ")}`, "DUPLICATE_IDENTIFIER");
    this.name = "DuplicateIdentifierError";
  }
}

export class ParseError extends WaiverMergeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PARSE", options);
    this.name = "ParseError";
  }
}

export class FilenameFormatError extends WaiverMergeError {
  constructor(public readonly invalid: string[], public readonly pattern: RegExp) {
    super(
      `${invalid.length} file(s) do not match the expected format ${pattern.source}: ${invalid.join(", ")}`,
      "FILENAME_FORMAT"
    );
    this.name = "FilenameFormatError";
  }
}

export class DocumentFolderError extends WaiverMergeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "DOCUMENT_FOLDER", options);
    this.name = "DocumentFolderError";
  }
}

export class MalformedDocumentError extends WaiverMergeError {
  constructor(public readonly documentName: string, options?: ErrorOptions) {
    super(`${documentName}: invalid or corrupted document`, "MALFORMED_DOCUMENT", options);
    this.name = "MalformedDocumentError";
  }
}

export class ItemProcessingError extends WaiverMergeError {
  constructor(public readonly documentName: string, detail: string, options?: ErrorOptions) {
    super(`${documentName}: ${detail}`, "ITEM_PROCESSING", options);
    this.name = "ItemProcessingError";
  }
}

/** Student directory import or packet could not proceed (bad CSV row, waiver file gone). */
export class StudentDirectoryError extends WaiverMergeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "STUDENT_DIRECTORY", options);
    this.name = "StudentDirectoryError";
  }
}

export function isWaiverMergeError(error: unknown): error is WaiverMergeError {
  return error instanceof WaiverMergeError;
}
