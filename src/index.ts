export * from "./domain/errors.js";
export type * from "./domain/merge.js";
export type * from "./domain/student.js";
export { detectRosterFormat, extractIdentifiers, toIdentifier, DEFAULT_ID_COLUMN } from "./services/rosterExtractor.js";
export type { ExtractOptions } from "./services/rosterExtractor.js";
export { matchDocuments, validateFilenames, DEFAULT_FILENAME_PATTERN } from "./services/documentMatcher.js";
export { assembleDocuments } from "./services/documentAssembler.js";
export type { AssembleOptions, AssemblyItem } from "./services/documentAssembler.js";
export { generateStatusReport, DEFAULT_REPORT_TITLE } from "./services/statusReporter.js";
export { planMerge, executeMerge, resolveMergePolicy, DEFAULT_MERGE_POLICY } from "./services/mergePipeline.js";
export { loadDocumentFolder } from "./services/documentFolder.js";
export { writeMergeOutputs, defaultReportPath } from "./services/outputWriter.js";
export { StudentRepository } from "./repositories/studentRepository.js";
export { StudentDirectory } from "./services/studentDirectory.js";
export { generateSamples } from "./services/sampleGenerator.js";
