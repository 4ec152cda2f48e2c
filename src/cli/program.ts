import { Command, InvalidArgumentError, Option } from "commander";
import type { AppContext } from "../app/context.js";
import { runMerge, type MergeCommandOptions } from "./commands/merge.js";
import { runSamples, type SamplesCommandOptions } from "./commands/samples.js";
import {
  runStudentsImport,
  runStudentsList,
  runStudentsPacket,
  type StudentsCommandOptions,
} from "./commands/students.js";

const parseRowCount = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 10) {
    throw new InvalidArgumentError("Expected a whole number from 0 to 10.");
  }
  return parsed;
};

/**
 * Build the waiver-merger command tree. Actions set `process.exitCode`
 * rather than exiting, so pending log writes still flush.
 */
export function buildProgram(ctx: AppContext): Command {
  const program = new Command();
  const finish = (code: number) => {
    process.exitCode = code;
  };

  program
    .name("waiver-merger")
    .description("Match signed consent waivers to a student roster and merge them into one PDF")
    .version("1.0.0");

  program
    .command("merge", { isDefault: true })
    .description("Merge the waiver of every roster ID into one PDF and write a status report")
    .argument("<document_folder>", "Folder holding the waiver PDFs")
    .argument("<identifier_source>", "Roster file (.xlsx, .xls, .csv or .txt)")
    .argument("<output_path>", "Merged PDF to write")
    .option("-c, --column <name>", "Roster column holding the IDs")
    .option("--header-fallback-rows <n>", "Rows below the first to try as the header", parseRowCount)
    .option("-r, --report <path>", "Status report path (default: output path with .txt)")
    .option("--no-strict-filenames", "Do not require every file to follow the naming pattern")
    .option("-p, --pattern <regex>", "Naming pattern every file must match")
    .option("--recursive", "Also read waivers in subfolders")
    .option("--overwrite", "Replace existing output files")
    .option("-y, --yes", "Skip the confirmation prompt")
    .action(async (documentFolder: string, identifierSource: string, outputPath: string, options: MergeCommandOptions) => {
      finish(await runMerge(documentFolder, identifierSource, outputPath, options, ctx));
    });

  program
    .command("samples")
    .description("Write a sample roster and waiver PDFs to try the merge with")
    .argument("<out_dir>", "Folder to write into")
    .addOption(new Option("-f, --format <format>", "Roster file format").choices(["xlsx", "csv"]).default("xlsx"))
    .option("--banner", "Put a title row above the roster header")
    .action(async (outDir: string, options: SamplesCommandOptions) => {
      finish(await runSamples(outDir, options, ctx));
    });

  const students = program
    .command("students")
    .description("Student directory backed by SQLite")
    .option("--db <path>", "Database file", ctx.config.studentsDbPath);

  students
    .command("import")
    .description("Replace the directory with a student CSV and attach waiver files")
    .argument("<csv>", "Student CSV")
    .requiredOption("-w, --waivers <dir>", "Folder holding {id}_{last}-{first}-*.pdf waivers")
    .action(async (csvPath: string, options: { waivers: string }) => {
      const { db } = students.opts<StudentsCommandOptions>();
      finish(await runStudentsImport(csvPath, { ...options, db }, ctx));
    });

  students
    .command("list")
    .description("List students with a waiver on file, by last name")
    .action(async () => {
      finish(await runStudentsList(students.opts<StudentsCommandOptions>(), ctx));
    });

  students
    .command("packet")
    .description("Write a cover page plus every waiver on file as one PDF")
    .argument("<output>", "Packet PDF to write")
    .option("--overwrite", "Replace an existing packet")
    .action(async (outputPath: string, options: { overwrite?: boolean }) => {
      const { db } = students.opts<StudentsCommandOptions>();
      finish(await runStudentsPacket(outputPath, { ...options, db }, ctx));
    });

  return program;
}
