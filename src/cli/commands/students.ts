import fs from "node:fs/promises";
import type { AppContext } from "../../app/context.js";
import { openDatabase } from "../../db/connection.js";
import { isWaiverMergeError } from "../../domain/errors.js";
import { StudentRepository } from "../../repositories/studentRepository.js";
import { StudentDirectory } from "../../services/studentDirectory.js";
import { pathExists, writeMergeOutputs } from "../../services/outputWriter.js";
import { printToStdout, type Print } from "../utils/output.js";

export interface StudentsCommandOptions {
  db?: string;
}

async function withDirectory(
  options: StudentsCommandOptions,
  ctx: AppContext,
  print: Print,
  run: (directory: StudentDirectory) => Promise<number>
): Promise<number> {
  const db = openDatabase(options.db ?? ctx.config.studentsDbPath);
  try {
    return await run(new StudentDirectory(new StudentRepository(db), ctx.logger));
  } catch (err) {
    if (!isWaiverMergeError(err)) throw err;
    ctx.logger.error({ code: err.code, err }, "Student directory command failed");
    print(`ERROR: ${err.message}`);
    return 1;
  } finally {
    db.close();
  }
}

export async function runStudentsImport(
  csvPath: string,
  options: StudentsCommandOptions & { waivers: string },
  ctx: AppContext,
  print: Print = printToStdout
): Promise<number> {
  return withDirectory(options, ctx, print, async (directory) => {
    const csvText = await fs.readFile(csvPath, "utf8");
    const summary = await directory.importStudents(csvText, options.waivers);

    print(`Total students imported: ${summary.imported}`);
    print(`Students marked as having a waiver: ${summary.flagged}`);
    print(`Students with matched waiver files: ${summary.attached}`);
    if (summary.missingFiles.length > 0) {
      print(`Students missing waiver files: ${summary.missingFiles.length} (${summary.missingFiles.join(", ")})`);
    }
    return 0;
  });
}

export async function runStudentsList(
  options: StudentsCommandOptions,
  ctx: AppContext,
  print: Print = printToStdout
): Promise<number> {
  return withDirectory(options, ctx, print, async (directory) => {
    const students = directory.listWithWaivers();
    const counts = directory.counts();
    for (const student of students) {
      print(`${student.studentId}: ${student.firstName} ${student.lastName}`);
      print(`    -> ${student.waiverPath ?? ""}`);
    }
    if (students.length === 0) {
      print("No students with waiver files.");
    }
    print(`${counts.attached} of ${counts.total} students have a waiver on file (${counts.pending} pending).`);
    return 0;
  });
}

export async function runStudentsPacket(
  outputPath: string,
  options: StudentsCommandOptions & { overwrite?: boolean },
  ctx: AppContext,
  print: Print = printToStdout
): Promise<number> {
  return withDirectory(options, ctx, print, async (directory) => {
    if (!options.overwrite && (await pathExists(outputPath))) {
      print(`${outputPath} already exists; use --overwrite to replace it.`);
      return 1;
    }

    const packet = await directory.buildPacket();
    const written = await writeMergeOutputs(
      { assembly: packet.assembly, report: "" },
      { outputPath, overwriteExisting: options.overwrite ?? false }
    );

    for (const error of packet.assembly.errors) {
      print(`WARNING: skipped ${error}`);
    }
    if (written.skipped === "exists") {
      print(`${outputPath} already exists; use --overwrite to replace it.`);
      return 1;
    }
    if (written.skipped === "no-output") {
      print("Nothing to merge: no waiver could be read.");
      return 1;
    }

    print(`Total students: ${packet.counts.total}`);
    print(`Students with waivers: ${packet.students.length}`);
    print(`Students pending: ${packet.counts.total - packet.students.length}`);
    print(`Packet written to ${outputPath} (${packet.assembly.pageCount} pages)`);
    return 0;
  });
}
