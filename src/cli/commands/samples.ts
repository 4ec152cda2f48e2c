import path from "node:path";
import type { AppContext } from "../../app/context.js";
import {
  generateDirectorySamples,
  generateSamples,
  type SampleRosterFormat,
} from "../../services/sampleGenerator.js";
import { printToStdout, type Print } from "../utils/output.js";

export interface SamplesCommandOptions {
  format?: SampleRosterFormat;
  banner?: boolean;
}

/** Merge samples in <out_dir>, student directory samples in <out_dir>/directory. */
export async function runSamples(
  outDir: string,
  options: SamplesCommandOptions,
  ctx: AppContext,
  print: Print = printToStdout
): Promise<number> {
  const generated = await generateSamples(outDir, { format: options.format, banner: options.banner });
  const directory = await generateDirectorySamples(path.join(outDir, "directory"));
  ctx.logger.info(
    { outDir, waivers: generated.waiverFiles.length, studentFiles: directory.waiverFiles.length },
    "Sample data generated"
  );

  print(`Roster:        ${generated.rosterPath}`);
  print(`Waivers:       ${generated.waiverDir} (${generated.waiverFiles.length} files)`);
  print(`Student CSV:   ${directory.csvPath}`);
  print(`Student files: ${directory.waiverDir} (${directory.waiverFiles.length} files)`);
  print("");
  print("Try it:");
  print(`  waiver-merger merge "${generated.waiverDir}" "${generated.rosterPath}" merged.pdf`);
  print(`  waiver-merger students import "${directory.csvPath}" --waivers "${directory.waiverDir}"`);
  print("  waiver-merger students packet packet.pdf");
  return 0;
}
