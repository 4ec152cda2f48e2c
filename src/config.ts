import { config as loadEnv } from "dotenv";
import { z } from "zod";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_FILENAME_PATTERN } from "./services/documentMatcher.js";

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "") return undefined;
      if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
      if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

// Load .env from the package root, regardless of process.cwd()
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envPath = path.resolve(__dirname, "../.env");
const envResult = loadEnv({ path: envPath });

// A missing .env is normal; anything else is worth a warning
const envLoadError = envResult.error;
if (envLoadError && !("code" in envLoadError && envLoadError.code === "ENOENT")) {
  console.warn(`[config] Failed to load .env from ${envPath}:`, envLoadError.message);
}

const envSchema = z.object({
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_PRETTY: boolFromEnv(false),
  ROSTER_COLUMN: z.string().trim().min(1).default("EYFID"),
  HEADER_FALLBACK_ROWS: z.coerce.number().int().min(0).max(10).default(1),
  FILENAME_PATTERN: z
    .string()
    .default(DEFAULT_FILENAME_PATTERN)
    .refine((value) => {
      try {
        new RegExp(value);
        return true;
      } catch {
        return false;
      }
    }, "FILENAME_PATTERN must be a valid regular expression"),
  STUDENTS_DB: z.string().default("data/students.db"),
  REPORT_TITLE: z.string().default("FERPA Waiver Status Report"),
});

export type RuntimeConfig = ReturnType<typeof loadRuntimeConfig>;

export function loadRuntimeConfig(env: NodeJS.ProcessEnv) {
  const parsed = envSchema.parse(env);

  return {
    logLevel: parsed.LOG_LEVEL,
    logPretty: parsed.LOG_PRETTY,
    rosterColumn: parsed.ROSTER_COLUMN,
    headerFallbackRows: parsed.HEADER_FALLBACK_ROWS,
    filenamePattern: parsed.FILENAME_PATTERN,
    studentsDbPath: parsed.STUDENTS_DB,
    reportTitle: parsed.REPORT_TITLE,
  };
}

export const runtimeConfig = loadRuntimeConfig(process.env);
