import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

/**
 * Open (creating if needed) the student directory database.
 * ":memory:" opens a throwaway in-process database.
 */
export const openDatabase = (dbPath: string): Database.Database => {
  if (dbPath === ":memory:") {
    return new Database(dbPath);
  }

  const absolutePath = path.resolve(process.cwd(), dbPath);
  ensureDir(absolutePath);
  const db = new Database(absolutePath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("synchronous = NORMAL");

  return db;
};
