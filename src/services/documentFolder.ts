/**
 * Document Folder
 *
 * Reads a folder of uploaded waivers into an in-memory candidate pool. All
 * bytes are loaded up front so nothing holds a file handle while planning or
 * assembling.
 *
 * Pool keys are bare file names (the matcher keys on the "{id}_" prefix), in
 * name order. Dotfiles such as .DS_Store are skipped.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { DocumentFolderError } from "../domain/errors.js";

export interface LoadFolderOptions {
  /** Also read files in subfolders (default false) */
  recursive?: boolean;
}

async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const fullPath = path.join(dir, entry.name);
    if (entry.isFile()) {
      files.push(fullPath);
    } else if (recursive && entry.isDirectory()) {
      files.push(...(await listFiles(fullPath, recursive)));
    }
  }

  return files;
}

export async function loadDocumentFolder(
  dir: string,
  options: LoadFolderOptions = {}
): Promise<Map<string, Uint8Array>> {
  const stat = await fs.stat(dir).catch((err: unknown) => {
    throw new DocumentFolderError(`Document folder not found: ${dir}`, { cause: err });
  });
  if (!stat.isDirectory()) {
    throw new DocumentFolderError(`Not a folder: ${dir}`);
  }

  const files = await listFiles(dir, options.recursive ?? false);
  const byName = new Map<string, string>();
  for (const file of files) {
    const name = path.basename(file);
    const existing = byName.get(name);
    if (existing !== undefined) {
      throw new DocumentFolderError(`Two files share the name ${name}: ${existing} and ${file}`);
    }
    byName.set(name, file);
  }

  const pool = new Map<string, Uint8Array>();
  for (const name of [...byName.keys()].sort()) {
    const file = byName.get(name);
    if (file === undefined) continue;
    pool.set(name, new Uint8Array(await fs.readFile(file)));
  }
  return pool;
}
