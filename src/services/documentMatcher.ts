/**
 * Document Matcher
 *
 * Pairs roster IDs with uploaded files by filename prefix. A file belongs to
 * an ID when its name starts with exactly "{id}_", so "12" never claims
 * "123_x.pdf".
 *
 * Every ID lands in exactly one bucket:
 * - matched: one file
 * - missing: no file
 * - duplicates: two or more files (excluded from the merge)
 *
 * Files claimed by no ID are returned as orphans.
 */

import type {
  CandidatePool,
  DuplicateConflict,
  IdentifierSet,
  MatchedDocument,
  MatchResult,
} from "../domain/merge.js";

/** Strict naming convention: "{id}_{Client name}_KCS Records Consent_{anything}.pdf" */
export const DEFAULT_FILENAME_PATTERN = "^[0-9]+_[A-Za-z ]+_KCS Records Consent_.*\\.pdf$";

export function prefixFor(id: string): string {
  return `${id}_`;
}

export function matchDocuments(candidates: CandidatePool, identifiers: IdentifierSet): MatchResult {
  const matched: MatchedDocument[] = [];
  const missing: string[] = [];
  const duplicates: DuplicateConflict[] = [];
  const claimed = new Set<string>();

  for (const id of identifiers) {
    const prefix = prefixFor(id);
    const hits = [...candidates].filter(([name]) => name.startsWith(prefix));

    if (hits.length === 0) {
      missing.push(id);
      continue;
    }

    for (const [name] of hits) claimed.add(name);

    if (hits.length > 1) {
      duplicates.push({ id, names: hits.map(([name]) => name) });
    } else {
      const [name, bytes] = hits[0];
      matched.push({ id, name, bytes });
    }
  }

  const orphans = [...candidates.keys()].filter((name) => !claimed.has(name));

  return { matched, missing, duplicates, orphans };
}

export interface FilenameCheck {
  valid: string[];
  invalid: string[];
}

/** Split file names by whether they follow the expected naming pattern. */
export function validateFilenames(names: Iterable<string>, pattern: RegExp): FilenameCheck {
  const valid: string[] = [];
  const invalid: string[] = [];
  for (const name of names) {
    // test() on a global/sticky regex advances lastIndex between calls
    pattern.lastIndex = 0;
    (pattern.test(name) ? valid : invalid).push(name);
  }
  return { valid, invalid };
}
