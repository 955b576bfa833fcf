/**
 * Custom-name file: a JSON object mapping a player's own label to the
 * canonical name of a system, e.g. `{ "Home": "Sol" }`.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";

import { DataLoadError } from "../errors.js";

/** Immutable alias -> canonical name table. Keys are case-sensitive. */
export type AliasTable = ReadonlyMap<string, string>;

/** Written when a missing alias file is created */
export const DEFAULT_ALIASES: Readonly<Record<string, string>> = {
  Sol: "Jackson's Lighthouse",
  Colonia: "Magellan",
};

export interface AliasFileOptions {
  /** Write DEFAULT_ALIASES to `path` first if the file does not exist */
  createIfMissing?: boolean;
}

/**
 * Build an alias table from a parsed JSON document.
 * Entries whose value is not a string are skipped.
 *
 * @throws DataLoadError if the document is not a JSON object
 */
export function parseAliasDocument(raw: unknown, source?: string): AliasTable {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new DataLoadError("Alias file must be a JSON object of name -> system", source);
  }

  const table = new Map<string, string>();
  let skipped = 0;
  for (const [alias, target] of Object.entries(raw)) {
    if (typeof target === "string") {
      table.set(alias, target);
    } else {
      skipped++;
    }
  }
  if (skipped > 0) {
    console.warn(`[aliases] Skipped ${skipped} non-string entr${skipped === 1 ? "y" : "ies"}`);
  }
  return table;
}

/**
 * Load the alias file at `path`.
 *
 * @throws DataLoadError if the file is missing (and not created), unreadable or not a JSON object
 */
export function loadAliasFile(path: string, options: AliasFileOptions = {}): AliasTable {
  if (!existsSync(path)) {
    if (!options.createIfMissing) {
      throw new DataLoadError("Alias file not found", path);
    }
    writeFileSync(path, JSON.stringify(DEFAULT_ALIASES, null, 2) + "\n", "utf-8");
    console.log(`[aliases] Wrote default alias file: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataLoadError(`Cannot parse alias file: ${reason}`, path);
  }

  const table = parseAliasDocument(raw, path);
  console.log(`[aliases] Loaded ${table.size} custom name(s) from ${path}`);
  return table;
}
