/**
 * Pack a JSON list of systems into a binary star snapshot.
 *
 * Usage: npx tsx scripts/pack-snapshot.ts <points.json> <out.bin> [--v1]
 *
 * Input: [{ "name": "Sol", "x": 0, "y": 0, "z": 0, "category": "fuel", "jumpRange": 40 }, ...]
 * `category` is "neutron" or "fuel"; anything else is packed as unknown and
 * skipped when the snapshot is loaded. `jumpRange` is optional and dropped by --v1.
 */

import { readFileSync, writeFileSync } from "node:fs";
import type { StarCategory } from "@neutron-hop/types";
import { DataLoadError, encodeSnapshot, STAR_CATEGORIES, type SnapshotRecord } from "@neutron-hop/builder";

const args = process.argv.slice(2);
const flags = args.filter((a) => a.startsWith("--"));
const positional = args.filter((a) => !a.startsWith("--"));

function toCategory(value: unknown): StarCategory | null {
  return STAR_CATEGORIES.find((c) => c === value) ?? null;
}

function toRecord(entry: unknown, i: number, source: string): SnapshotRecord {
  if (entry === null || typeof entry !== "object" || Array.isArray(entry)) {
    throw new DataLoadError(`Entry ${i} is not an object`, source);
  }
  const fields = new Map<string, unknown>(Object.entries(entry));
  const name = fields.get("name");
  const x = fields.get("x");
  const y = fields.get("y");
  const z = fields.get("z");
  const jumpRange = fields.get("jumpRange");
  if (typeof name !== "string" || typeof x !== "number" || typeof y !== "number" || typeof z !== "number") {
    throw new DataLoadError(`Entry ${i} needs a string "name" and numeric "x", "y", "z"`, source);
  }
  return {
    name,
    position: { x, y, z },
    category: toCategory(fields.get("category")),
    ...(typeof jumpRange === "number" ? { jumpRange } : {}),
  };
}

async function main() {
  const [inputPath, outputPath] = positional;
  if (!inputPath || !outputPath) {
    console.error("Usage: pack-snapshot <points.json> <out.bin> [--v1]");
    process.exit(1);
  }

  const raw: unknown = JSON.parse(readFileSync(inputPath, "utf-8"));
  if (!Array.isArray(raw)) {
    throw new DataLoadError("Expected a JSON array of systems", inputPath);
  }
  const records = raw.map((entry, i) => toRecord(entry, i, inputPath));
  const version = flags.includes("--v1") ? 1 : 2;

  const bytes = encodeSnapshot(records, version);
  writeFileSync(outputPath, bytes);

  const unknown = records.filter((r) => r.category === null).length;
  console.log(
    `[snapshot] Packed ${records.length.toLocaleString()} systems (${unknown} unknown) into v${version} snapshot ${outputPath} (${bytes.byteLength.toLocaleString()} bytes)`,
  );
}

main().catch((err: unknown) => {
  console.error(`[error] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
