/**
 * In-memory star table.
 *
 * Built once from a decoded snapshot and never mutated afterwards. A dataset
 * is an ordinary value owned by its caller, so several can coexist (tests
 * build one per case).
 */

import { readFileSync } from "node:fs";

import type { StarCategory, StarPoint } from "@neutron-hop/types";
import { DataLoadError } from "../errors.js";
import { decodeSnapshot, type SnapshotRecord } from "../snapshot/codec.js";

/** All categories, in a fixed order */
export const STAR_CATEGORIES: readonly StarCategory[] = ["neutron", "fuel"];

/** The category a hop departing `category` must land on */
export function oppositeCategory(category: StarCategory): StarCategory {
  return category === "neutron" ? "fuel" : "neutron";
}

/** Load statistics */
export interface DatasetStats {
  points: number;
  neutron: number;
  fuel: number;
  /** Snapshot rows dropped because their kind is neither neutron nor fuel */
  skippedUnknown: number;
  /** Rows dropped because a later row carries the same name */
  skippedDuplicates: number;
}

export class StarDataset {
  private readonly points: readonly StarPoint[];
  private readonly byName: ReadonlyMap<string, StarPoint>;
  private readonly byCategory: Readonly<Record<StarCategory, readonly StarPoint[]>>;
  readonly stats: DatasetStats;

  private constructor(records: readonly SnapshotRecord[]) {
    const points: StarPoint[] = [];
    const byName = new Map<string, StarPoint>();
    const byCategory: Record<StarCategory, StarPoint[]> = { neutron: [], fuel: [] };
    let skippedUnknown = 0;
    let skippedDuplicates = 0;

    // A repeated name resolves to its last row
    const lastRow = new Map<string, number>();
    records.forEach((record, row) => {
      if (record.category !== null) lastRow.set(record.name, row);
    });

    for (let row = 0; row < records.length; row++) {
      const record = records[row];
      if (record.category === null) {
        skippedUnknown++;
        continue;
      }
      if (lastRow.get(record.name) !== row) {
        skippedDuplicates++;
        continue;
      }

      const point: StarPoint = Object.freeze({
        index: points.length,
        name: record.name,
        position: Object.freeze({ ...record.position }),
        category: record.category,
        ...(record.jumpRange !== undefined ? { jumpRange: record.jumpRange } : {}),
      });
      points.push(point);
      byName.set(point.name, point);
      byCategory[point.category].push(point);
    }

    this.points = points;
    this.byName = byName;
    this.byCategory = byCategory;
    this.stats = {
      points: points.length,
      neutron: byCategory.neutron.length,
      fuel: byCategory.fuel.length,
      skippedUnknown,
      skippedDuplicates,
    };
  }

  /**
   * Build a dataset from a snapshot buffer.
   *
   * @throws DataLoadError if the snapshot cannot be decoded
   */
  static load(bytes: Uint8Array): StarDataset {
    const { version, records } = decodeSnapshot(bytes);
    const dataset = new StarDataset(records);
    const { points, neutron, fuel, skippedUnknown, skippedDuplicates } = dataset.stats;
    console.log(
      `[snapshot] Loaded v${version}: ${points.toLocaleString()} systems (${neutron.toLocaleString()} neutron, ${fuel.toLocaleString()} fuel), skipped ${skippedUnknown} of unknown kind`,
    );
    if (skippedDuplicates > 0) {
      console.warn(`[snapshot] ${skippedDuplicates} row(s) shadowed by a later row with the same name`);
    }
    return dataset;
  }

  /** Build a dataset directly from rows (no binary round trip) */
  static fromRecords(records: readonly SnapshotRecord[]): StarDataset {
    return new StarDataset(records);
  }

  pointCount(): number {
    return this.points.length;
  }

  /** Look up a system by canonical name (case-sensitive). Returns null if absent. */
  pointById(name: string): StarPoint | null {
    return this.byName.get(name) ?? null;
  }

  /** The system stored at a table row */
  pointAt(index: number): StarPoint {
    const point = this.points[index];
    if (point === undefined) {
      throw new RangeError(`Point index ${index} out of range (0..${this.points.length - 1})`);
    }
    return point;
  }

  categoryCount(category: StarCategory): number {
    return this.byCategory[category].length;
  }

  /**
   * Every system of a category, in table order.
   * The returned iterable can be walked any number of times.
   */
  allPointsOfCategory(category: StarCategory): Iterable<StarPoint> {
    const points = this.byCategory[category];
    return {
      *[Symbol.iterator]() {
        yield* points;
      },
    };
  }
}

/**
 * Read and load a snapshot file.
 *
 * @throws DataLoadError if the file is missing, unreadable or malformed
 */
export function loadSnapshotFile(path: string): StarDataset {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataLoadError(`Cannot read snapshot: ${reason}`, path);
  }

  try {
    return StarDataset.load(bytes);
  } catch (err) {
    if (err instanceof DataLoadError && err.source === undefined) {
      throw new DataLoadError(err.message, path);
    }
    throw err;
  }
}
