/**
 * Binary star snapshot codec.
 *
 * The snapshot is a flat little-endian table precomputed from a galaxy dump:
 *
 *   header: u32 version, u32 count
 *   v1 row: f32 x, f32 y, f32 z, u8 kind, u32 nameLength, name (UTF-8)
 *   v2 row: f32 x, f32 y, f32 z, u8 kind, f32 jumpRange, u32 nameLength, name
 *
 * kind is 1 for a fuel star, 2 for a neutron star and 0 for anything else.
 * A v2 jumpRange of zero (or NaN) means the row carries no range attribute.
 */

import type { StarCategory, Vec3 } from "@neutron-hop/types";
import { DataLoadError } from "../errors.js";

/** Schema versions this codec reads and writes */
export const SNAPSHOT_VERSIONS = [1, 2] as const;
export type SnapshotVersion = (typeof SNAPSHOT_VERSIONS)[number];

export const CURRENT_SNAPSHOT_VERSION: SnapshotVersion = 2;

const HEADER_BYTES = 8;
const KIND_UNKNOWN = 0;
const KIND_FUEL = 1;
const KIND_NEUTRON = 2;

/** One decoded snapshot row */
export interface SnapshotRecord {
  name: string;
  position: Vec3;
  /** null for rows of an unknown kind */
  category: StarCategory | null;
  jumpRange?: number;
}

/** Result of decoding a snapshot */
export interface DecodedSnapshot {
  version: SnapshotVersion;
  records: SnapshotRecord[];
}

function isSupportedVersion(version: number): version is SnapshotVersion {
  return SNAPSHOT_VERSIONS.some((v) => v === version);
}

function rowFixedBytes(version: SnapshotVersion): number {
  // xyz + kind + nameLength, plus the range attribute in v2
  return 12 + 1 + 4 + (version >= 2 ? 4 : 0);
}

function kindToCategory(kind: number): StarCategory | null {
  if (kind === KIND_FUEL) return "fuel";
  if (kind === KIND_NEUTRON) return "neutron";
  return null;
}

function categoryToKind(category: StarCategory | null): number {
  if (category === "fuel") return KIND_FUEL;
  if (category === "neutron") return KIND_NEUTRON;
  return KIND_UNKNOWN;
}

/** Bounds-checked little-endian cursor over the snapshot bytes */
class SnapshotCursor {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  u8(): number {
    this.require(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  u32(): number {
    this.require(4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  f32(): number {
    this.require(4);
    const value = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return value;
  }

  slice(length: number): Uint8Array {
    this.require(length);
    const out = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  private require(length: number): void {
    if (this.offset + length > this.bytes.byteLength) {
      throw new DataLoadError(
        `Snapshot truncated: needed ${length} byte(s) at offset ${this.offset}, ${this.remaining} left`,
      );
    }
  }
}

/**
 * Decode a snapshot buffer.
 *
 * @throws DataLoadError on a truncated or malformed buffer, trailing bytes,
 *   non-UTF-8 names or an unsupported version
 */
export function decodeSnapshot(bytes: Uint8Array): DecodedSnapshot {
  if (bytes.byteLength < HEADER_BYTES) {
    throw new DataLoadError(`Snapshot too short: ${bytes.byteLength} byte(s), header needs ${HEADER_BYTES}`);
  }

  const cursor = new SnapshotCursor(bytes);
  const version = cursor.u32();
  if (!isSupportedVersion(version)) {
    throw new DataLoadError(
      `Unsupported snapshot version ${version}. Supported: ${SNAPSHOT_VERSIONS.join(", ")}`,
    );
  }
  const count = cursor.u32();

  // Reject absurd counts before allocating anything
  const minRowBytes = rowFixedBytes(version);
  if (count * minRowBytes > cursor.remaining) {
    throw new DataLoadError(
      `Snapshot truncated: header declares ${count} rows but only ${cursor.remaining} byte(s) follow`,
    );
  }

  const decoder = new TextDecoder("utf-8", { fatal: true });
  const records: SnapshotRecord[] = new Array(count);

  for (let i = 0; i < count; i++) {
    const x = cursor.f32();
    const y = cursor.f32();
    const z = cursor.f32();
    const kind = cursor.u8();
    const rawRange = version >= 2 ? cursor.f32() : 0;
    const nameLength = cursor.u32();
    const nameOffset = cursor.position;
    const nameBytes = cursor.slice(nameLength);

    let name: string;
    try {
      name = decoder.decode(nameBytes);
    } catch {
      throw new DataLoadError(`Row ${i}: name at offset ${nameOffset} is not valid UTF-8`);
    }
    if (name.length === 0) {
      throw new DataLoadError(`Row ${i}: empty system name`);
    }
    if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
      throw new DataLoadError(`Row ${i} ("${name}"): non-finite coordinate`);
    }

    const record: SnapshotRecord = {
      name,
      position: { x, y, z },
      category: kindToCategory(kind),
    };
    if (Number.isFinite(rawRange) && rawRange > 0) {
      record.jumpRange = rawRange;
    }
    records[i] = record;
  }

  if (cursor.remaining !== 0) {
    throw new DataLoadError(`Snapshot has ${cursor.remaining} trailing byte(s) after ${count} rows`);
  }

  return { version, records };
}

/**
 * Encode rows into a snapshot buffer.
 * Coordinates and ranges are stored as 32-bit floats.
 */
export function encodeSnapshot(
  records: readonly SnapshotRecord[],
  version: SnapshotVersion = CURRENT_SNAPSHOT_VERSION,
): Uint8Array {
  const encoder = new TextEncoder();
  const names = records.map((r) => encoder.encode(r.name));
  const fixed = rowFixedBytes(version);

  let size = HEADER_BYTES;
  for (const name of names) size += fixed + name.byteLength;

  const bytes = new Uint8Array(size);
  const view = new DataView(bytes.buffer);
  view.setUint32(0, version, true);
  view.setUint32(4, records.length, true);

  let offset = HEADER_BYTES;
  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    const name = names[i];
    view.setFloat32(offset, record.position.x, true);
    view.setFloat32(offset + 4, record.position.y, true);
    view.setFloat32(offset + 8, record.position.z, true);
    view.setUint8(offset + 12, categoryToKind(record.category));
    offset += 13;
    if (version >= 2) {
      view.setFloat32(offset, record.jumpRange ?? 0, true);
      offset += 4;
    }
    view.setUint32(offset, name.byteLength, true);
    offset += 4;
    bytes.set(name, offset);
    offset += name.byteLength;
  }

  return bytes;
}
