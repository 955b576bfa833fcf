import { describe, it, expect } from "vitest";
import { decodeSnapshot, encodeSnapshot, type SnapshotRecord } from "./codec.js";
import { DataLoadError } from "../errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const RECORDS: SnapshotRecord[] = [
  { name: "Alpha", position: { x: 0, y: 1.5, z: -2.25 }, category: "neutron", jumpRange: 40 },
  { name: "Beta", position: { x: 10, y: 0, z: 0 }, category: "fuel" },
  { name: "Gamma Ö", position: { x: -3, y: 4, z: 8 }, category: null },
];

function withVersion(bytes: Uint8Array, version: number): Uint8Array {
  const copy = bytes.slice();
  new DataView(copy.buffer).setUint32(0, version, true);
  return copy;
}

// ─── decodeSnapshot ─────────────────────────────────────────────────────────

describe("decodeSnapshot", () => {
  it("reads back v2 rows with positions, categories and ranges", () => {
    const { version, records } = decodeSnapshot(encodeSnapshot(RECORDS));
    expect(version).toBe(2);
    expect(records).toEqual(RECORDS);
  });

  it("v1 rows carry no range attribute", () => {
    const { version, records } = decodeSnapshot(encodeSnapshot(RECORDS, 1));
    expect(version).toBe(1);
    expect(records[0]).toEqual({
      name: "Alpha",
      position: { x: 0, y: 1.5, z: -2.25 },
      category: "neutron",
    });
  });

  it("maps unknown kinds to a null category", () => {
    const { records } = decodeSnapshot(encodeSnapshot(RECORDS));
    expect(records[2].category).toBeNull();
    expect(records[2].name).toBe("Gamma Ö");
  });

  it("treats a zero range as absent", () => {
    const bytes = encodeSnapshot([
      { name: "Zero", position: { x: 0, y: 0, z: 0 }, category: "fuel", jumpRange: 0 },
    ]);
    expect(decodeSnapshot(bytes).records[0]).not.toHaveProperty("jumpRange");
  });

  it("decodes an empty table", () => {
    expect(decodeSnapshot(encodeSnapshot([])).records).toEqual([]);
  });

  it("rejects a buffer shorter than the header", () => {
    expect(() => decodeSnapshot(new Uint8Array(4))).toThrow(DataLoadError);
    expect(() => decodeSnapshot(new Uint8Array(4))).toThrow(/too short/);
  });

  it("rejects an unsupported version", () => {
    const bytes = withVersion(encodeSnapshot(RECORDS), 3);
    expect(() => decodeSnapshot(bytes)).toThrow("Unsupported snapshot version 3. Supported: 1, 2");
  });

  it("rejects a row count larger than the payload", () => {
    const bytes = new Uint8Array(8);
    const view = new DataView(bytes.buffer);
    view.setUint32(0, 2, true);
    view.setUint32(4, 1000, true);
    expect(() => decodeSnapshot(bytes)).toThrow(/header declares 1000 rows/);
  });

  it("rejects a truncated final row", () => {
    const bytes = encodeSnapshot(RECORDS);
    expect(() => decodeSnapshot(bytes.subarray(0, bytes.byteLength - 1))).toThrow(/truncated/);
  });

  it("rejects trailing bytes", () => {
    const bytes = encodeSnapshot(RECORDS);
    const padded = new Uint8Array(bytes.byteLength + 2);
    padded.set(bytes);
    expect(() => decodeSnapshot(padded)).toThrow("Snapshot has 2 trailing byte(s) after 3 rows");
  });

  it("rejects names that are not valid UTF-8", () => {
    const bytes = encodeSnapshot([{ name: "ab", position: { x: 0, y: 0, z: 0 }, category: "fuel" }]);
    // header (8) + xyz (12) + kind (1) + range (4) + name length (4)
    bytes[29] = 0xff;
    bytes[30] = 0xfe;
    expect(() => decodeSnapshot(bytes)).toThrow("Row 0: name at offset 29 is not valid UTF-8");
  });

  it("rejects empty names", () => {
    const bytes = encodeSnapshot([{ name: "", position: { x: 0, y: 0, z: 0 }, category: "fuel" }]);
    expect(() => decodeSnapshot(bytes)).toThrow("Row 0: empty system name");
  });

  it("rejects non-finite coordinates", () => {
    const bytes = encodeSnapshot([{ name: "Nan", position: { x: 0, y: 0, z: 0 }, category: "fuel" }]);
    new DataView(bytes.buffer).setFloat32(8, Number.NaN, true);
    expect(() => decodeSnapshot(bytes)).toThrow('Row 0 ("Nan"): non-finite coordinate');
  });
});
