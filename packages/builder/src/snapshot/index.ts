export {
  decodeSnapshot,
  encodeSnapshot,
  SNAPSHOT_VERSIONS,
  CURRENT_SNAPSHOT_VERSION,
  type SnapshotVersion,
  type SnapshotRecord,
  type DecodedSnapshot,
} from "./codec.js";
