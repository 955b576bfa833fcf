/**
 * @neutron-hop/builder
 *
 * Everything that is built once per run and then only read:
 * 1. Decode the star snapshot -> StarDataset
 * 2. Index each category -> StarSpatialIndex
 * 3. Load custom names -> AliasResolver
 *
 * Route search lives in @neutron-hop/routing.
 */

// Errors
export { DataLoadError, UnknownAliasError, UnknownPointError } from "./errors.js";

// Snapshot
export {
  decodeSnapshot,
  encodeSnapshot,
  SNAPSHOT_VERSIONS,
  CURRENT_SNAPSHOT_VERSION,
  type SnapshotVersion,
  type SnapshotRecord,
  type DecodedSnapshot,
} from "./snapshot/index.js";

// Dataset
export {
  StarDataset,
  loadSnapshotFile,
  oppositeCategory,
  STAR_CATEGORIES,
  type DatasetStats,
} from "./dataset/index.js";

// Spatial index
export {
  StaticKdTree,
  compareHits,
  StarSpatialIndex,
  type KdHit,
  type RangeHit,
  type SpatialIndexOptions,
} from "./spatial/index.js";

// Aliases
export {
  loadAliasFile,
  parseAliasDocument,
  DEFAULT_ALIASES,
  AliasResolver,
  ALIAS_PREFIX,
  isAliasLabel,
  type AliasTable,
  type AliasFileOptions,
} from "./aliases/index.js";
