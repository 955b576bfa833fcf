export { StaticKdTree, compareHits, type KdHit } from "./kd-tree.js";
export { StarSpatialIndex, type RangeHit, type SpatialIndexOptions } from "./spatial-index.js";
