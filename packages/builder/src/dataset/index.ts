export {
  StarDataset,
  loadSnapshotFile,
  oppositeCategory,
  STAR_CATEGORIES,
  type DatasetStats,
} from "./dataset.js";
