/**
 * Jump range rules.
 *
 * A system's own range attribute, when the snapshot carries one, is the
 * final word. Otherwise the range comes from the search config: the base
 * range from a fuel star, the boosted range from a neutron star.
 */

import type { Hop, StarCategory, StarPoint } from "@neutron-hop/types";
import type { SearchConfig } from "../config/search-config.js";

type RangeConfig = Pick<SearchConfig, "baseJumpRange" | "neutronBoost">;

/** Multiplier applied to the base range when departing a star of this category */
export function categoryMultiplier(category: StarCategory, config: RangeConfig): number {
  return category === "neutron" ? config.neutronBoost : 1;
}

/** Default range (ly) departing a star of this category */
export function categoryRange(category: StarCategory, config: RangeConfig): number {
  return config.baseJumpRange * categoryMultiplier(category, config);
}

/** Maximum distance (ly) a hop departing `point` may cover */
export function rangeLimit(point: StarPoint, config: RangeConfig): number {
  return point.jumpRange ?? categoryRange(point.category, config);
}

/**
 * Base range this hop needs, or 0 when the departing system carries its own
 * range and the base does not apply.
 */
export function requiredBaseRange(hop: Hop, config: RangeConfig): number {
  if (hop.from.jumpRange !== undefined) return 0;
  return hop.distance / categoryMultiplier(hop.from.category, config);
}
