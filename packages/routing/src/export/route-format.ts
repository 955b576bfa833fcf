/**
 * Route -> externally consumed stop list.
 *
 * Only fuel stops and the destination are emitted: the player chains them
 * with the game's own neutron plotter, which picks the neutron legs in
 * between at use time.
 */

import type { HopRecord, Route, RouteSummary } from "@neutron-hop/types";

import type { SearchConfig } from "../config/search-config.js";
import { requiredBaseRange } from "../search/range-rules.js";

/**
 * Fuel stops after the start in traversal order, then the destination.
 * The destination is always the last record, whatever its category.
 * A zero-hop route formats to an empty list.
 */
export function formatRoute(route: Route): HopRecord[] {
  const last = route.stops.length - 1;
  return route.stops
    .filter((stop, i) => i > 0 && (i === last || stop.category === "fuel"))
    .map((stop) => ({
      name: stop.name,
      position: { x: stop.position.x, y: stop.position.y, z: stop.position.z },
    }));
}

/** Aggregate statistics for a route under the config it was searched with */
export function summarizeRoute(
  route: Route,
  config: Pick<SearchConfig, "baseJumpRange" | "neutronBoost">,
): RouteSummary {
  let requiredJumpRange = 0;
  for (const hop of route.hops) {
    requiredJumpRange = Math.max(requiredJumpRange, requiredBaseRange(hop, config));
  }
  return {
    hopCount: route.hopCount,
    fuelStops: route.stops.slice(1).filter((stop) => stop.category === "fuel").length,
    totalDistance: route.totalDistance,
    requiredJumpRange,
  };
}
