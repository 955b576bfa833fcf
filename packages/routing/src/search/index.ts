/**
 * Route search module.
 *
 * Finds the route between two systems that alternates neutron and fuel
 * stars with the fewest hops, querying the spatial index for the systems in
 * range of each expanded stop.
 *
 * Resolve endpoints -> RouteSearch (frontier over NodeArena) -> Route
 */

export { RouteSearch, plotRoute, routeFromStops, distance3 } from "./route-search.js";
export type { SearchState, RouteSearchResult } from "./route-search.js";
export { searchWithRangeEscalation, type EscalatedSearchResult } from "./escalation.js";
export { NoRouteFoundError, ResourceExhaustionError, type SearchStats } from "./errors.js";
export { categoryMultiplier, categoryRange, rangeLimit, requiredBaseRange } from "./range-rules.js";
export { MinHeap } from "./frontier.js";
export { NodeArena } from "./node-arena.js";
