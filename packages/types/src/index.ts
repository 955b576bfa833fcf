/**
 * @neutron-hop/types
 *
 * Shared domain types for the neutron-hop route plotter.
 *
 * - Star: A system in the static dataset (neutron or fuel)
 * - Route: The result of a route search
 * - Geo: Positions in light years
 */

export * from "./geo.js";
export * from "./star.js";
export * from "./route.js";
