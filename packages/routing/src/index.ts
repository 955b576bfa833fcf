/**
 * @neutron-hop/routing
 *
 * Route plotting over a loaded star dataset.
 *
 * Key concepts:
 * - Range rules: how far a hop may reach from a neutron or fuel star
 * - RouteSearch: fewest-hop search alternating the two categories
 * - SearchConfig: layered JSON configuration for the search
 * - Export: fuel-stop listing and text output
 * - Plot command: the run-once entry behind scripts/plot-route.ts
 *
 * Pipeline:
 * 1. Load snapshot, build index, resolve endpoints (@neutron-hop/builder)
 * 2. Search -> Route
 * 3. Format -> HopRecord[] -> route file
 */

export * from "./config/search-config.js";
export * from "./search/index.js";
export * from "./export/index.js";
export * from "./plot/plot-command.js";
