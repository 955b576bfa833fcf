/**
 * Plain-text route output.
 */

import { writeFileSync } from "node:fs";

import type { HopRecord, Route, RouteSummary } from "@neutron-hop/types";

/** One stop name per line, first stop after the start first */
export function formatRouteText(records: readonly HopRecord[]): string {
  return records.map((r) => `${r.name}\n`).join("");
}

/**
 * Human-readable report: summary lines followed by every stop, start and
 * end included.
 */
export function formatRouteReport(route: Route, summary: RouteSummary): string {
  const lines = [
    `Minimum jump range required: ${summary.requiredJumpRange.toFixed(2)}`,
    `Total jumps: ${summary.hopCount}`,
    `Fuel stops: ${summary.fuelStops}`,
    `Total distance: ${summary.totalDistance.toFixed(2)} ly`,
    ...route.stops.map((stop, i) => `${String(i).padStart(3, " ")}  ${stop.name} [${stop.category}]`),
  ];
  return lines.join("\n") + "\n";
}

/** Write the stop listing to `path` */
export function writeRouteFile(path: string, records: readonly HopRecord[]): void {
  writeFileSync(path, formatRouteText(records), "utf-8");
  console.log(`[route] Wrote ${records.length} stop(s) to ${path}`);
}
