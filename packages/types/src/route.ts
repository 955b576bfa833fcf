/**
 * Route results - the output of the route search.
 *
 * A route is an ordered list of stops whose categories strictly alternate.
 * Only the fuel stops are handed to the player; the neutron legs are plotted
 * in-game between them.
 */

import type { Vec3 } from "./geo.js";
import type { StarPoint } from "./star.js";

/** One traversal between two consecutive stops */
export interface Hop {
  from: StarPoint;
  to: StarPoint;
  /** Straight-line distance in light years */
  distance: number;
}

/** A complete route from start to end */
export interface Route {
  start: StarPoint;
  end: StarPoint;
  /** Every stop in traversal order, start and end included */
  stops: StarPoint[];
  /** hops[i] connects stops[i] and stops[i + 1] */
  hops: Hop[];
  hopCount: number;
  /** Sum of hop distances in light years */
  totalDistance: number;
}

/** A single formatted stop, as written to the route listing */
export interface HopRecord {
  name: string;
  position: Vec3;
}

/** Aggregated statistics about a route */
export interface RouteSummary {
  hopCount: number;
  /** Number of fuel stops after the start */
  fuelStops: number;
  totalDistance: number;
  /**
   * Smallest base jump range that keeps every hop departing a system without
   * its own range attribute legal
   */
  requiredJumpRange: number;
}
