/**
 * Alternating neutron/fuel route search.
 *
 * A best-first search over the implicit graph "system -> systems of the
 * other category within its jump range". The frontier is ordered by hop
 * count first, so it sweeps the graph one hop layer at a time; the
 * configured tie-break only orders systems inside a layer. The first time
 * the destination leaves the frontier its hop count is minimal.
 *
 * States: INITIALIZED (frontier = {start}) -> EXPANDING -> FOUND | EXHAUSTED.
 * EXHAUSTED surfaces as NoRouteFoundError; running past the node budget
 * surfaces as ResourceExhaustionError.
 */

import type { Hop, Route, StarPoint, Vec3 } from "@neutron-hop/types";
import { oppositeCategory, type StarDataset, type StarSpatialIndex } from "@neutron-hop/builder";

import type { SearchConfig } from "../config/search-config.js";
import { NoRouteFoundError, ResourceExhaustionError, type SearchStats } from "./errors.js";
import { MinHeap } from "./frontier.js";
import { NodeArena } from "./node-arena.js";
import { rangeLimit } from "./range-rules.js";

/** Search lifecycle */
export type SearchState = "initialized" | "expanding" | "found" | "exhausted" | "aborted";

/** A route with the counters of the search that produced it */
export interface RouteSearchResult {
  route: Route;
  stats: SearchStats;
}

/** Straight-line distance in light years */
export function distance3(a: Vec3, b: Vec3): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const dz = a.z - b.z;
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
}

/** Build a Route from its stops, measuring each hop */
export function routeFromStops(stops: StarPoint[]): Route {
  const hops: Hop[] = [];
  let totalDistance = 0;
  for (let i = 1; i < stops.length; i++) {
    const from = stops[i - 1];
    const to = stops[i];
    const distance = distance3(from.position, to.position);
    hops.push({ from, to, distance });
    totalDistance += distance;
  }
  return {
    start: stops[0],
    end: stops[stops.length - 1],
    stops,
    hops,
    hopCount: hops.length,
    totalDistance,
  };
}

export class RouteSearch {
  private currentState: SearchState = "initialized";

  constructor(
    private readonly dataset: StarDataset,
    private readonly index: StarSpatialIndex,
    private readonly config: SearchConfig,
  ) {}

  /** State of the most recent search */
  get state(): SearchState {
    return this.currentState;
  }

  /**
   * Find the route from `start` to `end` with the fewest hops.
   *
   * @throws NoRouteFoundError if the destination is unreachable
   * @throws ResourceExhaustionError if the node budget runs out first
   */
  search(start: StarPoint, end: StarPoint): RouteSearchResult {
    const t0 = Date.now();
    this.currentState = "initialized";

    if (start.index === end.index) {
      this.currentState = "found";
      return {
        route: routeFromStops([start]),
        stats: { expanded: 0, created: 0, maxFrontier: 0, elapsedMs: Date.now() - t0 },
      };
    }

    const { dataset, index, config } = this;
    const goalDistance = config.tieBreak === "goal-distance";
    const tieKeyOf = (point: StarPoint, cumulative: number): number =>
      goalDistance ? distance3(point.position, end.position) : cumulative;

    const pointCount = dataset.pointCount();
    // Best (hops, tieKey) pushed so far per system; -1 = never reached
    const bestHops = new Int32Array(pointCount).fill(-1);
    const bestKey = new Float64Array(pointCount);
    const settled = new Uint8Array(pointCount);

    const arena = new NodeArena();
    const frontier = new MinHeap((a, b) => arena.less(a, b));
    const stats: SearchStats = { expanded: 0, created: 0, maxFrontier: 1, elapsedMs: 0 };

    const root = arena.add(start.index, 0, 0, tieKeyOf(start, 0), -1);
    bestHops[start.index] = 0;
    bestKey[start.index] = arena.tieKey(root);
    frontier.push(root);

    console.log(
      `[search] Routing "${start.name}" (${start.category}) -> "${end.name}" (${end.category}), base=${config.baseJumpRange}ly, boost=x${config.neutronBoost}, tieBreak=${config.tieBreak}`,
    );
    this.currentState = "expanding";

    for (let nodeId = frontier.pop(); nodeId !== undefined; nodeId = frontier.pop()) {
      const pointIndex = arena.pointIndex(nodeId);
      if (settled[pointIndex]) continue;
      settled[pointIndex] = 1;

      if (pointIndex === end.index) {
        this.currentState = "found";
        stats.created = arena.size;
        stats.elapsedMs = Date.now() - t0;
        const route = routeFromStops(arena.pathTo(nodeId).map((i) => dataset.pointAt(i)));
        console.log(
          `[search] Found ${route.hopCount} hops, ${route.totalDistance.toFixed(2)}ly (expanded=${stats.expanded}, created=${stats.created}, maxFrontier=${stats.maxFrontier}, ${stats.elapsedMs}ms)`,
        );
        return { route, stats };
      }

      stats.expanded++;
      const point = dataset.pointAt(pointIndex);
      const hops = arena.hops(nodeId) + 1;
      const travelled = arena.distance(nodeId);

      index.forEachWithin(
        point.position,
        oppositeCategory(point.category),
        rangeLimit(point, config),
        (next, hopDistance) => {
          if (settled[next.index]) return;

          const cumulative = travelled + hopDistance;
          const key = tieKeyOf(next, cumulative);
          const prevHops = bestHops[next.index];
          if (prevHops !== -1 && (prevHops < hops || (prevHops === hops && bestKey[next.index] <= key))) {
            return;
          }

          if (arena.size >= config.maxSearchNodes) {
            this.currentState = "aborted";
            stats.created = arena.size;
            stats.elapsedMs = Date.now() - t0;
            throw new ResourceExhaustionError(config.maxSearchNodes, stats);
          }

          bestHops[next.index] = hops;
          bestKey[next.index] = key;
          frontier.push(arena.add(next.index, hops, cumulative, key, nodeId));
        },
      );

      if (frontier.size > stats.maxFrontier) stats.maxFrontier = frontier.size;
    }

    this.currentState = "exhausted";
    stats.created = arena.size;
    stats.elapsedMs = Date.now() - t0;
    console.log(
      `[search] Exhausted after expanding ${stats.expanded} systems (${stats.elapsedMs}ms), no route`,
    );
    throw new NoRouteFoundError(start.name, end.name, stats);
  }
}

/**
 * One-shot search.
 *
 * @throws NoRouteFoundError | ResourceExhaustionError
 */
export function plotRoute(
  dataset: StarDataset,
  index: StarSpatialIndex,
  start: StarPoint,
  end: StarPoint,
  config: SearchConfig,
): Route {
  return new RouteSearch(dataset, index, config).search(start, end).route;
}
