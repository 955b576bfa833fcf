import { describe, it, expect } from "vitest";
import type { Route, StarCategory, StarPoint } from "@neutron-hop/types";
import { StarDataset, StarSpatialIndex, type SnapshotRecord } from "@neutron-hop/builder";

import { getDefaultSearchConfig, type SearchConfig } from "../config/search-config.js";
import { formatRoute } from "../export/route-format.js";
import { NoRouteFoundError, ResourceExhaustionError } from "./errors.js";
import { rangeLimit } from "./range-rules.js";
import { RouteSearch, distance3, plotRoute } from "./route-search.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function star(
  name: string,
  category: StarCategory,
  x: number,
  y = 0,
  z = 0,
  jumpRange?: number,
): SnapshotRecord {
  return {
    name,
    position: { x, y, z },
    category,
    ...(jumpRange !== undefined ? { jumpRange } : {}),
  };
}

function makeConfig(overrides: Partial<SearchConfig> = {}): SearchConfig {
  return { ...getDefaultSearchConfig(), maxSearchNodes: 100_000, ...overrides };
}

function setup(records: SnapshotRecord[]) {
  const dataset = StarDataset.fromRecords(records);
  const index = StarSpatialIndex.build(dataset);
  const get = (name: string): StarPoint => {
    const point = dataset.pointById(name);
    if (!point) throw new Error(`test dataset has no ${name}`);
    return point;
  };
  return { dataset, index, get };
}

function names(route: Route): string[] {
  return route.stops.map((s) => s.name);
}

/** Small deterministic PRNG so failures reproduce */
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Exhaustive reference: minimum hop count, and the shortest total distance
 * among walks with that hop count, by dynamic programming over hop layers.
 */
function bruteForceBest(
  points: StarPoint[],
  start: StarPoint,
  end: StarPoint,
  config: SearchConfig,
): { hops: number; distance: number } | null {
  let layer = new Map<number, number>([[start.index, 0]]);
  if (start.index === end.index) return { hops: 0, distance: 0 };

  for (let hops = 1; hops <= points.length; hops++) {
    const next = new Map<number, number>();
    for (const [fromIndex, travelled] of layer) {
      const from = points[fromIndex];
      for (const to of points) {
        if (to.category === from.category) continue;
        const d = distance3(from.position, to.position);
        if (d > rangeLimit(from, config)) continue;
        const total = travelled + d;
        const prev = next.get(to.index);
        if (prev === undefined || total < prev) next.set(to.index, total);
      }
    }
    const reached = next.get(end.index);
    if (reached !== undefined) return { hops, distance: reached };
    if (next.size === 0) return null;
    layer = next;
  }
  return null;
}

function expectValidRoute(route: Route, start: StarPoint, end: StarPoint, config: SearchConfig): void {
  expect(route.stops[0]).toBe(start);
  expect(route.stops[route.stops.length - 1]).toBe(end);
  expect(route.hops).toHaveLength(route.stops.length - 1);
  for (const hop of route.hops) {
    expect(hop.to.category).not.toBe(hop.from.category);
    expect(hop.distance).toBeLessThanOrEqual(rangeLimit(hop.from, config));
  }
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("RouteSearch", () => {
  describe("worked line", () => {
    // A and C carry their own 10 ly range; B uses the 30 ly fuel default
    const { dataset, index, get } = setup([
      star("A", "neutron", 0, 0, 0, 10),
      star("B", "fuel", 5),
      star("C", "neutron", 10, 0, 0, 10),
      star("D", "fuel", 15),
    ]);
    const config = makeConfig();

    it("plots A -> B -> C -> D in three hops", () => {
      const route = plotRoute(dataset, index, get("A"), get("D"), config);
      expect(names(route)).toEqual(["A", "B", "C", "D"]);
      expect(route.hopCount).toBe(3);
      expect(route.totalDistance).toBe(15);
      expect(route.hops.map((h) => h.distance)).toEqual([5, 5, 5]);
    });

    it("formats to the fuel stops B and D", () => {
      const route = plotRoute(dataset, index, get("A"), get("D"), config);
      expect(formatRoute(route).map((r) => r.name)).toEqual(["B", "D"]);
    });

    it("reports search counters and ends in the found state", () => {
      const search = new RouteSearch(dataset, index, config);
      const { stats } = search.search(get("A"), get("D"));
      expect(search.state).toBe("found");
      expect(stats.expanded).toBe(3);
      expect(stats.created).toBe(4);
    });

    it("returns a zero-hop route when start equals end", () => {
      const route = plotRoute(dataset, index, get("C"), get("C"), config);
      expect(names(route)).toEqual(["C"]);
      expect(route.hopCount).toBe(0);
      expect(route.totalDistance).toBe(0);
      expect(formatRoute(route)).toEqual([]);
    });

    it("routes in reverse from a fuel start", () => {
      // D (fuel, 30 ly) reaches both neutrons; C reaches B; A is a neutron so
      // the route must end on a neutron hop
      const route = plotRoute(dataset, index, get("D"), get("A"), config);
      expect(names(route)).toEqual(["D", "A"]);
    });

    it("fails the budget check instead of growing without bound", () => {
      const search = new RouteSearch(dataset, index, makeConfig({ maxSearchNodes: 2 }));
      expect(() => search.search(get("A"), get("D"))).toThrow(ResourceExhaustionError);
      expect(search.state).toBe("aborted");
    });
  });

  describe("unreachable endpoints", () => {
    const { dataset, index, get } = setup([
      star("Lonely", "neutron", 0, 0, 0, 1),
      star("Fuel", "fuel", 5),
      star("Pulsar", "neutron", 10),
      star("Far", "fuel", 10_000),
    ]);
    const config = makeConfig();

    it("throws NoRouteFoundError when the start has nothing in range", () => {
      const search = new RouteSearch(dataset, index, config);
      expect(() => search.search(get("Lonely"), get("Pulsar"))).toThrow(NoRouteFoundError);
      expect(search.state).toBe("exhausted");
    });

    it("throws NoRouteFoundError when the end is out of everyone's range", () => {
      expect(() => plotRoute(dataset, index, get("Pulsar"), get("Far"), config)).toThrow(
        'No route from "Pulsar" to "Far"',
      );
    });

    it("carries the endpoints on the error", () => {
      let caught: unknown;
      try {
        plotRoute(dataset, index, get("Lonely"), get("Fuel"), config);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(NoRouteFoundError);
      if (caught instanceof NoRouteFoundError) {
        expect(caught.startName).toBe("Lonely");
        expect(caught.endName).toBe("Fuel");
        expect(caught.stats.expanded).toBe(1);
      }
    });
  });

  describe("tie-breaking", () => {
    it("prefers the lower table index between equal-distance routes", () => {
      const records = [
        star("A", "neutron", 0, 0, 0, 10),
        star("North", "fuel", 0, 5, 0),
        star("South", "fuel", 0, -5, 0),
        star("E", "neutron", 10),
      ];
      const first = setup(records);
      expect(names(plotRoute(first.dataset, first.index, first.get("A"), first.get("E"), makeConfig()))).toEqual(
        ["A", "North", "E"],
      );

      const swapped = setup([records[0], records[2], records[1], records[3]]);
      expect(
        names(plotRoute(swapped.dataset, swapped.index, swapped.get("A"), swapped.get("E"), makeConfig())),
      ).toEqual(["A", "South", "E"]);
    });

    const { dataset, index, get } = setup([
      star("A", "neutron", 0, 0, 0, 20),
      star("Up", "fuel", 0, 10, 0),
      star("Back", "fuel", -5, 0, 0),
      star("E", "neutron", 20),
    ]);

    it("distance tie-break picks the shortest route within the hop layer", () => {
      const route = plotRoute(dataset, index, get("A"), get("E"), makeConfig({ tieBreak: "distance" }));
      expect(names(route)).toEqual(["A", "Back", "E"]);
      expect(route.totalDistance).toBe(30);
    });

    it("goal-distance tie-break expands systems nearer the destination first", () => {
      const route = plotRoute(dataset, index, get("A"), get("E"), makeConfig({ tieBreak: "goal-distance" }));
      expect(names(route)).toEqual(["A", "Up", "E"]);
      expect(route.hopCount).toBe(2);
    });
  });

  describe("hop count over distance", () => {
    it("takes two long hops over four short ones", () => {
      const { dataset, index, get } = setup([
        star("Start", "neutron", 0, 0, 0, 25),
        star("NearFuel", "fuel", 5, 0, 0, 6),
        star("MidPulsar", "neutron", 10, 0, 0, 25),
        star("FarFuel", "fuel", 20, 0, 0, 25),
        star("End", "neutron", 30),
      ]);
      const route = plotRoute(dataset, index, get("Start"), get("End"), makeConfig());
      expect(names(route)).toEqual(["Start", "FarFuel", "End"]);
    });
  });

  describe("random clouds", () => {
    function randomCloud(seed: number, count: number): SnapshotRecord[] {
      const rand = mulberry32(seed);
      const records: SnapshotRecord[] = [];
      for (let i = 0; i < count; i++) {
        const category: StarCategory = rand() < 0.4 ? "neutron" : "fuel";
        const own = rand() < 0.25 ? 5 + Math.floor(rand() * 30) : undefined;
        records.push(star(`S${i}`, category, rand() * 60, rand() * 60, rand() * 60, own));
      }
      return records;
    }

    const config = makeConfig({ baseJumpRange: 14, neutronBoost: 2 });

    it("matches the exhaustive minimum hop count and distance", () => {
      let found = 0;
      let missing = 0;
      for (let seed = 1; seed <= 25; seed++) {
        const { dataset, index } = setup(randomCloud(seed, 70));
        const points = Array.from({ length: dataset.pointCount() }, (_, i) => dataset.pointAt(i));
        const rand = mulberry32(seed * 31);

        for (let q = 0; q < 6; q++) {
          const start = points[Math.floor(rand() * points.length)];
          const end = points[Math.floor(rand() * points.length)];
          const expected = bruteForceBest(points, start, end, config);

          if (expected === null) {
            missing++;
            expect(() => plotRoute(dataset, index, start, end, config)).toThrow(NoRouteFoundError);
            continue;
          }

          found++;
          const route = plotRoute(dataset, index, start, end, config);
          expectValidRoute(route, start, end, config);
          expect(route.hopCount).toBe(expected.hops);
          expect(route.totalDistance).toBeCloseTo(expected.distance, 6);
        }
      }
      // Both outcomes must have been exercised
      expect(found).toBeGreaterThan(0);
      expect(missing).toBeGreaterThan(0);
    });

    it("goal-distance routes keep the minimum hop count", () => {
      const goalConfig = { ...config, tieBreak: "goal-distance" as const };
      for (let seed = 100; seed < 110; seed++) {
        const { dataset, index } = setup(randomCloud(seed, 70));
        const points = Array.from({ length: dataset.pointCount() }, (_, i) => dataset.pointAt(i));
        for (let q = 0; q + 1 < points.length; q += 9) {
          const start = points[q];
          const end = points[q + 1];
          const expected = bruteForceBest(points, start, end, goalConfig);
          if (expected === null) continue;
          const route = plotRoute(dataset, index, start, end, goalConfig);
          expectValidRoute(route, start, end, goalConfig);
          expect(route.hopCount).toBe(expected.hops);
        }
      }
    });

    it("is deterministic across runs and independently built handles", () => {
      const records = randomCloud(7, 120);
      const a = setup(records);
      const b = setup(records);
      for (let q = 0; q + 1 < a.dataset.pointCount(); q += 11) {
        const startA = a.dataset.pointAt(q);
        const endA = a.dataset.pointAt(q + 1);
        let first: string[] | null;
        try {
          first = names(plotRoute(a.dataset, a.index, startA, endA, config));
        } catch (err) {
          if (!(err instanceof NoRouteFoundError)) throw err;
          first = null;
        }
        let second: string[] | null;
        try {
          second = names(plotRoute(b.dataset, b.index, b.get(startA.name), b.get(endA.name), config));
        } catch (err) {
          if (!(err instanceof NoRouteFoundError)) throw err;
          second = null;
        }
        expect(second).toEqual(first);
      }
    });
  });
});
