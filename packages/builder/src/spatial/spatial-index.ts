/**
 * Per-category spatial index over a star dataset.
 *
 * One static k-d tree per category, so a query for "fuel stars within R of P"
 * never touches a neutron star. The index is a pure geometric oracle: the
 * caller decides the radius.
 */

import type { StarCategory, StarPoint, Vec3 } from "@neutron-hop/types";
import type { StarDataset } from "../dataset/dataset.js";
import { StaticKdTree, type KdHit } from "./kd-tree.js";

/** A system returned by a proximity query */
export interface RangeHit {
  point: StarPoint;
  /** Euclidean distance from the query position in light years */
  distance: number;
}

export interface SpatialIndexOptions {
  /** Range size below which the tree scans linearly (default 16) */
  nodeSize?: number;
}

export class StarSpatialIndex {
  private constructor(
    private readonly dataset: StarDataset,
    private readonly trees: Readonly<Record<StarCategory, StaticKdTree>>,
  ) {}

  /** Build one tree per category. O(n log n). */
  static build(dataset: StarDataset, options: SpatialIndexOptions = {}): StarSpatialIndex {
    const t0 = Date.now();
    const positionOf = (id: number): [number, number, number] => {
      const { x, y, z } = dataset.pointAt(id).position;
      return [x, y, z];
    };

    const buildTree = (category: StarCategory): StaticKdTree => {
      const ids: number[] = [];
      for (const point of dataset.allPointsOfCategory(category)) ids.push(point.index);
      return new StaticKdTree(ids, positionOf, options.nodeSize);
    };
    const trees: Record<StarCategory, StaticKdTree> = {
      neutron: buildTree("neutron"),
      fuel: buildTree("fuel"),
    };

    console.log(
      `[index] Built k-d trees in ${Date.now() - t0}ms: neutron=${trees.neutron.size.toLocaleString()}, fuel=${trees.fuel.size.toLocaleString()}`,
    );
    return new StarSpatialIndex(dataset, trees);
  }

  /** Number of indexed systems of a category */
  size(category: StarCategory): number {
    return this.trees[category].size;
  }

  /**
   * Systems of `category` within `radius` (inclusive) of `position`.
   *
   * @param limit - keep only the closest `limit` hits
   * @returns hits by ascending distance, ties broken by table index
   */
  query(position: Vec3, category: StarCategory, radius: number, limit?: number): RangeHit[] {
    const tree = this.trees[category];
    const hits =
      limit === undefined
        ? tree.within(position.x, position.y, position.z, radius)
        : tree.nearest(position.x, position.y, position.z, limit, radius);
    return hits.map((hit) => this.toRangeHit(hit));
  }

  /** The `k` closest systems of `category`, optionally capped at `maxRadius` */
  nearest(position: Vec3, category: StarCategory, k: number, maxRadius?: number): RangeHit[] {
    return this.trees[category]
      .nearest(position.x, position.y, position.z, k, maxRadius)
      .map((hit) => this.toRangeHit(hit));
  }

  /**
   * Visit systems of `category` within `radius` without sorting or allocating
   * hit objects. Visit order is unspecified.
   */
  forEachWithin(
    position: Vec3,
    category: StarCategory,
    radius: number,
    visit: (point: StarPoint, distance: number) => void,
  ): void {
    this.trees[category].forEachWithin(position.x, position.y, position.z, radius, (id, distSq) =>
      visit(this.dataset.pointAt(id), Math.sqrt(distSq)),
    );
  }

  private toRangeHit(hit: KdHit): RangeHit {
    return { point: this.dataset.pointAt(hit.id), distance: Math.sqrt(hit.distSq) };
  }
}
