/**
 * Static 3-D k-d tree over integer ids.
 *
 * The tree is implicit: ids and their coordinates are permuted in place so
 * that every range [left, right] has its median at the midpoint, split on
 * x, y, z in turn. Ranges of `nodeSize` entries or fewer are left unsorted
 * and scanned linearly. Build is O(n log n) via quickselect; queries never
 * allocate per visited node.
 */

/** Default number of entries below which a range is scanned linearly */
const DEFAULT_NODE_SIZE = 16;

/** A single hit from a radius or nearest-neighbour query */
export interface KdHit {
  id: number;
  /** Squared euclidean distance to the query position */
  distSq: number;
}

/** Order hits by distance, then by id */
export function compareHits(a: KdHit, b: KdHit): number {
  return a.distSq - b.distSq || a.id - b.id;
}

export class StaticKdTree {
  readonly size: number;
  private readonly ids: Uint32Array;
  private readonly coords: Float64Array;
  private readonly nodeSize: number;

  /**
   * @param ids - ids to index (copied)
   * @param positionOf - coordinate lookup for an id, as [x, y, z]
   */
  constructor(
    ids: ArrayLike<number>,
    positionOf: (id: number) => readonly [number, number, number],
    nodeSize: number = DEFAULT_NODE_SIZE,
  ) {
    this.size = ids.length;
    this.nodeSize = Math.max(1, Math.floor(nodeSize));
    this.ids = new Uint32Array(this.size);
    this.coords = new Float64Array(this.size * 3);

    for (let i = 0; i < this.size; i++) {
      const id = ids[i];
      const [x, y, z] = positionOf(id);
      this.ids[i] = id;
      this.coords[3 * i] = x;
      this.coords[3 * i + 1] = y;
      this.coords[3 * i + 2] = z;
    }

    if (this.size > 0) this.sortRange(0, this.size - 1, 0);
  }

  /** Visit every entry within `radius` (inclusive) of (x, y, z), in tree order */
  forEachWithin(
    x: number,
    y: number,
    z: number,
    radius: number,
    visit: (id: number, distSq: number) => void,
  ): void {
    if (this.size === 0 || !(radius >= 0)) return;

    const { ids, coords, nodeSize } = this;
    const r2 = radius * radius;
    const stack: number[] = [0, this.size - 1, 0];

    while (stack.length > 0) {
      const axis = stack.pop() ?? 0;
      const right = stack.pop() ?? -1;
      const left = stack.pop() ?? 0;

      if (right - left <= nodeSize) {
        for (let i = left; i <= right; i++) {
          const d2 = sqDist(coords, i, x, y, z);
          if (d2 <= r2) visit(ids[i], d2);
        }
        continue;
      }

      const m = (left + right) >> 1;
      const d2 = sqDist(coords, m, x, y, z);
      if (d2 <= r2) visit(ids[m], d2);

      const q = axis === 0 ? x : axis === 1 ? y : z;
      const split = coords[3 * m + axis];
      const nextAxis = (axis + 1) % 3;

      if (q - radius <= split) stack.push(left, m - 1, nextAxis);
      if (q + radius >= split) stack.push(m + 1, right, nextAxis);
    }
  }

  /** All entries within `radius`, ordered by distance then id */
  within(x: number, y: number, z: number, radius: number): KdHit[] {
    const hits: KdHit[] = [];
    this.forEachWithin(x, y, z, radius, (id, distSq) => hits.push({ id, distSq }));
    return hits.sort(compareHits);
  }

  /** The `k` entries closest to (x, y, z) within `maxRadius`, ordered by distance then id */
  nearest(x: number, y: number, z: number, k: number, maxRadius: number = Infinity): KdHit[] {
    const best: KdHit[] = [];
    if (this.size === 0 || k <= 0 || !(maxRadius >= 0)) return best;

    const { ids, coords, nodeSize } = this;
    const maxR2 = maxRadius * maxRadius;
    const bound = (): number =>
      best.length < k ? maxR2 : Math.min(maxR2, best[best.length - 1].distSq);

    const offer = (i: number): void => {
      const d2 = sqDist(coords, i, x, y, z);
      if (d2 > bound()) return;
      const hit: KdHit = { id: ids[i], distSq: d2 };
      let at = best.length;
      while (at > 0 && compareHits(hit, best[at - 1]) < 0) at--;
      if (at >= k) return;
      best.splice(at, 0, hit);
      if (best.length > k) best.pop();
    };

    const search = (left: number, right: number, axis: number): void => {
      if (left > right) return;
      if (right - left <= nodeSize) {
        for (let i = left; i <= right; i++) offer(i);
        return;
      }
      const m = (left + right) >> 1;
      offer(m);

      const q = axis === 0 ? x : axis === 1 ? y : z;
      const diff = q - coords[3 * m + axis];
      const nextAxis = (axis + 1) % 3;
      const [nearLeft, nearRight, farLeft, farRight] =
        diff <= 0 ? [left, m - 1, m + 1, right] : [m + 1, right, left, m - 1];

      search(nearLeft, nearRight, nextAxis);
      if (diff * diff <= bound()) search(farLeft, farRight, nextAxis);
    };

    search(0, this.size - 1, 0);
    return best;
  }

  // ── Build ─────────────────────────────────────────────────────────────

  private sortRange(left: number, right: number, axis: number): void {
    if (right - left <= this.nodeSize) return;
    const m = (left + right) >> 1;
    this.select(m, left, right, axis);
    const nextAxis = (axis + 1) % 3;
    this.sortRange(left, m - 1, nextAxis);
    this.sortRange(m + 1, right, nextAxis);
  }

  /** Quickselect: place the k-th smallest (on `axis`) at k within [left, right] */
  private select(k: number, left: number, right: number, axis: number): void {
    const { coords } = this;
    while (right > left) {
      const pivot = coords[3 * ((left + right) >> 1) + axis];
      let i = left;
      let j = right;
      while (i <= j) {
        while (coords[3 * i + axis] < pivot) i++;
        while (coords[3 * j + axis] > pivot) j--;
        if (i <= j) {
          this.swap(i, j);
          i++;
          j--;
        }
      }
      if (k <= j) right = j;
      else if (k >= i) left = i;
      else return;
    }
  }

  private swap(i: number, j: number): void {
    const { ids, coords } = this;
    const id = ids[i];
    ids[i] = ids[j];
    ids[j] = id;
    for (let a = 0; a < 3; a++) {
      const c = coords[3 * i + a];
      coords[3 * i + a] = coords[3 * j + a];
      coords[3 * j + a] = c;
    }
  }
}

function sqDist(coords: Float64Array, i: number, x: number, y: number, z: number): number {
  const dx = coords[3 * i] - x;
  const dy = coords[3 * i + 1] - y;
  const dz = coords[3 * i + 2] - z;
  return dx * dx + dy * dy + dz * dz;
}
