/**
 * Flat storage for search nodes.
 *
 * Each node is a row in parallel typed arrays and refers to its parent by
 * row number (-1 for the root), so the explored tree has no object graph to
 * collect and a route is read back by walking parent rows.
 */

const INITIAL_CAPACITY = 1024;

export class NodeArena {
  private capacity: number;
  private count = 0;
  private pointIndices: Int32Array;
  private hopCounts: Int32Array;
  private distances: Float64Array;
  private tieKeys: Float64Array;
  private parents: Int32Array;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.capacity = Math.max(1, initialCapacity);
    this.pointIndices = new Int32Array(this.capacity);
    this.hopCounts = new Int32Array(this.capacity);
    this.distances = new Float64Array(this.capacity);
    this.tieKeys = new Float64Array(this.capacity);
    this.parents = new Int32Array(this.capacity);
  }

  get size(): number {
    return this.count;
  }

  /** Append a node and return its row */
  add(pointIndex: number, hops: number, distance: number, tieKey: number, parent: number): number {
    if (this.count === this.capacity) this.grow();
    const id = this.count++;
    this.pointIndices[id] = pointIndex;
    this.hopCounts[id] = hops;
    this.distances[id] = distance;
    this.tieKeys[id] = tieKey;
    this.parents[id] = parent;
    return id;
  }

  pointIndex(id: number): number {
    return this.pointIndices[id];
  }

  hops(id: number): number {
    return this.hopCounts[id];
  }

  distance(id: number): number {
    return this.distances[id];
  }

  tieKey(id: number): number {
    return this.tieKeys[id];
  }

  parent(id: number): number {
    return this.parents[id];
  }

  /** Frontier order: fewer hops, then lower tie key, then lower point index */
  less(a: number, b: number): boolean {
    const ha = this.hopCounts[a];
    const hb = this.hopCounts[b];
    if (ha !== hb) return ha < hb;
    const ka = this.tieKeys[a];
    const kb = this.tieKeys[b];
    if (ka !== kb) return ka < kb;
    return this.pointIndices[a] < this.pointIndices[b];
  }

  /** Point indices from the root to `id`, inclusive */
  pathTo(id: number): number[] {
    const path: number[] = [];
    for (let at = id; at !== -1; at = this.parents[at]) {
      path.push(this.pointIndices[at]);
    }
    return path.reverse();
  }

  private grow(): void {
    this.capacity *= 2;
    this.pointIndices = growInt32(this.pointIndices, this.capacity);
    this.hopCounts = growInt32(this.hopCounts, this.capacity);
    this.distances = growFloat64(this.distances, this.capacity);
    this.tieKeys = growFloat64(this.tieKeys, this.capacity);
    this.parents = growInt32(this.parents, this.capacity);
  }
}

function growInt32(src: Int32Array, capacity: number): Int32Array {
  const out = new Int32Array(capacity);
  out.set(src);
  return out;
}

function growFloat64(src: Float64Array, capacity: number): Float64Array {
  const out = new Float64Array(capacity);
  out.set(src);
  return out;
}
