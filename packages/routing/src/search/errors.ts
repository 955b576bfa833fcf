/**
 * Search outcomes that are not a route.
 */

/** Counters from one search run */
export interface SearchStats {
  /** Nodes popped and expanded */
  expanded: number;
  /** Nodes created (the arena size) */
  created: number;
  /** Largest frontier size seen */
  maxFrontier: number;
  elapsedMs: number;
}

/**
 * The frontier emptied before the destination was reached.
 * Non-fatal: the run completes without a route.
 */
export class NoRouteFoundError extends Error {
  constructor(
    public readonly startName: string,
    public readonly endName: string,
    public readonly stats: SearchStats,
  ) {
    super(
      `No route from "${startName}" to "${endName}" (explored ${stats.expanded.toLocaleString("en-US")} systems)`,
    );
    this.name = "NoRouteFoundError";
  }
}

/** The search created more nodes than its budget allows */
export class ResourceExhaustionError extends Error {
  constructor(
    public readonly limit: number,
    public readonly stats: SearchStats,
  ) {
    super(`Search exceeded its budget of ${limit.toLocaleString("en-US")} nodes without resolving`);
    this.name = "ResourceExhaustionError";
  }
}
