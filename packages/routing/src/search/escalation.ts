/**
 * Range escalation: when no route exists at the configured base range, try
 * again with a slightly longer one. Systems with their own range attribute
 * are unaffected by the base range.
 */

import type { StarPoint } from "@neutron-hop/types";
import type { StarDataset, StarSpatialIndex } from "@neutron-hop/builder";

import type { SearchConfig } from "../config/search-config.js";
import { NoRouteFoundError } from "./errors.js";
import { RouteSearch, type RouteSearchResult } from "./route-search.js";

/** Log a progress line every this many retries */
const LOG_EVERY = 25;

export interface EscalatedSearchResult extends RouteSearchResult {
  /** Base range the route was found at */
  baseJumpRange: number;
  /** Retries after the first attempt */
  escalations: number;
}

/**
 * Search at the configured base range; if escalation is enabled, retry with
 * the base range raised by `escalation.step` until a route is found or the
 * range would pass `escalation.maxJumpRange`.
 *
 * @throws NoRouteFoundError from the last attempt when every range fails
 * @throws ResourceExhaustionError immediately, without further retries
 */
export function searchWithRangeEscalation(
  dataset: StarDataset,
  index: StarSpatialIndex,
  start: StarPoint,
  end: StarPoint,
  config: SearchConfig,
): EscalatedSearchResult {
  const { enabled, step, maxJumpRange } = config.escalation;
  let baseJumpRange = config.baseJumpRange;
  let escalations = 0;

  for (;;) {
    const search = new RouteSearch(dataset, index, { ...config, baseJumpRange });
    try {
      return { ...search.search(start, end), baseJumpRange, escalations };
    } catch (err) {
      if (!(err instanceof NoRouteFoundError) || !enabled) throw err;
      if (config.baseJumpRange + (escalations + 1) * step > maxJumpRange) {
        console.warn(`[search] Exceeded ${maxJumpRange}ly base range; giving up`);
        throw err;
      }
    }

    escalations++;
    baseJumpRange = config.baseJumpRange + escalations * step;
    if (escalations % LOG_EVERY === 0) {
      console.log(
        `[search] Raised base range to ${baseJumpRange.toFixed(3)}ly after ${escalations} failed attempts`,
      );
    }
  }
}
