/**
 * Star systems - the static point cloud routes are plotted over.
 *
 * Every system in the dataset is one of two categories. Routes strictly
 * alternate between them: a neutron star supercharges the next jump, a fuel
 * star refills the tank before the next neutron.
 */

import type { Vec3 } from "./geo.js";

/** The two categories a route alternates between */
export type StarCategory = "neutron" | "fuel";

/** A star system in the loaded dataset. Immutable once loaded. */
export interface StarPoint {
  /** Row in the dataset table; the stable identity ordering for tie-breaks */
  readonly index: number;
  /** Canonical system name (unique within a dataset) */
  readonly name: string;
  readonly position: Readonly<Vec3>;
  readonly category: StarCategory;
  /** Per-system maximum jump distance in light years, if the snapshot carries one */
  readonly jumpRange?: number;
}
