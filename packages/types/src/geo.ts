/**
 * Spatial utility types.
 */

/** A position in galactic coordinates, in light years */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}
