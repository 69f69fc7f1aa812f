/**
 * Point Filter
 *
 * Drops near-duplicate neighbours so no strand produces a zero-length
 * segment (whose direction would normalize to NaN).
 */

import type { SkeletonPoint, Strand } from "../types.js";

/** Squared distance at or below which adjacent points are merged */
export const DUPLICATE_DISTANCE_SQ = 0.000001;

/**
 * Filter a strand so every consecutive pair is more than
 * sqrt(DUPLICATE_DISTANCE_SQ) apart.
 *
 * The first point is always kept. Each later point is compared with the last
 * point kept, so a run of coincident points collapses onto its first member.
 * The result may be shorter than two points; callers treat that as "no
 * geometry", not as an error.
 */
export function filterStrandPoints(strand: Strand): SkeletonPoint[] {
  const filtered: SkeletonPoint[] = [];

  for (const point of strand) {
    const last = filtered[filtered.length - 1];
    if (
      last === undefined ||
      last.position.distanceToSquared(point.position) > DUPLICATE_DISTANCE_SQ
    ) {
      filtered.push(point);
    }
  }

  return filtered;
}
