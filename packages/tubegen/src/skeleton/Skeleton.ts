/**
 * Skeleton construction helpers.
 *
 * Skeletons normally arrive from an upstream generator. These helpers cover
 * hosts and tests that assemble one by hand.
 */

import * as THREE from "three";
import type { RGBA, Skeleton, SkeletonPoint } from "../types.js";

export const DEFAULT_POINT_RADIUS = 0.1;
export const WHITE: RGBA = [1, 1, 1, 1];

/**
 * Create a skeleton point, filling unspecified fields with defaults
 * (origin, identity orientation, radius 0.1, white, material 0, uvScale 1).
 */
export function createSkeletonPoint(
  fields: Partial<SkeletonPoint> = {},
): SkeletonPoint {
  return {
    position: fields.position ?? new THREE.Vector3(),
    orientation: fields.orientation ?? new THREE.Quaternion(),
    radius: fields.radius ?? DEFAULT_POINT_RADIUS,
    color: fields.color ?? WHITE,
    materialId: fields.materialId ?? 0,
    uvScale: fields.uvScale ?? 1,
  };
}

/**
 * Create a skeleton from strands. Strand arrays are copied, points are not.
 */
export function createSkeleton(
  strands: ReadonlyArray<readonly SkeletonPoint[]> = [],
): Skeleton {
  return { strands: strands.map((strand) => [...strand]) };
}

/**
 * Append a point to the skeleton's last strand, or start a new strand with it
 * when `startNewStrand` is set or the skeleton has none yet.
 */
export function appendSkeletonPoint(
  skeleton: Skeleton,
  point: SkeletonPoint,
  startNewStrand: boolean,
): void {
  const last = skeleton.strands[skeleton.strands.length - 1];
  if (startNewStrand || last === undefined) {
    skeleton.strands.push([point]);
  } else {
    last.push(point);
  }
}
