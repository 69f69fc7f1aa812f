/**
 * Skeleton fixtures shared by the test suites.
 */

import { Vector3 } from "three";
import { createSkeletonPoint } from "../src/skeleton/Skeleton.js";
import type { Skeleton, SkeletonPoint } from "../src/types.js";

export function pointAt(
  x: number,
  y: number,
  z: number,
  fields: Partial<SkeletonPoint> = {},
): SkeletonPoint {
  return createSkeletonPoint({ ...fields, position: new Vector3(x, y, z) });
}

/** `count` points spaced `spacing` apart along +Y, starting at the origin */
export function strandAlongY(
  count: number,
  spacing: number = 1,
  fields: Partial<SkeletonPoint> = {},
): SkeletonPoint[] {
  return Array.from({ length: count }, (_, i) => pointAt(0, i * spacing, 0, fields));
}

export function skeletonOf(...strands: SkeletonPoint[][]): Skeleton {
  return { strands };
}

export function allFinite(values: ArrayLike<number>): boolean {
  for (let i = 0; i < values.length; i++) {
    if (!Number.isFinite(values[i])) return false;
  }
  return true;
}
