/**
 * Collider Generation
 *
 * One capsule per skeleton segment, or a sphere where the segment is too
 * short for a capsule's caps to fit between its endpoints. Far cheaper than
 * convex decomposition for branch-like shapes.
 */

import type {
  ColliderOptions,
  CompoundShape,
  PositionedCollider,
  PrimitiveShape,
  Skeleton,
  SkeletonPoint,
} from "../types.js";
import { FORWARD_AXIS, robustRotationArc } from "../math/index.js";
import { filterStrandPoints } from "../skeleton/PointFilter.js";
import { resolveColliderOptions } from "../config.js";

/**
 * Choose the primitive for a segment.
 *
 * A capsule with cap radius r needs length >= 2r; anything shorter becomes a
 * sphere of radius r so nothing reaches past the segment's ends.
 */
export function selectPrimitiveShape(
  length: number,
  radius: number,
): PrimitiveShape {
  if (length < 2 * radius) {
    return { type: "sphere", radius };
  }
  return { type: "capsule", radius, cylinderLength: length - 2 * radius };
}

/**
 * Collider for the segment start → end, or null when it is too thin or
 * has no length.
 */
export function createSegmentCollider(
  start: SkeletonPoint,
  end: SkeletonPoint,
  minRadius: number,
): PositionedCollider | null {
  const radius = (start.radius + end.radius) * 0.5;
  if (radius < minRadius) {
    return null;
  }

  const segment = end.position.clone().sub(start.position);
  const length = segment.length();
  if (length < Number.EPSILON) {
    return null;
  }

  const direction = segment.divideScalar(length);
  const position = start.position.clone().add(end.position).multiplyScalar(0.5);

  return {
    transform: {
      position,
      rotation: robustRotationArc(FORWARD_AXIS, direction),
    },
    shape: selectPrimitiveShape(length, radius),
    radius,
    length,
  };
}

/**
 * Generate one positioned collider per qualifying segment.
 *
 * Useful for debugging, visualization, or custom compound construction.
 * Prefer {@link buildCompoundCollider} for registering a single body.
 */
export function buildColliderParts(
  skeleton: Skeleton,
  options: ColliderOptions = {},
): PositionedCollider[] {
  const { minRadius } = resolveColliderOptions(options);
  const colliders: PositionedCollider[] = [];

  for (const strand of skeleton.strands) {
    const points = filterStrandPoints(strand);
    for (let i = 0; i < points.length - 1; i++) {
      const collider = createSegmentCollider(points[i], points[i + 1], minRadius);
      if (collider) {
        colliders.push(collider);
      }
    }
  }

  return colliders;
}

/**
 * Merge positioned colliders into one compound shape. Children are copies,
 * so the compound and the list can be edited independently.
 * Returns null for an empty list.
 */
export function toCompoundShape(
  parts: readonly PositionedCollider[],
): CompoundShape | null {
  if (parts.length === 0) {
    return null;
  }
  return {
    type: "compound",
    children: parts.map((part) => ({
      position: part.transform.position.clone(),
      rotation: part.transform.rotation.clone(),
      shape: { ...part.shape },
    })),
  };
}

/**
 * Generate a single compound collider for the whole skeleton, or null when no
 * segment qualifies (empty skeleton, or everything below `minRadius`).
 */
export function buildCompoundCollider(
  skeleton: Skeleton,
  options: ColliderOptions = {},
): CompoundShape | null {
  return toCompoundShape(buildColliderParts(skeleton, options));
}
