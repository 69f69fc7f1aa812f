/**
 * Frame Transport
 *
 * One orientation per strand point, propagated by minimal rotations so the
 * tube does not twist along its length.
 */

import * as THREE from "three";
import type { SkeletonPoint } from "../types.js";
import { forwardOf, normalizeOrZero, robustRotationArc } from "../math/index.js";

/**
 * Below this squared length the incoming and outgoing directions cancel out
 * (a fold-back) and the miter falls back to the incoming direction.
 */
const MITER_CANCEL_LENGTH_SQ = 0.001;

/**
 * Direction of the tube at point `index` of a filtered strand.
 *
 * The first point follows its outgoing segment, the last point its incoming
 * one, and interior points the bisector of the two.
 */
export function miterTangent(
  points: readonly SkeletonPoint[],
  index: number,
): THREE.Vector3 {
  const curr = points[index].position;

  if (index === 0) {
    return normalizeOrZero(points[1].position.clone().sub(curr));
  }

  const vIn = normalizeOrZero(
    curr.clone().sub(points[index - 1].position),
  );
  if (index === points.length - 1) {
    return vIn;
  }

  const vOut = normalizeOrZero(points[index + 1].position.clone().sub(curr));
  const sum = vIn.clone().add(vOut);
  if (sum.lengthSq() < MITER_CANCEL_LENGTH_SQ) {
    return vIn;
  }
  return sum.normalize();
}

/**
 * Compute a frame for every point of an already filtered strand.
 *
 * The first point's declared orientation is bent so its forward axis follows
 * the first segment. Each later frame is the previous one bent onto that
 * point's miter tangent. Returns one quaternion per point, or an empty array
 * for strands shorter than two points.
 */
export function computeStrandFrames(
  points: readonly SkeletonPoint[],
): THREE.Quaternion[] {
  if (points.length < 2) {
    return [];
  }

  const frames: THREE.Quaternion[] = [];
  let current = points[0].orientation.clone();

  for (let i = 0; i < points.length; i++) {
    const tangent = miterTangent(points, i);
    const bend = robustRotationArc(forwardOf(current), tangent);
    current = bend.multiply(current).normalize();
    frames.push(current.clone());
  }

  return frames;
}
