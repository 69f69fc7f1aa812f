/**
 * Vector and rotation helpers shared by the tube and collider builders.
 */

import * as THREE from "three";

/** Tube forward axis in frame-local space; rings lie in the local XZ plane */
export const FORWARD_AXIS = new THREE.Vector3(0, 1, 0);

/** 2 * Pi */
export const PI2 = Math.PI * 2;

/**
 * Dot product beyond which two unit vectors count as parallel
 * (or antiparallel, when negated).
 */
export const PARALLEL_DOT_THRESHOLD = 0.9999;

/**
 * Shortest-arc rotation taking unit vector `from` onto unit vector `to`.
 *
 * Nearly parallel inputs give the identity. Nearly opposite inputs have no
 * unique shortest arc, so the result is a half turn about an axis
 * perpendicular to `from`, built from X (or Y when `from` is close to X).
 */
export function robustRotationArc(
  from: THREE.Vector3,
  to: THREE.Vector3,
): THREE.Quaternion {
  const dot = from.dot(to);

  if (dot > PARALLEL_DOT_THRESHOLD) {
    return new THREE.Quaternion();
  }

  if (dot < -PARALLEL_DOT_THRESHOLD) {
    const reference =
      Math.abs(from.x) < 0.8
        ? new THREE.Vector3(1, 0, 0)
        : new THREE.Vector3(0, 1, 0);
    const axis = reference.cross(from).normalize();
    return new THREE.Quaternion().setFromAxisAngle(axis, Math.PI);
  }

  return new THREE.Quaternion().setFromUnitVectors(from, to);
}

/**
 * Normalized copy of `v`, or the zero vector when `v` has no length.
 */
export function normalizeOrZero(v: THREE.Vector3): THREE.Vector3 {
  const length = v.length();
  if (length === 0 || !Number.isFinite(length)) {
    return new THREE.Vector3();
  }
  return v.clone().divideScalar(length);
}

/**
 * Forward axis of a rotation, in world space.
 */
export function forwardOf(rotation: THREE.Quaternion): THREE.Vector3 {
  return FORWARD_AXIS.clone().applyQuaternion(rotation);
}

/**
 * Clamp a value between min and max.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Clamp a value between 0 and 1.
 */
export function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}
