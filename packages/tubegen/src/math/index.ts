/**
 * Math utilities for skeleton meshing.
 */

export {
  FORWARD_AXIS,
  PI2,
  PARALLEL_DOT_THRESHOLD,
  robustRotationArc,
  normalizeOrZero,
  forwardOf,
  clamp,
  clamp01,
} from "./Vector3.js";
