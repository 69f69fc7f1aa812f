export {
  DEFAULT_POINT_RADIUS,
  WHITE,
  createSkeletonPoint,
  createSkeleton,
  appendSkeletonPoint,
} from "./Skeleton.js";
export { DUPLICATE_DISTANCE_SQ, filterStrandPoints } from "./PointFilter.js";
