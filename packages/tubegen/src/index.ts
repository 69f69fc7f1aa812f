/**
 * @strandmesh/tubegen
 *
 * Turns branching skeletons (ordered strands of points with radius, color,
 * material and UV scale) into twist-free tube meshes bucketed by material,
 * capsule/sphere collision proxies, and OBJ or GLB files.
 *
 * @packageDocumentation
 */

// Types
export * from "./types.js";

// Math utilities
export {
  FORWARD_AXIS,
  PI2,
  robustRotationArc,
  normalizeOrZero,
  forwardOf,
  clamp,
  clamp01,
} from "./math/index.js";

// Skeleton input
export {
  createSkeletonPoint,
  createSkeleton,
  appendSkeletonPoint,
  filterStrandPoints,
  DUPLICATE_DISTANCE_SQ,
} from "./skeleton/index.js";

// Geometry
export {
  miterTangent,
  computeStrandFrames,
  computeStrandVCoordinates,
  generateTubeMeshData,
  generateTubeGeometryByMaterial,
  toBufferGeometry,
} from "./geometry/index.js";

// Colliders
export {
  selectPrimitiveShape,
  createSegmentCollider,
  buildColliderParts,
  toCompoundShape,
  buildCompoundCollider,
} from "./collider/index.js";

// Materials
export {
  DEFAULT_MATERIAL_SETTINGS,
  MAX_MATERIAL_ID,
  materialSettingsSchema,
  createDefaultMaterialPalette,
  parseMaterialSettings,
  parseMaterialSettingsMap,
  getMaterialSettings,
  changedMaterialIds,
  type MaterialSettingsInput,
} from "./materials/index.js";

// Export
export * from "./export/index.js";

// Pipeline
export {
  generateSkeletonAssets,
  type SkeletonAssetOptions,
  type SkeletonAssets,
} from "./pipeline.js";

// Configuration
export {
  MIN_RESOLUTION,
  MAX_RESOLUTION,
  DEFAULT_RESOLUTION,
  tubeMeshOptionsSchema,
  colliderOptionsSchema,
  resolveTubeMeshOptions,
  resolveColliderOptions,
} from "./config.js";

// Logging and errors
export { Logger, LogLevel, type ILogger, type LogEntry } from "./utils/Logger.js";
export { ValidationError } from "./utils/errors.js";
