/**
 * One-call pipeline: skeleton in, meshes and colliders out.
 *
 * Hosts that only rebuild when something changed do that check themselves
 * before calling; nothing here is cached between calls.
 */

import type {
  ColliderOptions,
  CompoundShape,
  MeshBuckets,
  PositionedCollider,
  Skeleton,
  TubeMeshOptions,
} from "./types.js";
import { generateTubeMeshData } from "./geometry/index.js";
import { buildColliderParts, toCompoundShape } from "./collider/index.js";

export interface SkeletonAssetOptions {
  mesh?: TubeMeshOptions;
  /** Omit to skip collider generation */
  collider?: ColliderOptions;
}

export interface SkeletonAssets {
  meshes: MeshBuckets;
  colliders: PositionedCollider[];
  /** Null when colliders were skipped or no segment qualified */
  compound: CompoundShape | null;
}

export function generateSkeletonAssets(
  skeleton: Skeleton,
  options: SkeletonAssetOptions = {},
): SkeletonAssets {
  const meshes = generateTubeMeshData(skeleton, options.mesh);
  const colliders = options.collider
    ? buildColliderParts(skeleton, options.collider)
    : [];

  return {
    meshes,
    colliders,
    compound: toCompoundShape(colliders),
  };
}
