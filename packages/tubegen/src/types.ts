/**
 * Type Definitions for Skeleton Meshing
 *
 * Input skeletons come from an upstream generator; everything else here is
 * derived output, computed fresh on each build call.
 */

import type * as THREE from "three";

// ============================================================================
// SKELETON INPUT
// ============================================================================

/** Linear RGBA color, each channel nominally in [0, 1] */
export type RGBA = readonly [number, number, number, number];

/** Linear RGB color */
export type RGB = readonly [number, number, number];

/**
 * One node of a skeleton strand.
 */
export interface SkeletonPoint {
  /** World-space position */
  readonly position: THREE.Vector3;
  /**
   * Turtle orientation at this node. Its +Y axis is the forward direction;
   * only the first point of a strand uses it, to seed the tube frame.
   */
  readonly orientation: THREE.Quaternion;
  /** Cross-section radius (>= 0) */
  readonly radius: number;
  /** Vertex color copied onto every vertex of this point's ring */
  readonly color: RGBA;
  /** Material bucket for the segment that starts at this point */
  readonly materialId: number;
  /** Multiplier on the V accumulation of the segment starting here */
  readonly uvScale: number;
}

/** One continuous branch; order is significant */
export type Strand = readonly SkeletonPoint[];

/**
 * Ordered collection of strands.
 */
export interface Skeleton {
  strands: SkeletonPoint[][];
}

// ============================================================================
// MESH OUTPUT
// ============================================================================

/**
 * Flat vertex/index buffers for one material bucket.
 *
 * Layout:
 * - positions: [x, y, z, ...] (V × 3)
 * - normals: [x, y, z, ...] (V × 3)
 * - colors: [r, g, b, a, ...] (V × 4)
 * - uvs: [u, v, ...] (V × 2)
 * - indices: triangle list into this bucket only
 */
export interface MeshGeometryData {
  positions: Float32Array;
  normals: Float32Array;
  colors: Float32Array;
  uvs: Float32Array;
  indices: Uint32Array;
}

/** Mesh output keyed by material id */
export type MeshBuckets = Map<number, MeshGeometryData>;

/**
 * Options for tube mesh generation.
 */
export interface TubeMeshOptions {
  /** Vertices around each ring, clamped to [3, 128] (default 8) */
  resolution?: number;
}

// ============================================================================
// COLLIDER OUTPUT
// ============================================================================

/**
 * Capsule aligned with local +Y. `cylinderLength` excludes the two caps.
 */
export interface CapsuleShape {
  type: "capsule";
  radius: number;
  cylinderLength: number;
}

export interface SphereShape {
  type: "sphere";
  radius: number;
}

export type PrimitiveShape = CapsuleShape | SphereShape;

export interface ColliderTransform {
  position: THREE.Vector3;
  rotation: THREE.Quaternion;
}

/**
 * A collision primitive placed in world space, one per qualifying segment.
 */
export interface PositionedCollider {
  transform: ColliderTransform;
  shape: PrimitiveShape;
  /** Average radius of the source segment */
  radius: number;
  /** Length of the source segment */
  length: number;
}

export interface CompoundChild extends ColliderTransform {
  shape: PrimitiveShape;
}

/**
 * Single collision body made of primitives with local offsets.
 */
export interface CompoundShape {
  type: "compound";
  children: CompoundChild[];
}

export interface ColliderOptions {
  /** Segments whose average radius is below this are skipped (default 0) */
  minRadius?: number;
}

// ============================================================================
// MATERIALS
// ============================================================================

/**
 * Procedural texture selector. The textures themselves belong to the host.
 */
export const TextureType = {
  None: "none",
  Grid: "grid",
  Noise: "noise",
  Checker: "checker",
} as const;

export type TextureTypeValue = (typeof TextureType)[keyof typeof TextureType];

/**
 * Per-material PBR settings used by the renderer and the GLB exporter.
 */
export interface MaterialSettings {
  baseColor: RGB;
  emissionColor: RGB;
  emissionStrength: number;
  roughness: number;
  metallic: number;
  texture: TextureTypeValue;
  uvScale: number;
}

/** Read-only settings lookup by material id */
export type MaterialSettingsLookup = ReadonlyMap<number, MaterialSettings>;
