/**
 * Tube Geometry Generation
 *
 * Converts skeleton strands into tube meshes, one per material id.
 *
 * Each filtered point gets one ring of `resolution + 1` vertices (the last
 * duplicates the first at U = 1 so textures wrap). Consecutive segments with
 * the same material share the ring at their common point; a material change
 * starts a fresh ring in the new bucket.
 */

import * as THREE from "three";
import type {
  MeshBuckets,
  MeshGeometryData,
  Skeleton,
  SkeletonPoint,
  TubeMeshOptions,
} from "../types.js";
import { PI2 } from "../math/index.js";
import { filterStrandPoints } from "../skeleton/PointFilter.js";
import { computeStrandFrames } from "./FrameTransport.js";
import { resolveTubeMeshOptions } from "../config.js";

/** Circumferences below this use a V scale of 1 instead of 1 / circumference */
const MIN_CIRCUMFERENCE = 0.0001;

/**
 * Growable per-material buffers. Never leaves this module.
 */
class BucketBuilder {
  readonly positions: number[] = [];
  readonly normals: number[] = [];
  readonly colors: number[] = [];
  readonly uvs: number[] = [];
  readonly indices: number[] = [];

  get vertexCount(): number {
    return this.positions.length / 3;
  }

  build(): MeshGeometryData {
    return {
      positions: new Float32Array(this.positions),
      normals: new Float32Array(this.normals),
      colors: new Float32Array(this.colors),
      uvs: new Float32Array(this.uvs),
      indices: new Uint32Array(this.indices),
    };
  }
}

/**
 * A ring already written to a bucket, identified by its first vertex.
 */
interface RingRef {
  materialId: number;
  start: number;
}

/**
 * V coordinate of every point along a filtered strand.
 *
 * V is accumulated point by point: each segment adds its length divided by
 * its circumference (2π × average radius), times the uv scale of its start
 * point. Because the running sum is shared, V is continuous across
 * boundaries where the radius changes.
 */
export function computeStrandVCoordinates(
  points: readonly SkeletonPoint[],
): number[] {
  if (points.length === 0) {
    return [];
  }

  const v: number[] = [0];
  for (let i = 0; i < points.length - 1; i++) {
    const curr = points[i];
    const next = points[i + 1];
    const segmentLength = curr.position.distanceTo(next.position);
    const avgRadius = (curr.radius + next.radius) * 0.5;
    const circumference = avgRadius * PI2;
    const vScale = circumference > MIN_CIRCUMFERENCE ? 1 / circumference : 1;
    v.push(v[i] + segmentLength * vScale * curr.uvScale);
  }
  return v;
}

/**
 * Append one ring of `resolution + 1` vertices and return its first index.
 */
function addRing(
  bucket: BucketBuilder,
  point: SkeletonPoint,
  frame: THREE.Quaternion,
  v: number,
  resolution: number,
): number {
  const start = bucket.vertexCount;
  const [r, g, b, a] = point.color;
  const local = new THREE.Vector3();

  for (let j = 0; j <= resolution; j++) {
    const u = j / resolution;
    const theta = u * PI2;
    const cos = Math.cos(theta);
    const sin = Math.sin(theta);

    local.set(cos, 0, sin).applyQuaternion(frame);
    bucket.normals.push(local.x, local.y, local.z);
    bucket.positions.push(
      point.position.x + local.x * point.radius,
      point.position.y + local.y * point.radius,
      point.position.z + local.z * point.radius,
    );
    bucket.colors.push(r, g, b, a);
    bucket.uvs.push(u, v);
  }

  return start;
}

/**
 * Stitch two rings with `resolution` quads, two triangles each.
 */
function connectRings(
  bucket: BucketBuilder,
  bottomStart: number,
  topStart: number,
  resolution: number,
): void {
  for (let j = 0; j < resolution; j++) {
    const bottomCurr = bottomStart + j;
    const bottomNext = bottomStart + j + 1;
    const topCurr = topStart + j;
    const topNext = topStart + j + 1;

    bucket.indices.push(bottomCurr, topCurr, bottomNext);
    bucket.indices.push(bottomNext, topCurr, topNext);
  }
}

/**
 * Emit one strand into the buckets.
 */
function generateStrand(
  strand: readonly SkeletonPoint[],
  buckets: Map<number, BucketBuilder>,
  resolution: number,
): void {
  const points = filterStrandPoints(strand);
  if (points.length < 2) {
    return;
  }

  const frames = computeStrandFrames(points);
  const vCoords = computeStrandVCoordinates(points);
  let previousTop: RingRef | null = null;

  for (let i = 0; i < points.length - 1; i++) {
    const curr = points[i];
    const next = points[i + 1];
    const materialId = curr.materialId;

    let bucket = buckets.get(materialId);
    if (!bucket) {
      bucket = new BucketBuilder();
      buckets.set(materialId, bucket);
    }

    const bottom =
      previousTop !== null && previousTop.materialId === materialId
        ? previousTop.start
        : addRing(bucket, curr, frames[i], vCoords[i], resolution);
    const top = addRing(bucket, next, frames[i + 1], vCoords[i + 1], resolution);

    connectRings(bucket, bottom, top, resolution);
    previousTop = { materialId, start: top };
  }
}

/**
 * Generate tube mesh data for every strand of a skeleton.
 *
 * @param skeleton - Source skeleton; strands shorter than two distinct
 *   points contribute nothing
 * @param options - Ring resolution (clamped to [3, 128])
 * @returns One bucket per material id encountered
 */
export function generateTubeMeshData(
  skeleton: Skeleton,
  options: TubeMeshOptions = {},
): MeshBuckets {
  const { resolution } = resolveTubeMeshOptions(options);
  const builders = new Map<number, BucketBuilder>();

  for (const strand of skeleton.strands) {
    generateStrand(strand, builders, resolution);
  }

  const result: MeshBuckets = new Map();
  for (const [materialId, builder] of builders) {
    result.set(materialId, builder.build());
  }
  return result;
}

/**
 * Wrap mesh data in a Three.js BufferGeometry.
 * Colors are RGBA (item size 4); indices are 32-bit.
 */
export function toBufferGeometry(data: MeshGeometryData): THREE.BufferGeometry {
  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute("position", new THREE.BufferAttribute(data.positions, 3));
  geometry.setAttribute("normal", new THREE.BufferAttribute(data.normals, 3));
  geometry.setAttribute("color", new THREE.BufferAttribute(data.colors, 4));
  geometry.setAttribute("uv", new THREE.BufferAttribute(data.uvs, 2));
  geometry.setIndex(new THREE.BufferAttribute(data.indices, 1));
  return geometry;
}

/**
 * Generate tube geometry by material id, ready for the host renderer.
 *
 * @param skeleton - Source skeleton
 * @param options - Geometry generation options
 * @returns BufferGeometry per material id
 */
export function generateTubeGeometryByMaterial(
  skeleton: Skeleton,
  options: TubeMeshOptions = {},
): Map<number, THREE.BufferGeometry> {
  const result = new Map<number, THREE.BufferGeometry>();
  for (const [materialId, data] of generateTubeMeshData(skeleton, options)) {
    result.set(materialId, toBufferGeometry(data));
  }
  return result;
}
