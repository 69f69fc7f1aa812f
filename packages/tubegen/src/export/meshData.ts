/**
 * Helpers shared by the exporters.
 */

import type * as THREE from "three";
import type { ExportableBuckets, ExportableMesh } from "./types.js";

export function vertexCountOf(mesh: ExportableMesh): number {
  return Math.floor(mesh.positions.length / 3);
}

export function triangleCountOf(mesh: ExportableMesh): number {
  return mesh.indices
    ? Math.floor(mesh.indices.length / 3)
    : Math.floor(vertexCountOf(mesh) / 3);
}

/**
 * Bucket entries in ascending material id order, so exports are
 * deterministic whatever order the map was filled in.
 */
export function sortedBuckets(
  buckets: ExportableBuckets,
): Array<[number, ExportableMesh]> {
  return [...buckets.entries()].sort(([a], [b]) => a - b);
}

type AnyAttribute = THREE.BufferAttribute | THREE.InterleavedBufferAttribute;

function readVectors(attribute: AnyAttribute, itemSize: number): Float32Array {
  const out = new Float32Array(attribute.count * itemSize);
  for (let i = 0; i < attribute.count; i++) {
    const o = i * itemSize;
    out[o] = attribute.getX(i);
    if (itemSize > 1) out[o + 1] = attribute.getY(i);
    if (itemSize > 2) out[o + 2] = attribute.getZ(i);
    if (itemSize > 3) out[o + 3] = attribute.itemSize > 3 ? attribute.getW(i) : 1;
  }
  return out;
}

/**
 * Copy a BufferGeometry's position/normal/color/uv/index data into an
 * exportable mesh. RGB colors gain an alpha of 1; interleaved attributes
 * are de-interleaved.
 */
export function meshDataFromBufferGeometry(
  geometry: THREE.BufferGeometry,
): ExportableMesh {
  const mesh: ExportableMesh = {
    positions: geometry.hasAttribute("position")
      ? readVectors(geometry.getAttribute("position"), 3)
      : new Float32Array(0),
  };

  if (geometry.hasAttribute("normal")) {
    mesh.normals = readVectors(geometry.getAttribute("normal"), 3);
  }
  if (geometry.hasAttribute("color")) {
    mesh.colors = readVectors(geometry.getAttribute("color"), 4);
  }
  if (geometry.hasAttribute("uv")) {
    mesh.uvs = readVectors(geometry.getAttribute("uv"), 2);
  }

  const index = geometry.getIndex();
  if (index) {
    const indices = new Uint32Array(index.count);
    for (let i = 0; i < index.count; i++) {
      indices[i] = index.getX(i);
    }
    mesh.indices = indices;
  }

  return mesh;
}
