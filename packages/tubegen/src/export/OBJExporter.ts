/**
 * OBJ Export
 *
 * Each material bucket becomes one `o` object. Indices are 1-based and
 * offset by the vertices of the objects written before it, since OBJ
 * vertex numbering is global to the file.
 */

import {
  EXPORT_FORMATS,
  ExportFormat,
  type ExportableBuckets,
  type ExportableMesh,
  type ExportOptions,
  type ExportResult,
} from "./types.js";
import { sortedBuckets, triangleCountOf, vertexCountOf } from "./meshData.js";

export interface OBJExportOptions extends ExportOptions {
  /** Objects are named `${baseName}_mat${id}` (default "skeleton") */
  baseName?: string;
}

function formatVec3(values: Float32Array, i: number): string {
  const o = i * 3;
  return `${values[o].toFixed(6)} ${values[o + 1].toFixed(6)} ${values[o + 2].toFixed(6)}`;
}

/** Normals of a mesh when there is one per vertex */
function usableNormals(mesh: ExportableMesh): Float32Array | undefined {
  return mesh.normals && mesh.normals.length >= vertexCountOf(mesh) * 3
    ? mesh.normals
    : undefined;
}

/**
 * Convert a single mesh to OBJ text.
 *
 * `v` and `vn` lines are numbered separately in OBJ, so a file mixing meshes
 * with and without normals needs a separate offset for each.
 *
 * @param mesh - Mesh to write
 * @param objectName - Name for the `o` line
 * @param vertexOffset - `v` lines written before this mesh
 * @param normalOffset - `vn` lines written before this mesh
 */
export function meshToOBJ(
  mesh: ExportableMesh,
  objectName: string,
  vertexOffset: number = 0,
  normalOffset: number = vertexOffset,
): string {
  const vertexCount = vertexCountOf(mesh);
  const normals = usableNormals(mesh);
  const lines: string[] = [`o ${objectName}`];

  for (let i = 0; i < vertexCount; i++) {
    lines.push(`v ${formatVec3(mesh.positions, i)}`);
  }

  if (normals) {
    for (let i = 0; i < vertexCount; i++) {
      lines.push(`vn ${formatVec3(normals, i)}`);
    }
  }

  const faceCount = triangleCountOf(mesh);
  for (let t = 0; t < faceCount; t++) {
    const corners = [0, 1, 2].map((k) =>
      mesh.indices ? mesh.indices[t * 3 + k] : t * 3 + k,
    );
    lines.push(
      normals
        ? `f ${corners.map((c) => `${c + 1 + vertexOffset}//${c + 1 + normalOffset}`).join(" ")}`
        : `f ${corners.map((c) => c + 1 + vertexOffset).join(" ")}`,
    );
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Convert all buckets to one OBJ document body, ascending by material id.
 * Buckets without vertices are skipped. Returns only the object blocks;
 * exportToOBJ() adds the header comments.
 */
export function meshesToOBJ(
  buckets: ExportableBuckets,
  baseName: string = "skeleton",
): string {
  let combined = "";
  let vertexOffset = 0;
  let normalOffset = 0;

  for (const [materialId, mesh] of sortedBuckets(buckets)) {
    const vertexCount = vertexCountOf(mesh);
    if (vertexCount === 0) continue;

    combined += meshToOBJ(
      mesh,
      `${baseName}_mat${materialId}`,
      vertexOffset,
      normalOffset,
    );
    vertexOffset += vertexCount;
    if (usableNormals(mesh)) {
      normalOffset += vertexCount;
    }
  }

  return combined;
}

/**
 * Export buckets to an OBJ file body with a comment header.
 */
export function exportToOBJ(
  buckets: ExportableBuckets,
  options: OBJExportOptions = {},
): ExportResult<string> {
  const filename = options.filename || "skeleton";
  const format = EXPORT_FORMATS[ExportFormat.OBJ];

  let vertexCount = 0;
  let triangleCount = 0;
  let meshCount = 0;
  for (const mesh of buckets.values()) {
    const count = vertexCountOf(mesh);
    if (count === 0) continue;
    vertexCount += count;
    triangleCount += triangleCountOf(mesh);
    meshCount++;
  }

  let obj = "# Skeleton mesh - @strandmesh/tubegen\n";
  obj += `# Objects: ${meshCount}\n`;
  obj += `# Vertices: ${vertexCount}\n`;
  obj += `# Faces: ${triangleCount}\n\n`;
  obj += meshesToOBJ(buckets, options.baseName);

  return {
    data: obj,
    filename: `${filename}.${format.extension}`,
    mimeType: format.mimeType,
    stats: {
      vertexCount,
      triangleCount,
      meshCount,
      fileSizeBytes: new TextEncoder().encode(obj).byteLength,
    },
  };
}
