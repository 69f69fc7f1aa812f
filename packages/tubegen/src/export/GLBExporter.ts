/**
 * GLB Export
 *
 * Writes material buckets as a binary glTF 2.0 container: a 12-byte header,
 * a JSON chunk describing scene/meshes/materials, and a BIN chunk holding
 * every vertex and index stream back to back. All numbers are little-endian.
 */

import type { MaterialSettingsLookup } from "../types.js";
import { clamp01 } from "../math/index.js";
import { getMaterialSettings } from "../materials/MaterialSettings.js";
import { ValidationError, fromZodError } from "../utils/errors.js";
import { Logger } from "../utils/Logger.js";
import {
  CHUNK_HEADER_BYTES,
  CHUNK_TYPE_BIN,
  CHUNK_TYPE_JSON,
  COMPONENT_FLOAT,
  COMPONENT_UNSIGNED_INT,
  GLB_HEADER_BYTES,
  GLB_MAGIC,
  GLB_VERSION,
  TARGET_ARRAY_BUFFER,
  TARGET_ELEMENT_ARRAY_BUFFER,
  gltfDocumentSchema,
  type GltfAccessor,
  type GltfBufferView,
  type GltfDocument,
  type GltfMaterial,
  type GltfMesh,
  type GltfNode,
} from "./gltf.js";
import {
  EXPORT_FORMATS,
  ExportFormat,
  type ExportableBuckets,
  type ExportableMesh,
  type ExportOptions,
  type ExportResult,
} from "./types.js";
import { sortedBuckets, triangleCountOf, vertexCountOf } from "./meshData.js";

const GENERATOR = "@strandmesh/tubegen";

/** Largest byte length the uint32 header field can hold */
const MAX_GLB_BYTES = 0xffffffff;

/** Round up to the next multiple of 4 */
function align4(n: number): number {
  return n + ((4 - (n % 4)) % 4);
}

/**
 * Total container size for the given unpadded chunk payloads.
 *
 * @throws ValidationError when the size does not fit the header's uint32
 */
export function glbByteLength(jsonByteLength: number, binByteLength: number): number {
  const total =
    GLB_HEADER_BYTES +
    CHUNK_HEADER_BYTES +
    align4(jsonByteLength) +
    (binByteLength > 0 ? CHUNK_HEADER_BYTES + align4(binByteLength) : 0);
  if (total > MAX_GLB_BYTES) {
    throw new ValidationError(
      `exceeds the ${MAX_GLB_BYTES}-byte container limit`,
      "glb.length",
      total,
    );
  }
  return total;
}

/**
 * Accumulates the BIN chunk. Every stream starts on a 4-byte boundary.
 */
class BinaryWriter {
  private parts: Uint8Array[] = [];
  private length = 0;

  get byteLength(): number {
    return this.length;
  }

  writeFloat32(values: ArrayLike<number>): { byteOffset: number; byteLength: number } {
    const bytes = new Uint8Array(values.length * 4);
    const view = new DataView(bytes.buffer);
    for (let i = 0; i < values.length; i++) {
      view.setFloat32(i * 4, values[i], true);
    }
    return this.append(bytes);
  }

  writeUint32(values: ArrayLike<number>): { byteOffset: number; byteLength: number } {
    const bytes = new Uint8Array(values.length * 4);
    const view = new DataView(bytes.buffer);
    for (let i = 0; i < values.length; i++) {
      view.setUint32(i * 4, values[i], true);
    }
    return this.append(bytes);
  }

  private append(bytes: Uint8Array): { byteOffset: number; byteLength: number } {
    const byteOffset = this.length;
    this.parts.push(bytes);
    this.length += bytes.byteLength;

    const padding = align4(this.length) - this.length;
    if (padding > 0) {
      this.parts.push(new Uint8Array(padding));
      this.length += padding;
    }
    return { byteOffset, byteLength: bytes.byteLength };
  }

  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const part of this.parts) {
      out.set(part, offset);
      offset += part.byteLength;
    }
    return out;
  }
}

/**
 * Per-axis bounds of a packed VEC3 stream (required on POSITION accessors).
 */
function computeBounds(
  positions: Float32Array,
  vertexCount: number,
): { min: number[]; max: number[] } {
  const min = [Infinity, Infinity, Infinity];
  const max = [-Infinity, -Infinity, -Infinity];
  for (let i = 0; i < vertexCount; i++) {
    for (let axis = 0; axis < 3; axis++) {
      const value = positions[i * 3 + axis];
      if (value < min[axis]) min[axis] = value;
      if (value > max[axis]) max[axis] = value;
    }
  }
  return { min, max };
}

/**
 * glTF material for a bucket. Emissive is emission color × strength,
 * clamped per channel to [0, 1].
 */
function buildMaterial(
  materialId: number,
  lookup: MaterialSettingsLookup,
): GltfMaterial {
  if (!lookup.has(materialId)) {
    Logger.systemDebug("GLBExporter", "No settings for material, using defaults", {
      materialId,
    });
  }
  const s = getMaterialSettings(lookup, materialId);

  return {
    name: `Material_${materialId}`,
    pbrMetallicRoughness: {
      baseColorFactor: [s.baseColor[0], s.baseColor[1], s.baseColor[2], 1],
      metallicFactor: s.metallic,
      roughnessFactor: s.roughness,
    },
    emissiveFactor: [
      clamp01(s.emissionColor[0] * s.emissionStrength),
      clamp01(s.emissionColor[1] * s.emissionStrength),
      clamp01(s.emissionColor[2] * s.emissionStrength),
    ],
    extras: { textureType: s.texture, uvScale: s.uvScale },
  };
}

/**
 * Pack a JSON document and binary payload into a GLB container.
 *
 * JSON is padded with spaces and BIN with zeros to 4-byte boundaries. An
 * empty payload omits the BIN chunk entirely.
 *
 * @throws ValidationError when the container would exceed 4 GiB
 */
export function packGLB(json: string, bin: Uint8Array): ArrayBuffer {
  const jsonBytes = new TextEncoder().encode(json);
  const jsonPadded = align4(jsonBytes.byteLength);
  const binPadded = align4(bin.byteLength);
  const hasBin = bin.byteLength > 0;
  const totalLength = glbByteLength(jsonBytes.byteLength, bin.byteLength);

  const buffer = new ArrayBuffer(totalLength);
  const view = new DataView(buffer);
  const bytes = new Uint8Array(buffer);

  view.setUint32(0, GLB_MAGIC, true);
  view.setUint32(4, GLB_VERSION, true);
  view.setUint32(8, totalLength, true);

  let offset = GLB_HEADER_BYTES;
  view.setUint32(offset, jsonPadded, true);
  view.setUint32(offset + 4, CHUNK_TYPE_JSON, true);
  offset += CHUNK_HEADER_BYTES;
  bytes.set(jsonBytes, offset);
  bytes.fill(0x20, offset + jsonBytes.byteLength, offset + jsonPadded);
  offset += jsonPadded;

  if (hasBin) {
    view.setUint32(offset, binPadded, true);
    view.setUint32(offset + 4, CHUNK_TYPE_BIN, true);
    offset += CHUNK_HEADER_BYTES;
    // Padding bytes are already zero.
    bytes.set(bin, offset);
  }

  return buffer;
}

/**
 * Minimal valid container: one empty scene, no meshes, no BIN chunk.
 */
export function buildEmptyGLB(): ArrayBuffer {
  const document: GltfDocument = {
    asset: { version: "2.0", generator: GENERATOR },
    scene: 0,
    scenes: [{ name: "Empty" }],
  };
  return packGLB(JSON.stringify(document), new Uint8Array(0));
}

/**
 * Convert mesh buckets and material settings to a GLB container.
 *
 * Buckets are written in ascending material id order, one glTF material per
 * bucket and one mesh + node per bucket that has vertices. Settings missing
 * from the lookup fall back to the defaults.
 */
export function meshesToGLB(
  buckets: ExportableBuckets,
  materialSettings: MaterialSettingsLookup = new Map(),
): ArrayBuffer {
  const writer = new BinaryWriter();
  const bufferViews: GltfBufferView[] = [];
  const accessors: GltfAccessor[] = [];
  const meshes: GltfMesh[] = [];
  const nodes: GltfNode[] = [];
  const materials: GltfMaterial[] = [];

  const addVertexStream = (
    values: Float32Array,
    vertexCount: number,
    itemSize: 2 | 3 | 4,
    bounds?: { min: number[]; max: number[] },
  ): number => {
    const region = writer.writeFloat32(values.subarray(0, vertexCount * itemSize));
    bufferViews.push({ buffer: 0, ...region, target: TARGET_ARRAY_BUFFER });
    const accessor: GltfAccessor = {
      bufferView: bufferViews.length - 1,
      componentType: COMPONENT_FLOAT,
      count: vertexCount,
      type: itemSize === 2 ? "VEC2" : itemSize === 3 ? "VEC3" : "VEC4",
    };
    if (bounds) {
      accessor.min = bounds.min;
      accessor.max = bounds.max;
    }
    accessors.push(accessor);
    return accessors.length - 1;
  };

  for (const [materialId, mesh] of sortedBuckets(buckets)) {
    const materialIndex = materials.length;
    materials.push(buildMaterial(materialId, materialSettings));

    const vertexCount = vertexCountOf(mesh);
    if (vertexCount === 0) {
      continue;
    }

    const attributes: Record<string, number> = {
      POSITION: addVertexStream(
        mesh.positions,
        vertexCount,
        3,
        computeBounds(mesh.positions, vertexCount),
      ),
    };
    if (hasStream(mesh.normals, vertexCount * 3)) {
      attributes.NORMAL = addVertexStream(mesh.normals, vertexCount, 3);
    }
    if (hasStream(mesh.uvs, vertexCount * 2)) {
      attributes.TEXCOORD_0 = addVertexStream(mesh.uvs, vertexCount, 2);
    }
    if (hasStream(mesh.colors, vertexCount * 4)) {
      attributes.COLOR_0 = addVertexStream(mesh.colors, vertexCount, 4);
    }

    const primitive: GltfMesh["primitives"][number] = {
      attributes,
      material: materialIndex,
    };
    if (mesh.indices && mesh.indices.length > 0) {
      const region = writer.writeUint32(mesh.indices);
      bufferViews.push({ buffer: 0, ...region, target: TARGET_ELEMENT_ARRAY_BUFFER });
      accessors.push({
        bufferView: bufferViews.length - 1,
        componentType: COMPONENT_UNSIGNED_INT,
        count: mesh.indices.length,
        type: "SCALAR",
      });
      primitive.indices = accessors.length - 1;
    }

    meshes.push({ name: `mesh_mat${materialId}`, primitives: [primitive] });
    nodes.push({ name: `node_mat${materialId}`, mesh: meshes.length - 1 });
  }

  if (nodes.length === 0) {
    return buildEmptyGLB();
  }

  const document: GltfDocument = {
    asset: { version: "2.0", generator: GENERATOR },
    scene: 0,
    scenes: [{ name: "Skeleton", nodes: nodes.map((_, i) => i) }],
    nodes,
    meshes,
    materials,
    accessors,
    bufferViews,
    buffers: [{ byteLength: writer.byteLength }],
  };

  return packGLB(JSON.stringify(document), writer.toBytes());
}

function hasStream(
  values: Float32Array | undefined,
  expectedLength: number,
): values is Float32Array {
  return values !== undefined && values.length >= expectedLength;
}

/**
 * Export buckets to GLB with statistics.
 */
export function exportToGLB(
  buckets: ExportableBuckets,
  materialSettings: MaterialSettingsLookup = new Map(),
  options: ExportOptions = {},
): ExportResult<ArrayBuffer> {
  const filename = options.filename || "skeleton";
  const format = EXPORT_FORMATS[ExportFormat.GLB];
  const data = meshesToGLB(buckets, materialSettings);

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

  const stats = {
    vertexCount,
    triangleCount,
    meshCount,
    fileSizeBytes: data.byteLength,
  };
  Logger.systemDebug("GLBExporter", "Exported GLB", stats);

  return {
    data,
    filename: `${filename}.${format.extension}`,
    mimeType: format.mimeType,
    stats,
  };
}

/**
 * Parsed GLB container.
 */
export interface GLBContents {
  version: number;
  /** Total length from the header */
  length: number;
  json: GltfDocument;
  /** BIN chunk payload including padding, or null when absent */
  bin: Uint8Array | null;
}

/**
 * Parse a GLB container back into its JSON document and binary payload.
 *
 * @throws ValidationError when the header, chunk layout or JSON is invalid
 */
export function readGLB(data: ArrayBuffer | Uint8Array): GLBContents {
  const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (bytes.byteLength < GLB_HEADER_BYTES + CHUNK_HEADER_BYTES) {
    throw new ValidationError("too short for a GLB container", "glb", bytes.byteLength);
  }
  const magic = view.getUint32(0, true);
  if (magic !== GLB_MAGIC) {
    throw new ValidationError("bad magic", "glb.magic", magic);
  }
  const version = view.getUint32(4, true);
  if (version !== GLB_VERSION) {
    throw new ValidationError("unsupported version", "glb.version", version);
  }
  const length = view.getUint32(8, true);
  if (length !== bytes.byteLength) {
    throw new ValidationError(
      `header length does not match ${bytes.byteLength} bytes`,
      "glb.length",
      length,
    );
  }

  let offset = GLB_HEADER_BYTES;
  const jsonLength = view.getUint32(offset, true);
  const jsonType = view.getUint32(offset + 4, true);
  if (jsonType !== CHUNK_TYPE_JSON) {
    throw new ValidationError("first chunk must be JSON", "glb.chunks[0].type", jsonType);
  }
  offset += CHUNK_HEADER_BYTES;
  if (offset + jsonLength > length) {
    throw new ValidationError("JSON chunk overruns container", "glb.chunks[0].length", jsonLength);
  }
  const text = new TextDecoder().decode(bytes.subarray(offset, offset + jsonLength));
  offset += jsonLength;

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(
      error instanceof Error ? error.message : String(error),
      "glb.json",
      text,
    );
  }
  const parsed = gltfDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw fromZodError(parsed.error, "glb.json", raw);
  }

  let bin: Uint8Array | null = null;
  if (offset + CHUNK_HEADER_BYTES <= length) {
    const binLength = view.getUint32(offset, true);
    const binType = view.getUint32(offset + 4, true);
    if (binType !== CHUNK_TYPE_BIN) {
      throw new ValidationError("second chunk must be BIN", "glb.chunks[1].type", binType);
    }
    offset += CHUNK_HEADER_BYTES;
    if (offset + binLength > length) {
      throw new ValidationError("BIN chunk overruns container", "glb.chunks[1].length", binLength);
    }
    bin = bytes.slice(offset, offset + binLength);
  }

  return { version, length, json: parsed.data, bin };
}
