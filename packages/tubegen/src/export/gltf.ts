/**
 * The subset of glTF 2.0 JSON written by the GLB exporter, as zod schemas so
 * readGLB() can hand back a typed document.
 */

import { z } from "zod";

/** "glTF" */
export const GLB_MAGIC = 0x46546c67;
export const GLB_VERSION = 2;
/** "JSON" */
export const CHUNK_TYPE_JSON = 0x4e4f534a;
/** "BIN\0" */
export const CHUNK_TYPE_BIN = 0x004e4942;

export const GLB_HEADER_BYTES = 12;
export const CHUNK_HEADER_BYTES = 8;

export const COMPONENT_FLOAT = 5126;
export const COMPONENT_UNSIGNED_INT = 5125;
export const TARGET_ARRAY_BUFFER = 34962;
export const TARGET_ELEMENT_ARRAY_BUFFER = 34963;

const index = z.number().int().nonnegative();

export const gltfAccessorSchema = z.object({
  bufferView: index,
  componentType: z.number().int(),
  count: index,
  type: z.enum(["SCALAR", "VEC2", "VEC3", "VEC4"]),
  min: z.array(z.number()).optional(),
  max: z.array(z.number()).optional(),
});

export const gltfBufferViewSchema = z.object({
  buffer: index,
  byteOffset: index,
  byteLength: index,
  target: z.number().int().optional(),
});

export const gltfPrimitiveSchema = z.object({
  attributes: z.record(z.string(), index),
  indices: index.optional(),
  material: index.optional(),
});

export const gltfMeshSchema = z.object({
  name: z.string().optional(),
  primitives: z.array(gltfPrimitiveSchema),
});

export const gltfNodeSchema = z.object({
  name: z.string().optional(),
  mesh: index.optional(),
});

export const gltfMaterialSchema = z.object({
  name: z.string().optional(),
  pbrMetallicRoughness: z
    .object({
      baseColorFactor: z.array(z.number()).length(4),
      metallicFactor: z.number(),
      roughnessFactor: z.number(),
    })
    .optional(),
  emissiveFactor: z.array(z.number()).length(3).optional(),
  extras: z.record(z.string(), z.unknown()).optional(),
});

export const gltfSceneSchema = z.object({
  name: z.string().optional(),
  nodes: z.array(index).optional(),
});

export const gltfDocumentSchema = z.object({
  asset: z.object({
    version: z.string(),
    generator: z.string().optional(),
  }),
  scene: index.optional(),
  scenes: z.array(gltfSceneSchema).optional(),
  nodes: z.array(gltfNodeSchema).optional(),
  meshes: z.array(gltfMeshSchema).optional(),
  materials: z.array(gltfMaterialSchema).optional(),
  accessors: z.array(gltfAccessorSchema).optional(),
  bufferViews: z.array(gltfBufferViewSchema).optional(),
  buffers: z.array(z.object({ byteLength: index })).optional(),
});

export type GltfAccessor = z.infer<typeof gltfAccessorSchema>;
export type GltfBufferView = z.infer<typeof gltfBufferViewSchema>;
export type GltfMesh = z.infer<typeof gltfMeshSchema>;
export type GltfNode = z.infer<typeof gltfNodeSchema>;
export type GltfMaterial = z.infer<typeof gltfMaterialSchema>;
export type GltfDocument = z.infer<typeof gltfDocumentSchema>;
