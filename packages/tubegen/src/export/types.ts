/**
 * Export types and the format registry.
 */

/**
 * Vertex/index data an exporter can write. Tube mesh buckets satisfy this;
 * so does anything converted with meshDataFromBufferGeometry().
 */
export interface ExportableMesh {
  /** [x, y, z, ...] */
  positions: Float32Array;
  /** [x, y, z, ...], one per vertex */
  normals?: Float32Array;
  /** [r, g, b, a, ...], one per vertex */
  colors?: Float32Array;
  /** [u, v, ...], one per vertex */
  uvs?: Float32Array;
  /** Triangle list; when absent, vertices are taken three at a time */
  indices?: Uint32Array | Uint16Array;
}

/** Meshes keyed by material id */
export type ExportableBuckets = ReadonlyMap<number, ExportableMesh>;

/**
 * Supported export formats.
 */
export const ExportFormat = {
  OBJ: "obj",
  GLB: "glb",
} as const;

export type ExportFormatType = (typeof ExportFormat)[keyof typeof ExportFormat];

export interface ExportFormatInfo {
  /** Display name */
  name: string;
  /** File extension without the dot */
  extension: string;
  mimeType: string;
}

export const EXPORT_FORMATS: Record<ExportFormatType, ExportFormatInfo> = {
  [ExportFormat.OBJ]: { name: "OBJ", extension: "obj", mimeType: "text/plain" },
  [ExportFormat.GLB]: {
    name: "GLB",
    extension: "glb",
    mimeType: "model/gltf-binary",
  },
};

export interface ExportOptions {
  /** Filename without extension */
  filename?: string;
}

/**
 * Export statistics
 */
export interface ExportStats {
  vertexCount: number;
  triangleCount: number;
  meshCount: number;
  fileSizeBytes: number;
}

/**
 * Export result
 */
export interface ExportResult<T extends ArrayBuffer | string = ArrayBuffer | string> {
  /** Raw data (ArrayBuffer for GLB, string for OBJ) */
  data: T;
  /** Suggested filename with extension */
  filename: string;
  mimeType: string;
  stats: ExportStats;
}
