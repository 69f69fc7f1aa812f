/**
 * Export module: OBJ and GLB serializers plus a format dispatcher.
 */

import type { MaterialSettingsLookup } from "../types.js";
import { exportToGLB } from "./GLBExporter.js";
import { exportToOBJ } from "./OBJExporter.js";
import {
  ExportFormat,
  type ExportableBuckets,
  type ExportFormatType,
  type ExportResult,
} from "./types.js";

export * from "./types.js";
export {
  meshToOBJ,
  meshesToOBJ,
  exportToOBJ,
  type OBJExportOptions,
} from "./OBJExporter.js";
export {
  packGLB,
  glbByteLength,
  buildEmptyGLB,
  meshesToGLB,
  exportToGLB,
  readGLB,
  type GLBContents,
} from "./GLBExporter.js";
export {
  meshDataFromBufferGeometry,
  vertexCountOf,
  triangleCountOf,
} from "./meshData.js";
export {
  GLB_MAGIC,
  GLB_VERSION,
  CHUNK_TYPE_JSON,
  CHUNK_TYPE_BIN,
  gltfDocumentSchema,
  type GltfDocument,
} from "./gltf.js";

export interface ExportMeshesOptions {
  /** Filename without extension (default "skeleton") */
  filename?: string;
  /** OBJ object name prefix (default "skeleton") */
  baseName?: string;
  /** GLB material lookup; missing ids use default settings */
  materialSettings?: MaterialSettingsLookup;
}

/**
 * Export buckets in the requested format.
 */
export function exportMeshes(
  format: ExportFormatType,
  buckets: ExportableBuckets,
  options: ExportMeshesOptions = {},
): ExportResult {
  switch (format) {
    case ExportFormat.OBJ:
      return exportToOBJ(buckets, {
        filename: options.filename,
        baseName: options.baseName,
      });
    case ExportFormat.GLB:
      return exportToGLB(buckets, options.materialSettings, {
        filename: options.filename,
      });
  }
}

/**
 * Write an export result to disk (Node.js hosts and CLI tools).
 */
export async function writeExportFile(
  outputPath: string,
  result: ExportResult,
): Promise<void> {
  const { writeFile } = await import("node:fs/promises");
  const contents =
    typeof result.data === "string" ? result.data : new Uint8Array(result.data);
  await writeFile(outputPath, contents);
}
