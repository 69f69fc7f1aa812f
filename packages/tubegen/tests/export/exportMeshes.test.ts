/**
 * Export dispatcher, file output and BufferGeometry conversion tests
 */

import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BufferGeometry, Float32BufferAttribute } from "three";
import {
  EXPORT_FORMATS,
  ExportFormat,
  exportMeshes,
  exportToOBJ,
  generateTubeMeshData,
  meshDataFromBufferGeometry,
  parseMaterialSettings,
  readGLB,
  toBufferGeometry,
  writeExportFile,
} from "../../src/index.js";
import { skeletonOf, strandAlongY } from "../fixtures.js";

const buckets = () => generateTubeMeshData(skeletonOf(strandAlongY(3)));

describe("exportMeshes", () => {
  it("should produce the same text as exportToOBJ", () => {
    const result = exportMeshes(ExportFormat.OBJ, buckets(), { baseName: "vine" });
    expect(result.data).toBe(exportToOBJ(buckets(), { baseName: "vine" }).data);
    expect(result.filename).toBe("skeleton.obj");
  });

  it("should pass material settings through to GLB", () => {
    const materialSettings = new Map([[0, parseMaterialSettings({ roughness: 1 })]]);
    const result = exportMeshes(ExportFormat.GLB, buckets(), {
      filename: "vine",
      materialSettings,
    });

    expect(result.filename).toBe("vine.glb");
    expect(result.data).toBeInstanceOf(ArrayBuffer);
    if (typeof result.data === "string") return;
    expect(readGLB(result.data).json.materials?.[0].pbrMetallicRoughness?.roughnessFactor).toBe(1);
  });

  it("should list a MIME type per format", () => {
    expect(EXPORT_FORMATS.obj.mimeType).toBe("text/plain");
    expect(EXPORT_FORMATS.glb.mimeType).toBe("model/gltf-binary");
  });
});

describe("writeExportFile", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tubegen-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should write OBJ text", async () => {
    const result = exportMeshes(ExportFormat.OBJ, buckets());
    const path = join(dir, result.filename);
    await writeExportFile(path, result);

    expect(await readFile(path, "utf8")).toBe(result.data);
  });

  it("should write GLB bytes", async () => {
    const result = exportMeshes(ExportFormat.GLB, buckets());
    const path = join(dir, result.filename);
    await writeExportFile(path, result);

    const written = await readFile(path);
    expect(written.byteLength).toBe(result.stats.fileSizeBytes);
    expect(readGLB(new Uint8Array(written)).json.meshes).toHaveLength(1);
  });
});

describe("meshDataFromBufferGeometry", () => {
  it("should recover the tube streams from a BufferGeometry", () => {
    const mesh = buckets().get(0);
    expect(mesh).toBeDefined();
    if (!mesh) return;

    const copy = meshDataFromBufferGeometry(toBufferGeometry(mesh));
    expect(copy.positions).toEqual(mesh.positions);
    expect(copy.normals).toEqual(mesh.normals);
    expect(copy.colors).toEqual(mesh.colors);
    expect(copy.uvs).toEqual(mesh.uvs);
    expect(copy.indices).toEqual(mesh.indices);
  });

  it("should give RGB colors an alpha of one", () => {
    const geometry = new BufferGeometry();
    geometry.setAttribute("position", new Float32BufferAttribute([0, 0, 0, 1, 0, 0, 0, 1, 0], 3));
    geometry.setAttribute("color", new Float32BufferAttribute([1, 0, 0, 0, 1, 0, 0, 0, 1], 3));
    geometry.setIndex([0, 1, 2]);

    const mesh = meshDataFromBufferGeometry(geometry);
    expect([...(mesh.colors ?? [])]).toEqual([1, 0, 0, 1, 0, 1, 0, 1, 0, 0, 1, 1]);
    expect(mesh.indices).toEqual(new Uint32Array([0, 1, 2]));
    expect(mesh.normals).toBeUndefined();
  });

  it("should leave indices unset for non-indexed geometry", () => {
    const geometry = new BufferGeometry();
    geometry.setAttribute("position", new Float32BufferAttribute(new Float32Array(9), 3));

    const mesh = meshDataFromBufferGeometry(geometry);
    expect(mesh.positions).toHaveLength(9);
    expect(mesh.indices).toBeUndefined();
  });
});
