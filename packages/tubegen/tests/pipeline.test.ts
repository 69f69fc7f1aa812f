/**
 * Pipeline Tests
 */

import { describe, it, expect } from "vitest";
import {
  buildColliderParts,
  generateSkeletonAssets,
  generateTubeMeshData,
} from "../src/index.js";
import { pointAt, skeletonOf, strandAlongY } from "./fixtures.js";

describe("generateSkeletonAssets", () => {
  const skeleton = skeletonOf(
    strandAlongY(4, 1, { radius: 0.2 }),
    [pointAt(2, 0, 0, { materialId: 1 }), pointAt(2, 0, 3, { materialId: 1 })],
  );

  it("should build meshes and skip colliders by default", () => {
    const assets = generateSkeletonAssets(skeleton);

    expect([...assets.meshes.keys()].sort()).toEqual([0, 1]);
    expect(assets.colliders).toEqual([]);
    expect(assets.compound).toBeNull();
  });

  it("should match the individual builders", () => {
    const assets = generateSkeletonAssets(skeleton, {
      mesh: { resolution: 6 },
      collider: { minRadius: 0.15 },
    });

    expect(assets.meshes).toEqual(generateTubeMeshData(skeleton, { resolution: 6 }));
    expect(assets.colliders).toEqual(buildColliderParts(skeleton, { minRadius: 0.15 }));
    // The thin second strand has no collider
    expect(assets.colliders).toHaveLength(3);
    expect(assets.compound?.children).toHaveLength(3);
  });

  it("should return empty results for an empty skeleton", () => {
    const assets = generateSkeletonAssets(skeletonOf(), { collider: {} });

    expect(assets.meshes.size).toBe(0);
    expect(assets.colliders).toEqual([]);
    expect(assets.compound).toBeNull();
  });
});
