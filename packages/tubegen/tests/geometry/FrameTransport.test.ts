/**
 * Frame Transport and rotation helper tests
 */

import { describe, it, expect } from "vitest";
import { Quaternion, Vector3 } from "three";
import {
  computeStrandFrames,
  forwardOf,
  miterTangent,
  robustRotationArc,
} from "../../src/index.js";
import { pointAt, strandAlongY } from "../fixtures.js";

function expectVecClose(actual: Vector3, x: number, y: number, z: number): void {
  expect(actual.x).toBeCloseTo(x, 5);
  expect(actual.y).toBeCloseTo(y, 5);
  expect(actual.z).toBeCloseTo(z, 5);
}

function isFiniteQuat(q: Quaternion): boolean {
  return [q.x, q.y, q.z, q.w].every(Number.isFinite);
}

describe("robustRotationArc", () => {
  it("should return identity for parallel vectors", () => {
    const q = robustRotationArc(new Vector3(0, 1, 0), new Vector3(0, 1, 0));
    expect(q.equals(new Quaternion())).toBe(true);
  });

  it("should return identity for nearly parallel vectors", () => {
    const to = new Vector3(0.001, 1, 0).normalize();
    const q = robustRotationArc(new Vector3(0, 1, 0), to);
    expect(q.equals(new Quaternion())).toBe(true);
  });

  it("should rotate Y onto X", () => {
    const q = robustRotationArc(new Vector3(0, 1, 0), new Vector3(1, 0, 0));
    expectVecClose(new Vector3(0, 1, 0).applyQuaternion(q), 1, 0, 0);
  });

  it("should half-turn antiparallel vectors without NaN", () => {
    const q = robustRotationArc(new Vector3(0, 1, 0), new Vector3(0, -1, 0));

    expect(isFiniteQuat(q)).toBe(true);
    expectVecClose(new Vector3(0, 1, 0).applyQuaternion(q), 0, -1, 0);
  });

  it("should use the secondary axis when the source is close to X", () => {
    const q = robustRotationArc(new Vector3(1, 0, 0), new Vector3(-1, 0, 0));

    expect(isFiniteQuat(q)).toBe(true);
    expectVecClose(new Vector3(1, 0, 0).applyQuaternion(q), -1, 0, 0);
  });
});

describe("miterTangent", () => {
  it("should bisect a right-angle bend", () => {
    const points = [pointAt(0, 0, 0), pointAt(0, 1, 0), pointAt(1, 1, 0)];
    expectVecClose(miterTangent(points, 1), Math.SQRT1_2, Math.SQRT1_2, 0);
  });

  it("should use the outgoing segment at the first point", () => {
    const points = [pointAt(0, 0, 0), pointAt(0, 0, 2), pointAt(1, 0, 2)];
    expectVecClose(miterTangent(points, 0), 0, 0, 1);
  });

  it("should use the incoming segment at the last point", () => {
    const points = [pointAt(0, 0, 0), pointAt(0, 1, 0), pointAt(3, 1, 0)];
    expectVecClose(miterTangent(points, 2), 1, 0, 0);
  });

  it("should fall back to the incoming direction on a fold-back", () => {
    const points = [pointAt(0, 0, 0), pointAt(0, 1, 0), pointAt(0, 0, 0)];
    expectVecClose(miterTangent(points, 1), 0, 1, 0);
  });
});

describe("computeStrandFrames", () => {
  it("should return one frame per point", () => {
    expect(computeStrandFrames(strandAlongY(5))).toHaveLength(5);
  });

  it("should return no frames for fewer than two points", () => {
    expect(computeStrandFrames([])).toEqual([]);
    expect(computeStrandFrames([pointAt(0, 0, 0)])).toEqual([]);
  });

  it("should keep the declared orientation when it already follows the strand", () => {
    const twist = new Quaternion().setFromAxisAngle(new Vector3(0, 1, 0), Math.PI / 2);
    const frames = computeStrandFrames(strandAlongY(3, 1, { orientation: twist }));

    for (const frame of frames) {
      expect(frame.angleTo(twist)).toBeLessThan(1e-6);
    }
  });

  it("should bend the seed frame onto the first segment", () => {
    const points = [pointAt(0, 0, 0), pointAt(2, 0, 0), pointAt(4, 0, 0)];
    const frames = computeStrandFrames(points);

    for (const frame of frames) {
      expectVecClose(forwardOf(frame), 1, 0, 0);
    }
  });

  it("should follow the miter tangent at a bend", () => {
    const points = [pointAt(0, 0, 0), pointAt(0, 1, 0), pointAt(1, 1, 0)];
    const frames = computeStrandFrames(points);

    expectVecClose(forwardOf(frames[0]), 0, 1, 0);
    expectVecClose(forwardOf(frames[1]), Math.SQRT1_2, Math.SQRT1_2, 0);
    expectVecClose(forwardOf(frames[2]), 1, 0, 0);
  });

  it("should produce finite frames on a 180° fold-back", () => {
    const points = [pointAt(0, 0, 0), pointAt(0, 1, 0), pointAt(0, 0, 0)];
    const frames = computeStrandFrames(points);

    expect(frames.every(isFiniteQuat)).toBe(true);
    expectVecClose(forwardOf(frames[2]), 0, -1, 0);
  });

  it("should not twist a straight tube", () => {
    const frames = computeStrandFrames(strandAlongY(10));
    for (const frame of frames) {
      expect(frame.angleTo(frames[0])).toBeLessThan(1e-6);
    }
  });
});
