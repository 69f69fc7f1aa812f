/**
 * Option resolution tests
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_RESOLUTION,
  Logger,
  LogLevel,
  ValidationError,
  resolveColliderOptions,
  resolveTubeMeshOptions,
} from "../src/index.js";

describe("resolveTubeMeshOptions", () => {
  it("should default the resolution quietly", () => {
    expect(resolveTubeMeshOptions()).toEqual({ resolution: DEFAULT_RESOLUTION });
    expect(resolveTubeMeshOptions({ resolution: 16 })).toEqual({ resolution: 16 });
    expect(Logger.getRecentLogs()).toEqual([]);
  });

  it("should floor fractional resolutions and warn", () => {
    expect(resolveTubeMeshOptions({ resolution: 8.7 })).toEqual({ resolution: 8 });

    const [entry] = Logger.getSystemLogs("TubeGeometry");
    expect(entry.level).toBe(LogLevel.WARN);
    expect(entry.message).toBe("[TubeGeometry] Resolution adjusted");
    expect(entry.context).toEqual({ requested: 8.7, resolution: 8 });
  });

  it("should clamp to the supported range", () => {
    expect(resolveTubeMeshOptions({ resolution: 2 }).resolution).toBe(3);
    expect(resolveTubeMeshOptions({ resolution: 500 }).resolution).toBe(128);
    expect(Logger.getSystemStats().get("TubeGeometry")?.warnings).toBe(2);
  });

  it("should reject a non-finite resolution", () => {
    expect(() => resolveTubeMeshOptions({ resolution: Infinity })).toThrow(ValidationError);
    expect(() => resolveTubeMeshOptions({ resolution: Infinity })).toThrow(/^options\.resolution: /);
  });
});

describe("resolveColliderOptions", () => {
  it("should default the minimum radius to zero", () => {
    expect(resolveColliderOptions()).toEqual({ minRadius: 0 });
  });

  it("should keep a positive minimum radius", () => {
    expect(resolveColliderOptions({ minRadius: 0.3 })).toEqual({ minRadius: 0.3 });
    expect(Logger.getRecentLogs()).toEqual([]);
  });

  it("should clamp a negative minimum radius and warn", () => {
    expect(resolveColliderOptions({ minRadius: -0.5 })).toEqual({ minRadius: 0 });

    const [entry] = Logger.getSystemLogs("ColliderGenerator");
    expect(entry.message).toBe("[ColliderGenerator] Negative minRadius clamped to 0");
    expect(entry.context).toEqual({ requested: -0.5 });
  });

  it("should reject NaN", () => {
    expect(() => resolveColliderOptions({ minRadius: NaN })).toThrow(ValidationError);
  });
});
