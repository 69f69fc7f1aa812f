/**
 * Logger Tests
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import { Logger, LogLevel } from "../../src/utils/Logger.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should drop entries below the minimum level", () => {
    Logger.debug("hidden");
    Logger.info("shown");

    expect(Logger.getRecentLogs().map((e) => e.message)).toEqual(["shown"]);
    expect(Logger.isLevelEnabled(LogLevel.DEBUG)).toBe(false);
  });

  it("should record debug entries once the level is lowered", () => {
    Logger.setLogLevel(LogLevel.DEBUG);
    Logger.systemDebug("GLBExporter", "Exported GLB", { meshCount: 1 });

    const [entry] = Logger.getSystemLogs("GLBExporter");
    expect(entry.message).toBe("[GLBExporter] Exported GLB");
    expect(entry.context).toEqual({ meshCount: 1 });
  });

  it("should count messages per system", () => {
    Logger.systemWarn("TubeGeometry", "a");
    Logger.systemWarn("TubeGeometry", "b");
    Logger.systemError("TubeGeometry", "c", new Error("boom"));
    Logger.system("TubeGeometry", "d");

    expect(Logger.getSystemStats().get("TubeGeometry")).toEqual({
      errors: 1,
      warnings: 2,
      messages: 1,
    });
  });

  it("should keep only the newest entries", () => {
    Logger.configure({ maxLogEntries: 3 });
    for (let i = 0; i < 5; i++) {
      Logger.info(`m${i}`);
    }

    expect(Logger.getRecentLogs().map((e) => e.message)).toEqual(["m2", "m3", "m4"]);
  });

  it("should write to the matching console method", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    Logger.configure({ enableConsole: true });
    Logger.warn("careful", { value: 1 });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/\] careful \{"value":1\}$/);
  });

  it("should clear entries and stats", () => {
    Logger.systemWarn("ColliderGenerator", "x");
    Logger.clearLogs();

    expect(Logger.getRecentLogs()).toEqual([]);
    expect(Logger.getSystemStats().size).toBe(0);
  });
});
