/**
 * Material Settings
 *
 * PBR settings per material id. The core only reads them (through a
 * lookup that falls back to defaults); editing and syncing them into real
 * renderer materials is the host's job.
 */

import { z } from "zod";
import {
  TextureType,
  type MaterialSettings,
  type MaterialSettingsLookup,
} from "../types.js";
import { ValidationError, fromZodError } from "../utils/errors.js";

/** Material ids are small integers (one byte) */
export const MAX_MATERIAL_ID = 255;

const rgbSchema = z.tuple([
  z.number().finite(),
  z.number().finite(),
  z.number().finite(),
]);

export const materialSettingsSchema = z.object({
  baseColor: rgbSchema.default([1, 1, 1]),
  emissionColor: rgbSchema.default([0, 0, 0]),
  emissionStrength: z.number().finite().min(0).default(0),
  roughness: z.number().min(0).max(1).default(0.5),
  metallic: z.number().min(0).max(1).default(0),
  texture: z
    .enum([
      TextureType.None,
      TextureType.Grid,
      TextureType.Noise,
      TextureType.Checker,
    ])
    .default(TextureType.None),
  uvScale: z.number().finite().positive().default(1),
});

export type MaterialSettingsInput = z.input<typeof materialSettingsSchema>;

export const DEFAULT_MATERIAL_SETTINGS: Readonly<MaterialSettings> = Object.freeze(
  materialSettingsSchema.parse({}),
);

/**
 * Starter palette: 0 metallic green, 1 glowing cyan, 2 rough grey.
 */
export function createDefaultMaterialPalette(): Map<number, MaterialSettings> {
  return new Map<number, MaterialSettings>([
    [
      0,
      materialSettingsSchema.parse({
        baseColor: [0.2, 0.8, 0.2],
        emissionColor: [0.5, 1.0, 0.5],
        roughness: 0.2,
        metallic: 0.8,
      }),
    ],
    [
      1,
      materialSettingsSchema.parse({
        emissionColor: [0.0, 1.0, 1.0],
        emissionStrength: 2.0,
        roughness: 0.1,
      }),
    ],
    [
      2,
      materialSettingsSchema.parse({
        baseColor: [0.5, 0.5, 0.5],
        roughness: 0.9,
      }),
    ],
  ]);
}

/**
 * Validate one material's settings, filling omitted fields with defaults.
 *
 * @throws ValidationError on malformed input
 */
export function parseMaterialSettings(
  input: unknown,
  field: string = "material",
): MaterialSettings {
  const parsed = materialSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError(parsed.error, field, input);
  }
  return parsed.data;
}

/**
 * Validate a plain object keyed by material id (e.g. parsed JSON) into a
 * settings map.
 *
 * @throws ValidationError for non-integer or out-of-range ids and malformed
 *   settings
 */
export function parseMaterialSettingsMap(
  input: unknown,
): Map<number, MaterialSettings> {
  const parsed = z.record(z.string(), z.unknown()).safeParse(input);
  if (!parsed.success) {
    throw fromZodError(parsed.error, "materials", input);
  }

  const result = new Map<number, MaterialSettings>();
  const ids = Object.keys(parsed.data).sort((a, b) => Number(a) - Number(b));
  for (const key of ids) {
    const id = Number(key);
    if (!/^\d+$/.test(key) || id > MAX_MATERIAL_ID) {
      throw new ValidationError(
        `material id must be an integer in [0, ${MAX_MATERIAL_ID}]`,
        `materials.${key}`,
        key,
      );
    }
    result.set(id, parseMaterialSettings(parsed.data[key], `materials.${key}`));
  }
  return result;
}

/**
 * Settings for a material id, or the defaults when the lookup has none.
 */
export function getMaterialSettings(
  lookup: MaterialSettingsLookup,
  materialId: number,
): MaterialSettings {
  return lookup.get(materialId) ?? { ...DEFAULT_MATERIAL_SETTINGS };
}

function sameRgb(
  a: readonly [number, number, number],
  b: readonly [number, number, number],
): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

function sameSettings(a: MaterialSettings, b: MaterialSettings): boolean {
  return (
    sameRgb(a.baseColor, b.baseColor) &&
    sameRgb(a.emissionColor, b.emissionColor) &&
    a.emissionStrength === b.emissionStrength &&
    a.roughness === b.roughness &&
    a.metallic === b.metallic &&
    a.texture === b.texture &&
    a.uvScale === b.uvScale
  );
}

/**
 * Material ids whose settings differ between two snapshots: added, removed,
 * or with any field changed. Sorted ascending.
 *
 * Hosts call this before re-syncing renderer materials, so that work only
 * happens when something was edited.
 */
export function changedMaterialIds(
  previous: MaterialSettingsLookup,
  next: MaterialSettingsLookup,
): number[] {
  const changed = new Set<number>();

  for (const [id, settings] of next) {
    const before = previous.get(id);
    if (!before || !sameSettings(before, settings)) {
      changed.add(id);
    }
  }
  for (const id of previous.keys()) {
    if (!next.has(id)) {
      changed.add(id);
    }
  }

  return [...changed].sort((a, b) => a - b);
}
