/**
 * Builder configuration.
 *
 * Options are validated with zod. Out-of-range values are clamped and
 * reported through the logger; only values that are not numbers at all
 * are rejected.
 */

import { z } from "zod";
import type { ColliderOptions, TubeMeshOptions } from "./types.js";
import { clamp } from "./math/index.js";
import { fromZodError } from "./utils/errors.js";
import { Logger } from "./utils/Logger.js";

export const MIN_RESOLUTION = 3;
export const MAX_RESOLUTION = 128;
export const DEFAULT_RESOLUTION = 8;

export const tubeMeshOptionsSchema = z.object({
  resolution: z.number().finite().default(DEFAULT_RESOLUTION),
});

export const colliderOptionsSchema = z.object({
  minRadius: z.number().finite().default(0),
});

export type ResolvedTubeMeshOptions = Required<TubeMeshOptions>;
export type ResolvedColliderOptions = Required<ColliderOptions>;

/**
 * Validate tube options and clamp the resolution to [3, 128].
 *
 * @throws ValidationError when resolution is not a finite number
 */
export function resolveTubeMeshOptions(
  options: TubeMeshOptions = {},
): ResolvedTubeMeshOptions {
  const parsed = tubeMeshOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw fromZodError(parsed.error, "options", options);
  }

  const requested = Math.floor(parsed.data.resolution);
  const resolution = clamp(requested, MIN_RESOLUTION, MAX_RESOLUTION);
  if (resolution !== parsed.data.resolution) {
    Logger.systemWarn("TubeGeometry", "Resolution adjusted", {
      requested: parsed.data.resolution,
      resolution,
    });
  }

  return { resolution };
}

/**
 * Validate collider options; a negative minimum radius becomes 0.
 *
 * @throws ValidationError when minRadius is not a finite number
 */
export function resolveColliderOptions(
  options: ColliderOptions = {},
): ResolvedColliderOptions {
  const parsed = colliderOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw fromZodError(parsed.error, "options", options);
  }

  const minRadius = Math.max(0, parsed.data.minRadius);
  if (minRadius !== parsed.data.minRadius) {
    Logger.systemWarn("ColliderGenerator", "Negative minRadius clamped to 0", {
      requested: parsed.data.minRadius,
    });
  }

  return { minRadius };
}
