/**
 * Region definitions and the position → region index
 *
 * @module operations/regions
 */

import { type } from "arktype";
import { ERROR_SUGGESTIONS, ValidationError } from "../errors";
import type { RegionIndex, RegionInput } from "./types";

const PositionsSchema = type("number.integer>=0").array();

/**
 * Inclusive integer range, for building contiguous regions
 *
 * @example
 * ```typescript
 * regionRange(221638, 221640); // [221638, 221639, 221640]
 * ```
 */
export function regionRange(start: number, end: number): number[] {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start > end) {
    throw new ValidationError(
      `Invalid region range ${start}..${end}`,
      undefined,
      "Range bounds must be integers with start <= end"
    );
  }
  return Array.from({ length: end - start + 1 }, (_, offset) => start + offset);
}

/**
 * FKS1 hotspot regions (HS1 and HS2), the default positions of interest
 */
export const DEFAULT_REGIONS: ReadonlyMap<string, readonly number[]> = new Map([
  ["fks1_hs1", regionRange(221638, 221665)],
  ["fks1_hs2", regionRange(223782, 223805)],
]);

function isRegionMap(regions: RegionInput): regions is ReadonlyMap<string, readonly number[]> {
  return regions instanceof Map;
}

function isEntryList(
  regions: RegionInput
): regions is ReadonlyArray<readonly [string, readonly number[]]> {
  return Array.isArray(regions);
}

/**
 * Normalise any accepted region input to ordered `[name, positions]` entries
 *
 * @throws {ValidationError} On empty names or non-integer / negative positions
 */
export function normalizeRegions(
  regions: RegionInput
): ReadonlyArray<readonly [string, readonly number[]]> {
  const entries: ReadonlyArray<readonly [string, readonly number[]]> = isRegionMap(regions)
    ? [...regions.entries()]
    : isEntryList(regions)
      ? regions
      : Object.entries(regions);

  for (const [name, positions] of entries) {
    if (name.trim() === "") {
      throw new ValidationError(
        "Region names must not be empty",
        undefined,
        ERROR_SUGGESTIONS.INVALID_REGIONS
      );
    }
    const checked = PositionsSchema(positions);
    if (checked instanceof type.errors) {
      throw new ValidationError(
        `Invalid positions for region '${name}': ${checked.summary}`,
        undefined,
        ERROR_SUGGESTIONS.INVALID_REGIONS
      );
    }
  }

  return entries;
}

/**
 * Build the inverse mapping position → region name
 *
 * Regions are applied in order, so a position listed in several regions
 * ends up with the last one.
 */
export function buildRegionIndex(regions: RegionInput): RegionIndex {
  const index = new Map<number, string>();
  for (const [name, positions] of normalizeRegions(regions)) {
    for (const position of positions) {
      index.set(position, name);
    }
  }
  return index;
}
