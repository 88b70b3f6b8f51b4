/**
 * Position filter: keep the records that fall inside a region of interest
 *
 * @module operations/positions
 */

import type { VariantRecord } from "../formats/vcf/types";
import type { RegionIndex, RegionRecord } from "./types";

/**
 * Keep records whose POS is a key of the region index, tagging each with
 * its region name
 *
 * @example
 * ```typescript
 * const index = buildRegionIndex({ hs1: regionRange(100, 110) });
 * const kept = filterByRegions(table.records, index);
 * kept[0]?.region; // "hs1"
 * ```
 */
export function filterByRegions(
  records: readonly VariantRecord[],
  index: RegionIndex
): RegionRecord[] {
  const kept: RegionRecord[] = [];
  for (const record of records) {
    const region = index.get(record.pos);
    if (region !== undefined) {
      kept.push({ ...record, region });
    }
  }
  return kept;
}
