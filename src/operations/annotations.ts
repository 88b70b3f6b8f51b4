/**
 * Annotation splitting and sub-field parsing
 *
 * Sites without an ANN payload are dropped first; the survivors get their
 * `rowId` before the payload is split, so every long-form instance can be
 * traced back to its site regardless of ordering.
 *
 * @module operations/annotations
 */

import {
  extractAnnotationPayload,
  parseAnnotationEntry,
  splitAnnotationInstances,
} from "../formats/ann/parser";
import type { AnnotationInstance, ParsedAnnotation, RegionRecord, SiteRecord } from "./types";

/**
 * Result of the split stage
 */
export interface SplitAnnotations {
  /** Annotated sites, numbered 1..N in input order */
  readonly sites: SiteRecord[];
  /** One entry per comma-separated annotation instance */
  readonly instances: AnnotationInstance[];
}

/**
 * Number the annotated sites and unpivot their ANN payloads
 *
 * A site contributes as many instances as its payload holds; ragged counts
 * across sites need no padding in long form.
 */
export function splitAnnotations(records: readonly RegionRecord[]): SplitAnnotations {
  const sites: SiteRecord[] = [];
  const instances: AnnotationInstance[] = [];

  for (const record of records) {
    const payload = extractAnnotationPayload(record.info);
    if (payload === null) continue;

    const rowId = sites.length + 1;
    sites.push({ ...record, rowId });

    splitAnnotationInstances(payload).forEach((raw, offset) => {
      instances.push({
        rowId,
        chrom: record.chrom,
        pos: record.pos,
        ref: record.ref,
        alt: record.alt,
        index: offset + 1,
        raw,
      });
    });
  }

  return { sites, instances };
}

/**
 * Replace each instance's raw string with its parsed sub-fields
 */
export function parseAnnotationFields(
  instances: readonly AnnotationInstance[]
): ParsedAnnotation[] {
  return instances.map(({ raw, ...meta }) => ({ ...meta, entry: parseAnnotationEntry(raw) }));
}
