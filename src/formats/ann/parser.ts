/**
 * snpEff ANN microformat parser
 *
 * The payload is split in two levels: `,` between annotation instances and
 * `|` between sub-fields. Nothing here throws: short instances are padded
 * with null, long ones keep their extra tokens in `overflow`.
 *
 * @module ann/parser
 */

import type { AnnotationEntry, AnnotationField } from "./types";
import {
  ANNOTATION_FIELDS,
  ANNOTATION_MARKER,
  FIELD_SEPARATOR,
  INSTANCE_SEPARATOR,
} from "./types";

/**
 * Extract the ANN payload from an INFO field
 *
 * Takes the text after the last `ANN=` marker, up to the next INFO
 * separator (`;`), so trailing keys such as `LOF=` or `NMD=` stay out.
 *
 * @example
 * ```typescript
 * extractAnnotationPayload("DP=12;ANN=C|missense_variant|...;LOF=(...)");
 * // "C|missense_variant|..."
 * ```
 */
export function extractAnnotationPayload(info: string): string | null {
  const markerIndex = info.lastIndexOf(ANNOTATION_MARKER);
  if (markerIndex === -1) {
    return null;
  }

  const payload = info.slice(markerIndex + ANNOTATION_MARKER.length);
  const end = payload.indexOf(";");
  return end === -1 ? payload : payload.slice(0, end);
}

/**
 * Split a payload into its annotation-instance strings
 */
export function splitAnnotationInstances(payload: string): string[] {
  return payload.split(INSTANCE_SEPARATOR);
}

/**
 * Parse one annotation instance into the 15-field schema plus overflow
 *
 * @example
 * ```typescript
 * const entry = parseAnnotationEntry("AGC|missense_variant|MODERATE|FKS1|CAB11_002014");
 * entry.geneId; // "CAB11_002014"
 * entry.hgvsP;  // null (instance too short)
 * ```
 */
export function parseAnnotationEntry(raw: string): AnnotationEntry {
  const tokens = raw.split(FIELD_SEPARATOR);

  const field = (name: AnnotationField): string | null =>
    tokens[ANNOTATION_FIELDS.indexOf(name)] ?? null;

  const overflow = tokens.slice(ANNOTATION_FIELDS.length);
  while (overflow.length > 0 && overflow[overflow.length - 1] === "") {
    overflow.pop();
  }

  return {
    allele: field("allele"),
    effect: field("effect"),
    putativeImpact: field("putativeImpact"),
    geneName: field("geneName"),
    geneId: field("geneId"),
    featureType: field("featureType"),
    featureId: field("featureId"),
    transcriptBiotype: field("transcriptBiotype"),
    rankTotal: field("rankTotal"),
    hgvsC: field("hgvsC"),
    hgvsP: field("hgvsP"),
    cdnaPosLen: field("cdnaPosLen"),
    cdsPosLen: field("cdsPosLen"),
    proteinPosLen: field("proteinPosLen"),
    distance: field("distance"),
    overflow,
  };
}

/**
 * Join the overflow tokens for display (`ERRORS / WARNINGS / INFO` column)
 *
 * @returns The `|`-joined tokens, or null when the instance had none
 */
export function formatOverflow(entry: Pick<AnnotationEntry, "overflow">): string | null {
  return entry.overflow.length > 0 ? entry.overflow.join(FIELD_SEPARATOR) : null;
}
