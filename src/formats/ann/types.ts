/**
 * snpEff ANN annotation types
 *
 * Each ANN instance is a `|`-delimited record with a fixed 15-field prefix
 * followed by an open-ended ERRORS / WARNINGS / INFO tail.
 * Field order follows the snpEff input/output documentation.
 *
 * @module ann/types
 */

/** INFO marker that introduces the annotation payload */
export const ANNOTATION_MARKER = "ANN=";

/** Separator between annotation instances in the payload */
export const INSTANCE_SEPARATOR = ",";

/** Separator between sub-fields of one instance */
export const FIELD_SEPARATOR = "|";

/**
 * The fixed sub-field schema, in snpEff order
 */
export const ANNOTATION_FIELDS = [
  "allele",
  "effect",
  "putativeImpact",
  "geneName",
  "geneId",
  "featureType",
  "featureId",
  "transcriptBiotype",
  "rankTotal",
  "hgvsC",
  "hgvsP",
  "cdnaPosLen",
  "cdsPosLen",
  "proteinPosLen",
  "distance",
] as const;

export type AnnotationField = (typeof ANNOTATION_FIELDS)[number];

/**
 * The 15 named sub-fields. `null` marks a sub-field the instance was too
 * short to carry; an empty string is a sub-field that was present but blank.
 */
export type AnnotationFields = { readonly [K in AnnotationField]: string | null };

/**
 * One parsed annotation instance
 */
export interface AnnotationEntry extends AnnotationFields {
  /** Raw tokens beyond the 15th sub-field, in order, without trailing blanks */
  readonly overflow: readonly string[];
}
