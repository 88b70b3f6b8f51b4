/**
 * Shared types for the mutation extraction pipeline
 *
 * Every intermediate table is a list of explicit long-format records that
 * carry `rowId`, the key assigned to each annotated site before any split.
 * Joins go through that key, never through row order.
 */

import type { AnnotationEntry } from "../formats/ann/types";
import type { GenotypeCall } from "../formats/vcf/genotype";
import type { VariantRecord } from "../formats/vcf/types";

/**
 * Caller-supplied regions: name → positions
 *
 * Insertion order matters: when a position appears in several regions the
 * later one wins.
 */
export type RegionInput =
  | Readonly<Record<string, readonly number[]>>
  | ReadonlyMap<string, readonly number[]>
  | ReadonlyArray<readonly [string, readonly number[]]>;

/**
 * Inverse region mapping: position → region name
 */
export type RegionIndex = ReadonlyMap<number, string>;

/**
 * Options for `extractMutations`
 */
export interface ExtractionOptions {
  /** Regions of interest (default: the two FKS1 hotspots) */
  regions?: RegionInput;
  /** Gene identifiers to keep, matched against the annotation's Gene_ID */
  genes?: readonly string[];
  /**
   * Effects to drop, as a regular expression over the effect field
   * (default: `synonymous_variant`). `null` keeps every effect.
   */
  excludeEffects?: string | RegExp | null;
  /** Receives pipeline warnings (default: console.warn) */
  onWarning?: (message: string) => void;
}

/**
 * A variant record that survived the position filter
 */
export interface RegionRecord extends VariantRecord {
  readonly region: string;
}

/**
 * An annotated site with its join key
 */
export interface SiteRecord extends RegionRecord {
  /** Sequential key, 1..N in input order */
  readonly rowId: number;
}

/**
 * One annotation instance in long form, before field parsing
 */
export interface AnnotationInstance {
  readonly rowId: number;
  readonly chrom: string;
  readonly pos: number;
  readonly ref: string;
  readonly alt: string;
  /** 1-based position of the instance within the site's payload */
  readonly index: number;
  readonly raw: string;
}

/**
 * An annotation instance with its parsed sub-fields
 */
export interface ParsedAnnotation extends Omit<AnnotationInstance, "raw"> {
  readonly entry: AnnotationEntry;
}

/**
 * One sample's decoded genotype at one site
 */
export interface SampleCall {
  readonly rowId: number;
  readonly sampleId: string;
  readonly call: GenotypeCall;
  /** Resolved allele sequence; null for no-calls and out-of-range codes */
  readonly sequence: string | null;
}

/**
 * Filters applied to annotations before the sample reshape
 */
export interface AnnotationFilter {
  readonly genes: ReadonlySet<string>;
  /** null disables effect exclusion */
  readonly excludeEffects: RegExp | null;
}

/**
 * A sample that carries an annotated allele, before output renaming
 */
export interface MutationCall {
  readonly sampleId: string;
  readonly geneId: string;
  readonly region: string;
  readonly pos: number;
  readonly hgvsP: string;
  readonly ref: string;
  readonly allele: string;
}

/**
 * Published output columns, in order
 */
export const RESULT_COLUMNS = [
  "sample_id",
  "snpeff_gene_name",
  "region",
  "position",
  "mutation",
  "ref_sequence",
  "sample_sequence",
] as const;

export type ResultColumn = (typeof RESULT_COLUMNS)[number];

/**
 * One output row
 */
export interface ResultRow {
  readonly sample_id: string;
  readonly snpeff_gene_name: string;
  readonly region: string;
  readonly position: number;
  readonly mutation: string;
  readonly ref_sequence: string;
  readonly sample_sequence: string;
}

/**
 * The published result table; `columns` is present even with zero rows
 */
export interface ResultTable {
  readonly columns: typeof RESULT_COLUMNS;
  readonly rows: readonly ResultRow[];
}
