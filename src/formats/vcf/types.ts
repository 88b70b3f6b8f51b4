/**
 * VCF record and table types
 *
 * @module vcf/types
 */

import type { ParserOptions } from "../../types";

/**
 * The eight mandatory VCF header columns, in order
 */
export const VCF_FIXED_COLUMNS = [
  "#CHROM",
  "POS",
  "ID",
  "REF",
  "ALT",
  "QUAL",
  "FILTER",
  "INFO",
] as const;

/** Column that separates the fixed fields from per-sample genotype columns */
export const VCF_FORMAT_COLUMN = "FORMAT";

/**
 * One variant site (one VCF data line)
 *
 * Fields are kept as the raw strings the file carries; only POS is
 * converted. `info` may embed a snpEff `ANN=` payload.
 */
export interface VariantRecord {
  /** Chromosome / contig name */
  readonly chrom: string;
  /** 1-based position */
  readonly pos: number;
  readonly id: string;
  /** Reference allele */
  readonly ref: string;
  /** Alternate alleles, comma-delimited */
  readonly alt: string;
  readonly qual: string;
  readonly filter: string;
  readonly info: string;
  /** FORMAT column, or null when the file carries no samples */
  readonly format: string | null;
  /** Raw genotype field per sample name */
  readonly genotypes: ReadonlyMap<string, string>;
  /** Source line number for debugging */
  readonly lineNumber?: number;
}

/**
 * A whole VCF file held in memory
 */
export interface VariantTable {
  /** Sample names in header order */
  readonly samples: readonly string[];
  readonly records: readonly VariantRecord[];
  /** `##` meta-information lines, verbatim */
  readonly meta: readonly string[];
}

/**
 * VCF parser configuration options
 */
export interface VcfParserOptions extends ParserOptions {
  /** Keep only these samples (default: all samples in the header) */
  samples?: string[];
}
