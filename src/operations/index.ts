/**
 * Mutation extraction pipeline
 *
 * Stages run in a fixed order: region filter, annotation split, field
 * parsing, genotype decoding, join & reshape, output projection. The core
 * (`extractMutations`) is synchronous and in-memory; only loading and
 * writing touch the file system.
 *
 * @example
 * ```typescript
 * const table = await extractMutationsFromFile("calls.ann.vcf.gz", {
 *   genes: ["CAB11_002014"],
 * });
 * await writeResults("mutations.csv", table);
 * ```
 *
 * @module operations
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { CSVWriter, TSVWriter } from "../formats/dsv";
import { loadVariantTable } from "../formats/vcf/parser";
import type { VariantTable } from "../formats/vcf/types";
import { parseAnnotationFields, splitAnnotations } from "./annotations";
import { decodeSampleCalls } from "./genotypes";
import { emptyResultTable, formatResults } from "./output";
import { buildRegionIndex, DEFAULT_REGIONS } from "./regions";
import { filterByRegions } from "./positions";
import { joinAndReshape } from "./reshape";
import type { AnnotationFilter, ExtractionOptions, RegionIndex, ResultTable } from "./types";

/** Gene identifiers kept by default */
export const DEFAULT_GENES: readonly string[] = ["CAB11_002014"];

/** Effects excluded by default */
export const DEFAULT_EXCLUDE_EFFECTS = "synonymous_variant";

export const ExtractionOptionsSchema = type({
  "regions?": "object",
  "genes?": type("string").array().atLeastLength(1),
  "excludeEffects?": "string | RegExp | null",
  "onWarning?": "Function",
});

/**
 * Options with defaults applied and patterns compiled
 */
export interface ResolvedExtractionOptions {
  readonly regionIndex: RegionIndex;
  readonly filter: AnnotationFilter;
  readonly onWarning: (message: string) => void;
}

/**
 * Validate options, apply defaults and compile the exclusion pattern
 *
 * @throws {ValidationError} On an empty gene list, a malformed region map
 * or an exclusion pattern that is not a valid regular expression
 */
export function resolveOptions(options: ExtractionOptions = {}): ResolvedExtractionOptions {
  const validation = ExtractionOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid extraction options: ${validation.summary}`);
  }

  return {
    regionIndex: buildRegionIndex(options.regions ?? DEFAULT_REGIONS),
    filter: {
      genes: new Set(options.genes ?? DEFAULT_GENES),
      excludeEffects: compileExclusion(
        options.excludeEffects === undefined ? DEFAULT_EXCLUDE_EFFECTS : options.excludeEffects
      ),
    },
    onWarning:
      options.onWarning ??
      ((message: string): void => {
        console.warn(`Mutation extraction Warning: ${message}`);
      }),
  };
}

/**
 * Compile the effect-exclusion pattern; `g` and `y` are dropped so that
 * repeated `test` calls do not depend on `lastIndex`
 */
export function compileExclusion(pattern: string | RegExp | null): RegExp | null {
  if (pattern === null) {
    return null;
  }
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
  }
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ValidationError(
      `Invalid effect exclusion pattern '${pattern}': ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Extract per-sample mutation calls from a loaded variant table
 *
 * A table with no records inside the regions yields an empty result with
 * the seven published columns; that is not an error.
 */
export function extractMutations(table: VariantTable, options: ExtractionOptions = {}): ResultTable {
  const { regionIndex, filter, onWarning } = resolveOptions(options);

  const inRegion = filterByRegions(table.records, regionIndex);
  if (inRegion.length === 0) {
    return emptyResultTable();
  }

  const { sites, instances } = splitAnnotations(inRegion);
  const annotations = parseAnnotationFields(instances);
  const calls = decodeSampleCalls(sites, table.samples, onWarning);
  return formatResults(joinAndReshape(annotations, calls, sites, table.samples, filter));
}

/**
 * Options for `extractMutationsFromFile`
 */
export interface FileExtractionOptions extends ExtractionOptions {
  /** Restrict the analysis to these samples, in this order */
  samples?: string[];
}

/**
 * Load a VCF file (plain or gzip) and extract mutation calls from it
 *
 * @throws {FileError} If the file cannot be read
 * @throws {InputFormatError} If the file is not a well-formed VCF table
 */
export async function extractMutationsFromFile(
  path: string,
  options: FileExtractionOptions = {}
): Promise<ResultTable> {
  const { samples, ...extraction } = options;
  const table = await loadVariantTable(path, {
    ...(samples !== undefined && { samples }),
    ...(extraction.onWarning !== undefined && { onWarning: extraction.onWarning }),
  });
  return extractMutations(table, extraction);
}

/**
 * Options for `writeResults`
 */
export interface ResultWriterOptions {
  /** Output flavour (default: from the extension, `.tsv` → tsv, else csv) */
  format?: "csv" | "tsv";
  excelCompatible?: boolean;
  compressionLevel?: number;
}

/**
 * Write a result table as CSV or TSV; `.gz` paths are gzip-compressed
 *
 * The header row is written even when the table has no rows.
 */
export async function writeResults(
  path: string,
  table: ResultTable,
  options: ResultWriterOptions = {}
): Promise<void> {
  const format = options.format ?? (/\.tsv(\.gz)?$/i.test(path) ? "tsv" : "csv");
  const writerOptions = {
    ...(options.excelCompatible !== undefined && { excelCompatible: options.excelCompatible }),
    ...(options.compressionLevel !== undefined && {
      compressionLevel: options.compressionLevel,
    }),
  };
  const writer = format === "tsv" ? new TSVWriter(writerOptions) : new CSVWriter(writerOptions);
  const rows = table.rows.map((row) => table.columns.map((column) => row[column]));
  await writer.writeFile(path, table.columns, rows);
}

export { parseAnnotationFields, splitAnnotations, type SplitAnnotations } from "./annotations";
export { decodeSampleCalls } from "./genotypes";
export { emptyResultTable, formatResults } from "./output";
export { filterByRegions } from "./positions";
export { buildRegionIndex, DEFAULT_REGIONS, normalizeRegions, regionRange } from "./regions";
export { joinAndReshape, passesAnnotationFilter } from "./reshape";
export * from "./types";
