/**
 * snpeff-mutations - per-sample mutation calls from snpEff-annotated VCF files
 *
 * Reads a VCF whose INFO column carries snpEff `ANN=` annotations, keeps
 * the sites inside the regions of interest, and reports every sample that
 * carries an annotated protein-changing allele in a gene of interest.
 */

// Compression infrastructure
export { CompressionDetector, CompressionService, type CompressionServiceShape } from "./compression";
// Error types
export {
  CompressionError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  InputFormatError,
  MutationCallError,
  ParseError,
  ValidationError,
} from "./errors";
// Formats
export * from "./formats";
// File I/O
export { exists, getSize, readBytes, readToString } from "./io/file-reader";
export { writeString } from "./io/file-writer";
// Pipeline
export {
  type AnnotationFilter,
  type AnnotationInstance,
  buildRegionIndex,
  compileExclusion,
  DEFAULT_EXCLUDE_EFFECTS,
  DEFAULT_GENES,
  DEFAULT_REGIONS,
  decodeSampleCalls,
  emptyResultTable,
  type ExtractionOptions,
  ExtractionOptionsSchema,
  extractMutations,
  extractMutationsFromFile,
  type FileExtractionOptions,
  filterByRegions,
  formatResults,
  joinAndReshape,
  type MutationCall,
  normalizeRegions,
  type ParsedAnnotation,
  parseAnnotationFields,
  passesAnnotationFilter,
  RESULT_COLUMNS,
  type RegionIndex,
  type RegionInput,
  type RegionRecord,
  regionRange,
  type ResolvedExtractionOptions,
  resolveOptions,
  type ResultColumn,
  type ResultRow,
  type ResultTable,
  type ResultWriterOptions,
  type SampleCall,
  type SiteRecord,
  type SplitAnnotations,
  splitAnnotations,
  writeResults,
} from "./operations";
// Shared types
export type {
  CompressionDetection,
  CompressionFormat,
  FileReaderOptions,
  ParserOptions,
  WriteOptions,
} from "./types";
