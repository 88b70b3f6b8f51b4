/**
 * Shared types for parsing, file I/O and compression
 *
 * Format-specific types live beside their parsers (`formats/vcf/types`,
 * `formats/ann/types`) and pipeline options in `operations/types`.
 */

import { type } from "arktype";

/**
 * Base options shared by every line-oriented parser
 */
export interface ParserOptions {
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** Whether to record source line numbers on parsed records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Compression formats the loader and writer understand
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Compression detection result
 */
export interface CompressionDetection {
  /** Detected compression format */
  readonly format: CompressionFormat;
  /** Magic bytes that led to detection */
  readonly magicBytes?: Uint8Array;
  /** Whether detection used magic bytes vs extension */
  readonly detectionMethod: "magic-bytes" | "extension" | "hybrid";
}

/**
 * File reading configuration
 */
export interface FileReaderOptions {
  /** Maximum file size to prevent memory exhaustion (default: 2GB) */
  readonly maxFileSize?: number;
  /** Whether to automatically detect and decompress compressed files (default: true) */
  readonly autoDecompress?: boolean;
  /** Override compression format detection (default: auto-detect) */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * File writing configuration
 *
 * Mirrors FileReaderOptions for symmetric read/write behaviour.
 */
export interface WriteOptions {
  /** Automatically compress based on file extension (default: true) */
  readonly autoCompress?: boolean;
  /** Override compression format detection (default: auto-detect from extension) */
  readonly compressionFormat?: CompressionFormat;
  /** Compression level, 1-9 for gzip (default: 6) */
  readonly compressionLevel?: number;
}

/**
 * File path validation schema
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject("a path without null characters");
  }
  return true;
});

export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>0",
  "autoDecompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
});

export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
  "compressionLevel?": "1<=number.integer<=9",
});
