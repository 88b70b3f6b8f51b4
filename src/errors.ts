/**
 * Error handling for annotated variant extraction
 *
 * Only structural problems with the record source are raised. Malformed
 * annotation entries and undecodable genotypes are absorbed by the pipeline
 * and never surface here.
 */

/**
 * Base error class for all mutation-extraction errors
 */
export class MutationCallError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "MutationCallError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid caller-supplied configuration (regions, genes, patterns, writer options)
 */
export class ValidationError extends MutationCallError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends MutationCallError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * The record source cannot be read as a VCF table.
 *
 * Raised for a missing `#CHROM` header, unexpected fixed columns, data lines
 * whose column count disagrees with the header, and non-integer positions.
 * Always fatal: no partial table is returned.
 */
export class InputFormatError extends ParseError {
  constructor(
    message: string,
    lineNumber?: number,
    context?: string,
    public readonly column?: string
  ) {
    super(message, "VCF", lineNumber, context);
    this.name = "InputFormatError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends MutationCallError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "compress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return `File may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("truncated") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends MutationCallError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  MISSING_HEADER:
    "VCF files need a '#CHROM\\tPOS\\tID\\tREF\\tALT\\tQUAL\\tFILTER\\tINFO' header line before the data",
  COLUMN_COUNT: "Every data line must have one tab-separated column per header column",
  INVALID_POSITION: "POS must be a non-negative integer",
  FORMAT_COLUMN: "Sample columns must follow a FORMAT column (column 9)",
  DUPLICATE_SAMPLE: "Every sample column in the header needs a distinct name",
  INVALID_REGIONS: "Regions map names to arrays of integer positions, e.g. { hs1: regionRange(100, 120) }",
} as const;

/**
 * Look up a recovery suggestion for an error, if one applies
 */
export function getErrorSuggestion(error: MutationCallError): string | undefined {
  if (!(error instanceof InputFormatError)) {
    return undefined;
  }
  switch (error.column) {
    case "#CHROM":
      return ERROR_SUGGESTIONS.MISSING_HEADER;
    case "POS":
      return ERROR_SUGGESTIONS.INVALID_POSITION;
    case "ROW":
      return ERROR_SUGGESTIONS.COLUMN_COUNT;
    case "FORMAT":
      return ERROR_SUGGESTIONS.FORMAT_COLUMN;
    case "SAMPLE":
      return ERROR_SUGGESTIONS.DUPLICATE_SAMPLE;
    default:
      return undefined;
  }
}
