/**
 * Compression format detection for VCF inputs and result outputs
 *
 * snpEff output is commonly shipped as `.vcf.gz` (plain gzip or bgzip).
 * Detection combines the file extension with the gzip magic bytes.
 */

import type { CompressionDetection, CompressionFormat } from "../types";
import { CompressionError } from "../errors";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip", ".bgz"] as const;

/**
 * Compression format detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("calls.ann.vcf.gz"); // "gzip"
 * CompressionDetector.fromMagicBytes(bytes).format;       // "gzip" | "none"
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }

  /**
   * Detect compression format from the leading bytes of a buffer
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    const isGzip = bytes[0] === GZIP_MAGIC_FIRST_BYTE && bytes[1] === GZIP_MAGIC_SECOND_BYTE;
    return {
      format: isGzip ? "gzip" : "none",
      magicBytes: bytes.slice(0, 2),
      detectionMethod: "magic-bytes",
    };
  }

  /**
   * Combine extension and magic-byte evidence
   *
   * Magic bytes win when they disagree with the extension: a `.vcf.gz`
   * that was already decompressed by a download tool is read as plain text.
   */
  static hybrid(bytes: Uint8Array, filePath: string): CompressionDetection {
    const fromBytes = CompressionDetector.fromMagicBytes(bytes);
    const fromExtension = CompressionDetector.fromExtension(filePath);

    if (fromBytes.format === fromExtension) {
      return { ...fromBytes, detectionMethod: "hybrid" };
    }
    if (bytes.length < 2) {
      return { format: fromExtension, detectionMethod: "extension" };
    }
    return fromBytes;
  }
}
