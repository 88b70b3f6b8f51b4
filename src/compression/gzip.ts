/**
 * Gzip compression for VCF inputs and tabular outputs
 *
 * Uses Node's zlib, which also reads multi-member streams such as the
 * BGZF blocks written by `bgzip`.
 */

import { constants } from "node:buffer";
import { promisify } from "node:util";
import { gunzip, gzip } from "node:zlib";
import { CompressionError } from "../errors";

const gunzipAsync = promisify(gunzip);
const gzipAsync = promisify(gzip);

const GZIP_MAGIC_BYTE1 = 0x1f;
const GZIP_MAGIC_BYTE2 = 0x8b;

/** Largest buffer zlib may allocate on this runtime */
const MAX_OUTPUT_SIZE = constants.MAX_LENGTH;

export interface GzipOptions {
  /** Compression level 1-9 (compress only) */
  readonly level?: number;
  /** Safety limit for decompressed output size, capped at `buffer.constants.MAX_LENGTH` */
  readonly maxOutputSize?: number;
}

function validateGzipFormat(compressed: Uint8Array): void {
  if (compressed.length === 0) {
    throw new CompressionError("Compressed data must not be empty", "gzip", "decompress");
  }
  if (
    compressed.length < 2 ||
    compressed[0] !== GZIP_MAGIC_BYTE1 ||
    compressed[1] !== GZIP_MAGIC_BYTE2
  ) {
    throw new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "gzip",
      "decompress",
      0
    );
  }
}

/**
 * Decompress an entire gzip buffer in memory
 *
 * @throws {CompressionError} If the data is not gzip or is corrupt
 */
export async function decompress(
  compressed: Uint8Array,
  options: GzipOptions = {}
): Promise<Uint8Array> {
  validateGzipFormat(compressed);

  try {
    const result = await gunzipAsync(compressed, {
      maxOutputLength: Math.min(options.maxOutputSize ?? MAX_OUTPUT_SIZE, MAX_OUTPUT_SIZE),
    });
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength);
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "decompress", err, compressed.length);
  }
}

/**
 * Compress a buffer with gzip
 *
 * @throws {CompressionError} If compression fails
 */
export async function compress(data: Uint8Array, options: GzipOptions = {}): Promise<Uint8Array> {
  try {
    const result = await gzipAsync(data, { level: options.level ?? 6 });
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength);
  } catch (err) {
    throw CompressionError.fromSystemError("gzip", "compress", err, data.length);
  }
}
