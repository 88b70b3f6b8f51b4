/**
 * File reading for VCF inputs
 *
 * Files are read whole: the pipeline holds the full record set in memory.
 * Gzip input is detected from magic bytes and extension and decompressed
 * through the injected `CompressionService`.
 */

import { readFile, stat } from "node:fs/promises";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector } from "../compression/detector";
import { CompressionService } from "../compression/service";
import { type CompressionError, FileError } from "../errors";
import type { CompressionFormat, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runIO } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  maxFileSize: 2_147_483_648, // 2GB
  autoDecompress: true,
  compressionFormat: "none", // auto-detected
};

/**
 * Check if a file exists and is a regular file
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);
  try {
    const info = await stat(validatedPath);
    return info.isFile();
  } catch {
    return false;
  }
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);
  return runIO(statSize(validatedPath));
}

/**
 * Read a file's bytes, decompressing gzip content when enabled
 *
 * @throws {FileError} If the file is missing, unreadable or too large
 * @throws {CompressionError} If gzip content is corrupt
 */
export async function readBytes(path: string, options: FileReaderOptions = {}): Promise<Uint8Array> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);
  return runIO(readBytesProgram(validatedPath, mergedOptions));
}

/**
 * Read a file as UTF-8 text, decompressing gzip content when enabled
 *
 * @example
 * ```typescript
 * const text = await readToString("calls.ann.vcf.gz");
 * ```
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const bytes = await readBytes(path, options);
  return new TextDecoder("utf-8").decode(bytes);
}

function statSize(path: string): Effect.Effect<number, FileError> {
  return Effect.tryPromise({
    try: async () => {
      const info = await stat(path);
      if (!info.isFile()) {
        throw new Error(`EISDIR: ${path} is a directory`);
      }
      return info.size;
    },
    catch: (error) => FileError.fromSystemError("stat", path, error),
  });
}

function readBytesProgram(
  path: string,
  options: Required<FileReaderOptions>
): Effect.Effect<Uint8Array, FileError | CompressionError, CompressionService> {
  return Effect.gen(function* () {
    const size = yield* statSize(path);
    if (size > options.maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File too large: ${size} bytes exceeds limit of ${options.maxFileSize} bytes`,
          path,
          "read"
        )
      );
    }

    const raw = yield* Effect.tryPromise({
      try: () => readFile(path),
      catch: (error) => FileError.fromSystemError("read", path, error),
    });
    const bytes = new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength);

    if (!options.autoDecompress) {
      return bytes;
    }

    const format = resolveFormat(bytes, path, options.compressionFormat);
    const compression = yield* CompressionService;
    return yield* compression.decompress(bytes, format);
  });
}

function resolveFormat(
  bytes: Uint8Array,
  path: string,
  requested: CompressionFormat
): CompressionFormat {
  if (requested !== "none") {
    return requested;
  }
  return CompressionDetector.hybrid(bytes, path).format;
}

function validatePath(path: string): string {
  const result = FilePathSchema(path);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid file path: ${result.summary}`, path, "stat");
  }
  return result;
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };
  const result = FileReaderOptionsSchema(merged);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${result.summary}`, "", "read");
  }
  return merged;
}
