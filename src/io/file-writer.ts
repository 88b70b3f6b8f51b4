/**
 * File writing for result tables
 *
 * Output is compressed when the path ends in `.gz` (or when a format is
 * forced through `WriteOptions`), using the same `CompressionService` the
 * reader uses.
 *
 * @module file-writer
 */

import { writeFile } from "node:fs/promises";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector } from "../compression/detector";
import { CompressionService } from "../compression/service";
import { type CompressionError, FileError, ValidationError } from "../errors";
import type { WriteOptions } from "../types";
import { FilePathSchema, WriteOptionsSchema } from "../types";
import { runIO } from "./runtime";

function applyCompression(
  data: Uint8Array,
  filePath: string,
  options: WriteOptions
): Effect.Effect<Uint8Array, CompressionError, CompressionService> {
  return Effect.gen(function* () {
    if (options.autoCompress === false) {
      return data;
    }

    let compressionFormat = options.compressionFormat ?? "none";
    if (compressionFormat === "none") {
      compressionFormat = CompressionDetector.fromExtension(filePath);
    }

    const compression = yield* CompressionService;
    return yield* compression.compress(data, compressionFormat, options.compressionLevel ?? 6);
  });
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails or the path is invalid
 *
 * @example
 * ```typescript
 * await writeString("mutations.csv.gz", csv); // gzip by extension
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const pathCheck = FilePathSchema(path);
  if (pathCheck instanceof type.errors) {
    throw new FileError(`Invalid file path: ${pathCheck.summary}`, path, "write");
  }
  const optionsCheck = WriteOptionsSchema(options);
  if (optionsCheck instanceof type.errors) {
    throw new ValidationError(`Invalid write options: ${optionsCheck.summary}`);
  }

  const program = Effect.gen(function* () {
    const encoded = new TextEncoder().encode(content);
    const data = yield* applyCompression(encoded, pathCheck, options);
    yield* Effect.tryPromise({
      try: () => writeFile(pathCheck, data),
      catch: (error) => FileError.fromSystemError("write", pathCheck, error),
    });
  });

  await runIO(program);
}
