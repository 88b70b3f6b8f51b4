/**
 * Effect-based compression service for symmetric I/O
 *
 * The file reader and writer declare a dependency on `CompressionService`
 * and run with `CompressionService.Live`. Tests can provide a different
 * layer to observe or replace compression without touching the disk code.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const svc = yield* CompressionService;
 *   return yield* svc.compress(data, "gzip", 6);
 * });
 *
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { compress as compressGzip, decompress as decompressGzip } from "./gzip";

/**
 * Shape of the compression service
 */
export interface CompressionServiceShape {
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;

  readonly decompress: (
    data: Uint8Array,
    format: CompressionFormat
  ) => Effect.Effect<Uint8Array, CompressionError>;
}

function toCompressionError(
  operation: "compress" | "decompress",
  error: unknown
): CompressionError {
  return error instanceof CompressionError
    ? error
    : CompressionError.fromSystemError("gzip", operation, error);
}

function createGzipService(): CompressionServiceShape {
  return {
    compress: (data, format, level) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.tryPromise({
            try: () => compressGzip(data, { level: level ?? 6 }),
            catch: (error) => toCompressionError("compress", error),
          }),

    decompress: (data, format) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.tryPromise({
            try: () => decompressGzip(data),
            catch: (error) => toCompressionError("decompress", error),
          }),
  };
}

export class CompressionService extends Context.Tag("snpeff-mutations/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /** Gzip and passthrough, backed by Node's zlib */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}
