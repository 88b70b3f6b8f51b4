/**
 * Effect runtime glue for the Promise-based I/O API
 *
 * I/O programs are written as Effects that depend on `CompressionService`.
 * These helpers provide the live layer and turn typed failures back into
 * thrown errors so callers see plain `FileError` / `CompressionError`
 * instances rather than fiber failures.
 */

import { Effect, Either } from "effect";
import { CompressionService } from "../compression/service";
import type { MutationCallError } from "../errors";

/**
 * Run an I/O program with the live compression layer
 *
 * @throws The program's typed failure, unchanged
 */
export async function runIO<A, E extends MutationCallError>(
  program: Effect.Effect<A, E, CompressionService>
): Promise<A> {
  const result = await Effect.runPromise(
    Effect.either(program).pipe(Effect.provide(CompressionService.Live))
  );
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
