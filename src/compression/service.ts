/**
 * Effect-based compression service
 *
 * Provided to the file writer as an Effect service; format "none" passes
 * data through unchanged.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const compressor = yield* CompressionService;
 *   return yield* compressor.compress(data, "gzip", 6);
 * });
 * await Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 *
 * @module compression/service
 */

import { Context, Effect, Layer } from "effect";
import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";
import { compress as compressGzip } from "./gzip";

export interface CompressionServiceShape {
  /**
   * Compress data using the specified format
   * @param level - gzip level 0-9 (default 6)
   */
  readonly compress: (
    data: Uint8Array,
    format: CompressionFormat,
    level?: number
  ) => Effect.Effect<Uint8Array, CompressionError>;
}

export class CompressionService extends Context.Tag("@tagcount/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Gzip compression service layer
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}

function createGzipService(): CompressionServiceShape {
  return {
    compress: (data, format, level) =>
      format === "none"
        ? Effect.succeed(data)
        : Effect.tryPromise({
            try: () => compressGzip(data, { level: level ?? 6 }),
            catch: (error) => CompressionError.fromSystemError("gzip", "compress", error),
          }),
  };
}
