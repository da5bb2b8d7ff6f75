/**
 * File writing operations using Effect Platform
 *
 * Promise-based API over the Effect FileSystem. Paths ending in .gz are
 * gzip-compressed through the injected CompressionService.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError } from "../errors";
import type { CompressionFormat, WriteOptions } from "../types";
import { WriteOptionsSchema } from "../types";
import { getPlatform, runOrThrow } from "./runtime";

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is closed when the callback given to openForWriting settles.
 */
export interface FileWriteHandle {
  writeString(content: string): Promise<void>;
  writeBytes(content: Uint8Array): Promise<void>;
}

function resolveFormat(path: string, options: WriteOptions): CompressionFormat {
  if (options.autoCompress === false) return "none";
  const format = options.compressionFormat ?? "none";
  return format === "none" ? CompressionDetector.fromExtension(path) : format;
}

function validateOptions(path: string, options: WriteOptions): void {
  const result = WriteOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new FileError(`Invalid write options: ${result.summary}`, path, "write");
  }
}

const compressWith = (data: Uint8Array, format: CompressionFormat, options: WriteOptions) =>
  Effect.gen(function* () {
    const compressionService = yield* CompressionService;
    return yield* compressionService.compress(data, format, options.compressionLevel ?? 6);
  });

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails
 *
 * @example
 * ```typescript
 * await writeString("counts.csv", table);
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  validateOptions(path, options);
  const format = resolveFormat(path, options);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const data = yield* compressWith(new TextEncoder().encode(content), format, options);
    yield* fs.writeFile(path, data);
  });

  try {
    await runOrThrow(
      program.pipe(Effect.provide(getPlatform()), Effect.provide(CompressionService.Live))
    );
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is opened (and truncated) before the callback runs, so an
 * unwritable path fails up front. For .gz paths every write becomes its
 * own gzip member; the concatenation is still a valid gzip file.
 *
 * @example
 * ```typescript
 * await openForWriting("nomatch.fastq", async (handle) => {
 *   for (const read of unresolved) {
 *     await handle.writeString(writer.formatRecord(read));
 *   }
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>,
  options: WriteOptions = {}
): Promise<T> {
  validateOptions(path, options);
  const format = resolveFormat(path, options);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const file = yield* fs
      .open(path, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", path, error)));

    const writeBytes = (content: Uint8Array): Promise<void> =>
      runOrThrow(
        compressWith(content, format, options).pipe(
          Effect.flatMap((data) => file.writeAll(data)),
          Effect.mapError((error) =>
            error instanceof CompressionError ? error : FileError.fromSystemError("write", path, error)
          ),
          Effect.provide(CompressionService.Live)
        )
      );

    const handle: FileWriteHandle = {
      writeString: (content) => writeBytes(new TextEncoder().encode(content)),
      writeBytes,
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
  });

  return runOrThrow(program.pipe(Effect.scoped, Effect.provide(getPlatform())));
}

/**
 * Delete a file if it exists
 *
 * @throws {FileError} When the file exists but cannot be removed
 */
export async function removeFile(path: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (yield* fs.exists(path)) {
      yield* fs.remove(path);
    }
  });

  try {
    await runOrThrow(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}
