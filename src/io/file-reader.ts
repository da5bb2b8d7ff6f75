/**
 * File reading utilities on top of the Effect platform FileSystem
 *
 * Effect is used internally for resource handling; every function here
 * exposes a plain Promise API and converts platform failures to FileError.
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { CompressionDetector, GzipDecompressor } from "../compression";
import { FileError } from "../errors";
import type { FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { readLines } from "./stream-utils";
import { getPlatform, runOrThrow } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  autoDecompress: true,
  compressionFormat: "none",
};

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If the path is invalid or cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(validatedPath))) return false;
    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runOrThrow(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Check if a path exists and is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(validatedPath))) return false;
    const info = yield* fs.stat(validatedPath);
    return info.type === "Directory";
  });

  try {
    return await runOrThrow(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * List the regular files of a directory, sorted by name
 *
 * Subdirectories and other entries are left out.
 *
 * @returns File names (not full paths)
 * @throws {FileError} If the directory cannot be read
 */
export async function listFiles(directory: string): Promise<string[]> {
  const validatedPath = validatePath(directory);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const names = yield* fs.readDirectory(validatedPath);

    const files = yield* Effect.filter(names, (name) =>
      fs.stat(path.join(validatedPath, name)).pipe(Effect.map((info) => info.type === "File"))
    );
    return [...files].sort(compareNames);
  });

  try {
    return await runOrThrow(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("list", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * Files ending in .gz are decompressed on the fly unless autoDecompress is
 * turned off.
 *
 * @throws {FileError} If the file does not exist or cannot be opened
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  if (!(await exists(validatedPath))) {
    throw new FileError(
      `File does not exist or is not accessible: ${validatedPath}`,
      validatedPath,
      "open"
    );
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return Stream.toReadableStream(
      fs.stream(validatedPath, { bufferSize: mergedOptions.bufferSize })
    );
  });

  let stream: ReadableStream<Uint8Array>;
  try {
    stream = await runOrThrow(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }

  if (!mergedOptions.autoDecompress) return stream;

  const format =
    mergedOptions.compressionFormat === "none"
      ? CompressionDetector.fromExtension(validatedPath)
      : mergedOptions.compressionFormat;

  return format === "gzip"
    ? GzipDecompressor.wrapStream(stream, { bufferSize: mergedOptions.bufferSize })
    : stream;
}

/**
 * Iterate over the lines of a (possibly gzipped) text file
 */
export async function* readFileLines(
  path: string,
  options: FileReaderOptions = {}
): AsyncIterable<string> {
  const stream = await createStream(path, options);
  yield* readLines(stream);
}

/**
 * Read entire file to string, decompressing .gz files
 *
 * @throws {FileError} If the file cannot be read
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const stream = await createStream(path, options);
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let content = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      content += decoder.decode(value, { stream: true });
    }
    return content + decoder.decode();
  } catch (error) {
    throw FileError.fromSystemError("read", path, error);
  } finally {
    reader.releaseLock();
  }
}

export const FileReader = {
  exists,
  isDirectory,
  listFiles,
  createStream,
  readFileLines,
  readToString,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
