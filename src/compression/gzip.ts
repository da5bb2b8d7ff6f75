/**
 * Gzip compression for sequencing files
 *
 * Buffer compression goes through fflate; streaming decompression uses
 * Node's zlib gunzip, which also accepts multi-member files such as
 * concatenated sequencer chunks or output written in several pieces.
 */

import { gzipSync, type GzipOptions } from "fflate";
import { createGunzip } from "node:zlib";
import { CompressionError } from "../errors";
import type { DecompressorOptions } from "../types";

type GzipLevel = NonNullable<GzipOptions["level"]>;

const GZIP_LEVELS: readonly GzipLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];
const DEFAULT_BUFFER_SIZE = 65536;

function toGzipLevel(level: number): GzipLevel {
  const match = GZIP_LEVELS.find((candidate) => candidate === level);
  if (match === undefined) {
    throw new CompressionError(`Invalid gzip compression level: ${level}`, "gzip", "compress");
  }
  return match;
}

/**
 * Compress a buffer into a single gzip member
 *
 * @throws {CompressionError} If the level is out of range or fflate fails
 */
export async function compress(
  data: Uint8Array,
  options: { readonly level?: number } = {}
): Promise<Uint8Array> {
  const level = toGzipLevel(options.level ?? 6);

  try {
    return gzipSync(data, { level });
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "compress", error);
  }
}

/**
 * Create gzip decompression transform stream
 *
 * @example
 * ```typescript
 * const reads = compressedStream.pipeThrough(createStream());
 * ```
 */
export function createStream(
  options: DecompressorOptions = {}
): TransformStream<Uint8Array, Uint8Array> {
  const gunzipStream = createGunzip({ chunkSize: options.bufferSize ?? DEFAULT_BUFFER_SIZE });
  let bytesProcessed = 0;

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller): void {
      gunzipStream.on("data", (chunk: Buffer) => {
        controller.enqueue(new Uint8Array(chunk));
      });
      gunzipStream.on("error", (error: Error) => {
        controller.error(CompressionError.fromSystemError("gzip", "stream", error, bytesProcessed));
      });
    },

    transform(chunk): Promise<void> {
      bytesProcessed += chunk.length;
      return new Promise((resolve, reject) => {
        gunzipStream.write(chunk, (error) => {
          if (error) {
            reject(CompressionError.fromSystemError("gzip", "stream", error, bytesProcessed));
            return;
          }
          resolve();
        });
      });
    },

    flush(): Promise<void> {
      return new Promise((resolve, reject) => {
        gunzipStream.once("end", () => resolve());
        gunzipStream.once("error", (error: Error) =>
          reject(CompressionError.fromSystemError("gzip", "stream", error, bytesProcessed))
        );
        gunzipStream.end();
      });
    },
  });
}

/**
 * Wrap compressed readable stream with gzip decompression
 */
export function wrapStream(
  input: ReadableStream<Uint8Array>,
  options: DecompressorOptions = {}
): ReadableStream<Uint8Array> {
  return input.pipeThrough(createStream(options));
}

export const GzipDecompressor = {
  createStream,
  wrapStream,
} as const;
