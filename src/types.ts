/**
 * Shared I/O type definitions and their runtime schemas
 */

import { type } from "arktype";

/**
 * Compression formats understood by the reader and writer
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Options for file reading operations
 */
export interface FileReaderOptions {
  /** Chunk size used when streaming from disk */
  readonly bufferSize?: number;
  /** Decompress based on the file extension (default: true) */
  readonly autoDecompress?: boolean;
  /** Force a compression format instead of detecting it from the extension */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * Options for writing files
 */
export interface WriteOptions {
  /** Automatically compress based on file extension (default: true) */
  readonly autoCompress?: boolean;
  /** Override compression format detection */
  readonly compressionFormat?: CompressionFormat;
  /** Compression level 1-9 for gzip (default: 6) */
  readonly compressionLevel?: number;
}

export interface DecompressorOptions {
  readonly bufferSize?: number;
}

/**
 * Result of splitting a text buffer into complete lines
 */
export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({ expected: "a path without null characters", actual: path });
  }
  return true;
});

export const FileReaderOptionsSchema = type({
  "bufferSize?": "1024<=number<=1048576",
  "autoDecompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
});

export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionFormat?": '"gzip"|"none"',
  "compressionLevel?": "1<=number<=9",
});
