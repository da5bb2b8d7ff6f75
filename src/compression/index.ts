/**
 * Compression module for sequencing files
 *
 * @example Streaming decompression
 * ```typescript
 * const compressedStream = await createStream('lib12.fastq.gz', { autoDecompress: false });
 * const reads = GzipDecompressor.wrapStream(compressedStream);
 * ```
 */

export { CompressionDetector } from "./detector";
export { GzipDecompressor, compress as gzipCompress } from "./gzip";
export { CompressionService, type CompressionServiceShape } from "./service";
export type { CompressionFormat, DecompressorOptions } from "../types";
