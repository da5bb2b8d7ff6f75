/**
 * Compression format detection from file extensions
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @example
   * ```typescript
   * CompressionDetector.fromExtension('/data/run1/lib12.fastq.gz'); // 'gzip'
   * ```
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }
}
