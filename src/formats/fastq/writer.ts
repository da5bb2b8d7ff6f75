/**
 * FASTQ format writer
 *
 * Writes records back out line for line, so that a record read by
 * FastqParser round-trips unchanged.
 */

import type { FastqRecord } from "./types";

export class FastqWriter {
  /**
   * Format one record as four newline-terminated lines
   *
   * @example
   * ```typescript
   * const writer = new FastqWriter();
   * writer.formatRecord(read); // "@read1\nACGT\n+\nIIII\n"
   * ```
   */
  formatRecord(record: FastqRecord): string {
    return `${record.header}\n${record.sequence}\n${record.separator}\n${record.quality}\n`;
  }

  formatRecords(records: Iterable<FastqRecord>): string {
    let output = "";
    for (const record of records) {
      output += this.formatRecord(record);
    }
    return output;
  }
}
