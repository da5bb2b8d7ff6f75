/**
 * FASTQ parser for strict 4-line records
 *
 * Records are read positionally: header, sequence, separator, quality.
 * Because '@' and '+' are legal quality characters, only the header and
 * separator lines are checked for their marker; blank lines are tolerated
 * between records but never inside one.
 *
 * ```
 * WAITING_HEADER → READING_SEQUENCE → WAITING_SEPARATOR → READING_QUALITY
 *      ↑                                                        │
 *      └────────────────────────── emit ────────────────────────┘
 * ```
 */

import { type } from "arktype";
import { ParseError, ValidationError } from "../../errors";
import { readFileLines } from "../../io/file-reader";
import { processBuffer, readLines } from "../../io/stream-utils";
import type { FileReaderOptions } from "../../types";
import { type FastqParserOptions, FastqParsingState, type FastqRecord } from "./types";

const FastqParserOptionsSchema = type({
  "trackLineNumbers?": "boolean",
});

interface PendingRecord {
  header: string;
  sequence: string;
  separator: string;
  lineNumber: number;
}

/**
 * Streaming FASTQ parser
 *
 * @example
 * ```typescript
 * const parser = new FastqParser();
 * for await (const read of parser.parseFile('lib12.fastq.gz')) {
 *   console.log(read.id, read.sequence.length);
 * }
 * ```
 */
export class FastqParser {
  private readonly trackLineNumbers: boolean;

  constructor(options: FastqParserOptions = {}) {
    const validationResult = FastqParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTQ parser options: ${validationResult.summary}`);
    }
    this.trackLineNumbers = options.trackLineNumbers ?? true;
  }

  /**
   * Parse FASTQ records from a string
   */
  async *parseString(data: string): AsyncIterable<FastqRecord> {
    const { lines, remainder } = processBuffer(data);
    if (remainder !== "") lines.push(remainder);
    yield* this.parseLines(lines);
  }

  /**
   * Parse FASTQ records from a file, decompressing .gz files transparently
   *
   * @throws {FileError} If the file cannot be opened
   * @throws {ParseError} On a malformed or truncated record
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<FastqRecord> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }
    yield* this.parseLines(readFileLines(filePath, options));
  }

  /**
   * Parse FASTQ records from a byte stream
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<FastqRecord> {
    yield* this.parseLines(readLines(stream));
  }

  /**
   * Group lines into records
   */
  async *parseLines(lines: AsyncIterable<string> | Iterable<string>): AsyncIterable<FastqRecord> {
    let state = FastqParsingState.WAITING_HEADER;
    let pending: PendingRecord = { header: "", sequence: "", separator: "", lineNumber: 0 };
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;

      switch (state) {
        case FastqParsingState.WAITING_HEADER:
          if (line.trim() === "") break;
          if (!line.startsWith("@")) {
            throw new ParseError(
              "FASTQ header must start with '@'",
              "FASTQ",
              lineNumber,
              line.slice(0, 100)
            );
          }
          pending = { header: line, sequence: "", separator: "", lineNumber };
          state = FastqParsingState.READING_SEQUENCE;
          break;

        case FastqParsingState.READING_SEQUENCE:
          pending.sequence = line;
          state = FastqParsingState.WAITING_SEPARATOR;
          break;

        case FastqParsingState.WAITING_SEPARATOR:
          if (!line.startsWith("+")) {
            throw new ParseError(
              "FASTQ separator line must start with '+'",
              "FASTQ",
              lineNumber,
              line.slice(0, 100)
            );
          }
          pending.separator = line;
          state = FastqParsingState.READING_QUALITY;
          break;

        case FastqParsingState.READING_QUALITY:
          yield this.buildRecord(pending, line);
          state = FastqParsingState.WAITING_HEADER;
          break;
      }
    }

    if (state !== FastqParsingState.WAITING_HEADER) {
      throw new ParseError(
        `Truncated FASTQ record: input ended before the record was complete`,
        "FASTQ",
        pending.lineNumber,
        pending.header.slice(0, 100)
      );
    }
  }

  private buildRecord(pending: PendingRecord, quality: string): FastqRecord {
    const id = pending.header.slice(1).trim().split(/\s+/, 1)[0] ?? "";
    const record: FastqRecord = {
      header: pending.header,
      id,
      sequence: pending.sequence,
      separator: pending.separator,
      quality,
    };
    return this.trackLineNumbers ? { ...record, lineNumber: pending.lineNumber } : record;
  }
}
