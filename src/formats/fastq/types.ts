/**
 * Type definitions for FASTQ reading and writing
 */

/**
 * One 4-line FASTQ record
 *
 * Lines are kept exactly as read (minus the line terminator) so that a
 * record can be written back out unchanged. Quality strings are carried
 * along but never interpreted.
 */
export interface FastqRecord {
  /** Full header line, including the leading '@' */
  readonly header: string;
  /** Read identifier: first whitespace-delimited token after '@' */
  readonly id: string;
  readonly sequence: string;
  /** Separator line, including the leading '+' */
  readonly separator: string;
  readonly quality: string;
  /** Line number of the header within its source (1-based) */
  readonly lineNumber?: number;
}

export interface FastqParserOptions {
  /** Attach source line numbers to records (default: true) */
  readonly trackLineNumbers?: boolean;
}

/**
 * Position within a 4-line record the parser expects next
 */
export enum FastqParsingState {
  WAITING_HEADER,
  READING_SEQUENCE,
  WAITING_SEPARATOR,
  READING_QUALITY,
}
