/**
 * Type definitions for delimiter-separated values
 */

/**
 * One data row keyed by header column name
 */
export interface DSVRecord {
  readonly fields: Readonly<Record<string, string>>;
  /** Source line number for error reporting */
  readonly lineNumber: number;
}

/**
 * Parser state for the CSV field state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

export interface DSVParserOptions {
  readonly delimiter?: string;
  readonly quote?: string;
  /** Skip rows whose fields are all empty (default: true) */
  readonly skipEmptyRows?: boolean;
}

export interface DSVWriterOptions {
  readonly delimiter?: string;
  readonly quote?: string;
  readonly lineEnding?: string;
  /** Quote every field, not only those that need it */
  readonly quoteAll?: boolean;
}

export type DSVField = string | number | null | undefined;
