/**
 * CSV State Machine Module
 *
 * RFC 4180 field splitting: quoted fields, doubled quotes as escapes and
 * delimiters inside quotes.
 */

import { DSVParseError } from "../../errors";
import { CSVParseState } from "./types";

/**
 * Count unescaped quotes in a line
 */
export function countUnescapedQuotes(line: string, quote: string): number {
  let count = 0;
  for (let i = 0; i < line.length; i++) {
    if (line[i] !== quote) continue;
    if (line[i + 1] === quote) {
      i++;
    } else {
      count++;
    }
  }
  return count;
}

/**
 * Check if quotes are balanced, i.e. the row does not continue on the next line
 */
export function hasBalancedQuotes(line: string, quote: string): boolean {
  return countUnescapedQuotes(line, quote) % 2 === 0;
}

/**
 * Parse one CSV row into its fields
 *
 * @param lineNumber - Source line, used in error messages only
 * @throws {DSVParseError} On an unclosed quoted field
 */
export function parseCSVRow(
  line: string,
  delimiter: string = ",",
  quote: string = '"',
  lineNumber?: number
): string[] {
  const fields: string[] = [];
  let currentField = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote) {
          state = CSVParseState.QUOTE_IN_QUOTED;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else if (char === quote) {
          // doubled quote
          currentField += quote;
          state = CSVParseState.QUOTED_FIELD;
        } else {
          // lenient: text after a closing quote joins the field
          currentField += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in CSV field", lineNumber, fields.length + 1, line);
  }
  if (state === CSVParseState.UNQUOTED_FIELD || state === CSVParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    fields.push("");
  }

  return fields;
}
