/**
 * @module formats/dsv/writer
 * @description Delimited text writer with RFC 4180 quoting
 *
 * Fields are quoted only when they contain the delimiter, the quote
 * character or a line break, unless quoteAll is set.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import type { DSVField, DSVWriterOptions } from "./types";

const DSVWriterOptionsSchema = type({
  "delimiter?": "string==1",
  "quote?": "string==1",
  "lineEnding?": "string>0",
  "quoteAll?": "boolean",
});

export class DSVWriter {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly lineEnding: string;
  private readonly quoteAll: boolean;

  constructor(options: DSVWriterOptions = {}) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? "\t";
    this.quote = options.quote ?? '"';
    this.lineEnding = options.lineEnding ?? "\n";
    this.quoteAll = options.quoteAll ?? false;
  }

  private formatField(value: DSVField): string {
    if (value === null || value === undefined) return "";

    const field = String(value);
    const needsQuoting =
      this.quoteAll ||
      field.includes(this.delimiter) ||
      field.includes(this.quote) ||
      field.includes("\n") ||
      field.includes("\r");

    if (!needsQuoting) return field;

    const escaped = field.split(this.quote).join(this.quote + this.quote);
    return this.quote + escaped + this.quote;
  }

  /**
   * Format a row of fields, without a line ending
   */
  formatRow(fields: readonly DSVField[]): string {
    return fields.map((field) => this.formatField(field)).join(this.delimiter);
  }

  /**
   * Format rows into a table, each row terminated by the line ending
   */
  formatRows(rows: Iterable<readonly DSVField[]>): string {
    let output = "";
    for (const row of rows) {
      output += this.formatRow(row) + this.lineEnding;
    }
    return output;
  }
}

export class CSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: "," });
  }
}
