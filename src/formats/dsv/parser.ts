/**
 * @module formats/dsv/parser
 * @description Header-driven delimited text parser
 *
 * The first non-empty row names the columns; each following row becomes a
 * DSVRecord keyed by those names. Quoted fields may span lines.
 */

import { type } from "arktype";
import { DSVParseError, ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import { hasBalancedQuotes, parseCSVRow } from "./state-machine";
import type { DSVParserOptions, DSVRecord } from "./types";
import { normalizeLineEndings, removeBOM } from "./utils";

const DSVParserOptionsSchema = type({
  "delimiter?": "string==1",
  "quote?": "string==1",
  "skipEmptyRows?": "boolean",
});

export class DSVParser {
  protected readonly delimiter: string;
  protected readonly quote: string;
  protected readonly skipEmptyRows: boolean;

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV parser options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? "\t";
    this.quote = options.quote ?? '"';
    this.skipEmptyRows = options.skipEmptyRows ?? true;
  }

  /**
   * Parse delimited text with a header row
   *
   * @returns Column names and one record per data row
   * @throws {DSVParseError} If there is no header row or a quote is never closed
   */
  parseString(text: string): { headers: string[]; records: DSVRecord[] } {
    const rows = this.splitRows(normalizeLineEndings(removeBOM(text)));
    const headerRow = rows.find((row) => !this.isEmpty(row.fields));
    if (headerRow === undefined) {
      throw new DSVParseError("Missing header row", 1);
    }

    const headers = headerRow.fields;
    const records: DSVRecord[] = [];

    for (const row of rows) {
      if (row.lineNumber <= headerRow.lineNumber) continue;
      if (this.skipEmptyRows && this.isEmpty(row.fields)) continue;

      const fields: Record<string, string> = {};
      headers.forEach((name, index) => {
        const value = row.fields[index];
        if (value !== undefined) fields[name] = value;
      });
      records.push({ fields, lineNumber: row.lineNumber });
    }

    return { headers, records };
  }

  /**
   * Read and parse a delimited file (gzip-compressed files are accepted)
   *
   * @throws {FileError} If the file cannot be read
   */
  async parseFile(path: string): Promise<{ headers: string[]; records: DSVRecord[] }> {
    return this.parseString(await readToString(path));
  }

  private splitRows(text: string): { fields: string[]; lineNumber: number }[] {
    const rows: { fields: string[]; lineNumber: number }[] = [];
    const lines = text.split("\n");
    if (lines[lines.length - 1] === "") lines.pop();

    let pending = "";
    let startLine = 0;

    lines.forEach((line, index) => {
      if (pending === "") {
        pending = line;
        startLine = index + 1;
      } else {
        pending += `\n${line}`;
      }

      if (hasBalancedQuotes(pending, this.quote)) {
        rows.push({
          fields: parseCSVRow(pending, this.delimiter, this.quote, startLine),
          lineNumber: startLine,
        });
        pending = "";
      }
    });

    if (pending !== "") {
      throw new DSVParseError("Unclosed quote at end of input", startLine);
    }

    return rows;
  }

  private isEmpty(fields: string[]): boolean {
    return fields.every((field) => field.trim() === "");
  }
}

/**
 * Comma-separated values parser
 */
export class CSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: "," });
  }
}
