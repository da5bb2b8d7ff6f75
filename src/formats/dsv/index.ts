/**
 * DSV (delimiter-separated values) module exports
 */

export { CSVParser, DSVParser } from "./parser";
export { CSVWriter, DSVWriter } from "./writer";
export { hasBalancedQuotes, parseCSVRow } from "./state-machine";
export { normalizeLineEndings, removeBOM } from "./utils";
export { CSVParseState } from "./types";
export type { DSVField, DSVParserOptions, DSVRecord, DSVWriterOptions } from "./types";
