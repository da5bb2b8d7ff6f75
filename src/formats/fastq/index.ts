/**
 * FASTQ module exports
 */

export { FastqParser } from "./parser";
export { FastqWriter } from "./writer";
export { FastqParsingState } from "./types";
export type { FastqParserOptions, FastqRecord } from "./types";
