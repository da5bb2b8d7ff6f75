/**
 * Barcode tag counting operations
 *
 * @example
 * ```typescript
 * const { report, summaries } = await countTags({
 *   seqDir: 'reads',
 *   barcodes: 'barcodes.csv',
 *   nomatchOutFile: 'nomatch.fastq.gz',
 * });
 * process.stdout.write(formatCountTable(report));
 * ```
 */

export { loadBarcodeFile, loadBarcodeReference } from "./barcodes";
export {
  ANCHOR_LENGTH,
  BA_PRIMER,
  MAX_BARCODE_LENGTH,
  MIN_BARCODE_LENGTH,
  NO_MATCH,
  R2_TO_AMP97,
} from "./constants";
export { CountMatrix } from "./count-matrix";
export { TagCounter, type TagCounterOptions, type UnresolvedReadSink } from "./counter";
export { classifyRead, deriveAnchors, extractCandidates } from "./matcher";
export { buildReport, formatCountTable } from "./report";
export { isFastqFile, parseSampleName } from "./samples";
export { countTags, TagCountOptionsSchema, type TagCountResult } from "./tagcount";
export { findFlankedSpans, type SpanSearch } from "./core/anchor-scanner";
export { reverseComplement } from "./core/sequence-manipulation";
export type {
  Anchors,
  BarcodeReference,
  BarcodeReferenceOptions,
  BarcodeRow,
  CountReport,
  Logger,
  MatchOutcome,
  ReportOptions,
  ReportRow,
  SampleSummary,
  TagCountOptions,
  UnresolvedReason,
} from "./types";
