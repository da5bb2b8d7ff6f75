/**
 * Type definitions for barcode tag counting
 */

/**
 * Lowercase barcode sequence to gene identifier
 */
export type BarcodeReference = ReadonlyMap<string, string>;

/**
 * One row of a barcode table, keyed by column name
 */
export type BarcodeRow = Readonly<Record<string, string | undefined>>;

/**
 * Five-base flanking sequences used to locate barcodes, all lowercase
 *
 * A forward-strand barcode reads `fivePrime` + barcode + `threePrime`;
 * on the opposite strand it reads `threePrimeRc` + rc(barcode) + `fivePrimeRc`.
 */
export interface Anchors {
  readonly fivePrime: string;
  readonly threePrime: string;
  readonly fivePrimeRc: string;
  readonly threePrimeRc: string;
}

export type UnresolvedReason = "no_candidate" | "ambiguous";

/**
 * Classification of a single read against the barcode reference
 */
export type MatchOutcome =
  | { readonly status: "resolved"; readonly barcode: string }
  | {
      readonly status: "unresolved";
      readonly reason: UnresolvedReason;
      /** Reference barcodes found in the read (empty for no_candidate) */
      readonly matches: readonly string[];
    };

/**
 * Diagnostic sink; console satisfies it
 */
export interface Logger {
  warn(message: string): void;
}

export interface BarcodeReferenceOptions {
  /** Skip rows without a barcode instead of failing (default: false) */
  readonly ignoreMissingTag?: boolean;
  readonly logger?: Logger;
}

/**
 * Per-sample classification tallies
 */
export interface SampleSummary {
  readonly reads: number;
  readonly resolved: number;
  readonly noCandidate: number;
  readonly ambiguous: number;
}

export interface ReportOptions {
  /** Keep one row per barcode instead of summing barcodes of the same gene (default: false) */
  readonly byTag?: boolean;
}

export interface ReportRow {
  /** Barcode key, `no_match`, or the `;`-joined barcodes of a gene */
  readonly barcode: string;
  readonly gene: string;
  /** One count per sample, in the report's sample order */
  readonly counts: readonly number[];
}

export interface CountReport {
  readonly samples: readonly string[];
  readonly rows: readonly ReportRow[];
}

export interface TagCountOptions {
  /** Directory holding one .fastq or .fastq.gz file per sample */
  readonly seqDir: string;
  /** CSV file mapping gene ids to barcodes */
  readonly barcodes: string;
  /** Sequence 5' of the barcode; only its last five bases are used */
  readonly fivePrimeContext?: string;
  /** Sequence 3' of the barcode; only its first five bases are used */
  readonly threePrimeContext?: string;
  readonly byTag?: boolean;
  readonly ignoreMissingTag?: boolean;
  /** FASTQ file receiving every unresolved read */
  readonly nomatchOutFile?: string;
  /** Log every unresolved read, not only ambiguous ones */
  readonly verbose?: boolean;
  readonly logger?: Logger;
}
