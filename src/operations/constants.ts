/**
 * Tag counting constants
 */

/** Tag amplification (BA) primer; the barcode sits directly 3' of it */
export const BA_PRIMER = "GTAATTCGTGCGCGTCAG";

/** Cassette sequence from primer R2 to the arg97 primer binding site, same for all constructs */
export const R2_TO_AMP97 =
  "CCGCCTACTGCGACTATAGAGATATCAACCACTTTGTACAAGAAAGCTGGGTGGTACCCATCGAAATTGAAGG";

/** Bases of context taken on each side of the barcode */
export const ANCHOR_LENGTH = 5;

export const MIN_BARCODE_LENGTH = 8;
export const MAX_BARCODE_LENGTH = 16;

/** Row collecting every read not resolved to exactly one barcode */
export const NO_MATCH = "no_match";

/** Barcode value meaning "this gene has no designed tag" */
export const NO_TAG_MARKER = "none";

export const GENE_ID_COLUMNS = ["gene id", "gene_id"] as const;
export const BARCODE_COLUMNS = ["tag", "Barcode", "barcode"] as const;
