/**
 * Tag matcher
 *
 * Locates barcode candidates in a read by their five-base flanking
 * anchors on both strands and resolves them against the reference. A
 * candidate only counts when it is a known barcode.
 */

import { ConfigurationError } from "../errors";
import { findFlankedSpans } from "./core/anchor-scanner";
import { reverseComplement } from "./core/sequence-manipulation";
import {
  ANCHOR_LENGTH,
  BA_PRIMER,
  MAX_BARCODE_LENGTH,
  MIN_BARCODE_LENGTH,
  R2_TO_AMP97,
} from "./constants";
import type { Anchors, BarcodeReference, MatchOutcome } from "./types";

/**
 * Derive the search anchors from the sequence context around the barcode
 *
 * Both contexts are given in barcode-table orientation.
 *
 * @throws {ConfigurationError} If either context is shorter than five bases
 */
export function deriveAnchors(
  fivePrimeContext: string = BA_PRIMER,
  threePrimeContext: string = R2_TO_AMP97
): Anchors {
  if (fivePrimeContext.length < ANCHOR_LENGTH) {
    throw new ConfigurationError(
      `five_p_seq (BA-primer) must be at least ${ANCHOR_LENGTH}nt long, got '${fivePrimeContext}'`,
      "fivePrimeContext"
    );
  }
  if (threePrimeContext.length < ANCHOR_LENGTH) {
    throw new ConfigurationError(
      `three_p_seq (R2-amp97) must be at least ${ANCHOR_LENGTH}nt long, got '${threePrimeContext}'`,
      "threePrimeContext"
    );
  }

  const fivePrime = fivePrimeContext.slice(-ANCHOR_LENGTH).toLowerCase();
  const threePrime = threePrimeContext.slice(0, ANCHOR_LENGTH).toLowerCase();

  return {
    fivePrime,
    threePrime,
    fivePrimeRc: reverseComplement(fivePrime),
    threePrimeRc: reverseComplement(threePrime),
  };
}

/**
 * All anchored spans of a read, in forward-strand orientation and lowercase
 *
 * Forward-strand spans come first, then reverse-strand spans
 * (reverse-complemented).
 */
export function extractCandidates(sequence: string, anchors: Anchors): string[] {
  const read = sequence.toLowerCase();

  const forward = findFlankedSpans(read, {
    leftAnchor: anchors.fivePrime,
    rightAnchor: anchors.threePrime,
    minLength: MIN_BARCODE_LENGTH,
    maxLength: MAX_BARCODE_LENGTH,
  });
  const reverse = findFlankedSpans(read, {
    leftAnchor: anchors.threePrimeRc,
    rightAnchor: anchors.fivePrimeRc,
    minLength: MIN_BARCODE_LENGTH,
    maxLength: MAX_BARCODE_LENGTH,
  }).map(reverseComplement);

  return [...forward, ...reverse];
}

/**
 * Classify one read sequence
 *
 * Resolves only when exactly one candidate is a reference barcode. The
 * same barcode found twice is two hits and makes the read ambiguous.
 *
 * @example
 * ```typescript
 * const anchors = deriveAnchors();
 * const reference = new Map([['aaaaaaaa', 'geneA']]);
 * classifyRead('GTCAGAAAAAAAACCGCC', reference, anchors);
 * // { status: 'resolved', barcode: 'aaaaaaaa' }
 * ```
 */
export function classifyRead(
  sequence: string,
  reference: BarcodeReference,
  anchors: Anchors
): MatchOutcome {
  const existing = extractCandidates(sequence, anchors).filter((candidate) =>
    reference.has(candidate)
  );

  const [only] = existing;
  if (existing.length === 1 && only !== undefined) {
    return { status: "resolved", barcode: only };
  }

  return {
    status: "unresolved",
    reason: existing.length === 0 ? "no_candidate" : "ambiguous",
    matches: existing,
  };
}
