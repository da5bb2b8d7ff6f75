/**
 * Reverse complement of DNA sequences
 *
 * Case is preserved: a lowercase base complements to a lowercase base.
 * Characters outside the DNA alphabet (N, gaps) pass through unchanged.
 */

const DNA_COMPLEMENT_MAP: Readonly<Record<string, string>> = {
  A: "T",
  T: "A",
  G: "C",
  C: "G",
  a: "t",
  t: "a",
  g: "c",
  c: "g",
};

/**
 * Reverse complement a DNA sequence
 *
 * @example
 * ```typescript
 * reverseComplement('GTCAG'); // 'CTGAC'
 * ```
 */
export function reverseComplement(sequence: string): string {
  let result = "";
  for (let i = sequence.length - 1; i >= 0; i--) {
    const base = sequence.charAt(i);
    result += DNA_COMPLEMENT_MAP[base] ?? base;
  }
  return result;
}
