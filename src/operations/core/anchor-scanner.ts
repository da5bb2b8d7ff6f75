/**
 * Anchor-delimited span search
 *
 * Finds stretches of bounded length that sit between a left and a right
 * anchor. The scan walks left to right: at each occurrence of the left
 * anchor the longest span whose right anchor follows is taken, and the
 * search resumes after that right anchor, so matches never overlap.
 */

export interface SpanSearch {
  readonly leftAnchor: string;
  readonly rightAnchor: string;
  readonly minLength: number;
  readonly maxLength: number;
}

/**
 * Collect every anchored span in the sequence
 *
 * Matching is exact; callers normalize case beforehand.
 *
 * @example
 * ```typescript
 * findFlankedSpans('gtcagaaaaaaaaccgcc', {
 *   leftAnchor: 'gtcag', rightAnchor: 'ccgcc', minLength: 8, maxLength: 16,
 * }); // ['aaaaaaaa']
 * ```
 */
export function findFlankedSpans(sequence: string, search: SpanSearch): string[] {
  const { leftAnchor, rightAnchor, minLength, maxLength } = search;
  const spans: string[] = [];
  let from = 0;

  while (from < sequence.length) {
    const anchorStart = sequence.indexOf(leftAnchor, from);
    if (anchorStart === -1) break;

    const spanStart = anchorStart + leftAnchor.length;
    const spanEnd = longestSpanEnd(sequence, spanStart, rightAnchor, minLength, maxLength);

    if (spanEnd === undefined) {
      from = anchorStart + 1;
    } else {
      spans.push(sequence.slice(spanStart, spanEnd));
      from = spanEnd + rightAnchor.length;
    }
  }

  return spans;
}

function longestSpanEnd(
  sequence: string,
  spanStart: number,
  rightAnchor: string,
  minLength: number,
  maxLength: number
): number | undefined {
  const longest = Math.min(maxLength, sequence.length - rightAnchor.length - spanStart);

  for (let length = longest; length >= minLength; length--) {
    if (sequence.startsWith(rightAnchor, spanStart + length)) {
      return spanStart + length;
    }
  }
  return undefined;
}
