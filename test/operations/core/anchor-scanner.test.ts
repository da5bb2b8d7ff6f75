/**
 * Tests for anchor-delimited span search
 */

import { describe, expect, test } from "vitest";
import { findFlankedSpans, type SpanSearch } from "../../../src/operations/core/anchor-scanner";

const SEARCH: SpanSearch = {
  leftAnchor: "gtcag",
  rightAnchor: "ccgcc",
  minLength: 8,
  maxLength: 16,
};

describe("findFlankedSpans", () => {
  test("should find a span between the anchors", () => {
    expect(findFlankedSpans("gtcagaaaaaaaaccgcc", SEARCH)).toEqual(["aaaaaaaa"]);
  });

  test("should accept spans of exactly 8 and 16 bases", () => {
    expect(findFlankedSpans(`gtcag${"a".repeat(8)}ccgcc`, SEARCH)).toEqual(["a".repeat(8)]);
    expect(findFlankedSpans(`gtcag${"a".repeat(16)}ccgcc`, SEARCH)).toEqual(["a".repeat(16)]);
  });

  test("should reject spans of 7 and 17 bases", () => {
    expect(findFlankedSpans(`gtcag${"a".repeat(7)}ccgcc`, SEARCH)).toEqual([]);
    expect(findFlankedSpans(`gtcag${"a".repeat(17)}ccgcc`, SEARCH)).toEqual([]);
  });

  test("should prefer the longest span when the right anchor occurs twice", () => {
    // right anchor after 8 and after 13 bases
    const sequence = "gtcag" + "aaaaaaaa" + "ccgcc" + "ccgcc";
    expect(findFlankedSpans(sequence, SEARCH)).toEqual(["aaaaaaaaccgcc"]);
  });

  test("should resume after the right anchor and find later spans", () => {
    const sequence = "gtcagaaaaaaaaccgcc" + "gtcagttgcatgccaccgcc";
    expect(findFlankedSpans(sequence, SEARCH)).toEqual(["aaaaaaaa", "ttgcatgcca"]);
  });

  test("should move past a left anchor with no usable right anchor", () => {
    const sequence = "gtcagaaaa" + "gtcagcccccccc" + "ccgcc";
    // first anchor: the only right anchor sits 17 bases away
    expect(findFlankedSpans(sequence, SEARCH)).toEqual(["cccccccc"]);
  });

  test("should return nothing when the anchors are absent", () => {
    expect(findFlankedSpans("acgtacgtacgtacgtacgt", SEARCH)).toEqual([]);
    expect(findFlankedSpans("", SEARCH)).toEqual([]);
  });

  test("should match case exactly", () => {
    expect(findFlankedSpans("GTCAGAAAAAAAACCGCC", SEARCH)).toEqual([]);
  });
});
