/**
 * Delimited text parser and writer tests
 */

import { describe, expect, test } from "vitest";
import { DSVParseError, ValidationError } from "../../src/errors";
import {
  CSVParser,
  CSVWriter,
  DSVParser,
  DSVWriter,
  normalizeLineEndings,
  parseCSVRow,
  removeBOM,
} from "../../src/formats/dsv";

describe("parseCSVRow", () => {
  test("should split plain fields", () => {
    expect(parseCSVRow("geneA,AAAAAAAA,1")).toEqual(["geneA", "AAAAAAAA", "1"]);
  });

  test("should handle quoted fields with delimiters and doubled quotes", () => {
    expect(parseCSVRow('geneA,"plate 1, well A1","say ""hi"""')).toEqual([
      "geneA",
      "plate 1, well A1",
      'say "hi"',
    ]);
  });

  test("should keep empty fields", () => {
    expect(parseCSVRow("a,,c")).toEqual(["a", "", "c"]);
    expect(parseCSVRow("a,")).toEqual(["a", ""]);
    expect(parseCSVRow(",")).toEqual(["", ""]);
    expect(parseCSVRow("")).toEqual([]);
  });

  test("should reject an unclosed quote", () => {
    expect(() => parseCSVRow('a,"unclosed', ",", '"', 3)).toThrow(DSVParseError);
    expect(() => parseCSVRow('a,"unclosed', ",", '"', 3)).toThrow(
      'Unclosed quote in CSV field (line 3, column 2, field "a,"unclosed")'
    );
  });
});

describe("CSVParser", () => {
  test("should key records by header", () => {
    const { headers, records } = new CSVParser().parseString(
      "gene_id,barcode\ngeneA,AAAAAAAA\n\ngeneB,CCCCCCCC\n"
    );

    expect(headers).toEqual(["gene_id", "barcode"]);
    expect(records).toEqual([
      { fields: { gene_id: "geneA", barcode: "AAAAAAAA" }, lineNumber: 2 },
      { fields: { gene_id: "geneB", barcode: "CCCCCCCC" }, lineNumber: 4 },
    ]);
  });

  test("should drop columns missing from short rows", () => {
    const { records } = new CSVParser().parseString("gene_id,barcode\ngeneA\n");
    expect(records[0]?.fields).toEqual({ gene_id: "geneA" });
  });

  test("should strip a byte order mark and CRLF endings", () => {
    const { headers, records } = new CSVParser().parseString("\uFEFFgene id,tag\r\ngeneA,ACGTACGT\r\n");
    expect(headers).toEqual(["gene id", "tag"]);
    expect(records[0]?.fields).toEqual({ "gene id": "geneA", tag: "ACGTACGT" });
  });

  test("should join quoted fields that span lines", () => {
    const { records } = new CSVParser().parseString('gene_id,note\ngeneA,"two\nlines"\ngeneB,x\n');
    expect(records).toEqual([
      { fields: { gene_id: "geneA", note: "two\nlines" }, lineNumber: 2 },
      { fields: { gene_id: "geneB", note: "x" }, lineNumber: 4 },
    ]);
  });

  test("should reject input without header", () => {
    expect(() => new CSVParser().parseString("\n\n")).toThrow("Missing header row");
  });

  test("should reject a quote left open at the end", () => {
    expect(() => new CSVParser().parseString('gene_id,note\ngeneA,"open\n')).toThrow(DSVParseError);
  });
});

describe("DSVParser options", () => {
  test("should parse tab-separated text", () => {
    const { records } = new DSVParser({ delimiter: "\t" }).parseString("gene_id\tbarcode\ngeneA\tAAAAAAAA\n");
    expect(records[0]?.fields).toEqual({ gene_id: "geneA", barcode: "AAAAAAAA" });
  });

  test("should reject a multi-character delimiter", () => {
    expect(() => new DSVParser({ delimiter: "::" })).toThrow(ValidationError);
  });
});

describe("writers", () => {
  test("should quote only fields that need it", () => {
    const writer = new CSVWriter();
    expect(writer.formatRow(["no_match", "", 3])).toBe("no_match,,3");
    expect(writer.formatRow(["a,b", 'say "hi"', "two\nlines"])).toBe('"a,b","say ""hi""","two\nlines"');
    expect(writer.formatRow([null, undefined])).toBe(",");
  });

  test("should quote everything with quoteAll", () => {
    expect(new CSVWriter({ quoteAll: true }).formatRow(["a", 1])).toBe('"a","1"');
  });

  test("should terminate every row", () => {
    expect(new DSVWriter().formatRows([["barcode", "gene"], ["aaaaaaaa", "geneA"]])).toBe(
      "barcode\tgene\naaaaaaaa\tgeneA\n"
    );
    expect(new CSVWriter({ lineEnding: "\r\n" }).formatRows([["a"], ["b"]])).toBe("a\r\nb\r\n");
  });
});

describe("text helpers", () => {
  test("should remove a leading BOM only", () => {
    expect(removeBOM("\uFEFFabc")).toBe("abc");
    expect(removeBOM("abc\uFEFF")).toBe("abc\uFEFF");
  });

  test("should normalize line endings", () => {
    expect(normalizeLineEndings("a\r\nb\rc\n")).toBe("a\nb\nc\n");
  });
});
