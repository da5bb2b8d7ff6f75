/**
 * Tests for barcode reference loading
 */

import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { gzipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { BarcodeReferenceError, FileError } from "../../src/errors";
import { loadBarcodeFile, loadBarcodeReference } from "../../src/operations/barcodes";
import { createTempDir, RecordingLogger, removeTempDir } from "../utils/fixtures";

describe("loadBarcodeReference", () => {
  test("should map lowercase barcodes to gene ids", () => {
    const reference = loadBarcodeReference([
      { gene_id: "geneA", barcode: "AAAAAAAA" },
      { gene_id: "geneB", barcode: "ttGCATGCCA" },
    ]);

    expect([...reference]).toEqual([
      ["aaaaaaaa", "geneA"],
      ["ttgcatgcca", "geneB"],
    ]);
  });

  test("should accept the alternative column names", () => {
    const reference = loadBarcodeReference([
      { "gene id": "geneA", tag: "AAAAAAAA" },
      { gene_id: "geneB", Barcode: "CCCCCCCC" },
    ]);

    expect(reference.get("aaaaaaaa")).toBe("geneA");
    expect(reference.get("cccccccc")).toBe("geneB");
  });

  test("should take the first non-empty barcode column", () => {
    const reference = loadBarcodeReference([{ gene_id: "geneA", tag: "", barcode: "GGGGGGGG" }]);
    expect(reference.get("gggggggg")).toBe("geneA");
  });

  test("should reject a row without gene id", () => {
    const rows = [{ gene_id: "geneA", barcode: "AAAAAAAA" }, { barcode: "CCCCCCCC" }];

    expect(() => loadBarcodeReference(rows)).toThrow(BarcodeReferenceError);
    expect(() => loadBarcodeReference(rows)).toThrow(
      "could not read gene id in barcode table row 2"
    );
  });

  test("should reject a row without barcode unless told to skip it", () => {
    const rows = [{ gene_id: "geneA" }, { gene_id: "geneB", barcode: "CCCCCCCC" }];

    expect(() => loadBarcodeReference(rows)).toThrow(
      "could not read barcode tag for gene geneA in barcode table row 1"
    );
    expect([...loadBarcodeReference(rows, { ignoreMissingTag: true })]).toEqual([
      ["cccccccc", "geneB"],
    ]);
  });

  test("should skip barcodes marked none", () => {
    const reference = loadBarcodeReference([
      { gene_id: "geneA", barcode: "none" },
      { gene_id: "geneB", barcode: "NONE" },
      { gene_id: "geneC", barcode: "AAAAAAAA" },
    ]);

    expect([...reference.keys()]).toEqual(["aaaaaaaa"]);
  });

  test("should reject barcodes outside 8-16 bases", () => {
    expect(() => loadBarcodeReference([{ gene_id: "geneA", barcode: "ACGTACG" }])).toThrow(
      "found a barcode outside allowed length range (8-16): ACGTACG, length: 7"
    );
    expect(() =>
      loadBarcodeReference([{ gene_id: "geneA", barcode: "A".repeat(17) }])
    ).toThrow(/length: 17$/);
    expect(loadBarcodeReference([{ gene_id: "geneA", barcode: "A".repeat(16) }]).size).toBe(1);
  });

  test("should keep the last gene for a duplicated barcode and warn", () => {
    const logger = new RecordingLogger();
    const reference = loadBarcodeReference(
      [
        { gene_id: "geneA", barcode: "AAAAAAAA" },
        { gene_id: "geneB", barcode: "aaaaaaaa" },
      ],
      { logger }
    );

    expect(reference.get("aaaaaaaa")).toBe("geneB");
    expect(logger.messages).toEqual([
      "barcode aaaaaaaa is listed for both geneA and geneB; counting it as geneB",
    ]);
  });

  test("should not warn when a barcode is repeated for the same gene", () => {
    const logger = new RecordingLogger();
    loadBarcodeReference(
      [
        { gene_id: "geneA", barcode: "AAAAAAAA" },
        { gene_id: "geneA", barcode: "AAAAAAAA" },
      ],
      { logger }
    );
    expect(logger.messages).toEqual([]);
  });
});

describe("loadBarcodeFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  test("should read a CSV barcode table", async () => {
    const path = join(dir, "barcodes.csv");
    writeFileSync(path, "gene_id,barcode,comment\ngeneA,AAAAAAAA,\"first, plate 1\"\ngeneB,TTGCATGCCA,\n");

    const reference = await loadBarcodeFile(path);

    expect([...reference]).toEqual([
      ["aaaaaaaa", "geneA"],
      ["ttgcatgcca", "geneB"],
    ]);
  });

  test("should read a gzipped barcode table", async () => {
    const path = join(dir, "barcodes.csv.gz");
    writeFileSync(path, gzipSync(new TextEncoder().encode("gene id,tag\r\ngeneA,CCCCCCCC\r\n")));

    const reference = await loadBarcodeFile(path);

    expect(reference.get("cccccccc")).toBe("geneA");
  });

  test("should fail with FileError for a missing table", async () => {
    await expect(loadBarcodeFile(join(dir, "missing.csv"))).rejects.toThrow(FileError);
  });
});
