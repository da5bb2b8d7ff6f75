/**
 * Barcode reference loading
 *
 * Builds the barcode → gene lookup from a gene/barcode table. Every
 * problem is fatal except barcodes marked "none" and, when allowed,
 * missing barcodes.
 *
 * Two genes sharing one barcode are not rejected: the later row wins and
 * a warning is logged.
 */

import { BarcodeReferenceError } from "../errors";
import { CSVParser } from "../formats/dsv";
import {
  BARCODE_COLUMNS,
  GENE_ID_COLUMNS,
  MAX_BARCODE_LENGTH,
  MIN_BARCODE_LENGTH,
  NO_TAG_MARKER,
} from "./constants";
import type { BarcodeReference, BarcodeReferenceOptions, BarcodeRow } from "./types";

function firstPresent(row: BarcodeRow, columns: readonly string[]): string | undefined {
  for (const column of columns) {
    const value = row[column];
    if (value !== undefined && value !== "") return value;
  }
  return undefined;
}

/**
 * Build the barcode reference from table rows
 *
 * @param rows - Rows keyed by column name; gene id columns are `gene id` or
 *   `gene_id`, barcode columns `tag`, `Barcode` or `barcode`
 * @returns Lowercase barcode → gene id
 * @throws {BarcodeReferenceError} For a row without gene id, a row without
 *   barcode (unless ignoreMissingTag) or a barcode outside 8-16 bases
 *
 * @example
 * ```typescript
 * const reference = loadBarcodeReference([{ gene_id: 'PBANKA_000010', barcode: 'TTCGCCGGGCC' }]);
 * reference.get('ttcgccgggcc'); // 'PBANKA_000010'
 * ```
 */
export function loadBarcodeReference(
  rows: Iterable<BarcodeRow>,
  options: BarcodeReferenceOptions = {}
): BarcodeReference {
  const reference = new Map<string, string>();
  let rowNumber = 0;

  for (const row of rows) {
    rowNumber++;

    const geneId = firstPresent(row, GENE_ID_COLUMNS);
    if (geneId === undefined) {
      throw new BarcodeReferenceError(`could not read gene id in barcode table row ${rowNumber}`, rowNumber);
    }

    const tag = firstPresent(row, BARCODE_COLUMNS);
    if (tag === undefined) {
      if (options.ignoreMissingTag === true) continue;
      throw new BarcodeReferenceError(
        `could not read barcode tag for gene ${geneId} in barcode table row ${rowNumber}`,
        rowNumber
      );
    }

    if (tag.toLowerCase() === NO_TAG_MARKER) continue;

    if (tag.length < MIN_BARCODE_LENGTH || tag.length > MAX_BARCODE_LENGTH) {
      throw new BarcodeReferenceError(
        `found a barcode outside allowed length range (${MIN_BARCODE_LENGTH}-${MAX_BARCODE_LENGTH}): ${tag}, length: ${tag.length}`,
        rowNumber,
        tag
      );
    }

    const key = tag.toLowerCase();
    const previous = reference.get(key);
    if (previous !== undefined && previous !== geneId) {
      options.logger?.warn(
        `barcode ${key} is listed for both ${previous} and ${geneId}; counting it as ${geneId}`
      );
    }
    reference.set(key, geneId);
  }

  return reference;
}

/**
 * Read a barcode table from a CSV file with a header row
 *
 * @throws {FileError} If the file cannot be read
 * @throws {BarcodeReferenceError} See {@link loadBarcodeReference}
 */
export async function loadBarcodeFile(
  path: string,
  options: BarcodeReferenceOptions = {}
): Promise<BarcodeReference> {
  const { records } = await new CSVParser().parseFile(path);
  return loadBarcodeReference(
    records.map((record) => record.fields),
    options
  );
}
