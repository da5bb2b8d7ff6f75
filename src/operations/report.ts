/**
 * Count table assembly and rendering
 */

import { CSVWriter } from "../formats/dsv";
import { NO_MATCH } from "./constants";
import type { CountMatrix } from "./count-matrix";
import type { BarcodeReference, CountReport, ReportOptions, ReportRow } from "./types";

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function rowFor(
  matrix: CountMatrix,
  samples: readonly string[],
  keys: readonly string[],
  gene: string
): ReportRow {
  return {
    barcode: keys.join(";"),
    gene,
    counts: samples.map((sample) => keys.reduce((sum, key) => sum + matrix.get(key, sample), 0)),
  };
}

/**
 * Arrange a count matrix into report rows
 *
 * The `no_match` row always comes first, with an empty gene field. The
 * remaining rows follow in code-unit order of their barcode column. Without
 * `byTag`, barcodes of the same gene collapse into one row whose counts are
 * summed and whose barcode column lists the barcodes joined with `;`.
 */
export function buildReport(
  matrix: CountMatrix,
  reference: BarcodeReference,
  options: ReportOptions = {}
): CountReport {
  const samples = matrix.samples().sort(byCodeUnit);
  const keys = matrix
    .keys()
    .filter((key) => key !== NO_MATCH)
    .sort(byCodeUnit);

  const rows: ReportRow[] = [];
  if (options.byTag === true) {
    for (const key of keys) {
      rows.push(rowFor(matrix, samples, [key], reference.get(key) ?? ""));
    }
  } else {
    const byGene = new Map<string, string[]>();
    for (const key of keys) {
      const gene = reference.get(key) ?? "";
      const group = byGene.get(gene) ?? [];
      group.push(key);
      byGene.set(gene, group);
    }
    for (const [gene, group] of byGene) {
      rows.push(rowFor(matrix, samples, group, gene));
    }
  }

  rows.sort((a, b) => byCodeUnit(a.barcode, b.barcode));
  rows.unshift(rowFor(matrix, samples, [NO_MATCH], ""));

  return { samples, rows };
}

/**
 * Render a report as CSV text with a header row and a trailing newline
 *
 * @example
 * ```typescript
 * formatCountTable({ samples: ['s1'], rows: [{ barcode: 'no_match', gene: '', counts: [3] }] });
 * // 'barcode,gene,s1\nno_match,,3\n'
 * ```
 */
export function formatCountTable(report: CountReport): string {
  const writer = new CSVWriter();
  return writer.formatRows([
    ["barcode", "gene", ...report.samples],
    ...report.rows.map((row) => [row.barcode, row.gene, ...row.counts]),
  ]);
}
