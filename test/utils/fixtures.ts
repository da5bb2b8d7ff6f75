/**
 * Shared test fixtures
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { FastqRecord } from "../../src/formats/fastq";
import type { Logger } from "../../src/operations";

/** Default anchors around a forward-strand barcode */
export const FIVE_P_ANCHOR = "GTCAG";
export const THREE_P_ANCHOR = "CCGCC";

/** The same anchors as they appear on the opposite strand */
export const THREE_P_ANCHOR_RC = "GGCGG";
export const FIVE_P_ANCHOR_RC = "CTGAC";

export function forwardRead(barcode: string): string {
  return `${FIVE_P_ANCHOR}${barcode}${THREE_P_ANCHOR}`;
}

export function record(sequence: string, id: string = "read1"): FastqRecord {
  return {
    header: `@${id}`,
    id,
    sequence,
    separator: "+",
    quality: "I".repeat(sequence.length),
  };
}

export function fastqText(sequences: readonly string[], prefix: string = "read"): string {
  return sequences
    .map((sequence, index) => `@${prefix}${index + 1}\n${sequence}\n+\n${"I".repeat(sequence.length)}\n`)
    .join("");
}

export class RecordingLogger implements Logger {
  readonly messages: string[] = [];

  warn(message: string): void {
    this.messages.push(message);
  }
}

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), "tagcount-"));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
