/**
 * Tag counting pipeline
 *
 * Reads the barcode table, classifies every read of every sample
 * collection in a directory and assembles the count report. Samples are
 * processed one after another in file-name order. All configuration and
 * file-name problems surface before the first read is counted, and a run
 * that fails leaves no no-match file behind.
 */

import { join } from "node:path";
import { type } from "arktype";
import { ConfigurationError, SampleNameError, ValidationError } from "../errors";
import { FastqParser, FastqWriter } from "../formats/fastq";
import type { FastqRecord } from "../formats/fastq";
import { isDirectory, listFiles } from "../io/file-reader";
import { type FileWriteHandle, openForWriting, removeFile } from "../io/file-writer";
import { loadBarcodeFile } from "./barcodes";
import type { CountMatrix } from "./count-matrix";
import { TagCounter, type UnresolvedReadSink } from "./counter";
import { deriveAnchors } from "./matcher";
import { buildReport } from "./report";
import { isFastqFile, parseSampleName } from "./samples";
import type { BarcodeReference, CountReport, SampleSummary, TagCountOptions } from "./types";

export const TagCountOptionsSchema = type({
  seqDir: "string>0",
  barcodes: "string>0",
  "fivePrimeContext?": "string",
  "threePrimeContext?": "string",
  "byTag?": "boolean",
  "ignoreMissingTag?": "boolean",
  "nomatchOutFile?": "string>0",
  "verbose?": "boolean",
});

const NOMATCH_BATCH_SIZE = 1000;

export interface TagCountResult {
  readonly matrix: CountMatrix;
  readonly reference: BarcodeReference;
  /** Per-sample tallies, sample names sorted */
  readonly summaries: ReadonlyMap<string, SampleSummary>;
  readonly report: CountReport;
}

interface SampleFile {
  readonly fileName: string;
  readonly sample: string;
}

/**
 * Buffers unresolved reads and writes them out in batches
 */
class BatchedFastqSink implements UnresolvedReadSink {
  private readonly writer = new FastqWriter();
  private pending: FastqRecord[] = [];

  constructor(private readonly handle: FileWriteHandle) {}

  async write(record: FastqRecord): Promise<void> {
    this.pending.push(record);
    if (this.pending.length >= NOMATCH_BATCH_SIZE) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) return;
    const batch = this.writer.formatRecords(this.pending);
    this.pending = [];
    await this.handle.writeString(batch);
  }
}

function validateOptions(options: TagCountOptions): void {
  if (!options.seqDir) {
    throw new ConfigurationError("a directory of sequence files (seqDir) is required", "seqDir");
  }
  if (!options.barcodes) {
    throw new ConfigurationError("a barcode table (barcodes) is required", "barcodes");
  }
  const result = TagCountOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid tag count options: ${result.summary}`);
  }
}

async function collectSampleFiles(seqDir: string): Promise<SampleFile[]> {
  if (!(await isDirectory(seqDir))) {
    throw new ConfigurationError(`sequence directory '${seqDir}' is not a directory`, "seqDir");
  }
  const names = await listFiles(seqDir);
  const bySample = new Map<string, string>();
  const files: SampleFile[] = [];

  for (const fileName of names.filter(isFastqFile)) {
    const sample = parseSampleName(fileName);
    const previous = bySample.get(sample);
    if (previous !== undefined) {
      throw new SampleNameError(
        fileName,
        `sample '${sample}' is named by both '${previous}' and '${fileName}'`
      );
    }
    bySample.set(sample, fileName);
    files.push({ fileName, sample });
  }
  return files;
}

/**
 * Count barcode tags across every FASTQ file in a directory
 *
 * @throws {ConfigurationError} For missing settings, short contexts or a
 *   missing sequence directory
 * @throws {BarcodeReferenceError} For an invalid barcode table
 * @throws {SampleNameError} For a FASTQ file name without sample token or
 *   two files naming the same sample
 * @throws {FileError} When an input cannot be read or the no-match file
 *   cannot be written
 * @throws {ParseError} For a malformed FASTQ record
 *
 * @example
 * ```typescript
 * const { report } = await countTags({ seqDir: 'reads', barcodes: 'barcodes.csv' });
 * await writeString('counts.csv', formatCountTable(report));
 * ```
 */
export async function countTags(options: TagCountOptions): Promise<TagCountResult> {
  validateOptions(options);
  const logger = options.logger ?? console;
  const anchors = deriveAnchors(options.fivePrimeContext, options.threePrimeContext);

  const files = await collectSampleFiles(options.seqDir);
  const reference = await loadBarcodeFile(options.barcodes, {
    ignoreMissingTag: options.ignoreMissingTag ?? false,
    logger,
  });

  const counter = new TagCounter(reference, anchors, {
    logger,
    verbose: options.verbose ?? false,
  });
  const parser = new FastqParser({ trackLineNumbers: false });

  const countAll = async (sink?: BatchedFastqSink): Promise<void> => {
    for (const { fileName, sample } of files) {
      logger.warn(`reading file ${fileName}`);
      await counter.countCollection(parser.parseFile(join(options.seqDir, fileName)), sample, sink);
      await sink?.flush();
    }
  };

  const { nomatchOutFile } = options;
  if (nomatchOutFile !== undefined) {
    try {
      await openForWriting(nomatchOutFile, (handle) => countAll(new BatchedFastqSink(handle)));
    } catch (error) {
      // a partial no-match file is not left behind
      await removeFile(nomatchOutFile);
      throw error;
    }
  } else {
    await countAll();
  }

  return {
    matrix: counter.matrix,
    reference,
    summaries: counter.summary(),
    report: buildReport(counter.matrix, reference, { byTag: options.byTag ?? false }),
  };
}
