/**
 * Tag counter
 *
 * Classifies reads one at a time and accumulates the result in its
 * CountMatrix. Reads that do not resolve are counted under `no_match` and
 * can be passed on to a sink, in the order they were seen.
 */

import type { FastqRecord } from "../formats/fastq";
import { NO_MATCH } from "./constants";
import { CountMatrix } from "./count-matrix";
import { classifyRead } from "./matcher";
import type { Anchors, BarcodeReference, Logger, MatchOutcome, SampleSummary } from "./types";

/**
 * Receiver for reads that did not resolve to exactly one barcode
 */
export interface UnresolvedReadSink {
  write(record: FastqRecord): Promise<void>;
}

export interface TagCounterOptions {
  readonly logger?: Logger;
  /** Log every unresolved read, not only ambiguous ones */
  readonly verbose?: boolean;
}

interface MutableSummary {
  reads: number;
  resolved: number;
  noCandidate: number;
  ambiguous: number;
}

export class TagCounter {
  readonly matrix = new CountMatrix();
  private readonly summaries = new Map<string, MutableSummary>();
  private readonly logger: Logger;
  private readonly verbose: boolean;

  constructor(
    private readonly reference: BarcodeReference,
    private readonly anchors: Anchors,
    options: TagCounterOptions = {}
  ) {
    this.logger = options.logger ?? console;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Register a sample before its reads arrive
   */
  addSample(sample: string): void {
    this.matrix.addSample(sample);
    this.summaryFor(sample);
  }

  /**
   * Classify one read and count it for the sample
   */
  countRead(record: FastqRecord, sample: string): MatchOutcome {
    const outcome = classifyRead(record.sequence, this.reference, this.anchors);
    const summary = this.summaryFor(sample);
    summary.reads++;

    if (outcome.status === "resolved") {
      summary.resolved++;
      this.matrix.increment(outcome.barcode, sample);
      return outcome;
    }

    if (outcome.reason === "ambiguous") {
      summary.ambiguous++;
      this.logger.warn(
        `Found ${outcome.matches.length} matching tags in sequence ${record.sequence} - counting as 'no match'`
      );
    } else {
      summary.noCandidate++;
    }
    if (this.verbose) {
      this.logger.warn(`NOMATCH ${record.sequence}`);
    }

    this.matrix.increment(NO_MATCH, sample);
    return outcome;
  }

  /**
   * Count every read of one sample's collection
   *
   * @param sink - Receives unresolved reads in encounter order
   */
  async countCollection(
    records: AsyncIterable<FastqRecord> | Iterable<FastqRecord>,
    sample: string,
    sink?: UnresolvedReadSink
  ): Promise<void> {
    this.addSample(sample);
    for await (const record of records) {
      const outcome = this.countRead(record, sample);
      if (outcome.status === "unresolved" && sink !== undefined) {
        await sink.write(record);
      }
    }
  }

  /**
   * Per-sample tallies, sample names sorted
   */
  summary(): Map<string, SampleSummary> {
    const names = [...this.summaries.keys()].sort();
    return new Map(names.map((name) => [name, { ...this.summaryFor(name) }]));
  }

  private summaryFor(sample: string): MutableSummary {
    let summary = this.summaries.get(sample);
    if (summary === undefined) {
      summary = { reads: 0, resolved: 0, noCandidate: 0, ambiguous: 0 };
      this.summaries.set(sample, summary);
    }
    return summary;
  }
}
