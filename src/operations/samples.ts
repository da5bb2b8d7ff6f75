/**
 * Sample names from read-collection file names
 */

import { SampleNameError } from "../errors";

const FASTQ_FILE = /\.fastq(?:\.gz)?$/;
const SAMPLE_NAME = /^(.*\d)\.fastq(?:\.gz)?$/;

/**
 * Whether a file name is a (possibly gzipped) FASTQ read collection
 */
export function isFastqFile(fileName: string): boolean {
  return FASTQ_FILE.test(fileName);
}

/**
 * Sample name: the file name up to and including the digits right before
 * the .fastq extension
 *
 * @example
 * ```typescript
 * parseSampleName('lib12.fastq');       // 'lib12'
 * parseSampleName('plate1_A07.fastq.gz'); // 'plate1_A07'
 * ```
 * @throws {SampleNameError} If no digit precedes the extension
 */
export function parseSampleName(fileName: string): string {
  const sample = SAMPLE_NAME.exec(fileName)?.[1];
  if (sample === undefined) {
    throw new SampleNameError(fileName);
  }
  return sample;
}
