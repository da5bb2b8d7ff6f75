/**
 * Command line front end for tag counting
 *
 * Flags keep the snake_case names used in analysis pipelines. The count
 * table goes to stdout unless --output is given; diagnostics and the
 * per-sample summary go to stderr.
 */

import { parseArgs } from "node:util";
import { TagCountError } from "./errors";
import { writeString } from "./io/file-writer";
import { countTags, formatCountTable } from "./operations";
import type { SampleSummary } from "./operations";

export interface CliOutput {
  write(text: string): void;
}

export interface CliIO {
  readonly stdout: CliOutput;
  readonly stderr: CliOutput;
}

export const USAGE = `Usage: tagcount --seq_dir <dir> --barcodes <file.csv> [options]

Count barcode tags in every .fastq / .fastq.gz file of a directory.

Options:
  --seq_dir <dir>             directory with one FASTQ file per sample (required)
  --barcodes <file>           CSV with 'gene_id' and 'barcode' columns (required)
  --by_tag                    one row per barcode instead of per gene
  --five_p_seq <seq>          sequence 5' of the barcode (last 5 bases are used)
  --three_p_seq <seq>         sequence 3' of the barcode (first 5 bases are used)
  --ignore_missing_tag        skip barcode table rows without a barcode
  --nomatch_out_file <file>   write unresolved reads to this FASTQ file
  --output <file>             write the count table here instead of stdout
  --verbose                   log every unresolved read
  --help                      show this message
`;

const OPTIONS = {
  seq_dir: { type: "string" },
  barcodes: { type: "string" },
  by_tag: { type: "boolean", default: false },
  five_p_seq: { type: "string" },
  three_p_seq: { type: "string" },
  ignore_missing_tag: { type: "boolean", default: false },
  nomatch_out_file: { type: "string" },
  output: { type: "string" },
  verbose: { type: "boolean", default: false },
  help: { type: "boolean", default: false },
} as const;

function parseFlags(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: OPTIONS }).values;
}

export function formatSummary(sample: string, summary: SampleSummary): string {
  return `${sample}: ${summary.reads} reads, ${summary.resolved} resolved, ${summary.noCandidate} without tag, ${summary.ambiguous} ambiguous`;
}

/**
 * Run the command line tool
 *
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let values: ReturnType<typeof parseFlags>;
  try {
    values = parseFlags(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n\n${USAGE}`);
    return 1;
  }

  if (values.help) {
    io.stdout.write(USAGE);
    return 0;
  }
  if (values.seq_dir === undefined || values.barcodes === undefined) {
    io.stderr.write(`--seq_dir and --barcodes are required\n\n${USAGE}`);
    return 1;
  }

  const logger = { warn: (message: string) => io.stderr.write(`${message}\n`) };

  try {
    const { report, summaries } = await countTags({
      seqDir: values.seq_dir,
      barcodes: values.barcodes,
      byTag: values.by_tag,
      ignoreMissingTag: values.ignore_missing_tag,
      verbose: values.verbose,
      logger,
      ...(values.five_p_seq !== undefined && { fivePrimeContext: values.five_p_seq }),
      ...(values.three_p_seq !== undefined && { threePrimeContext: values.three_p_seq }),
      ...(values.nomatch_out_file !== undefined && { nomatchOutFile: values.nomatch_out_file }),
    });

    const table = formatCountTable(report);
    if (values.output !== undefined) {
      await writeString(values.output, table);
    } else {
      io.stdout.write(table);
    }

    for (const [sample, summary] of summaries) {
      io.stderr.write(`${formatSummary(sample, summary)}\n`);
    }
    return 0;
  } catch (error) {
    if (error instanceof TagCountError) {
      io.stderr.write(`${error.toString()}\n`);
      return 1;
    }
    throw error;
  }
}
