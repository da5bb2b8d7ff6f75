/**
 * FASTQ parser and writer tests
 */

import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { gzipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError, ParseError, ValidationError } from "../../src/errors";
import { FastqParser, FastqWriter, type FastqRecord } from "../../src/formats/fastq";
import { createTempDir, removeTempDir } from "../utils/fixtures";

async function collect(records: AsyncIterable<FastqRecord>): Promise<FastqRecord[]> {
  const result: FastqRecord[] = [];
  for await (const record of records) {
    result.push(record);
  }
  return result;
}

describe("FastqParser", () => {
  const parser = new FastqParser();

  test("should parse 4-line records", async () => {
    const records = await collect(
      parser.parseString("@read1 lane=2\nACGT\n+\nIIII\n@read2\nGGCC\n+read2\n#@+I\n")
    );

    expect(records).toEqual([
      { header: "@read1 lane=2", id: "read1", sequence: "ACGT", separator: "+", quality: "IIII", lineNumber: 1 },
      { header: "@read2", id: "read2", sequence: "GGCC", separator: "+read2", quality: "#@+I", lineNumber: 5 },
    ]);
  });

  test("should leave out line numbers when not tracked", async () => {
    const records = await collect(
      new FastqParser({ trackLineNumbers: false }).parseString("@r\nA\n+\nI")
    );
    expect(records).toEqual([{ header: "@r", id: "r", sequence: "A", separator: "+", quality: "I" }]);
  });

  test("should skip blank lines between records and handle CRLF", async () => {
    const records = await collect(parser.parseString("@r1\r\nAC\r\n+\r\nII\r\n\r\n@r2\r\nGT\r\n+\r\nII\r\n"));
    expect(records.map((record) => record.sequence)).toEqual(["AC", "GT"]);
  });

  test("should reject a header without '@'", async () => {
    await expect(collect(parser.parseString("read1\nACGT\n+\nIIII\n"))).rejects.toThrow(
      "FASTQ header must start with '@'"
    );
  });

  test("should reject a separator without '+'", async () => {
    await expect(collect(parser.parseString("@read1\nACGT\nIIII\nIIII\n"))).rejects.toThrow(
      ParseError
    );
  });

  test("should reject a truncated record", async () => {
    await expect(collect(parser.parseString("@read1\nACGT\n"))).rejects.toThrow(
      /Truncated FASTQ record/
    );
  });

  test("should reject invalid options", () => {
    expect(() => new FastqParser({ trackLineNumbers: "yes" as unknown as boolean })).toThrow(
      ValidationError
    );
  });

  describe("parseFile", () => {
    let dir: string;

    beforeEach(() => {
      dir = createTempDir();
    });

    afterEach(() => {
      removeTempDir(dir);
    });

    test("should read plain and gzipped files", async () => {
      const text = "@read1\nACGT\n+\nIIII\n";
      writeFileSync(join(dir, "lib1.fastq"), text);
      writeFileSync(join(dir, "lib2.fastq.gz"), gzipSync(new TextEncoder().encode(text)));

      const plain = await collect(parser.parseFile(join(dir, "lib1.fastq")));
      const gzipped = await collect(parser.parseFile(join(dir, "lib2.fastq.gz")));

      expect(plain).toEqual(gzipped);
      expect(plain.map((record) => record.id)).toEqual(["read1"]);
    });

    test("should read concatenated gzip members", async () => {
      const member = (text: string) => gzipSync(new TextEncoder().encode(text));
      const first = member("@read1\nACGT\n+\nIIII\n");
      const second = member("@read2\nTTTT\n+\nIIII\n");
      const joined = new Uint8Array(first.length + second.length);
      joined.set(first);
      joined.set(second, first.length);
      writeFileSync(join(dir, "chunks1.fastq.gz"), joined);

      const records = await collect(parser.parseFile(join(dir, "chunks1.fastq.gz")));

      expect(records.map((record) => record.id)).toEqual(["read1", "read2"]);
    });

    test("should fail with FileError for a missing file", async () => {
      await expect(collect(parser.parseFile(join(dir, "missing.fastq")))).rejects.toThrow(FileError);
    });
  });
});

describe("FastqWriter", () => {
  test("should write records back out unchanged", async () => {
    const text = "@read1 lane=2\nACGT\n+read1\nII#I\n@read2\nGG\n+\nII\n";
    const records = await collect(new FastqParser().parseString(text));

    expect(new FastqWriter().formatRecords(records)).toBe(text);
  });
});
