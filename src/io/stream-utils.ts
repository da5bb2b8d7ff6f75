/**
 * Stream processing utilities for line-oriented text
 *
 * Turns byte streams into complete lines regardless of how chunk
 * boundaries fall, with CRLF and bare CR line endings normalized away.
 */

import { BufferError, StreamError, TagCountError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 1_000_000;
const MAX_BUFFER_SIZE = 10_485_760;

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * @param stream Stream of binary data to process
 * @yields Complete lines of text, without line terminators
 * @throws {StreamError} If stream processing fails; errors already typed
 *   (such as a CompressionError from gunzip) pass through unchanged
 * @throws {BufferError} If a line or the pending buffer grows past the limits
 *
 * @example
 * ```typescript
 * const stream = await createStream('/data/run1/lib12.fastq.gz');
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith('@')) console.log(line);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} bytes exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length
        );
      }
    }

    buffer += decoder.decode();
    const result = processBuffer(buffer);
    yield* result.lines;
    // final line without terminator
    if (result.remainder !== "") {
      yield result.remainder.endsWith("\r") ? result.remainder.slice(0, -1) : result.remainder;
    }
  } catch (error) {
    if (error instanceof TagCountError) throw error;
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    reader.releaseLock();
  }
}

/**
 * Split a text buffer into complete lines plus the unterminated remainder
 *
 * Handles \n, \r\n and bare \r terminators. A trailing \r is kept in the
 * remainder since the matching \n may arrive with the next chunk.
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > lineStart && buffer[position - 1] === "\r" ? position - 1 : position;
      pushLine(lines, buffer.slice(lineStart, lineEnd));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      pushLine(lines, buffer.slice(lineStart, position));
      lineStart = position + 1;
    }
  }

  return { lines, remainder: buffer.slice(lineStart) };
}

function pushLine(lines: string[], line: string): void {
  if (line.length > MAX_LINE_LENGTH) {
    throw new BufferError(
      `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      line.length,
      `Line starts with: ${line.slice(0, 100)}...`
    );
  }
  lines.push(line);
}
