/**
 * Stream processing utilities for line-oriented text reports
 *
 * Turns byte streams into complete lines, buffering partial lines across
 * chunk boundaries and accepting `\n`, `\r\n` and lone `\r` endings.
 */

import { BufferError, StreamError } from "../errors";

// Pending partial line kept between chunks; line-length policy is the parser's
const MAX_BUFFER_SIZE = 10_485_760;

/**
 * Complete lines found in a buffer plus the trailing partial line
 */
export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

/**
 * Anything the parsers accept as report text
 */
export type LineSource =
  | string
  | Iterable<string>
  | AsyncIterable<string>
  | ReadableStream<Uint8Array>;

/**
 * Process text buffer to extract complete lines
 *
 * @param buffer Text buffer to process
 * @returns Complete lines and the unterminated remainder
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  const pushLine = (end: number): void => {
    lines.push(buffer.slice(lineStart, end));
  };

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      pushLine(position > 0 && buffer[position - 1] === "\r" ? position - 1 : position);
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      // Classic Mac line ending
      pushLine(position);
      lineStart = position + 1;
    }
  }

  return { lines, remainder: buffer.slice(lineStart) };
}

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * @param stream Stream of binary data to process
 * @yields Complete lines of text, without line terminators
 * @throws {StreamError} If stream processing fails
 * @throws {BufferError} If an unterminated line outgrows the pending buffer
 *
 * @example
 * ```typescript
 * const stream = await createStream("search.m0.txt");
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith(">>")) console.log("subject:", line);
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

      if (done) {
        buffer += decoder.decode();
        const result = processBuffer(buffer);
        yield* result.lines;
        const last = result.remainder.endsWith("\r")
          ? result.remainder.slice(0, -1)
          : result.remainder;
        if (last !== "") {
          yield last;
        }
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} bytes exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length,
          "overflow"
        );
      }
    }
  } catch (error) {
    if (error instanceof BufferError) {
      throw error;
    }
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
 * Split a complete text into lines
 *
 * A trailing line terminator does not produce an empty final line.
 */
export function splitLines(text: string): string[] {
  const { lines, remainder } = processBuffer(text);
  if (remainder !== "") {
    lines.push(remainder.endsWith("\r") ? remainder.slice(0, -1) : remainder);
  }
  return lines;
}

/**
 * Normalize any supported input into an async iterable of lines
 */
export async function* toLines(source: LineSource): AsyncIterable<string> {
  if (typeof source === "string") {
    yield* splitLines(source);
  } else if (source instanceof ReadableStream) {
    yield* readLines(source);
  } else {
    yield* source;
  }
}
