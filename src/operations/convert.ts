/**
 * Report-to-table conversion
 *
 * Drives the FASTA36 parser over a whole report and writes the table.
 * Blocks are independent, so they are assembled in batches with bounded
 * concurrency; records always come out in report order.
 *
 * @since v0.1.0
 */

import { type } from "arktype";
import { Effect, Either } from "effect";
import { ParseError, ValidationError } from "../errors";
import { Fasta36Parser, warnRejected } from "../formats/fasta36/parser";
import { segmentBlocksAsync } from "../formats/fasta36/segmenter";
import type { Fasta36ParserOptions } from "../formats/fasta36/types";
import { AlignmentTableWriter, type AlignmentTableWriterOptions } from "../formats/fasta36/writer";
import { createStream } from "../io/file-reader";
import { type LineSource, readLines, toLines } from "../io/stream-utils";
import type { AlignmentBlock, BlockRejection, FileReaderOptions, OutputRecord, WriteOptions } from "../types";

/**
 * Options for report conversion
 */
export interface ConvertOptions extends Fasta36ParserOptions, AlignmentTableWriterOptions {
  /** Blocks assembled at once (default: 1) */
  concurrency?: number;
  /** Blocks buffered per batch, at least `concurrency` (default: 64) */
  batchSize?: number;
  /** Options for reading the input file */
  reader?: FileReaderOptions;
  /** Options for writing the output file */
  writer?: WriteOptions;
}

/**
 * Outcome of a file conversion
 */
export interface ConversionStats {
  /** Alignment blocks found in the report */
  readonly blocks: number;
  /** Table rows written, header excluded */
  readonly rows: number;
  /** Blocks that could not be converted */
  readonly rejected: number;
}

export const ConvertOptionsSchema = type({
  "concurrency?": "number.integer>=1",
  "batchSize?": "number.integer>=1",
});

const DEFAULT_BATCH_SIZE = 64;

/**
 * Convert a report into records, in report order
 *
 * @throws {ValidationError} When options are invalid
 * @throws {ParseError} On the first rejected block when `strict` is set
 *
 * @example
 * ```typescript
 * for await (const record of convertReport(text, { concurrency: 4 })) {
 *   console.log(record.subjectId, record.evalue);
 * }
 * ```
 */
export async function* convertReport(
  source: LineSource,
  options: ConvertOptions = {}
): AsyncGenerator<OutputRecord, void, undefined> {
  const validation = ConvertOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid convert options: ${validation.summary}`);
  }

  const parser = new Fasta36Parser(options);
  const concurrency = options.concurrency ?? 1;
  const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, concurrency);

  const blocks = segmentBlocksAsync(toLines(source), {
    ...(options.maxLineLength !== undefined && { maxLineLength: options.maxLineLength }),
    ...(options.onWarning !== undefined && { onWarning: options.onWarning }),
  });

  let batch: AlignmentBlock[] = [];
  for await (const block of blocks) {
    if (options.signal?.aborted) {
      throw new ParseError("Operation aborted during FASTA36 conversion", "ABORTED");
    }
    batch.push(block);
    if (batch.length >= batchSize) {
      yield* await assembleBatch(parser, batch, concurrency);
      batch = [];
    }
  }
  if (batch.length > 0) {
    yield* await assembleBatch(parser, batch, concurrency);
  }
}

/**
 * Convert a report file into a table file
 *
 * @returns Block, row and rejection counts
 * @throws {FileError} When the input cannot be read or the output written
 *
 * @example
 * ```typescript
 * const stats = await convertFile("search.m0.txt.gz", "hits.tsv", { columns: "extended" });
 * console.log(`${stats.rows} rows, ${stats.rejected} rejected`);
 * ```
 */
export async function convertFile(
  input: string,
  output: string,
  options: ConvertOptions = {}
): Promise<ConversionStats> {
  const writer = new AlignmentTableWriter(options);
  const report = options.onRejected ?? warnRejected;
  let rejected = 0;

  const onRejected = (rejection: BlockRejection): void => {
    rejected++;
    report(rejection);
  };

  const stream = await createStream(input, options.reader);
  const records = convertReport(readLines(stream), { ...options, onRejected });

  let rows: number;
  try {
    rows = await writer.writeFile(records, output, options.writer);
  } catch (error) {
    // Close the input file; a stream that already failed rejects here with
    // the same error that is rethrown below
    await stream.cancel(error).then(
      () => undefined,
      () => undefined
    );
    throw error;
  }

  return { blocks: rows + rejected, rows, rejected };
}

/**
 * Assemble one batch, keeping input order
 */
async function assembleBatch(
  parser: Fasta36Parser,
  batch: readonly AlignmentBlock[],
  concurrency: number
): Promise<OutputRecord[]> {
  const program = Effect.forEach(
    batch,
    (block) =>
      Effect.try({
        try: () => parser.processBlock(block),
        catch: (error) => error,
      }),
    { concurrency }
  );

  const outcome = await Effect.runPromise(Effect.either(program));
  if (Either.isLeft(outcome)) {
    throw outcome.left;
  }
  return outcome.right.filter((record): record is OutputRecord => record !== undefined);
}
