/**
 * FASTA36 pairwise (`-m 0`) report parser
 *
 * Turns the human-readable alignment report of the FASTA36 programs
 * (fasta36, ssearch36, ggsearch36, ...) into one record per alignment
 * block: reported statistics, reconstructed aligned sequences, derived
 * mismatch and gap counts, and a regenerated match pattern.
 *
 * A block that cannot be parsed is rejected on its own; parsing carries on
 * with the next block unless `strict` is set.
 */

import { type } from "arktype";
import { FileError, ParseError, ValidationError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { type LineSource, readLines, splitLines, toLines } from "../../io/stream-utils";
import { countMutations, generateMatchPattern } from "../../operations/core/match-pattern";
import {
  defaultTableFor,
  getScoringTable,
  type ScoringTable,
} from "../../operations/core/scoring";
import type {
  AlignmentBlock,
  BlockRejection,
  FileReaderOptions,
  OutputRecord,
  ResidueUnit,
} from "../../types";
import { AlignmentMetadataSchema } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { extractMetadata } from "./metadata";
import { reconstructSequences } from "./reconstruct";
import { segmentBlocks, segmentBlocksAsync } from "./segmenter";
import type { Fasta36ParserOptions, ScoringTableChoice } from "./types";
import { Fasta36ParserOptionsSchema } from "./types";

/**
 * Settings the record assembler needs
 */
export interface AssembleOptions {
  scoringTable: ScoringTable;
  skipValidation?: boolean;
  trackLineNumbers?: boolean;
}

/**
 * Streaming FASTA36 report parser
 *
 * @example Basic usage
 * ```typescript
 * const parser = new Fasta36Parser();
 * for await (const hit of parser.parseFile("search.m0.txt")) {
 *   console.log(`${hit.queryId}\t${hit.subjectId}\t${hit.percentIdentity}`);
 * }
 * ```
 *
 * @example Collecting rejected blocks
 * ```typescript
 * const rejected: BlockRejection[] = [];
 * const parser = new Fasta36Parser({
 *   scoringTable: "blosum62",
 *   onRejected: (rejection) => rejected.push(rejection),
 * });
 * ```
 */
class Fasta36Parser extends AbstractParser<OutputRecord, Fasta36ParserOptions> {
  protected getDefaultOptions(): Partial<Fasta36ParserOptions> {
    return {
      scoringTable: "auto",
      strict: false,
      onRejected: warnRejected,
    };
  }

  /**
   * Create a new FASTA36 parser
   * @throws {ValidationError} When options are invalid
   */
  constructor(options: Fasta36ParserOptions = {}) {
    const validationResult = Fasta36ParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid FASTA36 parser options: ${validationResult.summary}`,
        undefined,
        "FASTA36 parser configuration"
      );
    }
    super(options);
  }

  protected getFormatName(): string {
    return "FASTA36";
  }

  /**
   * Parse records from an in-memory report
   */
  async *parseString(data: string): AsyncIterable<OutputRecord> {
    yield* this.parseLines(splitLines(data));
  }

  /**
   * Parse records from a report file (gzip input is decompressed)
   *
   * @throws {FileError} When the file cannot be read
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<OutputRecord> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }

    let stream: ReadableStream<Uint8Array>;
    try {
      stream = await createStream(filePath, options);
    } catch (error) {
      if (error instanceof FileError) throw error;
      throw FileError.fromSystemError("open", filePath, error);
    }
    yield* this.parseLines(readLines(stream));
  }

  /**
   * Parse records from a binary stream
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<OutputRecord> {
    if (!(stream instanceof ReadableStream)) {
      throw new ValidationError("stream must be a ReadableStream");
    }
    yield* this.parseLines(readLines(stream));
  }

  /**
   * Parse records from any line source
   *
   * @yields One record per accepted block, in report order
   * @throws {ParseError} On the first rejected block when `strict` is set,
   *   or when parsing is aborted
   */
  async *parseLines(source: LineSource): AsyncIterable<OutputRecord> {
    const blocks = segmentBlocksAsync(toLines(source), {
      maxLineLength: this.options.maxLineLength,
      onWarning: this.options.onWarning,
    });

    for await (const block of blocks) {
      this.throwIfAborted("parsing");
      const record = this.processBlock(block);
      if (record) yield record;
    }
  }

  /**
   * Synchronously parse a complete report
   */
  parseAll(data: string): OutputRecord[] {
    const records: OutputRecord[] = [];
    for (const block of segmentBlocks(splitLines(data), {
      maxLineLength: this.options.maxLineLength,
      onWarning: this.options.onWarning,
    })) {
      this.throwIfAborted("parsing");
      const record = this.processBlock(block);
      if (record) records.push(record);
    }
    return records;
  }

  /**
   * Turn one block into a record, reporting the block if that fails
   *
   * @returns The record, or undefined when the block was rejected
   * @throws {ParseError} When the block is rejected and `strict` is set
   */
  processBlock(block: AlignmentBlock): OutputRecord | undefined {
    try {
      return assembleRecord(block, {
        scoringTable: resolveScoringTable(this.options.scoringTable, block.query.unit),
        skipValidation: this.options.skipValidation,
        trackLineNumbers: this.options.trackLineNumbers,
      });
    } catch (error) {
      // Only block-level parse failures are recoverable
      if (!(error instanceof ParseError) || this.options.strict === true) {
        throw error;
      }
      const rejection: BlockRejection = {
        blockIndex: block.index,
        queryId: block.query.id,
        subjectId: block.subject.id,
        lineNumber: error.lineNumber ?? block.startLine,
        error,
      };
      this.options.onRejected?.(rejection);
      return undefined;
    }
  }
}

// =============================================================================
// RECORD ASSEMBLY
// =============================================================================

/**
 * Assemble the output record of one block
 *
 * Runs metadata extraction, sequence reconstruction, mutation counting and
 * match-pattern generation, then validates the finished statistics.
 *
 * @throws {MalformedBlockError} When a required line or field is missing
 * @throws {LengthMismatchError} When the aligned rows disagree in length
 * @throws {UnknownSymbolError} When a residue is outside the table's alphabet
 */
function assembleRecord(block: AlignmentBlock, options: AssembleOptions): OutputRecord {
  const table = options.scoringTable;
  const reported = extractMetadata(block);
  const sequences = reconstructSequences(block, reported.alignmentLength);
  const counts = countMutations(sequences.query, sequences.subject, table.gapSymbol);
  const matchPattern = generateMatchPattern(sequences.query, sequences.subject, table);

  const record: OutputRecord = {
    ...reported,
    ...counts,
    queryAligned: sequences.query,
    subjectAligned: sequences.subject,
    matchPattern,
    blockIndex: block.index,
    ...(options.trackLineNumbers !== false && { lineNumber: block.startLine }),
  };

  if (options.skipValidation !== true) {
    const validation = AlignmentMetadataSchema(record);
    if (validation instanceof type.errors) {
      throw new ParseError(
        `Invalid alignment statistics: ${validation.summary}`,
        "FASTA36",
        block.startLine,
        `${block.query.id} vs ${block.subject.id}`
      );
    }
  }

  return record;
}

/**
 * Default rejection handler
 */
function warnRejected(rejection: BlockRejection): void {
  console.warn(
    `FASTA36 Warning (line ${rejection.lineNumber}): block ${rejection.blockIndex} ` +
      `(${rejection.queryId} vs ${rejection.subjectId}) rejected: ${rejection.error.message}`
  );
}

/**
 * Resolve a scoring table choice for a report's residue unit
 */
function resolveScoringTable(choice: ScoringTableChoice | undefined, unit: ResidueUnit): ScoringTable {
  if (choice === undefined || choice === "auto") {
    return defaultTableFor(unit);
  }
  return typeof choice === "string" ? getScoringTable(choice) : choice;
}

export { assembleRecord, Fasta36Parser, resolveScoringTable, warnRejected };
