/**
 * Block segmentation for FASTA36 `-m 0` reports
 *
 * Splits the line stream of a report into alignment blocks. A block opens
 * at a subject header (`>>`) or a repeat marker (`>--`) and runs until the
 * next block opener, the next query title or a footer line. Query and
 * subject header context is attached to each block when it opens, so later
 * stages never need to look back at earlier lines.
 *
 * @remarks
 * The state machine transitions:
 * OUTSIDE → IN_QUERY → IN_BLOCK → (IN_BLOCK | IN_QUERY | OUTSIDE)
 */

import type { AlignmentBlock, QueryContext, ResidueUnit, SubjectContext } from "../../types";
import { FOOTER_LINES, QUERY_TITLE, REPEAT_MARKER, SUBJECT_HEADER } from "./constants";
import { type SegmenterOptions, SegmenterState } from "./types";

interface OpenBlock {
  readonly subject: SubjectContext;
  readonly isRepeat: boolean;
  readonly startLine: number;
  readonly lines: string[];
}

/**
 * Push-based segmenter: feed lines one at a time, collect finished blocks
 *
 * @example
 * ```typescript
 * const segmenter = new BlockSegmenter();
 * for (const line of lines) {
 *   const block = segmenter.push(line);
 *   if (block) handle(block);
 * }
 * const last = segmenter.finish();
 * ```
 */
export class BlockSegmenter {
  private state = SegmenterState.OUTSIDE;
  private query: QueryContext | undefined;
  private subject: SubjectContext | undefined;
  private current: OpenBlock | undefined;
  private blockIndex = 0;
  private lineNumber = 0;
  private readonly maxLineLength: number;
  private readonly onWarning: (warning: string, lineNumber?: number) => void;

  constructor(options: SegmenterOptions = {}) {
    this.maxLineLength = options.maxLineLength ?? 1_000_000;
    this.onWarning =
      options.onWarning ??
      ((warning, lineNumber) => console.warn(`FASTA36 Warning (line ${lineNumber}): ${warning}`));
  }

  /**
   * Number of lines seen so far
   */
  get linesRead(): number {
    return this.lineNumber;
  }

  /**
   * Feed one line (without terminator)
   * @returns The block this line closed, if any
   */
  push(line: string): AlignmentBlock | undefined {
    this.lineNumber++;

    if (line.length > this.maxLineLength) {
      this.onWarning(`Line too long (${line.length} > ${this.maxLineLength}), skipped`, this.lineNumber);
      return undefined;
    }

    const query = parseQueryTitle(line, this.lineNumber);
    if (query) {
      const closed = this.closeBlock();
      this.query = query;
      this.subject = undefined;
      this.state = SegmenterState.IN_QUERY;
      return closed;
    }

    if (isFooterLine(line)) {
      const closed = this.closeBlock();
      this.subject = undefined;
      this.state = SegmenterState.OUTSIDE;
      return closed;
    }

    if (this.state === SegmenterState.OUTSIDE) {
      return undefined;
    }

    const subject = parseSubjectHeader(line, this.lineNumber);
    if (subject) {
      const closed = this.closeBlock();
      this.subject = subject;
      this.openBlock(subject, false, line);
      return closed;
    }

    if (REPEAT_MARKER.test(line)) {
      const closed = this.closeBlock();
      if (this.subject) {
        this.openBlock(this.subject, true, line);
      } else {
        this.onWarning("'>--' marker without a preceding subject header", this.lineNumber);
      }
      return closed;
    }

    if (this.state === SegmenterState.IN_BLOCK && this.current) {
      this.current.lines.push(line);
    }
    return undefined;
  }

  /**
   * Close the block still open at end of input
   */
  finish(): AlignmentBlock | undefined {
    const closed = this.closeBlock();
    this.state = SegmenterState.OUTSIDE;
    return closed;
  }

  private openBlock(subject: SubjectContext, isRepeat: boolean, headerLine: string): void {
    this.current = { subject, isRepeat, startLine: this.lineNumber, lines: [headerLine] };
    this.state = SegmenterState.IN_BLOCK;
  }

  private closeBlock(): AlignmentBlock | undefined {
    const open = this.current;
    this.current = undefined;
    if (this.state === SegmenterState.IN_BLOCK) {
      this.state = SegmenterState.IN_QUERY;
    }
    if (!open || !this.query) {
      return undefined;
    }

    return {
      index: this.blockIndex++,
      query: this.query,
      subject: open.subject,
      isRepeat: open.isRepeat,
      startLine: open.startLine,
      lines: Object.freeze(open.lines),
    };
  }
}

/**
 * Lazily segment a finite line sequence into blocks
 */
function* segmentBlocks(
  lines: Iterable<string>,
  options: SegmenterOptions = {}
): Generator<AlignmentBlock, void, undefined> {
  const segmenter = new BlockSegmenter(options);
  for (const line of lines) {
    const block = segmenter.push(line);
    if (block) yield block;
  }
  const last = segmenter.finish();
  if (last) yield last;
}

/**
 * Lazily segment an async line stream into blocks
 */
async function* segmentBlocksAsync(
  lines: AsyncIterable<string> | Iterable<string>,
  options: SegmenterOptions = {}
): AsyncGenerator<AlignmentBlock, void, undefined> {
  const segmenter = new BlockSegmenter(options);
  for await (const line of lines) {
    const block = segmenter.push(line);
    if (block) yield block;
  }
  const last = segmenter.finish();
  if (last) yield last;
}

/**
 * Parse a query title line, undefined when the line is not one
 */
function parseQueryTitle(line: string, lineNumber?: number): QueryContext | undefined {
  const match = QUERY_TITLE.exec(line);
  if (!match) return undefined;

  const [, id = "", description, length = "0", unit = ""] = match;
  return {
    id,
    ...(description ? { description } : {}),
    length: Number.parseInt(length, 10),
    unit: toResidueUnit(unit),
    ...(lineNumber !== undefined && { lineNumber }),
  };
}

/**
 * Parse a subject header line, undefined when the line is not one
 */
function parseSubjectHeader(line: string, lineNumber?: number): SubjectContext | undefined {
  const match = SUBJECT_HEADER.exec(line);
  if (!match) return undefined;

  const [, id = "", description, length = "0", unit = ""] = match;
  return {
    id,
    ...(description ? { description } : {}),
    length: Number.parseInt(length, 10),
    unit: toResidueUnit(unit),
    ...(lineNumber !== undefined && { lineNumber }),
  };
}

function isFooterLine(line: string): boolean {
  return FOOTER_LINES.some((pattern) => pattern.test(line));
}

function toResidueUnit(text: string): ResidueUnit {
  return text === "nt" ? "nt" : "aa";
}

export { isFooterLine, parseQueryTitle, parseSubjectHeader, segmentBlocks, segmentBlocksAsync };
