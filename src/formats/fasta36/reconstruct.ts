/**
 * Aligned sequence reconstruction from wrapped `-m 0` alignment rows
 *
 * The alignment display repeats a fixed pattern per wrapped segment:
 *
 * ```
 *                10        20        30
 * GSTM1_ MPMILGYWDIRGLAHAIRLLLEYTDSSYEEKKYTMGDAPDYDRSQWLNEKFKLGLDFPN
 *        ::::::::::::::::.:::::::::::::::::::::::::::::::::.:::::::::
 * GSTM2_ MPMTLGYWNIRGLAHSIRLLLEYTDSSYEEKKYTMGDAPDYDRSQWLNEKFKLGLDFPN
 *                10        20        30
 * ```
 *
 * Rows naming a sequence start in column 0; ruler and match lines start
 * with whitespace. The query row of a segment defines the column span of
 * its residues, and the match line and subject row are cut to that span.
 * Rows are paired by order, never by label, since the tool truncates both
 * labels to the same few characters.
 */

import { LengthMismatchError, MalformedBlockError } from "../../errors";
import type { AlignedSequencePair, AlignmentBlock } from "../../types";
import { findDetailsLine } from "./metadata";

/**
 * Column span of one wrapped query row
 */
interface PendingSegment {
  readonly start: number;
  readonly end: number;
  readonly lineNumber: number;
  matchLine: string | undefined;
}

const SEQUENCE_ROW = /^(\S+)(\s+)(\S+)/;

/**
 * Rebuild the aligned query and subject of a block
 *
 * @param block - Block from the segmenter
 * @param expectedLength - Alignment length from the details line, when known
 * @throws {MalformedBlockError} When there are no rows or a query row has no subject row
 * @throws {LengthMismatchError} When the rebuilt sequences differ in length,
 *   or from `expectedLength`
 */
export function reconstructSequences(block: AlignmentBlock, expectedLength?: number): AlignedSequencePair {
  const context = `${block.query.id} vs ${block.subject.id}`;
  const detailsIndex = findDetailsLine(block);
  const firstRow = detailsIndex === -1 ? 1 : detailsIndex + 1;

  const query: string[] = [];
  const subject: string[] = [];
  const pattern: string[] = [];
  let pending: PendingSegment | undefined;

  for (let i = firstRow; i < block.lines.length; i++) {
    const line = block.lines[i] ?? "";
    const lineNumber = block.startLine + i;

    if (!startsWithName(line)) {
      // First line after a query row is its match line, blank or not
      if (pending && pending.matchLine === undefined) {
        pending.matchLine = line;
      }
      continue;
    }

    if (!pending) {
      const row = SEQUENCE_ROW.exec(line);
      if (!row) {
        throw new MalformedBlockError(`Query row has no residues: '${line}'`, "queryAligned", lineNumber, context);
      }
      const [, label = "", spacing = "", residues = ""] = row;
      const start = label.length + spacing.length;
      pending = { start, end: start + residues.length, lineNumber, matchLine: undefined };
      query.push(residues);
      continue;
    }

    subject.push(line.slice(pending.start, pending.end));
    pattern.push((pending.matchLine ?? "").slice(pending.start, pending.end).padEnd(pending.end - pending.start));
    pending = undefined;
  }

  if (pending) {
    throw new MalformedBlockError(
      "Query row has no matching subject row",
      "subjectAligned",
      pending.lineNumber,
      context
    );
  }
  if (query.length === 0) {
    throw new MalformedBlockError("No aligned sequence rows found", "queryAligned", block.startLine, context);
  }

  const pair: AlignedSequencePair = {
    query: query.join(""),
    subject: subject.join(""),
    reportedPattern: pattern.join(""),
  };

  if (pair.query.length !== pair.subject.length) {
    throw new LengthMismatchError(
      `Aligned query (${pair.query.length}) and subject (${pair.subject.length}) differ in length`,
      pair.query.length,
      pair.subject.length,
      block.startLine,
      context
    );
  }
  if (expectedLength !== undefined && pair.query.length !== expectedLength) {
    throw new LengthMismatchError(
      `Reconstructed alignment has ${pair.query.length} columns, details line reports ${expectedLength}`,
      expectedLength,
      pair.query.length,
      block.startLine,
      context
    );
  }

  return pair;
}

function startsWithName(line: string): boolean {
  return line.length > 0 && !/\s/.test(line.charAt(0));
}
