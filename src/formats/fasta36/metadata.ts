/**
 * Reported statistics of an alignment block
 *
 * Reads the score line and the details line of a block and combines them
 * with the header context the segmenter attached. Mismatch and gap counts
 * are not printed in `-m 0` output; the record assembler derives them from
 * the aligned sequences.
 */

import { MalformedBlockError } from "../../errors";
import type { AlignmentBlock, AlignmentMetadata, Strand } from "../../types";
import { DETAILS_LINE, EVALUE_TEXT, SCORE_LINE } from "./constants";

/**
 * Statistics printed by the search tool for one block
 */
export type ReportedMetadata = Omit<AlignmentMetadata, "mismatches" | "gaps" | "gapOpens">;

/**
 * Index of the details line within a block, -1 when there is none
 */
export function findDetailsLine(block: AlignmentBlock): number {
  return block.lines.findIndex((line) => DETAILS_LINE.test(line));
}

/**
 * Extract the reported statistics of a block
 *
 * Reverse-strand coordinates (start > end) are normalized to ascending
 * order and flagged with `subjectStrand: "-"`.
 *
 * @throws {MalformedBlockError} When the score or details line is missing
 *   or a number on it cannot be read
 *
 * @example
 * ```typescript
 * const meta = extractMetadata(block);
 * console.log(`${meta.queryId} vs ${meta.subjectId}: ${meta.percentIdentity}%`);
 * ```
 */
export function extractMetadata(block: AlignmentBlock): ReportedMetadata {
  const context = `${block.query.id} vs ${block.subject.id}`;

  const scoreIndex = block.lines.findIndex((line) => SCORE_LINE.test(line));
  const scoreMatch = scoreIndex === -1 ? null : SCORE_LINE.exec(block.lines[scoreIndex] ?? "");
  if (!scoreMatch) {
    throw new MalformedBlockError("Score line with bits and E-value not found", "bitScore", block.startLine, context);
  }
  const scoreLine = block.startLine + scoreIndex;

  const detailsIndex = findDetailsLine(block);
  const detailsMatch = detailsIndex === -1 ? null : DETAILS_LINE.exec(block.lines[detailsIndex] ?? "");
  if (!detailsMatch) {
    throw new MalformedBlockError(
      "Details line with score, identity and overlap not found",
      "percentIdentity",
      block.startLine,
      context
    );
  }
  const detailsLine = block.startLine + detailsIndex;

  const [, bits = "", evalue = ""] = scoreMatch;
  const [
    ,
    kind = "",
    rawScore = "",
    identity = "",
    similarity = "",
    overlap = "",
    qStart = "",
    qEnd = "",
    sStart = "",
    sEnd = "",
  ] = detailsMatch;

  if (!EVALUE_TEXT.test(evalue)) {
    throw new MalformedBlockError(`E-value '${evalue}' is not a number`, "evalue", scoreLine, context);
  }

  const number = (text: string, field: string, line: number): number => {
    const value = Number(text);
    if (text === "" || !Number.isFinite(value)) {
      throw new MalformedBlockError(`Field ${field} '${text}' is not a number`, field, line, context);
    }
    return value;
  };

  const queryRange = orderRange(number(qStart, "queryStart", detailsLine), number(qEnd, "queryEnd", detailsLine));
  const subjectRange = orderRange(
    number(sStart, "subjectStart", detailsLine),
    number(sEnd, "subjectEnd", detailsLine)
  );
  const subjectStrand: Strand = queryRange.reversed !== subjectRange.reversed ? "-" : "+";

  return {
    queryId: block.query.id,
    subjectId: block.subject.id,
    alignmentKind: kind,
    alignmentLength: number(overlap, "alignmentLength", detailsLine),
    percentIdentity: number(identity, "percentIdentity", detailsLine),
    percentSimilarity: number(similarity, "percentSimilarity", detailsLine),
    queryStart: queryRange.start,
    queryEnd: queryRange.end,
    subjectStart: subjectRange.start,
    subjectEnd: subjectRange.end,
    subjectStrand,
    rawScore: number(rawScore, "rawScore", detailsLine),
    bitScore: number(bits, "bitScore", scoreLine),
    evalue,
    queryLength: block.query.length,
    subjectLength: block.subject.length,
  };
}

function orderRange(start: number, end: number): { start: number; end: number; reversed: boolean } {
  return start <= end ? { start, end, reversed: false } : { start: end, end: start, reversed: true };
}
