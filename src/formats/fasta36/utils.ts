/**
 * Quick text-level checks on FASTA36 reports, without full parsing
 */

import { splitLines } from "../../io/stream-utils";
import { DETAILS_LINE, QUERY_TITLE } from "./constants";
import { parseQueryTitle, segmentBlocks } from "./segmenter";

/**
 * True when the text has a query title and at least one details line
 */
function detectFasta36Format(data: string): boolean {
  const lines = splitLines(data);
  return lines.some((line) => QUERY_TITLE.test(line)) && lines.some((line) => DETAILS_LINE.test(line));
}

/**
 * Number of alignment blocks (`>>` and `>--`) in a report
 */
function countFasta36Blocks(data: string): number {
  let count = 0;
  for (const _block of segmentBlocks(splitLines(data), { onWarning: () => {} })) {
    count++;
  }
  return count;
}

/**
 * Query ids in report order
 */
function extractFasta36QueryIds(data: string): string[] {
  const ids: string[] = [];
  for (const line of splitLines(data)) {
    const query = parseQueryTitle(line);
    if (query) ids.push(query.id);
  }
  return ids;
}

/**
 * FASTA36 report utilities
 */
const Fasta36Utils = {
  detectFormat: detectFasta36Format,
  countBlocks: countFasta36Blocks,
  extractQueryIds: extractFasta36QueryIds,
} as const;

export { countFasta36Blocks, detectFasta36Format, extractFasta36QueryIds, Fasta36Utils };
