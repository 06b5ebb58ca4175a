/**
 * FASTA36 Format Module
 *
 * Parsing of the pairwise (`-m 0`) alignment reports written by fasta36,
 * ssearch36 and ggsearch36, and tabular output of the parsed alignments.
 *
 * @module fasta36
 * @since v0.1.0
 *
 * @example Report to table
 * ```typescript
 * import { AlignmentTableWriter, Fasta36Parser } from "./formats/fasta36";
 *
 * const parser = new Fasta36Parser({ scoringTable: "blosum62" });
 * const writer = new AlignmentTableWriter({ columns: "extended" });
 * await writer.writeFile(parser.parseFile("search.m0.txt"), "hits.tsv");
 * ```
 */

export * from "./constants";
export { extractMetadata, findDetailsLine, type ReportedMetadata } from "./metadata";
export { type AssembleOptions, assembleRecord, Fasta36Parser, resolveScoringTable, warnRejected } from "./parser";
export { reconstructSequences } from "./reconstruct";
export {
  BlockSegmenter,
  isFooterLine,
  parseQueryTitle,
  parseSubjectHeader,
  segmentBlocks,
  segmentBlocksAsync,
} from "./segmenter";
export {
  type Fasta36ParserOptions,
  Fasta36ParserOptionsSchema,
  type ScoringTableChoice,
  type SegmenterOptions,
  SegmenterState,
} from "./types";
export {
  countFasta36Blocks,
  detectFasta36Format,
  extractFasta36QueryIds,
  Fasta36Utils,
} from "./utils";
export {
  AlignmentTableWriter,
  type AlignmentTableWriterOptions,
  AlignmentTableWriterOptionsSchema,
  COLUMN_PRESETS,
  COLUMNS,
  type ColumnName,
  DEFAULT_COLUMNS,
  EXTENDED_COLUMNS,
  isColumnName,
  parseColumnList,
} from "./writer";
