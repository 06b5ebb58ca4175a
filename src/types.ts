/**
 * Core type definitions for pairwise alignment records
 *
 * Coordinates follow the search tool's convention: 1-based and inclusive.
 * Every record is created once per alignment block and never mutated.
 */

import { type } from "arktype";

/**
 * Strand of the subject sequence in a nucleotide alignment
 */
export type Strand = "+" | "-";

/**
 * Unit the search tool prints sequence lengths in
 */
export type ResidueUnit = "nt" | "aa";

/**
 * Header context of the query a block belongs to
 * Taken from the query title line: `  1>>>QUERY description - 120 aa`
 */
export interface QueryContext {
  readonly id: string;
  readonly description?: string;
  readonly length: number;
  readonly unit: ResidueUnit;
  readonly lineNumber?: number;
}

/**
 * Header context of the subject a block aligns against
 * Taken from the subject header line: `>>SUBJECT description  (250 aa)`
 */
export interface SubjectContext {
  readonly id: string;
  readonly description?: string;
  readonly length: number;
  readonly unit: ResidueUnit;
  readonly lineNumber?: number;
}

/**
 * Raw text of one query/subject alignment, plus the header context
 * the segmenter had seen when the block started
 */
export interface AlignmentBlock {
  /** Zero-based position of this block in the report */
  readonly index: number;
  readonly query: QueryContext;
  readonly subject: SubjectContext;
  /** True when the block started at a `>--` marker (another HSP for the same subject) */
  readonly isRepeat: boolean;
  /** Line number of the block's first line (1-based) */
  readonly startLine: number;
  readonly lines: readonly string[];
}

/**
 * Statistics of one alignment as printed by the search tool
 * (mismatch and gap counts are derived from the aligned sequences)
 */
export interface AlignmentMetadata {
  readonly queryId: string;
  readonly subjectId: string;
  /** Label preceding "score:" on the details line, e.g. "Smith-Waterman" */
  readonly alignmentKind: string;
  readonly alignmentLength: number;
  readonly percentIdentity: number;
  readonly percentSimilarity: number;
  readonly mismatches: number;
  /** Gap symbols in query and subject combined */
  readonly gaps: number;
  /** Runs of gap symbols in query and subject combined */
  readonly gapOpens: number;
  readonly queryStart: number;
  readonly queryEnd: number;
  readonly subjectStart: number;
  readonly subjectEnd: number;
  readonly subjectStrand: Strand;
  readonly rawScore: number;
  readonly bitScore: number;
  /** Kept as printed; E-values such as "1.2e-120" or "0" lose nothing this way */
  readonly evalue: string;
  readonly queryLength: number;
  readonly subjectLength: number;
}

/**
 * Aligned query and subject, gap symbols included
 */
export interface AlignedSequencePair {
  readonly query: string;
  readonly subject: string;
  /** The tool's own printed match line, kept for diagnostics */
  readonly reportedPattern: string;
}

/**
 * One output row per alignment block
 */
export interface OutputRecord extends AlignmentMetadata {
  readonly queryAligned: string;
  readonly subjectAligned: string;
  readonly matchPattern: string;
  /** Zero-based block position in the report */
  readonly blockIndex: number;
  readonly lineNumber?: number;
}

/**
 * A block that could not be turned into a record
 */
export interface BlockRejection {
  readonly blockIndex: number;
  readonly queryId: string;
  readonly subjectId: string;
  readonly lineNumber: number;
  readonly error: Error;
}

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Skip metadata range checks (coordinates, percentages) */
  skipValidation?: boolean;
  /** Lines longer than this are skipped with a warning */
  maxLineLength?: number;
  /** Whether to record line numbers on output records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * File reading options
 */
export interface FileReaderOptions {
  /** Buffer size for stream reads */
  bufferSize?: number;
  /** Maximum file size accepted (bytes) */
  maxFileSize?: number;
  /** Decompress gzip input automatically */
  autoDecompress?: boolean;
}

/**
 * File writing options
 */
export interface WriteOptions {
  /** Create parent directories if they don't exist */
  createDirectories?: boolean;
}

/**
 * File metadata information
 */
export interface FileMetadata {
  readonly path: string;
  readonly size: number;
  readonly lastModified?: Date;
}

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

/**
 * Percentages printed by the tool, 0-100 inclusive
 */
export const PercentSchema = type("0<=number<=100");

/**
 * 1-based coordinate
 */
export const OneBasedCoordinate = type("number.integer>=1");

/**
 * Runtime check for a finished alignment record
 */
export const AlignmentMetadataSchema = type({
  queryId: "string>0",
  subjectId: "string>0",
  alignmentKind: "string",
  alignmentLength: "number.integer>=0",
  percentIdentity: PercentSchema,
  percentSimilarity: PercentSchema,
  mismatches: "number.integer>=0",
  gaps: "number.integer>=0",
  gapOpens: "number.integer>=0",
  queryStart: OneBasedCoordinate,
  queryEnd: OneBasedCoordinate,
  subjectStart: OneBasedCoordinate,
  subjectEnd: OneBasedCoordinate,
  subjectStrand: "'+'|'-'",
  rawScore: "number",
  bitScore: "number",
  evalue: "string>0",
  queryLength: "number.integer>=0",
  subjectLength: "number.integer>=0",
}).narrow((meta, ctx) => {
  if (meta.queryStart > meta.queryEnd) {
    return ctx.reject({
      expected: "queryStart <= queryEnd",
      actual: `${meta.queryStart}-${meta.queryEnd}`,
      path: ["queryStart"],
    });
  }
  if (meta.subjectStart > meta.subjectEnd) {
    return ctx.reject({
      expected: "subjectStart <= subjectEnd",
      actual: `${meta.subjectStart}-${meta.subjectEnd}`,
      path: ["subjectStart"],
    });
  }
  return true;
});

/**
 * ArkType validation for file reader options
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number.integer>=1024",
  "maxFileSize?": "number>0",
  "autoDecompress?": "boolean",
});
