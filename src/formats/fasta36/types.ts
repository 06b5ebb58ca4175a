/**
 * Type definitions for FASTA36 pairwise report parsing
 */

import { type } from "arktype";
import type { ScoringTable, ScoringTableName } from "../../operations/core/scoring";
import type { BlockRejection, ParserOptions } from "../../types";

/**
 * Scoring table choice: a table instance, a bundled table name, or "auto"
 * to pick BLOSUM50 for protein reports and the IUPAC table for nucleotides
 */
export type ScoringTableChoice = ScoringTable | ScoringTableName | "auto";

/**
 * FASTA36-specific parser options
 */
export interface Fasta36ParserOptions extends ParserOptions {
  /** Table used to classify residue pairs for the match pattern */
  scoringTable?: ScoringTableChoice;
  /** Throw on the first rejected block instead of reporting it */
  strict?: boolean;
  /** Called for every block that could not be turned into a record */
  onRejected?: (rejection: BlockRejection) => void;
}

/**
 * Segmenter settings
 */
export interface SegmenterOptions {
  maxLineLength?: number;
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * States of the block segmenter
 */
export enum SegmenterState {
  /** Before the first query title, or after a footer */
  OUTSIDE = "OUTSIDE",
  /** Inside a query section, before its first block */
  IN_QUERY = "IN_QUERY",
  /** Accumulating the lines of an alignment block */
  IN_BLOCK = "IN_BLOCK",
}

/**
 * ArkType validation for FASTA36 parser options
 */
export const Fasta36ParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number.integer>0",
  "trackLineNumbers?": "boolean",
  "strict?": "boolean",
  "scoringTable?": "'auto'|'blosum50'|'blosum62'|'nucleotide'|object",
});
