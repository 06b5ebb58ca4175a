/**
 * Line patterns of FASTA36 `-m 0` (pairwise) reports
 *
 * A report is a run of query sections. Each section opens with a query
 * title, lists the best scores, then prints one alignment block per
 * subject (`>>`) and per additional alignment with the same subject (`>--`).
 */

// ============================================================================
// HEADER LINES
// ============================================================================

/**
 * Query title: `  1>>>sp|P09488|GSTM1_HUMAN Glutathione S-transferase - 218 aa`
 * Groups: id, description, length, unit
 */
export const QUERY_TITLE = /^\s*\d+>>>(\S+)(?:\s+(.*?))?\s+-\s+(\d+)\s+(nt|aa)\s*$/;

/**
 * Subject header: `>>sp|P28161|GSTM2_HUMAN Glutathione S-transferase (218 aa)`
 * Groups: id, description, length, unit
 */
export const SUBJECT_HEADER = /^>>(\S+)(?:\s+(.*?))?\s*\((\d+)\s+(nt|aa)\)\s*$/;

/**
 * Another alignment with the subject of the preceding block
 */
export const REPEAT_MARKER = /^>--\s*$/;

// ============================================================================
// BLOCK CONTENT
// ============================================================================

/**
 * Score line: ` s-w opt: 1497  Z-score: 1840.2  bits: 347.9 E(85289): 1.8e-99`
 * Groups: bit score, E-value
 */
export const SCORE_LINE = /^\s.*\bbits:\s*(\S+)\s+E\(\d*\):\s*(\S+)\s*$/;

/**
 * Details line:
 * `Smith-Waterman score: 1497; 78.9% identity (94.0% similar) in 218 aa overlap (1-218:1-218)`
 * Groups: kind, raw score, identity, similarity, overlap, q start, q end, s start, s end
 */
export const DETAILS_LINE =
  /^(\S.*?)\s+score:\s*(-?\d+(?:\.\d+)?);\s*(\S+)%\s+identity\s+\((\S+)%\s+(?:similar|ungapped)\)\s+in\s+(\d+)\s+(?:nt|aa)\s+overlap\s+\((\d+)-(\d+):(\d+)-(\d+)\)\s*$/;

/**
 * E-values are kept as printed, but must still read as numbers
 */
export const EVALUE_TEXT = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;

// ============================================================================
// SECTION BOUNDARIES
// ============================================================================

/**
 * Lines that end the alignment section of a query
 */
export const FOOTER_LINES: readonly RegExp[] = [
  /^\s*\d+\s+residues in\s+\d+\s+query\s+sequences/,
  /^>>><<</,
  /^>>>\/\/\//,
  /^Function used was/,
];

/**
 * Default gap symbol of the aligned rows
 */
export const GAP_SYMBOL = "-";
