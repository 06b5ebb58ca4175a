/**
 * Match-pattern generation and mutation counting for aligned sequence pairs
 *
 * Both operate column by column on two aligned sequences of equal length,
 * gap symbols included. Nothing here keeps state between calls.
 *
 * @module match-pattern
 * @since v0.1.0
 */

import { LengthMismatchError, UnknownSymbolError } from "../../errors";
import type { ScoringTable } from "./scoring";

/**
 * Symbols of a match pattern
 */
export const MatchSymbol = {
  /** Identical residues */
  IDENTICAL: ":",
  /** Different residues with a non-negative compatibility score */
  COMPATIBLE: ".",
  /** Gap column or incompatible residues */
  NONE: " ",
} as const;

export type MatchSymbol = (typeof MatchSymbol)[keyof typeof MatchSymbol];

/**
 * Counts derived from an aligned pair
 */
export interface MutationCounts {
  /** Non-gap columns with differing residues */
  readonly mismatches: number;
  /** Gap symbols in both sequences */
  readonly gaps: number;
  /** Runs of consecutive gap symbols in both sequences */
  readonly gapOpens: number;
}

function assertSameLength(query: string, subject: string): void {
  if (query.length !== subject.length) {
    throw new LengthMismatchError(
      `Aligned query (${query.length}) and subject (${subject.length}) differ in length`,
      query.length,
      subject.length
    );
  }
}

/**
 * Classify one alignment column
 *
 * @throws {UnknownSymbolError} When a residue is outside the table's alphabet
 */
export function classifyColumn(q: string, s: string, table: ScoringTable): MatchSymbol {
  const gap = table.gapSymbol;

  if (q === gap || s === gap) {
    return MatchSymbol.NONE;
  }
  if (q === s) {
    return MatchSymbol.IDENTICAL;
  }
  return table.compatibility(q, s) >= 0 ? MatchSymbol.COMPATIBLE : MatchSymbol.NONE;
}

/**
 * Generate the match pattern of two aligned sequences
 *
 * Every residue is checked against the table, identical ones included, so
 * a symbol outside the alphabet is never silently passed through.
 *
 * @param query - Aligned query, gaps included
 * @param subject - Aligned subject, same length as query
 * @param table - Residue compatibility scores
 * @returns One of `:`, `.` or a space per column
 * @throws {LengthMismatchError} When the sequences differ in length
 * @throws {UnknownSymbolError} When a residue is outside the table's alphabet
 *
 * @example
 * ```typescript
 * const table = getScoringTable("nucleotide");
 * generateMatchPattern("AC-GT", "AG-GA", table); // ":  : "
 * ```
 */
export function generateMatchPattern(query: string, subject: string, table: ScoringTable): string {
  assertSameLength(query, subject);

  const symbols: string[] = new Array(query.length);
  for (let i = 0; i < query.length; i++) {
    const q = query.charAt(i);
    const s = subject.charAt(i);

    const unknown = !table.has(q) ? q : !table.has(s) ? s : undefined;
    if (unknown !== undefined) {
      throw new UnknownSymbolError(unknown, table.name, i);
    }

    symbols[i] = classifyColumn(q, s, table);
  }

  return symbols.join("");
}

/**
 * Count mismatches, gap symbols and gap openings of an aligned pair
 *
 * @example
 * ```typescript
 * countMutations("AC--GT", "ACTTGA", "-"); // { mismatches: 1, gaps: 2, gapOpens: 1 }
 * ```
 */
export function countMutations(query: string, subject: string, gapSymbol = "-"): MutationCounts {
  assertSameLength(query, subject);

  let mismatches = 0;
  let gaps = 0;
  let gapOpens = 0;

  for (let i = 0; i < query.length; i++) {
    const q = query.charAt(i);
    const s = subject.charAt(i);
    const qGap = q === gapSymbol;
    const sGap = s === gapSymbol;

    if (qGap) {
      gaps++;
      if (i === 0 || query.charAt(i - 1) !== gapSymbol) gapOpens++;
    }
    if (sGap) {
      gaps++;
      if (i === 0 || subject.charAt(i - 1) !== gapSymbol) gapOpens++;
    }
    if (!qGap && !sGap && q !== s) {
      mismatches++;
    }
  }

  return { mismatches, gaps, gapOpens };
}
