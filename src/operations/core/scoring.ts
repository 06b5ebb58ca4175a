/**
 * Residue compatibility scoring
 *
 * A scoring table answers one question: given two aligned residue symbols,
 * how compatible are they? The match-pattern generator only depends on the
 * {@link ScoringTable} interface, so any substitution matrix can be plugged in.
 *
 * Bundled tables:
 * - BLOSUM50 (default protein matrix of the FASTA36 programs)
 * - BLOSUM62
 * - an IUPAC nucleotide table built from ambiguity-code overlap
 *
 * @module scoring
 * @since v0.1.0
 *
 * @example
 * ```typescript
 * const table = getScoringTable("blosum62");
 * table.compatibility("I", "V"); // 3
 * table.compatibility("W", "-"); // -4 (gap score)
 * ```
 */

import { type } from "arktype";
import blosum50 from "../../data/matrices/blosum50.json";
import blosum62 from "../../data/matrices/blosum62.json";
import { MatrixError, UnknownSymbolError, ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import type { ResidueUnit } from "../../types";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Pluggable residue-pair compatibility capability
 */
export interface ScoringTable {
  readonly name: string;
  /** Symbols the table scores, upper case, gap excluded */
  readonly alphabet: string;
  readonly gapSymbol: string;
  /** True when the symbol (either case) or the gap symbol can be scored */
  has(symbol: string): boolean;
  /**
   * Score an ordered symbol pair. Pairs involving the gap symbol always
   * score the table's (negative) gap score.
   * @throws {UnknownSymbolError} When either symbol is outside the alphabet
   */
  compatibility(a: string, b: string): number;
}

/**
 * Names of the bundled scoring tables
 */
export type ScoringTableName = "blosum50" | "blosum62" | "nucleotide";

/**
 * On-disk layout of a substitution matrix
 */
export const MatrixFileSchema = type({
  name: "string>0",
  alphabet: "string>0",
  gap: "number<0",
  scores: "number[][]",
});

export type MatrixFile = typeof MatrixFileSchema.infer;

// =============================================================================
// CONSTANTS
// =============================================================================

const DEFAULT_GAP_SYMBOL = "-";

/**
 * IUPAC nucleotide codes and the bases they stand for (U folded onto T)
 */
const IUPAC_BASES: Readonly<Record<string, readonly string[]>> = {
  A: ["A"],
  C: ["C"],
  G: ["G"],
  T: ["T"],
  U: ["T"],
  R: ["A", "G"],
  Y: ["C", "T"],
  S: ["C", "G"],
  W: ["A", "T"],
  K: ["G", "T"],
  M: ["A", "C"],
  B: ["C", "G", "T"],
  D: ["A", "G", "T"],
  H: ["A", "C", "T"],
  V: ["A", "C", "G"],
  N: ["A", "C", "G", "T"],
  X: ["A", "C", "G", "T"],
};

// =============================================================================
// IMPLEMENTATION
// =============================================================================

/**
 * Dense substitution matrix with O(1) symbol lookup
 *
 * Immutable after construction and safe to share between any number of
 * concurrent parsers.
 */
export class SubstitutionMatrix implements ScoringTable {
  readonly name: string;
  readonly alphabet: string;
  readonly gapSymbol: string;
  private readonly gapScore: number;
  private readonly index: ReadonlyMap<string, number>;
  private readonly scores: readonly (readonly number[])[];

  constructor(matrix: MatrixFile, gapSymbol: string = DEFAULT_GAP_SYMBOL) {
    validateMatrix(matrix, gapSymbol);

    this.name = matrix.name;
    this.alphabet = matrix.alphabet.toUpperCase();
    this.gapSymbol = gapSymbol;
    this.gapScore = matrix.gap;
    this.scores = matrix.scores.map((row) => Object.freeze([...row]));

    const index = new Map<string, number>();
    for (let i = 0; i < this.alphabet.length; i++) {
      const symbol = this.alphabet.charAt(i);
      index.set(symbol, i);
      index.set(symbol.toLowerCase(), i);
    }
    this.index = index;
  }

  has(symbol: string): boolean {
    return symbol === this.gapSymbol || this.index.has(symbol);
  }

  compatibility(a: string, b: string): number {
    const i = this.lookup(a);
    const j = this.lookup(b);

    if (i === undefined || j === undefined) {
      return this.gapScore;
    }

    return this.scores[i]?.[j] ?? this.gapScore;
  }

  /**
   * Matrix row index of a symbol, undefined for the gap symbol
   */
  private lookup(symbol: string): number | undefined {
    if (symbol === this.gapSymbol) {
      return undefined;
    }
    const position = this.index.get(symbol);
    if (position === undefined) {
      throw new UnknownSymbolError(symbol, this.name);
    }
    return position;
  }
}

/**
 * Check that a matrix file is square, matches its alphabet and is symmetric
 */
function validateMatrix(matrix: MatrixFile, gapSymbol: string): void {
  const checked = MatrixFileSchema(matrix);
  if (checked instanceof type.errors) {
    throw new MatrixError(checked.summary, String(matrix.name));
  }

  const size = matrix.alphabet.length;
  if (new Set(matrix.alphabet.toUpperCase()).size !== size) {
    throw new MatrixError("alphabet contains duplicate symbols", matrix.name);
  }
  if (matrix.alphabet.includes(gapSymbol)) {
    throw new MatrixError(`alphabet must not contain the gap symbol '${gapSymbol}'`, matrix.name);
  }
  if (matrix.scores.length !== size) {
    throw new MatrixError(
      `expected ${size} rows for alphabet '${matrix.alphabet}', found ${matrix.scores.length}`,
      matrix.name
    );
  }

  for (let i = 0; i < size; i++) {
    const row = matrix.scores[i] ?? [];
    if (row.length !== size) {
      throw new MatrixError(`row ${i + 1} has ${row.length} columns, expected ${size}`, matrix.name);
    }
    for (let j = 0; j < i; j++) {
      if (row[j] !== matrix.scores[j]?.[i]) {
        throw new MatrixError(
          `not symmetric at ${matrix.alphabet.charAt(i)}/${matrix.alphabet.charAt(j)}`,
          matrix.name
        );
      }
    }
  }
}

/**
 * Options for the IUPAC nucleotide table
 */
export interface NucleotideTableOptions {
  /** Identical unambiguous bases */
  match?: number;
  /** Bases whose IUPAC sets do not overlap */
  mismatch?: number;
  /** Ambiguity codes whose sets overlap */
  ambiguous?: number;
  /** Any pair involving a gap */
  gap?: number;
  gapSymbol?: string;
}

const NucleotideTableOptionsSchema = type({
  "match?": "number>0",
  "mismatch?": "number<0",
  "ambiguous?": "number",
  "gap?": "number<0",
  "gapSymbol?": "string==1",
});

/**
 * Build a nucleotide scoring table from IUPAC ambiguity sets
 *
 * Defaults follow the +5/-4 scoring of the FASTA36 nucleotide programs.
 */
export function createNucleotideTable(options: NucleotideTableOptions = {}): ScoringTable {
  const validation = NucleotideTableOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid nucleotide table options: ${validation.summary}`);
  }

  const match = options.match ?? 5;
  const mismatch = options.mismatch ?? -4;
  const ambiguous = options.ambiguous ?? 0;
  const alphabet = Object.keys(IUPAC_BASES).join("");

  const scores = [...alphabet].map((a) =>
    [...alphabet].map((b) => {
      const left = IUPAC_BASES[a] ?? [];
      const right = IUPAC_BASES[b] ?? [];
      if (left.length === 1 && right.length === 1) {
        return left[0] === right[0] ? match : mismatch;
      }
      return left.some((base) => right.includes(base)) ? ambiguous : mismatch;
    })
  );

  return new SubstitutionMatrix(
    { name: "NUCLEOTIDE", alphabet, gap: options.gap ?? mismatch, scores },
    options.gapSymbol ?? DEFAULT_GAP_SYMBOL
  );
}

const BUILT_IN_TABLES: Record<ScoringTableName, () => ScoringTable> = {
  blosum50: () => new SubstitutionMatrix(blosum50),
  blosum62: () => new SubstitutionMatrix(blosum62),
  nucleotide: () => createNucleotideTable(),
};

const tableCache = new Map<ScoringTableName, ScoringTable>();

/**
 * Get one of the bundled scoring tables (built once, then shared)
 */
export function getScoringTable(name: ScoringTableName): ScoringTable {
  const cached = tableCache.get(name);
  if (cached) return cached;

  const table = BUILT_IN_TABLES[name]();
  tableCache.set(name, table);
  return table;
}

/**
 * Check whether a string names a bundled scoring table
 */
export function isScoringTableName(name: string): name is ScoringTableName {
  return Object.hasOwn(BUILT_IN_TABLES, name);
}

/**
 * Default table for the residue unit a report prints its lengths in
 */
export function defaultTableFor(unit: ResidueUnit): ScoringTable {
  return getScoringTable(unit === "nt" ? "nucleotide" : "blosum50");
}

/**
 * Load a substitution matrix from a JSON file
 *
 * The file has the layout of the bundled matrices:
 * `{ "name": "PAM250", "alphabet": "ARND...", "gap": -8, "scores": [[...], ...] }`
 *
 * @throws {FileError} When the file cannot be read
 * @throws {MatrixError} When the content is not a valid matrix
 */
export async function loadScoringTable(path: string, gapSymbol: string = DEFAULT_GAP_SYMBOL): Promise<ScoringTable> {
  const text = await readToString(path);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new MatrixError(`not valid JSON (${error instanceof Error ? error.message : String(error)})`, path);
  }

  const matrix = MatrixFileSchema(data);
  if (matrix instanceof type.errors) {
    throw new MatrixError(matrix.summary, path);
  }
  return new SubstitutionMatrix(matrix, gapSymbol);
}
