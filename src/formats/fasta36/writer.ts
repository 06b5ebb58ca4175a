/**
 * Tabular output for parsed alignment records
 *
 * One delimited row per record, with a `#`-prefixed header row. Column
 * names follow the BLAST/FASTA `-m 8` tabular layout, extended with the
 * aligned sequences and the match pattern.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { openForWriting } from "../../io/file-writer";
import type { OutputRecord, WriteOptions } from "../../types";

// =============================================================================
// COLUMNS
// =============================================================================

type Formatter = (record: OutputRecord, format: (value: number) => string) => string;

/**
 * Known output columns and how each is rendered
 */
export const COLUMNS = {
  query: (r) => r.queryId,
  subject: (r) => r.subjectId,
  p_ident: (r, f) => f(r.percentIdentity),
  p_sim: (r, f) => f(r.percentSimilarity),
  aln_len: (r) => String(r.alignmentLength),
  mismatches: (r) => String(r.mismatches),
  gaps: (r) => String(r.gaps),
  gap_opens: (r) => String(r.gapOpens),
  q_start: (r) => String(r.queryStart),
  q_end: (r) => String(r.queryEnd),
  s_start: (r) => String(r.subjectStart),
  s_end: (r) => String(r.subjectEnd),
  strand: (r) => r.subjectStrand,
  evalue: (r) => r.evalue,
  bit_score: (r, f) => f(r.bitScore),
  score: (r) => String(r.rawScore),
  q_len: (r) => String(r.queryLength),
  s_len: (r) => String(r.subjectLength),
  kind: (r) => r.alignmentKind,
  q_aln: (r) => r.queryAligned,
  s_aln: (r) => r.subjectAligned,
  m_aln: (r) => r.matchPattern,
} as const satisfies Record<string, Formatter>;

export type ColumnName = keyof typeof COLUMNS;

export const DEFAULT_COLUMNS: readonly ColumnName[] = [
  "query",
  "subject",
  "p_ident",
  "aln_len",
  "mismatches",
  "gap_opens",
  "q_start",
  "q_end",
  "s_start",
  "s_end",
  "score",
  "q_aln",
  "s_aln",
  "m_aln",
];

/**
 * `-m 8` columns followed by similarity, gaps, lengths and the alignment
 */
export const EXTENDED_COLUMNS: readonly ColumnName[] = [
  "query",
  "subject",
  "p_ident",
  "aln_len",
  "mismatches",
  "gap_opens",
  "q_start",
  "q_end",
  "s_start",
  "s_end",
  "evalue",
  "bit_score",
  "p_sim",
  "gaps",
  "q_len",
  "s_len",
  "m_aln",
  "q_aln",
  "s_aln",
];

export const COLUMN_PRESETS = {
  default: DEFAULT_COLUMNS,
  extended: EXTENDED_COLUMNS,
} as const;

/**
 * Check whether a string names a known column
 */
export function isColumnName(name: string): name is ColumnName {
  return Object.hasOwn(COLUMNS, name);
}

/**
 * Parse a comma-separated column list such as `"query,subject,evalue"`
 *
 * @throws {ValidationError} When a name is not a known column
 */
export function parseColumnList(list: string): ColumnName[] {
  const names = list
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name !== "");

  const unknown = names.filter((name) => !isColumnName(name));
  if (unknown.length > 0) {
    throw new ValidationError(
      `Unknown column(s): ${unknown.join(", ")}. Known columns: ${Object.keys(COLUMNS).join(", ")}`
    );
  }
  return names.filter(isColumnName);
}

// =============================================================================
// WRITER
// =============================================================================

export interface AlignmentTableWriterOptions {
  /** Column list or preset name (default: "default") */
  columns?: readonly ColumnName[] | keyof typeof COLUMN_PRESETS;
  /** Field delimiter (default: tab); whitespace, ':' and '.' are refused */
  delimiter?: string;
  /** Write the `#` header row (default: true) */
  header?: boolean;
  lineEnding?: "\n" | "\r\n";
  /** Fixed decimals for percentages and bit scores; as printed when unset */
  precision?: number;
}

export const AlignmentTableWriterOptionsSchema = type({
  "columns?": "'default'|'extended'|string[]",
  "delimiter?": "string>0",
  "header?": "boolean",
  "lineEnding?": type.enumerated("\n", "\r\n"),
  "precision?": "number.integer>=0",
}).narrow((options, ctx) => {
  if (Array.isArray(options.columns)) {
    if (options.columns.length === 0) {
      return ctx.reject({ expected: "at least one column", actual: "[]", path: ["columns"] });
    }
    const unknown = options.columns.find((name) => !isColumnName(name));
    if (unknown !== undefined) {
      return ctx.reject({ expected: "a known column name", actual: unknown, path: ["columns"] });
    }
  }
  if (options.precision !== undefined && options.precision > 10) {
    return ctx.reject({ expected: "precision <= 10", actual: String(options.precision), path: ["precision"] });
  }
  // Match patterns are made of spaces, ':' and '.', so none of them can separate fields
  if (options.delimiter !== undefined && /[\s:.]/.test(options.delimiter)) {
    return ctx.reject({
      expected: "a delimiter without whitespace, ':' or '.'",
      actual: JSON.stringify(options.delimiter),
      path: ["delimiter"],
    });
  }
  return true;
});

/**
 * Writes alignment records as delimited text
 *
 * @example
 * ```typescript
 * const writer = new AlignmentTableWriter({ columns: "extended" });
 * await writer.writeFile(parser.parseFile("search.m0.txt"), "hits.tsv");
 * ```
 */
export class AlignmentTableWriter {
  readonly columns: readonly ColumnName[];
  private readonly delimiter: string;
  private readonly header: boolean;
  private readonly lineEnding: string;
  private readonly precision: number | undefined;

  constructor(options: AlignmentTableWriterOptions = {}) {
    const validation = AlignmentTableWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid table writer options: ${validation.summary}`);
    }

    const columns = options.columns ?? "default";
    this.columns = typeof columns === "string" ? COLUMN_PRESETS[columns] : columns;
    this.delimiter = options.delimiter ?? "\t";
    this.header = options.header !== false;
    this.lineEnding = options.lineEnding ?? "\n";
    this.precision = options.precision;
  }

  /**
   * Header row, `#` followed by the column names
   */
  formatHeader(): string {
    return `#${this.columns.join(this.delimiter)}`;
  }

  /**
   * Format one record as a row (no line ending)
   */
  formatRecord(record: OutputRecord): string {
    const format = (value: number): string =>
      this.precision === undefined ? String(value) : value.toFixed(this.precision);

    return this.columns
      .map((column) => {
        const formatter: Formatter = COLUMNS[column];
        return this.formatField(formatter(record, format));
      })
      .join(this.delimiter);
  }

  /**
   * Format records into a complete table, header included
   */
  formatRecords(records: Iterable<OutputRecord>): string {
    let text = this.header ? this.formatHeader() + this.lineEnding : "";
    for (const record of records) {
      text += this.formatRecord(record) + this.lineEnding;
    }
    return text;
  }

  /**
   * Write records to a stream
   * @returns Number of rows written (header excluded)
   */
  async writeToStream(
    records: AsyncIterable<OutputRecord> | Iterable<OutputRecord>,
    stream: WritableStream<Uint8Array>
  ): Promise<number> {
    const writer = stream.getWriter();
    const encoder = new TextEncoder();
    let rows = 0;

    try {
      if (this.header) {
        await writer.write(encoder.encode(this.formatHeader() + this.lineEnding));
      }
      for await (const record of records) {
        await writer.write(encoder.encode(this.formatRecord(record) + this.lineEnding));
        rows++;
      }
    } finally {
      writer.releaseLock();
    }
    return rows;
  }

  /**
   * Write records to a file
   * @returns Number of rows written (header excluded)
   * @throws {FileError} When the file cannot be written
   */
  async writeFile(
    records: AsyncIterable<OutputRecord> | Iterable<OutputRecord>,
    path: string,
    options: WriteOptions = {}
  ): Promise<number> {
    return openForWriting(
      path,
      async (handle) => {
        if (this.header) {
          await handle.writeString(this.formatHeader() + this.lineEnding);
        }
        let rows = 0;
        for await (const record of records) {
          await handle.writeString(this.formatRecord(record) + this.lineEnding);
          rows++;
        }
        return rows;
      },
      options
    );
  }

  /**
   * Delimiters and line breaks inside a value would shift columns
   */
  private formatField(value: string): string {
    if (!value.includes(this.delimiter) && !/[\r\n]/.test(value)) {
      return value;
    }
    return value.replaceAll(this.delimiter, " ").replace(/[\r\n]+/g, " ");
  }
}
