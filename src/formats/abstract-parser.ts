/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Provides consistent AbortSignal support across report parsers without
 * imposing parsing implementation details. Each format keeps its own
 * parsing logic while gaining interrupt capabilities.
 *
 * @since v0.1.0
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Base options after defaults are applied
 */
export type ResolvedParserOptions = Required<Omit<ParserOptions, "signal">> &
  Pick<ParserOptions, "signal">;

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 * @template TOptions - Format-specific options extending {@link ParserOptions}
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & ResolvedParserOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: ResolvedParserOptions = {
      skipValidation: false,
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  // ============================================================================
  // SHARED INTERRUPT HANDLING
  // ============================================================================

  /**
   * Throw if the signal has fired; call between records so Ctrl+C
   * interrupts long reports
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  // ============================================================================
  // ABSTRACT METHODS
  // ============================================================================

  /**
   * Parse records from an in-memory report
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a report file, gzip-compressed or not
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a binary stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier for error messages and logging (e.g. "FASTA36")
   */
  protected abstract getFormatName(): string;
}

/**
 * Utility class for AbortSignal integration across parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
