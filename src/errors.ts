/**
 * Error handling for alignment report parsing
 *
 * Every error carries a machine-readable code plus the line number and
 * surrounding text where the problem was found, so a rejected alignment
 * block can be traced back to the report that produced it.
 */

/**
 * Base error class for all pairtab errors
 */
export class PairtabError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "PairtabError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or arguments
 */
export class ValidationError extends PairtabError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends PairtabError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string,
    code = "PARSE_ERROR"
  ) {
    super(message, code, lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * A required field of an alignment block is missing or unparsable
 */
export class MalformedBlockError extends ParseError {
  constructor(
    message: string,
    public readonly field: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "FASTA36", lineNumber, context, "MALFORMED_BLOCK");
    this.name = "MalformedBlockError";
  }
}

/**
 * Reconstructed aligned sequences disagree with each other or with the
 * alignment length printed on the details line
 */
export class LengthMismatchError extends ParseError {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "FASTA36", lineNumber, context, "LENGTH_MISMATCH");
    this.name = "LengthMismatchError";
  }

  override toString(): string {
    return `${super.toString()}\nExpected length: ${this.expected}, actual: ${this.actual}`;
  }
}

/**
 * A residue symbol is outside the alphabet of the scoring table in use
 */
export class UnknownSymbolError extends ParseError {
  constructor(
    public readonly symbol: string,
    public readonly table: string,
    public readonly column?: number,
    lineNumber?: number
  ) {
    const where = column !== undefined ? ` at alignment column ${column + 1}` : "";
    super(
      `Symbol '${symbol}'${where} is not in the ${table} alphabet`,
      "FASTA36",
      lineNumber,
      undefined,
      "UNKNOWN_SYMBOL"
    );
    this.name = "UnknownSymbolError";
  }
}

/**
 * Scoring matrix file is not a valid square, symmetric table
 */
export class MatrixError extends ValidationError {
  constructor(
    message: string,
    public readonly matrixName: string,
    context?: string
  ) {
    super(`Scoring matrix '${matrixName}': ${message}`, undefined, context);
    this.name = "MatrixError";
  }
}

/**
 * Compression/decompression errors
 */
export class CompressionError extends PairtabError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const lower = errorMessage.toLowerCase();
    const suggestion =
      lower.includes("unexpected eof") || lower.includes("truncated")
        ? ". File appears to be truncated or incomplete"
        : lower.includes("header") || lower.includes("magic")
          ? `. File may be corrupted or not actually ${format} compressed`
          : "";

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends PairtabError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends PairtabError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * An unterminated line outgrew the pending stream buffer
 */
export class BufferError extends PairtabError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow"
  ) {
    super(message, "BUFFER_ERROR");
    this.name = "BufferError";
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  MALFORMED_BLOCK:
    "Check that the report was produced with '-m 0' and was not edited or truncated",
  LENGTH_MISMATCH:
    "The alignment display may be truncated; re-run the search without output line limits",
  UNKNOWN_SYMBOL:
    "Pick a scoring table matching the sequence type (nucleotide vs protein) or a custom matrix",
  MALFORMED_LINE: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Look up a recovery suggestion for an error
 */
export function getErrorSuggestion(error: PairtabError): string | undefined {
  switch (error.code) {
    case "MALFORMED_BLOCK":
      return ERROR_SUGGESTIONS.MALFORMED_BLOCK;
    case "LENGTH_MISMATCH":
      return ERROR_SUGGESTIONS.LENGTH_MISMATCH;
    case "UNKNOWN_SYMBOL":
      return ERROR_SUGGESTIONS.UNKNOWN_SYMBOL;
    case "PARSE_ERROR":
      return ERROR_SUGGESTIONS.MALFORMED_LINE;
    default:
      return undefined;
  }
}
