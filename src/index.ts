/**
 * pairtab - FASTA36 pairwise alignment reports to tables
 *
 * Parses the `-m 0` output of the FASTA36 search programs into typed
 * alignment records and writes them as delimited tables.
 */

// Compression
export { CompressionDetector, type CompressionFormat, decompress } from "./compression/gzip";
// Error types
export {
  BufferError,
  CompressionError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  LengthMismatchError,
  MalformedBlockError,
  MatrixError,
  PairtabError,
  ParseError,
  StreamError,
  UnknownSymbolError,
  ValidationError,
} from "./errors";
// Base parser
export { AbstractParser, type ResolvedParserOptions } from "./formats/abstract-parser";
// FASTA36 reports
export * from "./formats/fasta36";
// I/O
export {
  createStream,
  exists,
  FileReader,
  getMetadata,
  getSize,
  readToString,
} from "./io/file-reader";
export { type FileWriteHandle, openForWriting, writeString } from "./io/file-writer";
export { type LineSource, readLines, splitLines, toLines } from "./io/stream-utils";
// Conversion
export {
  type ConversionStats,
  type ConvertOptions,
  ConvertOptionsSchema,
  convertFile,
  convertReport,
} from "./operations/convert";
// Match patterns
export {
  classifyColumn,
  countMutations,
  generateMatchPattern,
  MatchSymbol,
  type MutationCounts,
} from "./operations/core/match-pattern";
// Scoring
export {
  createNucleotideTable,
  defaultTableFor,
  getScoringTable,
  isScoringTableName,
  loadScoringTable,
  type MatrixFile,
  MatrixFileSchema,
  type NucleotideTableOptions,
  type ScoringTable,
  type ScoringTableName,
  SubstitutionMatrix,
} from "./operations/core/scoring";
// Core types
export type {
  AlignedSequencePair,
  AlignmentBlock,
  AlignmentMetadata,
  BlockRejection,
  FileMetadata,
  FileReaderOptions,
  OutputRecord,
  ParserOptions,
  QueryContext,
  ResidueUnit,
  Strand,
  SubjectContext,
  WriteOptions,
} from "./types";
export { AlignmentMetadataSchema, OneBasedCoordinate, PercentSchema } from "./types";
