/**
 * File reading utilities built on Effect Platform
 *
 * Every operation is an Effect program run against the platform layer from
 * `./runtime`, exposed through a plain Promise-based API. Gzip-compressed
 * reports are decompressed transparently.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Option, Stream } from "effect";
import {
  CompressionDetector,
  createStream as createGunzipStream,
  decompress,
} from "../compression/gzip";
import { FileError } from "../errors";
import type { FileMetadata, FileReaderOptions } from "../types";
import { FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";

// Module-level constants for default options
const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  maxFileSize: 2_147_483_648, // 2GB
  autoDecompress: true,
};

const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({ expected: "a path without NUL bytes", actual: "NUL byte" });
  }
  return true;
});

/**
 * Check if a file exists and is a regular file
 *
 * @param path File path to check
 * @returns Promise resolving to true if the path is an existing file
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const metadata = await getMetadata(path);
  return metadata.size;
}

/**
 * Get file metadata
 *
 * @throws {FileError} If file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    const mtime = Option.getOrUndefined(info.mtime);

    return {
      path: validatedPath,
      size: Number(info.size),
      ...(mtime && { lastModified: mtime }),
    };
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * @param path File path to read
 * @param options Reading options
 * @returns Promise resolving to ReadableStream of (decompressed) file data
 * @throws {FileError} If file cannot be opened or is larger than `maxFileSize`
 *
 * @example
 * ```typescript
 * const stream = await createStream("hits.m0.txt.gz");
 * for await (const line of readLines(stream)) { ... }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  if (!(await exists(validatedPath))) {
    throw new FileError(
      `File not found: ${validatedPath}. Please check the file path and try again.`,
      validatedPath,
      "open"
    );
  }
  await validateFileSize(validatedPath, mergedOptions);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      chunkSize: mergedOptions.bufferSize,
    });
    return Stream.toReadableStream(effectStream);
  });

  let stream: ReadableStream<Uint8Array>;
  try {
    stream = await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }

  if (mergedOptions.autoDecompress && CompressionDetector.fromExtension(validatedPath) === "gzip") {
    return stream.pipeThrough(createGunzipStream());
  }
  return stream;
}

/**
 * Read an entire file to a string, decompressing gzip content
 *
 * @throws {FileError} If the file cannot be read or is too large
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);
  await validateFileSize(validatedPath, mergedOptions);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFile(validatedPath);
  });

  let bytes: Uint8Array;
  try {
    bytes = await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }

  if (mergedOptions.autoDecompress && CompressionDetector.fromMagicBytes(bytes) === "gzip") {
    bytes = decompress(bytes);
  }
  return new TextDecoder("utf-8").decode(bytes);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

async function validateFileSize(
  validatedPath: string,
  mergedOptions: Required<FileReaderOptions>
): Promise<number> {
  const fileSize = await getSize(validatedPath);
  if (fileSize > mergedOptions.maxFileSize) {
    throw new FileError(
      `File too large: ${fileSize} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
      validatedPath,
      "read"
    );
  }
  return fileSize;
}

/**
 * Validate file path using ArkType
 * All validation failures surface as FileError
 */
function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}

export const FileReader = {
  exists,
  getSize,
  getMetadata,
  createStream,
  readToString,
} as const;
