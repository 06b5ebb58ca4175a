/**
 * File writing operations using Effect Platform
 *
 * Promise-based wrappers around `FileSystem` programs; the Effect plumbing
 * stays inside this module.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { WriteOptions } from "../types";
import { runWithPlatform } from "./runtime";

/**
 * Handle for writing to a file multiple times within a scope
 */
export interface FileWriteHandle {
  /**
   * Write string content to the file
   */
  writeString(content: string): Promise<void>;
}

/**
 * Make sure the parent directory of a path exists
 */
const ensureParentDirectory = (path: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const parentDir = pathService.dirname(path);
    if (!(yield* fs.exists(parentDir))) {
      yield* fs.makeDirectory(parentDir, { recursive: true });
    }
  });

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @param path - File path to write to
 * @param content - String content to write
 * @param options - Write options
 * @throws {FileError} When write operation fails
 *
 * @example
 * ```typescript
 * await writeString("hits.tsv", table);
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const data = new TextEncoder().encode(content);

  const program = Effect.gen(function* () {
    if (options.createDirectories) {
      yield* ensureParentDirectory(path);
    }
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(path, data);
  });

  try {
    await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Open file for writing and run a callback with a write handle
 *
 * The file is truncated first and closed when the callback settles, via
 * Effect's scoped resource management.
 *
 * @example
 * ```typescript
 * await openForWriting("hits.tsv", async (handle) => {
 *   for await (const row of rows) {
 *     await handle.writeString(row + "\n");
 *   }
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>,
  options: WriteOptions = {}
): Promise<T> {
  const encoder = new TextEncoder();

  const program = Effect.gen(function* () {
    if (options.createDirectories) {
      yield* ensureParentDirectory(path);
    }
    const fs = yield* FileSystem.FileSystem;
    const file = yield* fs.open(path, { flag: "w" });

    const handle: FileWriteHandle = {
      writeString: (content) => Effect.runPromise(file.writeAll(encoder.encode(content))),
    };

    // Callback failures are carried out of the Effect untouched
    return yield* Effect.promise(() =>
      callback(handle).then(
        (value) => ({ ok: true as const, value }),
        (error: unknown) => ({ ok: false as const, error })
      )
    );
  });

  let outcome: { ok: true; value: T } | { ok: false; error: unknown };
  try {
    outcome = await runWithPlatform(program.pipe(Effect.scoped));
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }

  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}
