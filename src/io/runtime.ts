/**
 * Effect platform layer selection
 *
 * All file access goes through the `FileSystem` and `Path` services of
 * `@effect/platform`; this module supplies the Node.js implementation of
 * those services so callers never touch a runtime-specific API.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect } from "effect";

/**
 * Get the Effect platform layer providing FileSystem, Path and friends
 *
 * @returns Node.js platform layer
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run an Effect program that needs platform services, as a Promise
 *
 * @example
 * ```typescript
 * const size = await runWithPlatform(
 *   Effect.gen(function* () {
 *     const fs = yield* FileSystem.FileSystem;
 *     return (yield* fs.stat("report.txt")).size;
 *   })
 * );
 * ```
 */
export function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  return Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
}
