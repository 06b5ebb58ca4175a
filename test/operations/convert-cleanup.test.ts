/**
 * convertFile releases its input when the table cannot be written
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { FileError } from "../../src/errors";
import { convertFile } from "../../src/operations/convert";

const opened = vi.hoisted((): ReadableStream<Uint8Array>[] => []);

vi.mock("../../src/io/file-reader", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/io/file-reader")>();
  return {
    ...actual,
    createStream: async (...args: Parameters<typeof actual.createStream>) => {
      const stream = await actual.createStream(...args);
      opened.push(stream);
      return stream;
    },
  };
});

describe("convertFile input cleanup", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pairtab-cleanup-"));
    opened.length = 0;
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("cancels the input stream when the output cannot be opened", async () => {
    const input = join(dir, "search.m0.txt");
    await writeFile(input, "  1>>>q1 - 5 aa\n>>s1 (5 aa)\n");

    await expect(convertFile(input, join(dir, "missing", "hits.tsv"))).rejects.toThrow(FileError);

    expect(opened).toHaveLength(1);
    const stream = opened[0];
    if (!stream) throw new Error("input stream was not opened");
    expect(stream.locked).toBe(false);
    expect((await stream.getReader().read()).done).toBe(true);
  });
});
