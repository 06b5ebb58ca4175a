/**
 * Tests for file reading on the Effect platform layer
 */

import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { gzipSync } from "fflate";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { createStream, exists, FileReader, getMetadata, getSize, readToString } from "../../src/io/file-reader";
import { readLines } from "../../src/io/stream-utils";

const FIXTURES_DIR = join(process.cwd(), "test", "io", "tmp-reader");
const TEST_FILES = {
  small: join(FIXTURES_DIR, "small.txt"),
  empty: join(FIXTURES_DIR, "empty.txt"),
  utf8: join(FIXTURES_DIR, "utf8.txt"),
  lines: join(FIXTURES_DIR, "lines.txt"),
  gzipped: join(FIXTURES_DIR, "report.txt.gz"),
  gzippedNoExt: join(FIXTURES_DIR, "report-gz.txt"),
  nonexistent: join(FIXTURES_DIR, "nonexistent.txt"),
  directory: join(FIXTURES_DIR, "test-directory"),
};

beforeAll(() => {
  mkdirSync(FIXTURES_DIR, { recursive: true });
  writeFileSync(TEST_FILES.small, "Hello, World!");
  writeFileSync(TEST_FILES.empty, "");
  writeFileSync(TEST_FILES.utf8, "Hello, 世界!");
  writeFileSync(TEST_FILES.lines, "Line 1\nLine 2\r\nLine 3\rLine 4\n");
  const compressed = gzipSync(new TextEncoder().encode(">>s1 (5 aa)\nq1     MKTAY\n"));
  writeFileSync(TEST_FILES.gzipped, compressed);
  writeFileSync(TEST_FILES.gzippedNoExt, compressed);
  mkdirSync(TEST_FILES.directory, { recursive: true });
});

afterAll(() => {
  rmSync(FIXTURES_DIR, { recursive: true, force: true });
});

async function collectLines(stream: ReadableStream<Uint8Array>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of readLines(stream)) {
    lines.push(line);
  }
  return lines;
}

describe("exists", () => {
  test("regular files", async () => {
    expect(await exists(TEST_FILES.small)).toBe(true);
    expect(await exists(TEST_FILES.empty)).toBe(true);
  });

  test("missing paths and directories", async () => {
    expect(await exists(TEST_FILES.nonexistent)).toBe(false);
    expect(await exists(TEST_FILES.directory)).toBe(false);
  });

  test("invalid paths", async () => {
    await expect(exists("")).rejects.toThrow(FileError);
    await expect(exists("bad\0path")).rejects.toThrow("Invalid file path");
  });
});

describe("getSize and getMetadata", () => {
  test("reports byte sizes", async () => {
    expect(await getSize(TEST_FILES.small)).toBe(13);
    expect(await getSize(TEST_FILES.empty)).toBe(0);
    // 7 ASCII bytes, two 3-byte characters and "!"
    expect(await getSize(TEST_FILES.utf8)).toBe(14);
  });

  test("metadata carries the path", async () => {
    const metadata = await getMetadata(TEST_FILES.small);
    expect(metadata.path).toBe(TEST_FILES.small);
    expect(metadata.size).toBe(13);
    expect(metadata.lastModified).toBeInstanceOf(Date);
  });

  test("missing files", async () => {
    await expect(getMetadata(TEST_FILES.nonexistent)).rejects.toThrow(FileError);
  });
});

describe("readToString", () => {
  test("reads text", async () => {
    expect(await readToString(TEST_FILES.small)).toBe("Hello, World!");
    expect(await readToString(TEST_FILES.utf8)).toBe("Hello, 世界!");
    expect(await readToString(TEST_FILES.empty)).toBe("");
  });

  test("decompresses gzip by content", async () => {
    const expected = ">>s1 (5 aa)\nq1     MKTAY\n";
    expect(await readToString(TEST_FILES.gzipped)).toBe(expected);
    expect(await readToString(TEST_FILES.gzippedNoExt)).toBe(expected);
  });

  test("enforces the size limit", async () => {
    await expect(readToString(TEST_FILES.small, { maxFileSize: 5 })).rejects.toThrow(
      "File too large: 13 bytes exceeds limit of 5 bytes"
    );
  });

  test("validates options", async () => {
    await expect(readToString(TEST_FILES.small, { bufferSize: 10 })).rejects.toThrow(
      "Invalid file reader options"
    );
  });
});

describe("createStream", () => {
  test("streams lines with mixed endings", async () => {
    const stream = await createStream(TEST_FILES.lines, { bufferSize: 1024 });
    expect(await collectLines(stream)).toEqual(["Line 1", "Line 2", "Line 3", "Line 4"]);
  });

  test("decompresses .gz files", async () => {
    const stream = await createStream(TEST_FILES.gzipped);
    expect(await collectLines(stream)).toEqual([">>s1 (5 aa)", "q1     MKTAY"]);
  });

  test("can leave compressed data alone", async () => {
    const stream = await createStream(TEST_FILES.gzipped, { autoDecompress: false });
    const reader = stream.getReader();
    const { value } = await reader.read();
    await reader.cancel();

    expect(value?.[0]).toBe(0x1f);
    expect(value?.[1]).toBe(0x8b);
  });

  test("missing files", async () => {
    await expect(createStream(TEST_FILES.nonexistent)).rejects.toThrow("File not found");
  });
});

describe("FileReader", () => {
  test("groups the reader functions", () => {
    expect(FileReader.readToString).toBe(readToString);
    expect(FileReader.createStream).toBe(createStream);
    expect(FileReader.exists).toBe(exists);
  });
});
