import { readFileSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  FileError,
  LengthMismatchError,
  MalformedBlockError,
  ParseError,
  UnknownSymbolError,
  ValidationError,
} from "../../../src/errors";
import { assembleRecord, Fasta36Parser, resolveScoringTable } from "../../../src/formats/fasta36/parser";
import { segmentBlocks } from "../../../src/formats/fasta36/segmenter";
import { splitLines } from "../../../src/io/stream-utils";
import { getScoringTable } from "../../../src/operations/core/scoring";
import type { BlockRejection, OutputRecord } from "../../../src/types";

const FIXTURES = join(process.cwd(), "test", "fixtures");
const PROTEIN = readFileSync(join(FIXTURES, "protein.m0.txt"), "utf8");
const NUCLEOTIDE = readFileSync(join(FIXTURES, "nucleotide.m0.txt"), "utf8");
const REJECTS = readFileSync(join(FIXTURES, "rejects.m0.txt"), "utf8");

async function collect(records: AsyncIterable<OutputRecord>): Promise<OutputRecord[]> {
  const result: OutputRecord[] = [];
  for await (const record of records) {
    result.push(record);
  }
  return result;
}

describe("Fasta36Parser", () => {
  test("parses a protein report", async () => {
    const records = await collect(new Fasta36Parser().parseString(PROTEIN));

    expect(records).toHaveLength(3);
    expect(records[0]).toEqual({
      queryId: "q1",
      subjectId: "s1",
      alignmentKind: "Smith-Waterman",
      alignmentLength: 30,
      percentIdentity: 76.7,
      percentSimilarity: 90,
      mismatches: 3,
      gaps: 2,
      gapOpens: 2,
      queryStart: 1,
      queryEnd: 29,
      subjectStart: 1,
      subjectEnd: 29,
      subjectStrand: "+",
      rawScore: 120,
      bitScore: 40.1,
      evalue: "1.2e-12",
      queryLength: 29,
      subjectLength: 30,
      queryAligned: "MKTAYIAKQR-QISFVKSHFSRQLEERLGL",
      subjectAligned: "MKTAHIAKQRLQISFV-SHFSKQLEDRLGL",
      matchPattern: "::::.::::: ::::: ::::.:::.::::",
      blockIndex: 0,
      lineNumber: 14,
    });
  });

  test("keeps aligned lengths equal to the reported length", async () => {
    const records = await collect(new Fasta36Parser().parseString(PROTEIN));

    for (const record of records) {
      expect(record.queryAligned).toHaveLength(record.alignmentLength);
      expect(record.subjectAligned).toHaveLength(record.alignmentLength);
      expect(record.matchPattern).toHaveLength(record.alignmentLength);
    }
  });

  test("repeat alignments produce their own records", async () => {
    const records = await collect(new Fasta36Parser().parseString(PROTEIN));

    expect(records.map((r) => [r.subjectId, r.queryStart, r.queryEnd])).toEqual([
      ["s1", 1, 29],
      ["s2", 3, 10],
      ["s2", 18, 22],
    ]);
    expect(records[2]?.matchPattern).toBe("::.::");
    expect(records[2]?.mismatches).toBe(1);
  });

  test("scoring table choice changes the match pattern only", async () => {
    const blosum50 = await collect(new Fasta36Parser().parseString(PROTEIN));
    const blosum62 = await collect(new Fasta36Parser({ scoringTable: "blosum62" }).parseString(PROTEIN));

    // K/H scores 0 in BLOSUM50 and -1 in BLOSUM62
    expect(blosum50[1]?.matchPattern).toBe(":: ::...");
    expect(blosum62[1]?.matchPattern).toBe(":: :: ..");
    expect(blosum62[1]?.mismatches).toBe(blosum50[1]?.mismatches);
  });

  test("parses nucleotide reports with several queries", async () => {
    const records = await collect(new Fasta36Parser().parseString(NUCLEOTIDE));

    expect(records).toHaveLength(2);
    const [reverse, forward] = records;
    expect(reverse).toMatchObject({
      queryId: "dna1",
      subjectId: "chrA",
      subjectStart: 11,
      subjectEnd: 30,
      subjectStrand: "-",
      mismatches: 1,
      matchPattern: "::::::::::::::::.:::",
    });
    expect(forward).toMatchObject({
      queryId: "dna2",
      subjectId: "chrB",
      queryAligned: "ACGT-ACGTACG",
      subjectAligned: "ACGTTACGTTCG",
      matchPattern: ":::: :::: ::",
      mismatches: 1,
      gaps: 1,
      gapOpens: 1,
      evalue: "0.0031",
    });
  });

  test("rejected blocks do not stop parsing", async () => {
    const rejections: BlockRejection[] = [];
    const parser = new Fasta36Parser({ onRejected: (rejection) => rejections.push(rejection) });
    const records = await collect(parser.parseString(REJECTS));

    expect(records.map((r) => [r.subjectId, r.blockIndex])).toEqual([
      ["good1", 0],
      ["good2", 4],
    ]);
    expect(rejections.map((r) => [r.blockIndex, r.subjectId, r.lineNumber])).toEqual([
      [1, "short1", 15],
      [2, "nodetail", 24],
      [3, "oddsym", 32],
    ]);
    expect(rejections[0]?.error).toBeInstanceOf(LengthMismatchError);
    expect(rejections[1]?.error).toBeInstanceOf(MalformedBlockError);
    expect(rejections[2]?.error).toBeInstanceOf(UnknownSymbolError);
    expect(rejections[2]?.error.message).toBe("Symbol 'J' at alignment column 3 is not in the BLOSUM50 alphabet");
  });

  test("default rejection handler warns", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      await collect(new Fasta36Parser().parseString(REJECTS));
      expect(warn).toHaveBeenCalledTimes(3);
      expect(warn).toHaveBeenNthCalledWith(
        1,
        "FASTA36 Warning (line 15): block 1 (q9 vs short1) rejected: " +
          "Reconstructed alignment has 8 columns, details line reports 10"
      );
    } finally {
      warn.mockRestore();
    }
  });

  test("strict mode throws the first rejection", async () => {
    const parser = new Fasta36Parser({ strict: true });
    await expect(collect(parser.parseString(REJECTS))).rejects.toThrow(LengthMismatchError);
  });

  test("input without alignments gives no records", async () => {
    const records = await collect(new Fasta36Parser().parseString("no hits found\n"));
    expect(records).toEqual([]);
    expect(await collect(new Fasta36Parser().parseString(""))).toEqual([]);
  });

  test("overlong lines are skipped with a warning", async () => {
    const report = PROTEIN.replace("Library: test.lib", `Library: ${"x".repeat(1_200_000)}`);
    const onWarning = vi.fn();
    const records = await collect(new Fasta36Parser({ onWarning }).parseString(report));

    expect(records.map((r) => [r.subjectId, r.lineNumber])).toEqual([
      ["s1", 14],
      ["s2", 30],
      ["s2", 40],
    ]);
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning).toHaveBeenCalledWith("Line too long (1200009 > 1000000), skipped", 5);
  });

  test("maxLineLength raises the line limit", async () => {
    const report = PROTEIN.replace("Library: test.lib", `Library: ${"x".repeat(1_200_000)}`);
    const onWarning = vi.fn();
    const parser = new Fasta36Parser({ maxLineLength: 2_000_000, onWarning });

    expect(await collect(parser.parseString(report))).toHaveLength(3);
    expect(parser.parseAll(report)).toHaveLength(3);
    expect(onWarning).not.toHaveBeenCalled();
  });

  test("line numbers can be left out", async () => {
    const [record] = await collect(new Fasta36Parser({ trackLineNumbers: false }).parseString(PROTEIN));
    expect(record).toBeDefined();
    expect(record).not.toHaveProperty("lineNumber");
  });

  test("parses line iterables and streams", async () => {
    const fromLines = await collect(new Fasta36Parser().parseLines(splitLines(PROTEIN)));
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        const bytes = new TextEncoder().encode(PROTEIN);
        controller.enqueue(bytes.slice(0, 100));
        controller.enqueue(bytes.slice(100));
        controller.close();
      },
    });
    const fromStream = await collect(new Fasta36Parser().parse(stream));

    expect(fromLines).toEqual(await collect(new Fasta36Parser().parseString(PROTEIN)));
    expect(fromStream).toEqual(fromLines);
  });

  test("parseAll matches the async parser", async () => {
    const parser = new Fasta36Parser();
    expect(parser.parseAll(PROTEIN)).toEqual(await collect(parser.parseString(PROTEIN)));
  });

  test("honors an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const parser = new Fasta36Parser({ signal: controller.signal });

    await expect(collect(parser.parseString(PROTEIN))).rejects.toThrow(ParseError);
  });

  test("rejects invalid options", () => {
    expect(() => new Fasta36Parser({ maxLineLength: -1 })).toThrow(ValidationError);
    expect(() => new Fasta36Parser({ maxLineLength: 0 })).toThrow("Invalid FASTA36 parser options");
  });
});

describe("Fasta36Parser.parseFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pairtab-parser-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("reads plain and gzip-compressed reports", async () => {
    const plain = join(dir, "search.m0.txt");
    const gzipped = join(dir, "search.m0.txt.gz");
    await writeFile(plain, PROTEIN);
    await writeFile(gzipped, gzipSync(new TextEncoder().encode(PROTEIN)));

    const parser = new Fasta36Parser();
    const fromPlain = await collect(parser.parseFile(plain));
    const fromGzip = await collect(parser.parseFile(gzipped));

    expect(fromPlain).toHaveLength(3);
    expect(fromGzip).toEqual(fromPlain);
  });

  test("missing files", async () => {
    await expect(collect(new Fasta36Parser().parseFile(join(dir, "missing.txt")))).rejects.toThrow(FileError);
  });
});

describe("assembleRecord", () => {
  test("validates the finished statistics", () => {
    const [block] = [...segmentBlocks(splitLines(PROTEIN))];
    if (!block) throw new Error("fixture has no blocks");

    const broken = {
      ...block,
      lines: block.lines.map((line) => line.replace("76.7% identity", "176.7% identity")),
    };
    const table = getScoringTable("blosum50");

    expect(() => assembleRecord(broken, { scoringTable: table })).toThrow("Invalid alignment statistics");
    expect(assembleRecord(broken, { scoringTable: table, skipValidation: true }).percentIdentity).toBe(176.7);
  });
});

describe("resolveScoringTable", () => {
  test("resolves names and auto", () => {
    expect(resolveScoringTable("auto", "nt").name).toBe("NUCLEOTIDE");
    expect(resolveScoringTable(undefined, "aa").name).toBe("BLOSUM50");
    expect(resolveScoringTable("blosum62", "nt").name).toBe("BLOSUM62");

    const table = getScoringTable("blosum62");
    expect(resolveScoringTable(table, "aa")).toBe(table);
  });
});
