import { readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test, vi } from "vitest";
import {
  BlockSegmenter,
  isFooterLine,
  parseQueryTitle,
  parseSubjectHeader,
  segmentBlocks,
  segmentBlocksAsync,
} from "../../../src/formats/fasta36/segmenter";
import { splitLines } from "../../../src/io/stream-utils";

const FIXTURES = join(process.cwd(), "test", "fixtures");
const protein = splitLines(readFileSync(join(FIXTURES, "protein.m0.txt"), "utf8"));
const nucleotide = splitLines(readFileSync(join(FIXTURES, "nucleotide.m0.txt"), "utf8"));

describe("header lines", () => {
  test("parses query titles", () => {
    expect(parseQueryTitle("  1>>>q1 test query protein - 29 aa", 4)).toEqual({
      id: "q1",
      description: "test query protein",
      length: 29,
      unit: "aa",
      lineNumber: 4,
    });
    expect(parseQueryTitle("  2>>>dna2 - 12 nt")).toEqual({ id: "dna2", length: 12, unit: "nt" });
  });

  test("parses subject headers", () => {
    expect(parseSubjectHeader(">>sp|P09488|GSTM1_HUMAN Glutathione S-transferase Mu 1  (218 aa)")).toEqual({
      id: "sp|P09488|GSTM1_HUMAN",
      description: "Glutathione S-transferase Mu 1",
      length: 218,
      unit: "aa",
    });
    expect(parseSubjectHeader(">>chrB          (15 nt)")).toEqual({ id: "chrB", length: 15, unit: "nt" });
  });

  test("other lines are not headers", () => {
    expect(parseQueryTitle(">>>q1, 29 aa vs test.lib library")).toBeUndefined();
    expect(parseSubjectHeader(">>>q1, 29 aa vs test.lib library")).toBeUndefined();
    expect(parseSubjectHeader(">>><<<")).toBeUndefined();
    expect(parseSubjectHeader("s1 subject protein one   (  30)  120 40.1 1.2e-12")).toBeUndefined();
  });

  test("recognizes footers", () => {
    expect(isFooterLine(">>><<<")).toBe(true);
    expect(isFooterLine("29 residues in   1 query   sequences")).toBe(true);
    expect(isFooterLine("Function used was SSEARCH [36.3.8i May, 2023]")).toBe(true);
    expect(isFooterLine("       42 residues in      2 sequences")).toBe(false);
  });
});

describe("segmentBlocks", () => {
  test("one block per subject header and repeat marker", () => {
    const blocks = [...segmentBlocks(protein)];

    expect(blocks).toHaveLength(3);
    expect(blocks.map((block) => block.index)).toEqual([0, 1, 2]);
    expect(blocks.map((block) => block.subject.id)).toEqual(["s1", "s2", "s2"]);
    expect(blocks.map((block) => block.isRepeat)).toEqual([false, false, true]);
    expect(blocks.map((block) => block.startLine)).toEqual([14, 30, 40]);
    expect(blocks.map((block) => block.lines.length)).toEqual([16, 10, 9]);
  });

  test("attaches query and subject context", () => {
    const [first, , repeat] = [...segmentBlocks(protein)];

    expect(first?.query).toEqual({
      id: "q1",
      description: "test query protein",
      length: 29,
      unit: "aa",
      lineNumber: 4,
    });
    expect(first?.lines[0]).toBe(">>s1 subject protein one                                  (30 aa)");
    expect(repeat?.lines[0]).toBe(">--");
    expect(repeat?.subject.length).toBe(12);
  });

  test("query titles reset the context", () => {
    const blocks = [...segmentBlocks(nucleotide)];

    expect(blocks.map((block) => [block.query.id, block.subject.id])).toEqual([
      ["dna1", "chrA"],
      ["dna2", "chrB"],
    ]);
    expect(blocks[1]?.query.unit).toBe("nt");
  });

  test("footer lines end the last block", () => {
    const blocks = [...segmentBlocks(protein)];
    expect(blocks[2]?.lines.at(-1)).toBe("");
    expect(blocks[2]?.lines).not.toContain(">>><<<");
  });

  test("text without headers has no blocks", () => {
    expect([...segmentBlocks(["no alignments here", "", "at all"])]).toEqual([]);
    expect([...segmentBlocks([])]).toEqual([]);
  });

  test("subject headers before any query title are ignored", () => {
    const lines = [">>s1 desc (10 aa)", " s-w opt: 1 bits: 1.0 E(1): 1"];
    expect([...segmentBlocks(lines)]).toEqual([]);
  });

  test("a repeat marker without a subject is reported", () => {
    const onWarning = vi.fn();
    const blocks = [...segmentBlocks(["  1>>>q - 5 aa", ">--", "q     AAAAA"], { onWarning })];

    expect(blocks).toEqual([]);
    expect(onWarning).toHaveBeenCalledWith("'>--' marker without a preceding subject header", 2);
  });

  test("overlong lines are skipped with a warning", () => {
    const onWarning = vi.fn();
    const lines = ["  1>>>q - 5 aa", ">>s (5 aa)", "x".repeat(50), "end"];
    const [block] = [...segmentBlocks(lines, { maxLineLength: 20, onWarning })];

    expect(block?.lines).toEqual([">>s (5 aa)", "end"]);
    expect(onWarning).toHaveBeenCalledWith("Line too long (50 > 20), skipped", 3);
  });

  test("is lazy", () => {
    const seen: string[] = [];
    function* source(): Generator<string> {
      for (const line of protein) {
        seen.push(line);
        yield line;
      }
    }

    const iterator = segmentBlocks(source());
    const first = iterator.next();

    expect(first.done).toBe(false);
    // The first block closes when the second subject header is read
    expect(seen).toHaveLength(30);
  });
});

describe("segmentBlocksAsync", () => {
  test("matches the synchronous segmenter", async () => {
    async function* source(): AsyncGenerator<string> {
      yield* protein;
    }

    const blocks = [];
    for await (const block of segmentBlocksAsync(source())) {
      blocks.push(block);
    }
    expect(blocks).toEqual([...segmentBlocks(protein)]);
  });
});

describe("BlockSegmenter", () => {
  test("push returns the block a line closes", () => {
    const segmenter = new BlockSegmenter();

    expect(segmenter.push("  1>>>q - 5 aa")).toBeUndefined();
    expect(segmenter.push(">>s1 (5 aa)")).toBeUndefined();
    expect(segmenter.push("body")).toBeUndefined();

    const closed = segmenter.push(">>s2 (7 aa)");
    expect(closed?.subject.id).toBe("s1");
    expect(closed?.lines).toEqual([">>s1 (5 aa)", "body"]);

    expect(segmenter.finish()?.subject.id).toBe("s2");
    expect(segmenter.finish()).toBeUndefined();
    expect(segmenter.linesRead).toBe(4);
  });
});
