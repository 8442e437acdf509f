import { describe, it, expect } from "vitest";
import { chunkText } from "../chunker";

describe("chunkText", () => {
  it("returns nothing for empty or whitespace-only input", () => {
    expect(chunkText("")).toEqual([]);
    expect(chunkText("   ")).toEqual([]);
    expect(chunkText("\n\n  \n\n")).toEqual([]);
  });

  it("returns a short single paragraph as one trimmed chunk", () => {
    expect(chunkText("  Just one short line.  ")).toEqual(["Just one short line."]);
  });

  it("keeps paragraphs that fit together, joined by a blank line", () => {
    const text = "Alpha project kicks off next week.\n\nBob will own the budget review.";
    expect(chunkText(text, 500)).toEqual([
      "Alpha project kicks off next week.\n\nBob will own the budget review.",
    ]);
  });

  it("drops empty paragraphs between blank lines", () => {
    expect(chunkText("First.\n\n\n\n   \n\nSecond.")).toEqual(["First.\n\nSecond."]);
  });

  it("starts the next chunk with the trailing overlap of the previous one", () => {
    const text = "Alice opened the meeting.\n\nBob reviewed the budget.";
    expect(chunkText(text, 40, 8)).toEqual([
      "Alice opened the meeting.",
      "meeting. Bob reviewed the budget.",
    ]);
  });

  it("carries the whole previous buffer when it is shorter than the overlap", () => {
    expect(chunkText("short one\n\nsecond part", 10, 50)).toEqual([
      "short one",
      "short one second part",
    ]);
  });

  it("carries nothing with a zero overlap", () => {
    const text = "Alice opened the meeting.\n\nBob reviewed the budget.";
    expect(chunkText(text, 40, 0)).toEqual([
      "Alice opened the meeting.",
      "Bob reviewed the budget.",
    ]);
  });

  it("does not split a paragraph longer than the chunk size", () => {
    const long = "x".repeat(25);
    expect(chunkText(long, 10, 0)).toEqual([long]);
    expect(chunkText(`tiny\n\n${long}`, 10, 0)).toEqual(["tiny", long]);
  });

  it("carries an astral character whole across a chunk boundary", () => {
    const text = "Action item done \u{1F680}\n\nNext topic: budget.";
    expect(chunkText(text, 20, 1)).toEqual([
      "Action item done \u{1F680}",
      "\u{1F680} Next topic: budget.",
    ]);
  });

  it("measures chunk size in code points, not UTF-16 units", () => {
    const smiles = "\u{1F600}".repeat(6);
    expect(chunkText(`${smiles}\n\n${smiles}`, 12, 0)).toEqual([`${smiles}\n\n${smiles}`]);
    expect(chunkText(`${smiles}\n\n${smiles}`, 11, 0)).toEqual([smiles, smiles]);
  });

  it("overlaps every chunk after the first by at most `overlap` characters", () => {
    const paragraphs = Array.from(
      { length: 12 },
      (_, i) => `Item ${i}: the team discussed topic number ${i} in some detail.`,
    );
    const overlap = 20;
    const chunks = chunkText(paragraphs.join("\n\n"), 120, overlap);

    expect(chunks.length).toBeGreaterThan(1);
    for (let i = 1; i < chunks.length; i++) {
      const tail = chunks[i - 1].slice(-overlap).trimStart();
      expect(tail.length).toBeLessThanOrEqual(overlap);
      expect(chunks[i].startsWith(tail)).toBe(true);
    }
    // every paragraph survives somewhere
    for (const p of paragraphs) {
      expect(chunks.some((c) => c.includes(p))).toBe(true);
    }
  });
});
