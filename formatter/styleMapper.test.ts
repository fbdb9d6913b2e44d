import { describe, it, expect } from "vitest";
import { mapBodyBlocks, mapReferences, mapTitlePage } from "./styleMapper";
import type { Block } from "./types";

describe("mapBodyBlocks", () => {
  it("styles level 1-3 headings", () => {
    const blocks: Block[] = [
      { type: "heading", level: 1, text: "Introduction" },
      { type: "heading", level: 2, text: "Background" },
      { type: "heading", level: 3, text: "Early Work" },
    ];

    expect(mapBodyBlocks(blocks)).toEqual([
      { type: "paragraph", runs: [{ text: "Introduction", isBold: true }], alignment: "center" },
      { type: "paragraph", runs: [{ text: "Background", isBold: true }], alignment: "left" },
      { type: "paragraph", runs: [{ text: "Early Work", isBold: true, isItalic: true }], alignment: "left" },
    ]);
  });

  it("indents paragraphs and centres formulas", () => {
    const blocks: Block[] = [
      { type: "paragraph", text: "Body text." },
      { type: "formula", text: "a = b + c" },
    ];

    expect(mapBodyBlocks(blocks)).toEqual([
      { type: "paragraph", runs: [{ text: "Body text." }], firstLineIndent: 0.5 },
      { type: "paragraph", runs: [{ text: "a = b + c", isItalic: true }], alignment: "center" },
    ]);
  });

  describe("run-in headings", () => {
    it("merges a level 4 heading with the following paragraph", () => {
      const blocks: Block[] = [
        { type: "heading", level: 4, text: "Sampling" },
        { type: "paragraph", text: "We sampled forty schools." },
      ];

      expect(mapBodyBlocks(blocks)).toEqual([
        {
          type: "paragraph",
          runs: [
            { text: "Sampling. ", isBold: true, isItalic: false },
            { text: "We sampled forty schools." },
          ],
          leftIndent: 0.5,
          firstLineIndent: 0,
        },
      ]);
    });

    it("italicises a level 5 run-in heading", () => {
      const directives = mapBodyBlocks([
        { type: "heading", level: 5, text: "Pilot Sites" },
        { type: "paragraph", text: "Scores rose." },
      ]);

      expect(directives).toHaveLength(1);
      expect(directives[0].runs[0]).toEqual({ text: "Pilot Sites. ", isBold: true, isItalic: true });
    });

    it("consumes only the first following paragraph", () => {
      const directives = mapBodyBlocks([
        { type: "heading", level: 4, text: "Setup" },
        { type: "paragraph", text: "First." },
        { type: "paragraph", text: "Second." },
      ]);

      expect(directives).toHaveLength(2);
      expect(directives[1]).toEqual({ type: "paragraph", runs: [{ text: "Second." }], firstLineIndent: 0.5 });
    });
  });

  describe("standalone level 4-5 headings", () => {
    it("appends a period when followed by another heading", () => {
      const directives = mapBodyBlocks([
        { type: "heading", level: 4, text: "Methods" },
        { type: "heading", level: 5, text: "Details" },
      ]);

      expect(directives).toEqual([
        { type: "paragraph", runs: [{ text: "Methods.", isBold: true, isItalic: false }], leftIndent: 0.5 },
        { type: "paragraph", runs: [{ text: "Details.", isBold: true, isItalic: true }], leftIndent: 0.5 },
      ]);
    });

    it("does not double a trailing period", () => {
      const directives = mapBodyBlocks([{ type: "heading", level: 5, text: "Done." }]);

      expect(directives[0].runs).toEqual([{ text: "Done.", isBold: true, isItalic: true }]);
    });

    it("stays standalone before a formula", () => {
      const directives = mapBodyBlocks([
        { type: "heading", level: 4, text: "Model" },
        { type: "formula", text: "y = mx" },
      ]);

      expect(directives.map((d) => d.runs[0].text)).toEqual(["Model.", "y = mx"]);
    });
  });

  it("returns nothing for no blocks", () => {
    expect(mapBodyBlocks([])).toEqual([]);
  });
});

describe("mapReferences", () => {
  it("emits a centred heading then hanging-indent entries", () => {
    expect(mapReferences(["Adams, R. (2019). Title.", "   ", " Baker, S. (2020). Title. "])).toEqual([
      { type: "paragraph", runs: [{ text: "References", isBold: true }], alignment: "center" },
      { type: "paragraph", runs: [{ text: "Adams, R. (2019). Title." }], leftIndent: 0.5, firstLineIndent: -0.5 },
      { type: "paragraph", runs: [{ text: "Baker, S. (2020). Title." }], leftIndent: 0.5, firstLineIndent: -0.5 },
    ]);
  });

  it("emits nothing when every entry is blank", () => {
    expect(mapReferences([])).toEqual([]);
    expect(mapReferences(["", "  \t "])).toEqual([]);
  });
});

describe("mapTitlePage", () => {
  const blank = { type: "paragraph", runs: [] };

  it("lays out every title field in order", () => {
    const directives = mapTitlePage({
      title: "Shared Soil",
      author: "Sam Rivera",
      institution: "Riverside State University",
      course: "URB-410",
      instructor: "Dr. Ellis",
      date: "October 19, 2026",
    });

    expect(directives).toEqual([
      blank,
      blank,
      blank,
      { type: "paragraph", runs: [{ text: "Shared Soil", isBold: true }], alignment: "center" },
      blank,
      { type: "paragraph", runs: [{ text: "Sam Rivera" }], alignment: "center" },
      { type: "paragraph", runs: [{ text: "Riverside State University" }], alignment: "center" },
      { type: "paragraph", runs: [{ text: "URB-410" }], alignment: "center" },
      { type: "paragraph", runs: [{ text: "Dr. Ellis" }], alignment: "center" },
      { type: "paragraph", runs: [{ text: "October 19, 2026" }], alignment: "center" },
    ]);
  });

  it("skips absent and empty fields without reordering the rest", () => {
    const directives = mapTitlePage({ title: "T", date: "D", author: "", course: "C", instructor: "   " });

    expect(directives.slice(5).map((d) => d.runs[0].text)).toEqual(["C", "D"]);
    expect(directives).toHaveLength(7);
  });
});
