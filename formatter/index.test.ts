import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { createAcademicDocument, extractDocxParagraphs, TitleValidationError } from "./index";

const PAPER = [
  "# Introduction",
  "## Background",
  "### Early Developments",
  "Technology in classrooms has grown steadily.",
  "",
  "#### Research on Early Computing",
  "##### Findings from Pilot Programs",
  "Pilot schools reported higher scores.",
  "",
  "``Impact = (Post_Score - Pre_Score) / Pre_Score × 100``",
  "Current trends include adaptive learning.",
  "",
  "---",
  "Adams, R. (2019). First. Example Press.",
  "Baker, S. (2020). Second. Example Press.",
  "Chen, L. (2021). Third. Example Press.",
  "Diaz, M. (2022). Fourth. Example Press.",
].join("\n");

describe("createAcademicDocument", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "academic-formatter-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes the formatted paper", async () => {
    const outputPath = path.join(dir, "paper.docx");

    const result = await createAcademicDocument({ title: "Shared Soil", author: "Sam Rivera" }, PAPER, outputPath);

    expect(result.outputPath).toBe(outputPath);
    expect(result.blocks).toHaveLength(9);
    expect(result.references).toHaveLength(4);
    expect(result.bytes).toBe(fs.statSync(outputPath).size);

    const paragraphs = await extractDocxParagraphs(fs.readFileSync(outputPath));
    const texts = paragraphs.map((p) => (p.hasPageBreak ? "BREAK" : p.text));

    expect(texts).toEqual([
      "",
      "",
      "",
      "Shared Soil",
      "",
      "Sam Rivera",
      "BREAK",
      "Introduction",
      "Background",
      "Early Developments",
      "Technology in classrooms has grown steadily.",
      "Research on Early Computing.",
      "Findings from Pilot Programs. Pilot schools reported higher scores.",
      "Impact = (Post_Score - Pre_Score) / Pre_Score × 100",
      "Current trends include adaptive learning.",
      "BREAK",
      "References",
      "Adams, R. (2019). First. Example Press.",
      "Baker, S. (2020). Second. Example Press.",
      "Chen, L. (2021). Third. Example Press.",
      "Diaz, M. (2022). Fourth. Example Press.",
    ]);
  });

  it("validates the title before writing anything", async () => {
    const outputPath = path.join(dir, "paper.docx");

    await expect(createAcademicDocument({ author: "Sam Rivera" }, PAPER, outputPath)).rejects.toBeInstanceOf(
      TitleValidationError
    );
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it("formats empty text as a title page only", async () => {
    const outputPath = path.join(dir, "empty.docx");

    const result = await createAcademicDocument({ title: "T" }, "", outputPath);

    expect(result.blocks).toEqual([]);
    expect(result.references).toEqual([]);
    expect(await extractDocxParagraphs(fs.readFileSync(outputPath))).toHaveLength(6);
  });
});
