import type { Block, HeadingBlock, ParagraphDirective, TitleData } from "./types";
import { INDENT_INCHES } from "./documentStyle";

const TITLE_PAGE_KEYS = ["author", "institution", "course", "instructor", "date"] as const;

const blankLine = (): ParagraphDirective => ({ type: "paragraph", runs: [] });

function mapHeading(block: HeadingBlock): ParagraphDirective {
  const { level, text } = block;
  switch (level) {
    case 1:
      return { type: "paragraph", runs: [{ text, isBold: true }], alignment: "center" };
    case 2:
      return { type: "paragraph", runs: [{ text, isBold: true }], alignment: "left" };
    case 3:
      return { type: "paragraph", runs: [{ text, isBold: true, isItalic: true }], alignment: "left" };
    default:
      // Standalone level 4/5 heading, closed with a period
      return {
        type: "paragraph",
        runs: [{ text: text.endsWith(".") ? text : `${text}.`, isBold: true, isItalic: level === 5 }],
        leftIndent: INDENT_INCHES,
      };
  }
}

/**
 * Maps body blocks to paragraph directives. Level 4 and 5 headings directly
 * followed by a paragraph are merged with it into one run-in paragraph, so
 * the cursor sometimes advances by two.
 */
export function mapBodyBlocks(blocks: readonly Block[]): ParagraphDirective[] {
  const directives: ParagraphDirective[] = [];
  let i = 0;

  while (i < blocks.length) {
    const block = blocks[i];
    const next = i + 1 < blocks.length ? blocks[i + 1] : undefined;

    if (block.type === "heading") {
      if (block.level >= 4 && next?.type === "paragraph") {
        directives.push({
          type: "paragraph",
          runs: [
            { text: `${block.text}. `, isBold: true, isItalic: block.level === 5 },
            { text: next.text },
          ],
          leftIndent: INDENT_INCHES,
          firstLineIndent: 0,
        });
        i += 2;
        continue;
      }
      directives.push(mapHeading(block));
    } else if (block.type === "paragraph") {
      directives.push({ type: "paragraph", runs: [{ text: block.text }], firstLineIndent: INDENT_INCHES });
    } else {
      directives.push({ type: "paragraph", runs: [{ text: block.text, isItalic: true }], alignment: "center" });
    }

    i++;
  }

  return directives;
}

export function mapReferences(references: readonly string[]): ParagraphDirective[] {
  const entries = references.map((ref) => ref.trim()).filter((ref) => ref.length > 0);
  if (entries.length === 0) {
    return [];
  }

  return [
    { type: "paragraph", runs: [{ text: "References", isBold: true }], alignment: "center" },
    ...entries.map(
      (entry): ParagraphDirective => ({
        type: "paragraph",
        runs: [{ text: entry }],
        leftIndent: INDENT_INCHES,
        firstLineIndent: -INDENT_INCHES,
      })
    ),
  ];
}

/**
 * Title page lines. Optional fields are trimmed, and whitespace-only values
 * are skipped like absent ones.
 */
export function mapTitlePage(titleData: TitleData): ParagraphDirective[] {
  const directives: ParagraphDirective[] = [blankLine(), blankLine(), blankLine()];

  directives.push({ type: "paragraph", runs: [{ text: titleData.title, isBold: true }], alignment: "center" });
  directives.push(blankLine());

  for (const key of TITLE_PAGE_KEYS) {
    const value = titleData[key]?.trim();
    if (value) {
      directives.push({ type: "paragraph", runs: [{ text: value }], alignment: "center" });
    }
  }

  return directives;
}
