import type { Block, HeadingLevel, ParseResult } from "./types";

const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5];

/**
 * True when the line opens the reference section. A bare "---" only counts
 * when the next non-empty line starts with an uppercase letter (an
 * author-led citation).
 */
function isReferenceMarker(stripped: string, lines: string[], index: number): boolean {
  if (stripped.toLowerCase() === "references") {
    return true;
  }
  if (stripped !== "---" || index + 1 >= lines.length) {
    return false;
  }
  const nextLine = lines.slice(index + 1).find((line) => line.trim() !== "");
  return nextLine !== undefined && /^\p{Lu}/u.test(nextLine.trim());
}

/**
 * A bare "---" is consumed as a section marker even when the citation
 * heuristic fails.
 */
function isMarkerLine(stripped: string, lines: string[], index: number): boolean {
  return stripped.toLowerCase() === "references" || (stripped === "---" && index + 1 < lines.length);
}

function headingLevel(stripped: string): number {
  let level = 0;
  while (level < stripped.length && stripped[level] === "#") {
    level++;
  }
  return level;
}

function clampLevel(level: number): HeadingLevel {
  const index = Math.min(Math.max(level, 1), HEADING_LEVELS.length) - 1;
  return HEADING_LEVELS[index];
}

/**
 * Formula text between double backticks, else between single backticks.
 */
export function extractFormula(line: string): string | null {
  const match = /``(.+?)``/.exec(line) ?? /`(.+?)`/.exec(line);
  return match ? match[1] : null;
}

export function parseText(rawText: string): ParseResult {
  const blocks: Block[] = [];
  const references: string[] = [];
  const lines = rawText.split("\n");

  let inReferences = false;
  let currentParagraph: string[] = [];

  const flushParagraph = () => {
    if (currentParagraph.length > 0) {
      blocks.push({ type: "paragraph", text: currentParagraph.join(" ") });
      currentParagraph = [];
    }
  };

  for (let i = 0; i < lines.length; i++) {
    const stripped = lines[i].trim();

    if (isMarkerLine(stripped, lines, i)) {
      if (isReferenceMarker(stripped, lines, i)) {
        inReferences = true;
      }
      flushParagraph();
      continue;
    }

    if (inReferences) {
      if (stripped) {
        references.push(stripped);
      }
      continue;
    }

    if (stripped.startsWith("#")) {
      flushParagraph();
      const level = headingLevel(stripped);
      const text = stripped.slice(level).trim();
      // A bare "#" run carries no heading text
      if (text) {
        blocks.push({ type: "heading", level: clampLevel(level), text });
      }
    } else if (stripped.includes("`")) {
      flushParagraph();
      const formula = extractFormula(stripped);
      if (formula !== null) {
        blocks.push({ type: "formula", text: formula });
      }
    } else if (stripped && !stripped.startsWith("---")) {
      currentParagraph.push(stripped);
    } else {
      flushParagraph();
    }
  }

  flushParagraph();

  return { blocks, references };
}
