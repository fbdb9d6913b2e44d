export type HeadingLevel = 1 | 2 | 3 | 4 | 5;

export interface HeadingBlock {
  type: "heading";
  level: HeadingLevel;
  text: string;
}

export interface ParagraphBlock {
  type: "paragraph";
  text: string;
}

export interface FormulaBlock {
  type: "formula";
  text: string;
}

export type Block = HeadingBlock | ParagraphBlock | FormulaBlock;

export interface ParseResult {
  blocks: Block[];
  references: string[];
}

export type Alignment = "left" | "center" | "right";

export interface DirectiveRun {
  text: string;
  isBold?: boolean;
  isItalic?: boolean;
}

export interface ParagraphDirective {
  type: "paragraph";
  runs: DirectiveRun[]; // empty for a blank line
  alignment?: Alignment;
  leftIndent?: number; // inches
  firstLineIndent?: number; // inches, negative for a hanging indent
}

export interface PageBreakDirective {
  type: "pageBreak";
}

export type StyleDirective = ParagraphDirective | PageBreakDirective;

export interface TitleData {
  title: string;
  author?: string;
  institution?: string;
  course?: string;
  instructor?: string;
  date?: string;
}

// Paragraphs read back from a rendered .docx

export interface DocxRun {
  text: string;
  isBold: boolean;
  isItalic: boolean;
}

export interface DocxParagraph {
  runs: DocxRun[];
  text: string;
  alignment?: string;
  leftIndent?: number; // twips
  firstLineIndent?: number; // twips, negative for a hanging indent
  hasPageBreak: boolean;
}
