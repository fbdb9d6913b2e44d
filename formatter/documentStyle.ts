// APA 7th edition page setup

export const FONT_FAMILY = "Times New Roman";

// 12pt = 24 half-points
export const FONT_SIZE_HALF_POINTS = 24;

// Double spacing, in 240ths of a line
export const LINE_SPACING = 480;

export const MARGIN_INCHES = 1;

// Paragraph, run-in heading and hanging reference indent
export const INDENT_INCHES = 0.5;

// US Letter, in twips
export const PAGE_WIDTH_TWIPS = 12240;
export const PAGE_HEIGHT_TWIPS = 15840;

const TWIPS_PER_INCH = 1440;

export function inchesToTwips(inches: number): number {
  return Math.round(inches * TWIPS_PER_INCH);
}
