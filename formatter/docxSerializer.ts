import type { DirectiveRun, ParagraphDirective, StyleDirective } from "./types";
import {
  inchesToTwips,
  MARGIN_INCHES,
  PAGE_HEIGHT_TWIPS,
  PAGE_WIDTH_TWIPS,
} from "./documentStyle";

export const WORDPROCESSING_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
export const RELATIONSHIPS_NS = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";

/**
 * Escapes XML special characters
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function serializeRun(run: DirectiveRun, indentStr: string): string {
  let xml = `${indentStr}<w:r>\n`;

  if (run.isBold || run.isItalic) {
    xml += `${indentStr}  <w:rPr>\n`;
    if (run.isBold) {
      xml += `${indentStr}    <w:b/>\n`;
    }
    if (run.isItalic) {
      xml += `${indentStr}    <w:i/>\n`;
    }
    xml += `${indentStr}  </w:rPr>\n`;
  }

  // Keep the run-in separator space after the heading period
  xml += `${indentStr}  <w:t xml:space="preserve">${escapeXml(run.text)}</w:t>\n`;
  xml += `${indentStr}</w:r>\n`;
  return xml;
}

export function serializeParagraph(para: ParagraphDirective, indent: number): string {
  const indentStr = " ".repeat(indent);
  let xml = `${indentStr}<w:p>\n`;

  const hasIndent = para.leftIndent !== undefined || para.firstLineIndent !== undefined;
  if (para.alignment || hasIndent) {
    xml += `${indentStr}  <w:pPr>\n`;
    if (hasIndent) {
      let attrs = "";
      if (para.leftIndent !== undefined) {
        attrs += ` w:left="${inchesToTwips(para.leftIndent)}"`;
      }
      if (para.firstLineIndent !== undefined) {
        // A negative first line is expressed as a hanging indent
        attrs +=
          para.firstLineIndent < 0
            ? ` w:hanging="${inchesToTwips(-para.firstLineIndent)}"`
            : ` w:firstLine="${inchesToTwips(para.firstLineIndent)}"`;
      }
      xml += `${indentStr}    <w:ind${attrs}/>\n`;
    }
    if (para.alignment) {
      xml += `${indentStr}    <w:jc w:val="${para.alignment}"/>\n`;
    }
    xml += `${indentStr}  </w:pPr>\n`;
  }

  for (const run of para.runs) {
    xml += serializeRun(run, indentStr + "  ");
  }

  xml += `${indentStr}</w:p>\n`;
  return xml;
}

function serializePageBreak(indent: number): string {
  const indentStr = " ".repeat(indent);
  return `${indentStr}<w:p>\n${indentStr}  <w:r>\n${indentStr}    <w:br w:type="page"/>\n${indentStr}  </w:r>\n${indentStr}</w:p>\n`;
}

function serializeSectionProperties(headerRelId: string, indent: number): string {
  const indentStr = " ".repeat(indent);
  const margin = inchesToTwips(MARGIN_INCHES);
  let xml = `${indentStr}<w:sectPr>\n`;
  xml += `${indentStr}  <w:headerReference w:type="default" r:id="${headerRelId}"/>\n`;
  xml += `${indentStr}  <w:pgSz w:w="${PAGE_WIDTH_TWIPS}" w:h="${PAGE_HEIGHT_TWIPS}"/>\n`;
  xml += `${indentStr}  <w:pgMar w:top="${margin}" w:right="${margin}" w:bottom="${margin}" w:left="${margin}" w:header="720" w:footer="720" w:gutter="0"/>\n`;
  xml += `${indentStr}</w:sectPr>\n`;
  return xml;
}

/**
 * Serializes style directives to the WordprocessingML main document part.
 * Builds XML manually, one paragraph per directive.
 */
export function serializeDirectives(directives: readonly StyleDirective[], headerRelId: string): string {
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  xml += `<w:document xmlns:w="${WORDPROCESSING_NS}" xmlns:r="${RELATIONSHIPS_NS}">\n`;
  xml += "  <w:body>\n";

  for (const directive of directives) {
    if (directive.type === "paragraph") {
      xml += serializeParagraph(directive, 4);
    } else {
      xml += serializePageBreak(4);
    }
  }

  xml += serializeSectionProperties(headerRelId, 4);
  xml += "  </w:body>\n";
  xml += "</w:document>";
  return xml;
}
