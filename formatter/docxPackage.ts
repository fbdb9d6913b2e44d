import JSZip from "jszip";
import { RELATIONSHIPS_NS, WORDPROCESSING_NS, escapeXml, serializeDirectives } from "./docxSerializer";
import { FONT_FAMILY, FONT_SIZE_HALF_POINTS, LINE_SPACING } from "./documentStyle";
import type { StyleDirective } from "./types";

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
const PACKAGE_RELATIONSHIPS_NS = "http://schemas.openxmlformats.org/package/2006/relationships";
const OFFICE_DOC_REL = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";

const HEADER_REL_ID = "rId2";

const CONTENT_TYPES_XML =
  XML_DECLARATION +
  `<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
  <Default Extension="xml" ContentType="application/xml"/>
  <Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
  <Override PartName="/word/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml"/>
  <Override PartName="/word/header1.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.header+xml"/>
</Types>`;

const ROOT_RELS_XML =
  XML_DECLARATION +
  `<Relationships xmlns="${PACKAGE_RELATIONSHIPS_NS}">
  <Relationship Id="rId1" Type="${OFFICE_DOC_REL}/officeDocument" Target="word/document.xml"/>
</Relationships>`;

const DOCUMENT_RELS_XML =
  XML_DECLARATION +
  `<Relationships xmlns="${PACKAGE_RELATIONSHIPS_NS}">
  <Relationship Id="rId1" Type="${OFFICE_DOC_REL}/styles" Target="styles.xml"/>
  <Relationship Id="${HEADER_REL_ID}" Type="${OFFICE_DOC_REL}/header" Target="header1.xml"/>
</Relationships>`;

/**
 * Normal style carries the document-wide defaults: font, double spacing and
 * no space before or after paragraphs.
 */
function buildStylesXml(): string {
  const font = escapeXml(FONT_FAMILY);
  return (
    XML_DECLARATION +
    `<w:styles xmlns:w="${WORDPROCESSING_NS}">
  <w:docDefaults>
    <w:rPrDefault>
      <w:rPr>
        <w:rFonts w:ascii="${font}" w:hAnsi="${font}" w:eastAsia="${font}" w:cs="${font}"/>
        <w:sz w:val="${FONT_SIZE_HALF_POINTS}"/>
        <w:szCs w:val="${FONT_SIZE_HALF_POINTS}"/>
      </w:rPr>
    </w:rPrDefault>
    <w:pPrDefault>
      <w:pPr>
        <w:spacing w:before="0" w:after="0" w:line="${LINE_SPACING}" w:lineRule="auto"/>
      </w:pPr>
    </w:pPrDefault>
  </w:docDefaults>
  <w:style w:type="paragraph" w:default="1" w:styleId="Normal">
    <w:name w:val="Normal"/>
    <w:pPr>
      <w:spacing w:before="0" w:after="0" w:line="${LINE_SPACING}" w:lineRule="auto"/>
    </w:pPr>
    <w:rPr>
      <w:rFonts w:ascii="${font}" w:hAnsi="${font}" w:eastAsia="${font}" w:cs="${font}"/>
      <w:sz w:val="${FONT_SIZE_HALF_POINTS}"/>
      <w:szCs w:val="${FONT_SIZE_HALF_POINTS}"/>
    </w:rPr>
  </w:style>
</w:styles>`
  );
}

/**
 * Header with a right-aligned PAGE field, updated by Word on every page.
 */
function buildHeaderXml(): string {
  return (
    XML_DECLARATION +
    `<w:hdr xmlns:w="${WORDPROCESSING_NS}" xmlns:r="${RELATIONSHIPS_NS}">
  <w:p>
    <w:pPr>
      <w:jc w:val="right"/>
    </w:pPr>
    <w:r>
      <w:fldChar w:fldCharType="begin"/>
    </w:r>
    <w:r>
      <w:instrText xml:space="preserve">PAGE</w:instrText>
    </w:r>
    <w:r>
      <w:fldChar w:fldCharType="separate"/>
    </w:r>
    <w:r>
      <w:t>1</w:t>
    </w:r>
    <w:r>
      <w:fldChar w:fldCharType="end"/>
    </w:r>
  </w:p>
</w:hdr>`
  );
}

/**
 * Renders the directives into a complete .docx package.
 */
export async function renderDocx(directives: readonly StyleDirective[]): Promise<Buffer> {
  const zip = new JSZip();
  zip.file("[Content_Types].xml", CONTENT_TYPES_XML);
  zip.file("_rels/.rels", ROOT_RELS_XML);
  zip.file("word/_rels/document.xml.rels", DOCUMENT_RELS_XML);
  zip.file("word/document.xml", serializeDirectives(directives, HEADER_REL_ID));
  zip.file("word/styles.xml", buildStylesXml());
  zip.file("word/header1.xml", buildHeaderXml());

  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}
